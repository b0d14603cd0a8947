/**
 * Telegram Notifier
 *
 * Sends emitted signals and health alerts to Telegram
 */

import TelegramBot from "node-telegram-bot-api";
import { classifyAsset } from "../assets/assetClassifier.js";
import type { Credentials } from "../config/engineConfig.js";
import type { IndicatorBundle } from "../indicators/types.js";
import type { EvaluationOutcome, Signal } from "../signals/types.js";
import { info, warn, error as logError } from "./logger.js";

export interface MessageSender {
  sendMessage(chatId: string, text: string, options?: TelegramBot.SendMessageOptions): Promise<unknown>;
}

let bot: MessageSender | null = null;
let chatId: string | null = null;
let isEnabled = false;

/**
 * Initialize Telegram bot
 */
export function initTelegram(
  credentials: Pick<Credentials, "TELEGRAM_BOT_TOKEN" | "TELEGRAM_CHAT_ID">,
  sender?: MessageSender
): void {
  const botToken = credentials.TELEGRAM_BOT_TOKEN;
  const telegramChatId = credentials.TELEGRAM_CHAT_ID;

  if (!telegramChatId || (!botToken && !sender)) {
    warn("TelegramNotifier", "Telegram credentials not configured. Notifications disabled.");
    bot = null;
    isEnabled = false;
    return;
  }

  try {
    bot = sender ?? new TelegramBot(botToken ?? "", { polling: false });
    chatId = telegramChatId;
    isEnabled = true;
    info("TelegramNotifier", "Telegram bot initialized successfully");
  } catch (err) {
    logError("TelegramNotifier", "Failed to initialize Telegram bot", err);
    isEnabled = false;
  }
}

/**
 * Check if Telegram is enabled
 */
export function isTelegramEnabled(): boolean {
  return isEnabled;
}

/**
 * Send a Telegram message
 */
async function sendMessage(message: string, parseMode: "Markdown" | "HTML" = "Markdown"): Promise<boolean> {
  if (!isEnabled || !bot || !chatId) {
    return false;
  }

  try {
    await bot.sendMessage(chatId, message, { parse_mode: parseMode });
    return true;
  } catch (err) {
    logError("TelegramNotifier", "Failed to send Telegram message", err);
    return false;
  }
}

/**
 * Decimal places to quote a price with
 */
export function pricePrecision(instrument: string): number {
  const assetClass = classifyAsset(instrument);
  if (assetClass === "crypto" || assetClass === "metal") return 2;
  return instrument.toUpperCase().includes("JPY") ? 3 : 5;
}

/**
 * Format signal for Telegram
 */
export function formatSignalMessage(
  signal: Signal,
  indicators?: Pick<IndicatorBundle, "trend" | "momentum">
): string {
  const digits = pricePrecision(signal.instrument);
  const icon = signal.action === "BUY" ? "🟢" : signal.action === "SELL" ? "🔴" : "⚪";
  const fmt = (value: number | null) => (value === null ? "-" : value.toFixed(digits));

  let message =
    `${icon} *${signal.action} ${signal.instrument}*\n\n` +
    `*Entry:* ${fmt(signal.price)}\n` +
    `*Stop Loss:* ${fmt(signal.stopLoss)}\n` +
    `*Take Profit:* ${fmt(signal.takeProfit)}\n` +
    `*Score:* ${signal.score.toFixed(1)}/100\n` +
    `*Confidence:* ${signal.confidence.toFixed(0)}/100\n`;

  if (indicators) {
    const change = indicators.momentum.changePct;
    message +=
      `*Trend:* ${indicators.trend.direction} (${indicators.trend.strength.toFixed(0)})\n` +
      `*Momentum:* ${indicators.momentum.direction} (${change >= 0 ? "+" : ""}${change.toFixed(3)}%)\n`;
  }

  if (signal.reasons.length > 0) {
    message += `\n*Reasons:*\n` + signal.reasons.map((r) => `• ${r}`).join("\n") + "\n";
  }

  message += `\n*Time:* ${new Date(signal.timestamp).toISOString()}`;
  return message;
}

/**
 * Sink entry point: only emitted signals go out
 */
export async function notifySignal(outcome: EvaluationOutcome): Promise<void> {
  if (!isEnabled || outcome.kind !== "emitted") {
    return;
  }

  const sent = await sendMessage(formatSignalMessage(outcome.signal, outcome.indicators));
  if (sent) {
    info("TelegramNotifier", `Sent ${outcome.signal.action} notification for ${outcome.signal.instrument}`);
  }
}

/**
 * Send custom notification
 */
export async function notifyCustom(message: string): Promise<void> {
  if (!isEnabled) {
    return;
  }

  if (await sendMessage(message)) {
    info("TelegramNotifier", "Sent custom notification");
  }
}
