import type { Signal } from "./types.js";

const WINDOW_MS = 60 * 60 * 1000;

/**
 * Trailing-hour emission budget. admit() checks and records in one
 * synchronous step, so concurrent cycles on the event loop cannot both take
 * the last slot. Rejected signals are dropped, never queued.
 */
export class PacingController {
  private admitted: number[] = [];

  constructor(private maxPerHour: () => number) {}

  admit(signal: Pick<Signal, "action">, now: number = Date.now()): boolean {
    if (signal.action === "NO_SIGNAL") {
      return true;
    }

    this.prune(now);
    if (this.admitted.length >= this.maxPerHour()) {
      return false;
    }
    this.admitted.push(now);
    return true;
  }

  /**
   * Admissions inside the trailing hour
   */
  count(now: number = Date.now()): number {
    this.prune(now);
    return this.admitted.length;
  }

  remaining(now: number = Date.now()): number {
    return Math.max(0, this.maxPerHour() - this.count(now));
  }

  reset(): void {
    this.admitted = [];
  }

  private prune(now: number): void {
    const cutoff = now - WINDOW_MS;
    this.admitted = this.admitted.filter((t) => t > cutoff);
  }
}
