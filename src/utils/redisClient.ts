import { Redis } from "ioredis";
import type { Credentials } from "../config/engineConfig.js";
import { info, error as logError } from "./logger.js";

/**
 * The subset of Redis commands the signal store uses. Implemented by the
 * ioredis wrapper below and by MemoryRedis.
 */
export interface KeyValueStore {
  setex(key: string, seconds: number, value: string): Promise<unknown>;
  get(key: string): Promise<string | null>;
  lpush(key: string, value: string): Promise<number>;
  ltrim(key: string, start: number, stop: number): Promise<unknown>;
  lrange(key: string, start: number, stop: number): Promise<string[]>;
  hincrby(key: string, field: string, increment: number): Promise<number>;
  hgetall(key: string): Promise<Record<string, string>>;
  close(): Promise<void>;
}

export function createRedisClient(credentials: Pick<Credentials, "REDIS_HOST" | "REDIS_PORT" | "REDIS_DB">): Redis {
  const redis = new Redis({
    host: credentials.REDIS_HOST,
    port: credentials.REDIS_PORT,
    db: credentials.REDIS_DB,
    maxRetriesPerRequest: 2,
  });

  redis.on("error", (err: Error) => {
    logError("Redis", "Redis Client Error", err);
  });

  redis.on("connect", () => {
    info("Redis", `Redis Client Connected (${credentials.REDIS_HOST}:${credentials.REDIS_PORT}/${credentials.REDIS_DB})`);
  });

  return redis;
}

export function redisKeyValueStore(redis: Redis): KeyValueStore {
  return {
    setex: (key, seconds, value) => redis.setex(key, seconds, value),
    get: (key) => redis.get(key),
    lpush: (key, value) => redis.lpush(key, value),
    ltrim: (key, start, stop) => redis.ltrim(key, start, stop),
    lrange: (key, start, stop) => redis.lrange(key, start, stop),
    hincrby: (key, field, increment) => redis.hincrby(key, field, increment),
    hgetall: (key) => redis.hgetall(key),
    close: async () => {
      await redis.quit();
    },
  };
}
