import { Redis } from "ioredis";
import { info, error as logError } from "./logger.js";

export interface RedisSettings {
  host: string;
  port: number;
  db: number;
}

/**
 * Create the Redis connection used by the analysis store
 */
export function createRedisClient(settings: RedisSettings): Redis {
  const redis = new Redis({
    host: settings.host,
    port: settings.port,
    db: settings.db,
    lazyConnect: true,
    maxRetriesPerRequest: 3,
  });

  redis.on("error", (err: Error) => {
    logError("Redis", "Redis Client Error", err);
  });

  redis.on("connect", () => {
    info("Redis", "Redis Client Connected");
  });

  return redis;
}
