import { Redis } from "ioredis";

import { env } from "../config/env.js";

// BullMQ requires maxRetriesPerRequest: null on connections it blocks on.
export function createRedisConnection(url: string = env.REDIS_URL): Redis {
  return new Redis(url, {
    maxRetriesPerRequest: null
  });
}
