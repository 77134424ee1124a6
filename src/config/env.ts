import { config as loadEnv } from "dotenv";
import { z } from "zod";

loadEnv();

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.coerce.number().int().positive().default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).optional(),
  REDIS_URL: z.string().min(1).default("redis://localhost:6379"),
  CORS_ORIGINS: z
    .string()
    .default("http://localhost:3000,http://localhost:5173,http://127.0.0.1:5173")
    .transform((value) => value.split(",").map((item) => item.trim()).filter(Boolean)),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(600),
  TAX_RATES_PATH: z.string().min(1).default("tax-rates.json"),
  TRADE_AGREEMENTS_PATH: z.string().min(1).default("trade-agreements.json"),
  BATCH_MAX_LINES: z.coerce.number().int().positive().default(1000)
});

export const env = envSchema.parse(process.env);
