import pino from "pino";

import { env } from "../config/env.js";

export const logger =
  env.NODE_ENV === "production"
    ? pino({
        name: "tax-engine",
        level: env.LOG_LEVEL ?? "info"
      })
    : pino({
        name: "tax-engine",
        level: env.LOG_LEVEL ?? (env.NODE_ENV === "test" ? "silent" : "debug"),
        transport: {
          target: "pino/file",
          options: {
            destination: 1
          }
        }
      });
