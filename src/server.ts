import { buildApp } from "./app.js";
import { env } from "./config/env.js";
import { logger } from "./infrastructure/logger.js";

const app = await buildApp();

try {
  await app.listen({ port: env.PORT, host: env.HOST });
} catch (error) {
  logger.fatal({ error }, "server failed to start");
  await app.close();
  process.exit(1);
}
