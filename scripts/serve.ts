/**
 * serve.ts — Start the HTTP service.
 *
 * Usage: npx tsx scripts/serve.ts
 * Configuration comes from the environment (and .env); see .env.example.
 */

import "dotenv/config";
import {
  loadConfig,
  createLogger,
  createServiceContext,
  buildServer,
} from "../src/index.js";

async function main() {
  const config = loadConfig();
  const logger = createLogger(config.LOG_LEVEL);
  const ctx = createServiceContext(config, logger);
  const app = buildServer(ctx, { logLevel: config.LOG_LEVEL });

  const shutdown = async (signal: string) => {
    logger.info({ signal }, "shutting down");
    await app.close();
    process.exit(0);
  };
  const onSignal = (signal: NodeJS.Signals) => {
    shutdown(signal).catch((err) => {
      logger.error({ err }, "shutdown failed");
      process.exit(1);
    });
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  await app.listen({ host: config.HOST, port: config.PORT });
  logger.info(
    {
      host: config.HOST,
      port: config.PORT,
      sites_dir: config.SITES_DIR,
      detector: ctx.detector ? config.DETECTOR_MODE : "unavailable",
      model: config.OPENROUTER_MODEL,
    },
    "service started"
  );
}

main().catch((err) => {
  console.error("Error:", err instanceof Error ? err.message : err);
  process.exit(1);
});
