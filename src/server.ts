import { engineConfigFromEnv, initEnv } from "./config/env.js";
import { createApp } from "./app.js";
import { createMarketPriceEngine } from "./engine.js";
import { logger } from "./utils/logger.js";

const env = initEnv();
const engine = createMarketPriceEngine(engineConfigFromEnv(env), { logger });
const app = createApp(engine);

const server = app.listen(env.PORT, () => {
  logger.info({
    msg: "Server started",
    port: env.PORT,
    environment: env.NODE_ENV,
    families: engine.config.families,
  });
});

function gracefulShutdown(signal: string) {
  logger.info({
    msg: "Graceful shutdown initiated",
    signal,
  });

  server.close((err) => {
    if (err) {
      logger.error({
        msg: "Error during shutdown",
        error: err.message,
      });
      process.exit(1);
    }

    engine.stop().then(
      () => {
        logger.info({ msg: "Server closed gracefully" });
        process.exit(0);
      },
      (stopError: unknown) => {
        logger.error({
          msg: "Engine did not stop cleanly",
          error: stopError instanceof Error ? stopError.message : String(stopError),
        });
        process.exit(1);
      }
    );
  });

  setTimeout(() => {
    logger.error({
      msg: "Forced shutdown after timeout",
    });
    process.exit(1);
  }, 10000).unref();
}

process.on("SIGTERM", () => gracefulShutdown("SIGTERM"));
process.on("SIGINT", () => gracefulShutdown("SIGINT"));
