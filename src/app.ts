import express, { type Express as ExpressApp } from "express";
import type { MarketPriceEngine } from "./engine.js";
import { createHelmet } from "./middleware/helmet.js";
import { createCors } from "./middleware/cors.js";
import { createRateLimiter } from "./middleware/rateLimit.js";
import { errorHandler, notFoundHandler } from "./middleware/error.js";
import { logger } from "./utils/logger.js";
import { createHealthRouter } from "./routes/health.js";
import { createV1Router } from "./routes/v1/index.js";

declare global {
  namespace Express {
    interface Request {
      requestTime?: number;
    }
  }
}

export function createApp(engine: MarketPriceEngine): ExpressApp {
  const app = express();

  app.use(express.json({ limit: "64kb" }));

  app.use(createHelmet());
  app.use(createCors());

  app.use((req, res, next) => {
    req.requestTime = Date.now();
    res.on("finish", () => {
      logger.info({
        msg: "Request completed",
        method: req.method,
        url: req.originalUrl,
        status: res.statusCode,
        durationMs: Date.now() - (req.requestTime ?? Date.now()),
        ip: req.ip,
      });
    });
    next();
  });

  app.use(createHealthRouter(engine));
  app.use("/api/v1", createRateLimiter(), createV1Router(engine));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
