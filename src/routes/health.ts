import { Router } from "express";
import os from "os";
import { getEnv } from "../config/env.js";
import type { MarketPriceEngine } from "../engine.js";

export function createHealthRouter(engine: MarketPriceEngine): Router {
  const router = Router();

  router.get("/health", (_req, res) => {
    const env = getEnv();

    res.json({
      status: "healthy",
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      environment: env.NODE_ENV,
      memory: {
        used: Math.round(process.memoryUsage().heapUsed / 1024 / 1024),
        total: Math.round(process.memoryUsage().heapTotal / 1024 / 1024),
      },
      cpu: {
        cores: os.cpus().length,
        load: os.loadavg(),
      },
      engine: {
        families: engine.config.families,
        outboundRequests: engine.gate.requestCount,
        cachedConsensus: engine.cache.consensus.size(),
        cachedScrapes: engine.cache.scrape.size(),
      },
      version: process.env.npm_package_version ?? "0.1.0",
    });
  });

  router.get("/health/ready", (_req, res) => {
    const adapters = engine.config.families.flatMap((family) =>
      engine.chain.adaptersFor(family).map((adapter) => adapter.id)
    );

    res.json({
      ready: adapters.length > 0,
      adapters,
      timestamp: new Date().toISOString(),
    });
  });

  router.get("/health/live", (_req, res) => {
    res.json({
      alive: true,
      timestamp: new Date().toISOString(),
    });
  });

  return router;
}
