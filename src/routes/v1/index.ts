import { Router } from "express";
import type { MarketPriceEngine } from "../../engine.js";
import { createPricesRouter } from "./prices.js";

export function createV1Router(engine: MarketPriceEngine): Router {
  const router = Router();
  router.use("/", createPricesRouter(engine));
  return router;
}
