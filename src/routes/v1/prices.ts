import { Router } from "express";
import { z } from "zod";
import type { MarketPriceEngine } from "../../engine.js";
import { AppError, asyncHandler } from "../../middleware/error.js";

const MAX_BATCH_ITEMS = 100;

const priceQuerySchema = z.object({
  q: z.string().trim().min(1, "q is required").max(300),
  refresh: z
    .enum(["true", "false", "1", "0"])
    .optional()
    .transform((value) => value === "true" || value === "1"),
});

const batchBodySchema = z.object({
  items: z.array(z.string().trim().min(1).max(300)).min(1).max(MAX_BATCH_ITEMS),
  refresh: z.boolean().optional(),
});

const dealBodySchema = z.object({
  description: z.string().trim().min(1).max(300),
  referencePrice: z.number().nonnegative(),
  retailPrice: z.number().positive().optional(),
  strategy: z.enum(["ratio", "savings"]).optional(),
  refresh: z.boolean().optional(),
});

const namespaceSchema = z.enum(["consensus", "scrape"]);

export function createPricesRouter(engine: MarketPriceEngine): Router {
  const router = Router();
  const { service, cache } = engine;

  router.get("/prices", asyncHandler(async (req, res) => {
    const { q, refresh } = priceQuerySchema.parse(req.query);
    const result = await service.getMarketPrice(q, { forceRefresh: refresh });
    res.json(result);
  }));

  router.post("/prices/batch", asyncHandler(async (req, res) => {
    const { items, refresh } = batchBodySchema.parse(req.body);
    const results = await service.getMarketPrices(items, { forceRefresh: refresh });
    res.json({ items: results });
  }));

  router.post("/deals/assess", asyncHandler(async (req, res) => {
    const { refresh, ...input } = dealBodySchema.parse(req.body);
    const assessment = await service.assessDeal(input, { forceRefresh: refresh });
    res.json(assessment);
  }));

  router.delete("/cache/:namespace", asyncHandler(async (req, res) => {
    const parsed = namespaceSchema.safeParse(req.params.namespace);
    if (!parsed.success) {
      throw new AppError(`Unknown cache namespace: ${req.params.namespace}`, 404, "unknown_namespace");
    }

    const removed = await cache.clear(parsed.data);
    res.json({ ok: true, namespace: parsed.data, removed });
  }));

  return router;
}
