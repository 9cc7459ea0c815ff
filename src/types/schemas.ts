import { z } from "zod";
import type { ConsensusResult, ListingObservation } from "./contracts.js";

const listingCondition = z.enum([
  "New",
  "Open Box",
  "Like New",
  "Very Good",
  "Good",
  "Fair",
  "Poor/For Parts",
  "Refurbished",
  "Used",
  "Unknown"
]);

const sourceFamily = z.enum(["reverb", "ebay"]);

const conditionHistogram = z.record(listingCondition, z.number());

const listingSample = z.object({
  title: z.string(),
  price: z.number(),
  condition: listingCondition,
  url: z.string().optional()
});

export const listingObservationSchema: z.ZodType<ListingObservation> = z.object({
  kind: z.enum(["api", "scraped"]),
  family: sourceFamily,
  price: z.number().positive(),
  capturedAt: z.string(),
  distribution: z.object({
    average: z.number(),
    median: z.number(),
    min: z.number(),
    max: z.number(),
    count: z.number().int().nonnegative(),
    conditions: conditionHistogram
  }),
  sampleListings: z.array(listingSample)
});

export const consensusResultSchema: z.ZodType<ConsensusResult> = z.object({
  query: z.string(),
  averagePrice: z.number().nonnegative(),
  medianPrice: z.number().optional(),
  minPrice: z.number().optional(),
  maxPrice: z.number().optional(),
  confidenceLevel: z.number().min(0).max(100),
  sources: z.record(z.string(), z.number()),
  sourceType: z.string(),
  sourceKind: z.enum(["api", "scraped", "simulated"]).nullable(),
  count: z.number().int().nonnegative(),
  listingCount: z.number().int().nonnegative(),
  conditions: conditionHistogram,
  volatility: z.enum(["Low", "Medium", "High", "Unknown"]),
  capturedAt: z.string()
});
