import {
  CATEGORY_HEURISTICS,
  FALLBACK_RANGE,
  FAMILY_PRICE_FACTORS,
  JITTER_RANGE,
  KNOWN_BRANDS,
  type PriceRange
} from "../../config/priceHeuristics.js";
import type { SimulatedObservation, SourceFamily } from "../../types/contracts.js";
import { systemClock, type Clock, type SourceAdapter } from "./types.js";

export type RandomSource = () => number;

export type HeuristicMatch = {
  brand?: string;
  category?: string;
  range: PriceRange;
};

export type SimulatedAdapterOptions = {
  family: SourceFamily;
  random?: RandomSource;
  clock?: Clock;
};

/**
 * Last-resort source. Derives a plausible price from brand and category
 * keyword tables, so it always produces an observation.
 */
export class SimulatedAdapter implements SourceAdapter {
  readonly id: string;
  readonly family: SourceFamily;
  readonly kind = "simulated";

  private readonly random: RandomSource;
  private readonly clock: Clock;

  constructor(options: SimulatedAdapterOptions) {
    this.family = options.family;
    this.id = `${options.family}_simulated`;
    this.random = options.random ?? Math.random;
    this.clock = options.clock ?? systemClock;
  }

  async fetch(query: string): Promise<SimulatedObservation> {
    const match = matchHeuristics(query);
    const [factorLow, factorHigh] = FAMILY_PRICE_FACTORS[this.family];
    const [jitterLow, jitterHigh] = JITTER_RANGE;

    const base = this.between(match.range);
    const price = base * this.between([factorLow, factorHigh]) * this.between([jitterLow, jitterHigh]);

    return {
      kind: "simulated",
      family: this.family,
      price: Math.max(1, Math.round(price)),
      heuristic: {
        ...(match.brand ? { brand: match.brand } : {}),
        ...(match.category ? { category: match.category } : {})
      },
      capturedAt: this.clock().toISOString()
    };
  }

  private between([low, high]: PriceRange): number {
    return low + this.random() * (high - low);
  }
}

export function matchHeuristics(query: string): HeuristicMatch {
  const text = query.toLowerCase();
  const brand = KNOWN_BRANDS.find((candidate) => new RegExp(`\\b${candidate}\\b`).test(text));
  const heuristic = CATEGORY_HEURISTICS.find((entry) => entry.pattern.test(text));

  if (!heuristic) {
    return { brand, range: FALLBACK_RANGE };
  }

  const premium = brand !== undefined && heuristic.premiumBrands.includes(brand);
  return {
    brand,
    category: heuristic.category,
    range: premium ? heuristic.premiumRange : heuristic.standardRange
  };
}
