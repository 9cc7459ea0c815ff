import type {
  ConditionHistogram,
  ListingCondition,
  ListingSample,
  PriceDistribution
} from "../../types/contracts.js";

export type ParsedListing = {
  price: number;
  condition: ListingCondition;
  title?: string;
  url?: string;
};

const SAMPLE_LIMIT = 5;

// Order matters: "like new" and "open box" must win over the bare "new".
const CONDITION_KEYWORDS: Array<[ListingCondition, RegExp]> = [
  ["Poor/For Parts", /(for parts|not working|parts only|poor|non-?functional)/],
  ["Refurbished", /(refurbished|remanufactured|restored)/],
  ["Open Box", /(open box|b-stock|b stock)/],
  ["Like New", /(like new|mint|near mint)/],
  ["Very Good", /(very good|excellent)/],
  ["Good", /\bgood\b/],
  ["Fair", /\bfair\b/],
  ["New", /(brand new|\bnew\b)/],
  ["Used", /(used|pre-?owned)/]
];

export function normalizeCondition(raw: string | null | undefined): ListingCondition {
  const text = (raw ?? "").trim().toLowerCase();
  if (!text) {
    return "Unknown";
  }

  for (const [condition, pattern] of CONDITION_KEYWORDS) {
    if (pattern.test(text)) {
      return condition;
    }
  }

  return "Used";
}

/**
 * Parses a single price cell. Returns null for ranges ("$10 to $20"),
 * empty cells and anything that is not a positive amount.
 */
export function parsePriceText(raw: string | null | undefined): number | null {
  const text = (raw ?? "").trim();
  if (!text || /\bto\b/i.test(text)) {
    return null;
  }

  const match = text.match(/\d{1,3}(?:,\d{3})+(?:\.\d+)?|\d+(?:\.\d+)?/);
  if (!match) {
    return null;
  }

  const value = Number(match[0].replace(/,/g, ""));
  if (!Number.isFinite(value) || value <= 0) {
    return null;
  }

  return round2(value);
}

export function parseAmount(value: unknown): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) && value > 0 ? round2(value) : null;
  }
  if (typeof value === "string") {
    return parsePriceText(value);
  }
  return null;
}

export function parseJSON(body: string): unknown {
  try {
    return JSON.parse(body);
  } catch {
    return null;
  }
}

export function median(values: readonly number[]): number {
  if (values.length === 0) {
    return 0;
  }

  const sorted = [...values].sort((left, right) => left - right);
  const middle = Math.floor(sorted.length / 2);
  if (sorted.length % 2 === 1) {
    return sorted[middle] ?? 0;
  }

  return ((sorted[middle - 1] ?? 0) + (sorted[middle] ?? 0)) / 2;
}

export function summarizeListings(listings: readonly ParsedListing[]): PriceDistribution | null {
  if (listings.length === 0) {
    return null;
  }

  const prices = listings.map((listing) => listing.price);
  const conditions: ConditionHistogram = {};
  for (const listing of listings) {
    conditions[listing.condition] = (conditions[listing.condition] ?? 0) + 1;
  }

  return {
    average: round2(prices.reduce((sum, price) => sum + price, 0) / prices.length),
    median: round2(median(prices)),
    min: Math.min(...prices),
    max: Math.max(...prices),
    count: prices.length,
    conditions
  };
}

export function sampleListings(listings: readonly ParsedListing[]): ListingSample[] {
  return listings.slice(0, SAMPLE_LIMIT).map((listing) => ({
    title: listing.title ?? "",
    price: listing.price,
    condition: listing.condition,
    ...(listing.url ? { url: listing.url } : {})
  }));
}

export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}
