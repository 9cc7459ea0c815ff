import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { pino } from "pino";
import type {
  EngineConfig,
  ListingCondition,
  ListingObservation,
  SimulatedObservation,
  SourceFamily
} from "../src/types/contracts.js";
import { RequestGate, type FetchLike, type RequestGateOptions } from "../src/services/requestGate.js";
import { summarizeListings, sampleListings } from "../src/services/sources/listingStats.js";

export const silentLogger = pino({ level: "silent" });

export const CAPTURED_AT = "2026-03-01T12:00:00.000Z";
export const fixedClock = () => new Date(CAPTURED_AT);

export const noSleep = async (_ms: number): Promise<void> => {};

export type RecordedCall = {
  url: URL;
  headers: Record<string, string>;
};

export function recordingFetch(
  handler: (url: URL, init: RequestInit | undefined) => Response | Promise<Response>
): { fetchImpl: FetchLike; calls: RecordedCall[] } {
  const calls: RecordedCall[] = [];
  const fetchImpl: FetchLike = async (input, init) => {
    const url = new URL(String(input));
    calls.push({ url, headers: Object.fromEntries(new Headers(init?.headers).entries()) });
    return handler(url, init);
  };
  return { fetchImpl, calls };
}

export function fastGate(fetchImpl: FetchLike, overrides: RequestGateOptions = {}): RequestGate {
  return new RequestGate({
    minRequestIntervalMs: 0,
    maxRetries: 0,
    sleep: noSleep,
    random: () => 0,
    logger: silentLogger,
    fetchImpl,
    ...overrides
  });
}

export async function withTempDir<T>(run: (dir: string) => Promise<T>): Promise<T> {
  const dir = await mkdtemp(join(tmpdir(), "price-engine-"));
  try {
    return await run(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

export function listingObservation(
  family: SourceFamily,
  kind: "api" | "scraped",
  prices: number[],
  condition: ListingCondition = "Used"
): ListingObservation {
  const listings = prices.map((price, index) => ({ price, condition, title: `listing ${index + 1}` }));
  const distribution = summarizeListings(listings);
  if (!distribution) {
    throw new Error("listingObservation needs at least one price");
  }
  return {
    kind,
    family,
    price: distribution.average,
    distribution,
    sampleListings: sampleListings(listings),
    capturedAt: CAPTURED_AT
  };
}

export function simulatedObservation(
  family: SourceFamily,
  price: number,
  heuristic: SimulatedObservation["heuristic"] = {}
): SimulatedObservation {
  return { kind: "simulated", family, price, heuristic, capturedAt: CAPTURED_AT };
}

export function engineConfig(cacheDir: string, overrides: Partial<EngineConfig> = {}): EngineConfig {
  return {
    families: ["reverb", "ebay"],
    useSandbox: false,
    cacheDir,
    consensusTtlDays: 7,
    scrapeTtlHours: 24,
    gate: {
      minRequestIntervalMs: 0,
      maxRequestsPerSession: 20,
      sessionRestMs: 0,
      maxRetries: 0,
      rateLimitBackoffMs: 0,
      retryBackoffMs: 0,
      requestTimeoutMs: 1000
    },
    scrape: { maxPages: 3, targetResults: 50, pageSize: 60 },
    workerPoolSize: 2,
    deal: { dealThreshold: 0.85, overpricedThreshold: 1.15, auctionDiscount: 0.85 },
    simulatedInclusion: "filler",
    ...overrides
  };
}

export function ebaySoldCard(title: string, price: string, condition = "Pre-Owned", href = "https://www.ebay.com/itm/1"): string {
  return `<li class="s-item">
    <a class="s-item__link" href="${href}"><div class="s-item__title"><span>${title}</span></div></a>
    <span class="s-item__price">${price}</span>
    <span class="SECONDARY_INFO">${condition}</span>
  </li>`;
}

export function ebaySoldPage(cards: string[]): string {
  return `<html><body><ul class="srp-results">${cards.join("\n")}</ul></body></html>`;
}
