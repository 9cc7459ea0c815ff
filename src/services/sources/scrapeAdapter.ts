import type { ListingObservation, ScrapeConfig, SourceFamily } from "../../types/contracts.js";
import { PriceCache } from "../priceCache.js";
import type { RequestGate } from "../requestGate.js";
import { createChildLogger, type Logger } from "../../utils/logger.js";
import { sampleListings, summarizeListings, type ParsedListing } from "./listingStats.js";
import { systemClock, type Clock, type SourceAdapter } from "./types.js";

export type ParsedPage = {
  listings: ParsedListing[];
  // Listing cards seen on the page, including ones skipped for a bad price.
  cardCount: number;
};

export type ScrapeAdapterOptions = {
  gate: RequestGate;
  cache?: PriceCache;
  scrape?: Partial<ScrapeConfig>;
  clock?: Clock;
  logger?: Logger;
};

const DEFAULT_SCRAPE_CONFIG: ScrapeConfig = {
  maxPages: 3,
  targetResults: 50,
  pageSize: 60
};

/**
 * Paginated sold-listing search through the shared request gate, with the
 * scrape cache namespace in front of it.
 */
export abstract class ScrapeAdapter implements SourceAdapter {
  abstract readonly id: string;
  abstract readonly family: SourceFamily;
  readonly kind = "scraped";

  protected readonly gate: RequestGate;
  protected readonly cache: PriceCache | undefined;
  protected readonly config: ScrapeConfig;
  protected readonly clock: Clock;
  protected readonly log: Logger;

  constructor(options: ScrapeAdapterOptions) {
    this.gate = options.gate;
    this.cache = options.cache;
    this.config = {
      maxPages: options.scrape?.maxPages ?? DEFAULT_SCRAPE_CONFIG.maxPages,
      targetResults: options.scrape?.targetResults ?? DEFAULT_SCRAPE_CONFIG.targetResults,
      pageSize: options.scrape?.pageSize ?? DEFAULT_SCRAPE_CONFIG.pageSize
    };
    this.clock = options.clock ?? systemClock;
    this.log = options.logger ?? createChildLogger({ component: "scrape-adapter" });
  }

  protected abstract pageURL(query: string, page: number, pageSize: number): string;

  protected abstract parsePage(html: string): ParsedPage;

  async fetch(query: string): Promise<ListingObservation | null> {
    if (!query) {
      return null;
    }

    const cacheKey = PriceCache.scrapeKey(this.family, query);
    const cached = this.cache?.scrape.get(cacheKey);
    if (cached) {
      this.log.debug({ msg: "Scrape cache hit", source: this.id, query });
      return cached.payload;
    }

    const listings = await this.collect(query);
    const distribution = summarizeListings(listings);
    if (!distribution) {
      this.log.info({ msg: "No listings scraped", source: this.id, query });
      return null;
    }

    const observation: ListingObservation = {
      kind: "scraped",
      family: this.family,
      price: distribution.average,
      distribution,
      sampleListings: sampleListings(listings),
      capturedAt: this.clock().toISOString()
    };

    if (this.cache) {
      try {
        await this.cache.scrape.put(cacheKey, observation);
      } catch (error) {
        this.log.warn({
          msg: "Scrape cache write failed",
          source: this.id,
          query,
          error: error instanceof Error ? error.message : String(error)
        });
      }
    }
    return observation;
  }

  private async collect(query: string): Promise<ParsedListing[]> {
    const { maxPages, targetResults, pageSize } = this.config;
    const collected: ParsedListing[] = [];

    for (let page = 1; page <= maxPages; page += 1) {
      const result = await this.gate.execute(this.pageURL(query, page, pageSize));
      if (!result.ok) {
        this.log.warn({ msg: "Scrape page failed", source: this.id, page, reason: result.reason });
        break;
      }

      const parsed = this.parsePage(result.body);
      collected.push(...parsed.listings);
      this.log.debug({ msg: "Scraped page", source: this.id, page, found: parsed.listings.length });

      if (collected.length >= targetResults) {
        return collected.slice(0, targetResults);
      }
      if (parsed.cardCount < pageSize / 2) {
        break;
      }
    }

    return collected;
  }
}
