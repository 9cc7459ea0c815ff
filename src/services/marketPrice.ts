import Bottleneck from "bottleneck";
import type {
  ConsensusResult,
  DealAssessment,
  DealThresholds,
  SimulatedInclusionPolicy
} from "../types/contracts.js";
import { createChildLogger, type Logger } from "../utils/logger.js";
import { normalizeQuery } from "../utils/normalize.js";
import { assessDeal, DEFAULT_DEAL_THRESHOLDS, type DealInput } from "./dealScorer.js";
import type { FallbackChain } from "./fallbackChain.js";
import type { PriceCache } from "./priceCache.js";
import { fuseObservations, noDataResult } from "./priceFusion.js";

export type MarketPriceServiceOptions = {
  chain: FallbackChain;
  cache: PriceCache;
  workerPoolSize?: number;
  deal?: DealThresholds;
  simulatedInclusion?: SimulatedInclusionPolicy;
  now?: () => Date;
  logger?: Logger;
};

export type MarketPriceRequestOptions = {
  forceRefresh?: boolean;
};

const DEFAULT_WORKER_POOL_SIZE = 5;

export class MarketPriceService {
  private readonly chain: FallbackChain;
  private readonly cache: PriceCache;
  private readonly pool: Bottleneck;
  private readonly deal: DealThresholds;
  private readonly simulatedInclusion: SimulatedInclusionPolicy;
  private readonly now: () => Date;
  private readonly log: Logger;

  constructor(options: MarketPriceServiceOptions) {
    this.chain = options.chain;
    this.cache = options.cache;
    this.pool = new Bottleneck({
      maxConcurrent: Math.max(1, Math.floor(options.workerPoolSize ?? DEFAULT_WORKER_POOL_SIZE))
    });
    this.deal = options.deal ?? DEFAULT_DEAL_THRESHOLDS;
    this.simulatedInclusion = options.simulatedInclusion ?? "filler";
    this.now = options.now ?? (() => new Date());
    this.log = options.logger ?? createChildLogger({ component: "market-price" });
  }

  /**
   * Consensus price for one description. Served from the consensus cache
   * unless the entry is stale or a refresh is forced. Results without data
   * are returned but never cached.
   */
  async getMarketPrice(description: string, options: MarketPriceRequestOptions = {}): Promise<ConsensusResult> {
    const query = normalizeQuery(description);
    if (!query) {
      this.log.warn({ msg: "Description normalized to an empty query", description });
      return noDataResult(query, this.now());
    }

    if (!options.forceRefresh) {
      const cached = this.cache.consensus.get(query);
      if (cached) {
        this.log.debug({ msg: "Consensus cache hit", query });
        return cached.payload;
      }
    }

    const observations = await this.chain.collect(query);
    const result = fuseObservations(query, observations, {
      simulatedInclusion: this.simulatedInclusion,
      now: this.now
    });

    if (result.sourceType === "no_data") {
      this.log.warn({ msg: "No price data for query", query });
      return result;
    }

    try {
      await this.cache.consensus.put(query, result);
    } catch (error) {
      this.log.warn({
        msg: "Consensus cache write failed",
        query,
        error: error instanceof Error ? error.message : String(error)
      });
    }
    this.log.info({
      msg: "Consensus price computed",
      query,
      averagePrice: result.averagePrice,
      confidence: result.confidenceLevel,
      sourceType: result.sourceType
    });
    return result;
  }

  /** Fans descriptions out over the worker pool; results keep input order. */
  getMarketPrices(descriptions: readonly string[], options: MarketPriceRequestOptions = {}): Promise<ConsensusResult[]> {
    return Promise.all(
      descriptions.map((description) => this.pool.schedule(() => this.getMarketPrice(description, options)))
    );
  }

  async assessDeal(input: DealInput, options: MarketPriceRequestOptions = {}): Promise<DealAssessment> {
    const consensus = await this.getMarketPrice(input.description, options);
    return assessDeal(input, consensus, this.deal);
  }

  async stop(): Promise<void> {
    await this.pool.stop({ dropWaitingJobs: true });
  }
}
