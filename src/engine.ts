import type { EngineConfig, SourceFamily } from "./types/contracts.js";
import { createChildLogger, type Logger } from "./utils/logger.js";
import { FallbackChain } from "./services/fallbackChain.js";
import { MarketPriceService } from "./services/marketPrice.js";
import { PriceCache } from "./services/priceCache.js";
import { RequestGate, type FetchLike } from "./services/requestGate.js";
import { EbayApiAdapter } from "./services/sources/ebayApi.js";
import { EbayScrapeAdapter } from "./services/sources/ebayScrape.js";
import { ReverbApiAdapter } from "./services/sources/reverbApi.js";
import { ReverbScrapeAdapter } from "./services/sources/reverbScrape.js";
import { SimulatedAdapter, type RandomSource } from "./services/sources/simulated.js";
import type { Clock, SourceAdapter } from "./services/sources/types.js";

export type EngineDependencies = {
  fetchImpl?: FetchLike;
  random?: RandomSource;
  sleep?: (ms: number) => Promise<void>;
  clock?: Clock;
  logger?: Logger;
};

export type MarketPriceEngine = {
  config: EngineConfig;
  gate: RequestGate;
  cache: PriceCache;
  chain: FallbackChain;
  service: MarketPriceService;
  stop(): Promise<void>;
};

/**
 * Wires one request gate and one cache into every adapter, so all lookups in
 * the process share a single politeness budget and a single cache.
 */
export function createMarketPriceEngine(
  config: EngineConfig,
  dependencies: EngineDependencies = {}
): MarketPriceEngine {
  const logger = dependencies.logger ?? createChildLogger({ component: "engine" });
  const clock = dependencies.clock;

  const gate = new RequestGate({
    ...config.gate,
    fetchImpl: dependencies.fetchImpl,
    random: dependencies.random,
    sleep: dependencies.sleep,
    logger: logger.child({ component: "request-gate" })
  });

  const cache = new PriceCache({
    cacheDir: config.cacheDir,
    consensusTtlDays: config.consensusTtlDays,
    scrapeTtlHours: config.scrapeTtlHours,
    now: clock ? () => clock().getTime() : undefined,
    logger: logger.child({ component: "price-cache" })
  });

  const adapters = config.families.flatMap((family) => buildFamilyAdapters(family, config, gate, cache, dependencies, logger));

  const chain = new FallbackChain({
    families: config.families,
    adapters,
    logger: logger.child({ component: "fallback-chain" })
  });

  const service = new MarketPriceService({
    chain,
    cache,
    workerPoolSize: config.workerPoolSize,
    deal: config.deal,
    simulatedInclusion: config.simulatedInclusion,
    now: clock,
    logger: logger.child({ component: "market-price" })
  });

  logger.info({
    msg: "Market price engine ready",
    families: config.families,
    adapters: adapters.map((adapter) => adapter.id),
    cacheDir: config.cacheDir
  });

  return {
    config,
    gate,
    cache,
    chain,
    service,
    async stop() {
      await service.stop();
      await gate.stop();
    }
  };
}

function buildFamilyAdapters(
  family: SourceFamily,
  config: EngineConfig,
  gate: RequestGate,
  cache: PriceCache,
  dependencies: EngineDependencies,
  logger: Logger
): SourceAdapter[] {
  const scrapeOptions = {
    gate,
    cache,
    scrape: config.scrape,
    clock: dependencies.clock,
    logger: logger.child({ component: "scrape-adapter", family })
  };
  const simulated = new SimulatedAdapter({ family, random: dependencies.random, clock: dependencies.clock });

  switch (family) {
    case "reverb":
      return [
        new ReverbApiAdapter({ gate, token: config.reverbApiToken, useSandbox: config.useSandbox, clock: dependencies.clock }),
        new ReverbScrapeAdapter(scrapeOptions),
        simulated
      ];
    case "ebay":
      return [
        new EbayApiAdapter({ gate, token: config.ebayApiToken, useSandbox: config.useSandbox, clock: dependencies.clock }),
        new EbayScrapeAdapter(scrapeOptions),
        simulated
      ];
  }
}

export { FallbackChain } from "./services/fallbackChain.js";
export { MarketPriceService } from "./services/marketPrice.js";
export { PriceCache } from "./services/priceCache.js";
export { RequestGate } from "./services/requestGate.js";
export { assessDeal, computeTargetPrice, scoreRatio, scoreSavings } from "./services/dealScorer.js";
export { fuseObservations } from "./services/priceFusion.js";
export { categorizeItem } from "./services/itemCategory.js";
export { normalizeQuery } from "./utils/normalize.js";
export type * from "./types/contracts.js";
