import type {
  ConsensusResult,
  ListingObservation,
  MarketVolatility,
  Observation,
  SimulatedInclusionPolicy
} from "../types/contracts.js";
import { round2 } from "./sources/listingStats.js";

const API_CONFIDENCE = 90;
const SCRAPE_BASE_CONFIDENCE = 70;
const SCRAPE_SAMPLE_BONUS = 15;
const SCRAPE_SAMPLE_SATURATION = 20;
const SIMULATED_BASE_CONFIDENCE = 40;
const SIMULATED_MATCH_BONUS = 15;
const MAX_SUPPORT_BONUS = 10;
const MAX_CONFIDENCE = 100;

export type FusionOptions = {
  simulatedInclusion?: SimulatedInclusionPolicy;
  now?: () => Date;
};

export function baseConfidence(observation: Observation): number {
  switch (observation.kind) {
    case "api":
      return API_CONFIDENCE;
    case "scraped": {
      const samples = Math.min(observation.distribution.count, SCRAPE_SAMPLE_SATURATION);
      return SCRAPE_BASE_CONFIDENCE + (SCRAPE_SAMPLE_BONUS * samples) / SCRAPE_SAMPLE_SATURATION;
    }
    case "simulated":
      return (
        SIMULATED_BASE_CONFIDENCE +
        (observation.heuristic.brand ? SIMULATED_MATCH_BONUS : 0) +
        (observation.heuristic.category ? SIMULATED_MATCH_BONUS : 0)
      );
  }
}

export function sourceKey(observation: Observation): string {
  return `${observation.family}_${observation.kind}`;
}

export function selectPrimary(observations: readonly Observation[]): Observation | null {
  return (
    observations.find((observation) => observation.kind === "api") ??
    observations.find((observation) => observation.kind === "scraped") ??
    observations.find((observation) => observation.kind === "simulated") ??
    null
  );
}

export function selectIncluded(
  observations: readonly Observation[],
  policy: SimulatedInclusionPolicy
): Observation[] {
  const real = observations.filter((observation) => observation.kind !== "simulated");
  const includeSimulated =
    policy === "always" ||
    (policy === "filler" && real.length < 2) ||
    (policy === "never" && real.length === 0);

  return includeSimulated ? [...observations] : real;
}

export function volatilityOf(min: number, max: number, median: number): MarketVolatility {
  if (!(median > 0) || !Number.isFinite(min) || !Number.isFinite(max)) {
    return "Unknown";
  }

  const spread = (max - min) / median;
  if (spread <= 0.2) return "Low";
  if (spread <= 0.5) return "Medium";
  return "High";
}

export function noDataResult(query: string, now: Date): ConsensusResult {
  return {
    query,
    averagePrice: 0,
    confidenceLevel: 0,
    sources: {},
    sourceType: "no_data",
    sourceKind: null,
    count: 0,
    listingCount: 0,
    conditions: {},
    volatility: "Unknown",
    capturedAt: now.toISOString()
  };
}

/**
 * Folds per-family observations into one consensus. The primary observation
 * names the source and supplies the distribution figures. Confidence starts
 * from the strongest included observation, and every other included
 * observation adds a capped share of its own base confidence.
 */
export function fuseObservations(
  query: string,
  observations: readonly Observation[],
  options: FusionOptions = {}
): ConsensusResult {
  const now = options.now?.() ?? new Date();
  const primary = selectPrimary(observations);
  if (!primary) {
    return noDataResult(query, now);
  }

  const included = selectIncluded(observations, options.simulatedInclusion ?? "filler");
  const averagePrice = round2(included.reduce((sum, observation) => sum + observation.price, 0) / included.length);

  const sources: Record<string, number> = {};
  for (const observation of included) {
    sources[sourceKey(observation)] = observation.price;
  }


  const distribution = primary.kind === "simulated" ? null : primary.distribution;

  return {
    query,
    averagePrice,
    ...(distribution ? distributionFields(distribution) : {}),
    confidenceLevel: confidenceOf(included),
    sources,
    sourceType: sourceKey(primary),
    sourceKind: primary.kind,
    count: included.length,
    listingCount: distribution?.count ?? 0,
    conditions: distribution ? { ...distribution.conditions } : {},
    volatility: distribution ? volatilityOf(distribution.min, distribution.max, distribution.median) : "Unknown",
    capturedAt: now.toISOString()
  };
}

// Anchored on the strongest included observation rather than the primary.
export function confidenceOf(included: readonly Observation[]): number {
  const bases = included.map(baseConfidence);
  if (bases.length === 0) {
    return 0;
  }

  const anchor = bases.indexOf(Math.max(...bases));
  const confidence = bases.reduce(
    (total, base, index) => (index === anchor ? total + base : total + Math.min(MAX_SUPPORT_BONUS, base / 10)),
    0
  );
  return Math.round(Math.min(MAX_CONFIDENCE, confidence));
}

function distributionFields(
  distribution: ListingObservation["distribution"]
): Pick<ConsensusResult, "medianPrice" | "minPrice" | "maxPrice"> {
  return {
    medianPrice: distribution.median,
    minPrice: distribution.min,
    maxPrice: distribution.max
  };
}
