import type {
  ConditionHistogram,
  ConsensusResult,
  DealAssessment,
  DealStrategy,
  DealThresholds,
  RatioDealCategory,
  SavingsDealTier
} from "../types/contracts.js";
import { categorizeItem } from "./itemCategory.js";
import { round2 } from "./sources/listingStats.js";

export const DEFAULT_DEAL_THRESHOLDS: DealThresholds = {
  dealThreshold: 0.85,
  overpricedThreshold: 1.15,
  auctionDiscount: 0.85
};

const EXCEPTIONAL_MIN_LISTINGS = 5;
const PREMIUM_CONDITION_BONUS = 0.1;

export type RatioScore = {
  dealScore: number;
  category: RatioDealCategory;
};

export type SavingsScore = {
  dealScore: number;
  category: SavingsDealTier;
};

export type DealInput = {
  description: string;
  referencePrice: number;
  retailPrice?: number;
  strategy?: DealStrategy;
};

/** reference / consensus, classified against the deal and overpriced thresholds. */
export function scoreRatio(
  referencePrice: number,
  consensusPrice: number,
  thresholds: Pick<DealThresholds, "dealThreshold" | "overpricedThreshold"> = DEFAULT_DEAL_THRESHOLDS
): RatioScore {
  if (consensusPrice <= 0) {
    return { dealScore: Number.POSITIVE_INFINITY, category: "overpriced" };
  }

  const dealScore = referencePrice / consensusPrice;
  if (dealScore <= thresholds.dealThreshold) {
    return { dealScore, category: "good_deal" };
  }
  if (dealScore >= thresholds.overpricedThreshold) {
    return { dealScore, category: "overpriced" };
  }
  return { dealScore, category: "fair_price" };
}

/** Percent saved against the consensus, bucketed into tiers. */
export function scoreSavings(referencePrice: number, consensusPrice: number, listingCount = 0): SavingsScore {
  if (consensusPrice <= 0) {
    return { dealScore: 0, category: "Not a Deal" };
  }

  const percent = ((consensusPrice - referencePrice) / consensusPrice) * 100;
  const dealScore = round2(percent);

  if (percent >= 60) {
    return { dealScore, category: listingCount >= EXCEPTIONAL_MIN_LISTINGS ? "Exceptional" : "Great" };
  }
  if (percent >= 50) return { dealScore, category: "Great" };
  if (percent >= 30) return { dealScore, category: "Good" };
  if (percent >= 15) return { dealScore, category: "Fair" };
  if (percent > 0) return { dealScore, category: "Slight" };
  return { dealScore, category: "Overpriced" };
}

export function marketWeight(confidenceLevel: number): number {
  if (confidenceLevel >= 80) return 0.7;
  if (confidenceLevel >= 50) return 0.6;
  return 0.4;
}

export function premiumShare(conditions: ConditionHistogram): number {
  const total = Object.values(conditions).reduce<number>((sum, count) => sum + (count ?? 0), 0);
  if (total <= 0) {
    return 0;
  }
  return ((conditions.New ?? 0) + (conditions["Like New"] ?? 0)) / total;
}

/**
 * Suggested maximum bid. Blends the consensus with the retail price, leaning
 * on the market as confidence grows, then applies the auction discount.
 */
export function computeTargetPrice(
  consensus: Pick<ConsensusResult, "averagePrice" | "confidenceLevel" | "conditions">,
  retailPrice: number | undefined,
  auctionDiscount: number = DEFAULT_DEAL_THRESHOLDS.auctionDiscount
): number | null {
  const retail = retailPrice !== undefined && retailPrice > 0 ? retailPrice : undefined;
  const market = consensus.averagePrice > 0 ? consensus.averagePrice : undefined;

  let blended: number;
  if (market !== undefined && retail !== undefined) {
    const weight = marketWeight(consensus.confidenceLevel);
    blended = market * weight + retail * (1 - weight);
  } else if (market !== undefined) {
    blended = market;
  } else if (retail !== undefined) {
    blended = retail;
  } else {
    return null;
  }

  const premium = 1 + premiumShare(consensus.conditions) * PREMIUM_CONDITION_BONUS;
  return round2(blended * auctionDiscount * premium);
}

export function assessDeal(
  input: DealInput,
  consensus: ConsensusResult,
  thresholds: DealThresholds = DEFAULT_DEAL_THRESHOLDS
): DealAssessment {
  const strategy = input.strategy ?? "ratio";
  const score =
    strategy === "savings"
      ? scoreSavings(input.referencePrice, consensus.averagePrice, consensus.listingCount)
      : scoreRatio(input.referencePrice, consensus.averagePrice, thresholds);

  return {
    description: input.description,
    itemCategory: categorizeItem(input.description),
    strategy,
    referencePrice: input.referencePrice,
    consensusPrice: consensus.averagePrice,
    dealScore: score.dealScore,
    category: score.category,
    confidenceLevel: consensus.confidenceLevel,
    targetPrice: computeTargetPrice(consensus, input.retailPrice, thresholds.auctionDiscount),
    sourceType: consensus.sourceType
  };
}
