import test from "node:test";
import assert from "node:assert/strict";
import {
  assessDeal,
  computeTargetPrice,
  premiumShare,
  scoreRatio,
  scoreSavings
} from "../src/services/dealScorer.js";
import type { ConsensusResult } from "../src/types/contracts.js";
import { CAPTURED_AT } from "./helpers.js";

const consensus: ConsensusResult = {
  query: "fender precision bass",
  averagePrice: 1000,
  medianPrice: 1000,
  minPrice: 900,
  maxPrice: 1100,
  confidenceLevel: 85,
  sources: { reverb_scraped: 1000 },
  sourceType: "reverb_scraped",
  sourceKind: "scraped",
  count: 1,
  listingCount: 5,
  conditions: {},
  volatility: "Low",
  capturedAt: CAPTURED_AT
};

test("scoreRatio classifies half price as a good deal and 120% as overpriced", () => {
  assert.deepEqual(scoreRatio(500, 1000), { dealScore: 0.5, category: "good_deal" });
  assert.deepEqual(scoreRatio(1200, 1000), { dealScore: 1.2, category: "overpriced" });
  assert.deepEqual(scoreRatio(1000, 1000), { dealScore: 1, category: "fair_price" });
});

test("scoreRatio thresholds are inclusive", () => {
  assert.equal(scoreRatio(850, 1000).category, "good_deal");
  assert.equal(scoreRatio(850.001, 1000).category, "fair_price");
  assert.equal(scoreRatio(1150, 1000).category, "overpriced");
});

test("scoreRatio treats a zero consensus as overpriced", () => {
  assert.deepEqual(scoreRatio(100, 0), { dealScore: Number.POSITIVE_INFINITY, category: "overpriced" });
});

test("scoreSavings buckets percent saved and gates Exceptional on listing count", () => {
  assert.deepEqual(scoreSavings(300, 1000, 5), { dealScore: 70, category: "Exceptional" });
  assert.deepEqual(scoreSavings(300, 1000, 4), { dealScore: 70, category: "Great" });
  assert.equal(scoreSavings(500, 1000).category, "Great");
  assert.equal(scoreSavings(700, 1000).category, "Good");
  assert.equal(scoreSavings(850, 1000).category, "Fair");
  assert.equal(scoreSavings(950, 1000).category, "Slight");
  assert.equal(scoreSavings(1000, 1000).category, "Overpriced");
  assert.deepEqual(scoreSavings(1200, 1000), { dealScore: -20, category: "Overpriced" });
  assert.deepEqual(scoreSavings(100, 0), { dealScore: 0, category: "Not a Deal" });
});

test("computeTargetPrice leans on the market as confidence grows", () => {
  assert.equal(computeTargetPrice({ averagePrice: 1000, confidenceLevel: 85, conditions: {} }, 1500), 977.5);
  assert.equal(computeTargetPrice({ averagePrice: 1000, confidenceLevel: 60, conditions: {} }, 1500), 1020);
  assert.equal(computeTargetPrice({ averagePrice: 1000, confidenceLevel: 30, conditions: {} }, 1500), 1105);
});

test("computeTargetPrice falls back to whichever price exists", () => {
  assert.equal(computeTargetPrice({ averagePrice: 1000, confidenceLevel: 85, conditions: {} }, undefined), 850);
  assert.equal(computeTargetPrice({ averagePrice: 0, confidenceLevel: 0, conditions: {} }, 1500), 1275);
  assert.equal(computeTargetPrice({ averagePrice: 0, confidenceLevel: 0, conditions: {} }, undefined), null);
});

test("a market full of new and like-new listings raises the target", () => {
  const conditions = { New: 1, "Like New": 1, Used: 2 };

  assert.equal(premiumShare(conditions), 0.5);
  assert.equal(computeTargetPrice({ averagePrice: 1000, confidenceLevel: 85, conditions }, undefined), 892.5);
});

test("assessDeal defaults to the ratio strategy and tags the item category", () => {
  const assessment = assessDeal({ description: "Fender Precision Bass", referencePrice: 500 }, consensus);

  assert.deepEqual(assessment, {
    description: "Fender Precision Bass",
    itemCategory: "Bass Guitar",
    strategy: "ratio",
    referencePrice: 500,
    consensusPrice: 1000,
    dealScore: 0.5,
    category: "good_deal",
    confidenceLevel: 85,
    targetPrice: 850,
    sourceType: "reverb_scraped"
  });
});

test("assessDeal runs the savings strategy by name", () => {
  const assessment = assessDeal(
    { description: "Fender Precision Bass", referencePrice: 500, retailPrice: 1500, strategy: "savings" },
    consensus
  );

  assert.equal(assessment.strategy, "savings");
  assert.equal(assessment.dealScore, 50);
  assert.equal(assessment.category, "Great");
  assert.equal(assessment.targetPrice, 977.5);
});
