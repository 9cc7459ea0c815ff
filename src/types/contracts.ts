export type SourceFamily = "reverb" | "ebay";

export type SourceKind = "api" | "scraped" | "simulated";

export const SOURCE_KIND_PRIORITY: readonly SourceKind[] = ["api", "scraped", "simulated"];

export type ListingCondition =
  | "New"
  | "Open Box"
  | "Like New"
  | "Very Good"
  | "Good"
  | "Fair"
  | "Poor/For Parts"
  | "Refurbished"
  | "Used"
  | "Unknown";

export type ConditionHistogram = Partial<Record<ListingCondition, number>>;

export type ListingSample = {
  title: string;
  price: number;
  condition: ListingCondition;
  url?: string;
};

export type PriceDistribution = {
  average: number;
  median: number;
  min: number;
  max: number;
  count: number;
  conditions: ConditionHistogram;
};

type ObservationBase = {
  readonly family: SourceFamily;
  readonly price: number;
  readonly capturedAt: string;
};

export type ListingObservation = ObservationBase & {
  readonly kind: "api" | "scraped";
  readonly distribution: Readonly<PriceDistribution>;
  readonly sampleListings: readonly ListingSample[];
};

export type SimulatedObservation = ObservationBase & {
  readonly kind: "simulated";
  readonly heuristic: {
    readonly brand?: string;
    readonly category?: string;
  };
};

export type Observation = ListingObservation | SimulatedObservation;

export type MarketVolatility = "Low" | "Medium" | "High" | "Unknown";

export type ConsensusResult = {
  query: string;
  averagePrice: number;
  medianPrice?: number;
  minPrice?: number;
  maxPrice?: number;
  confidenceLevel: number;
  sources: Record<string, number>;
  sourceType: string;
  sourceKind: SourceKind | null;
  count: number;
  listingCount: number;
  conditions: ConditionHistogram;
  volatility: MarketVolatility;
  capturedAt: string;
};

export type RatioDealCategory = "good_deal" | "fair_price" | "overpriced";

export type SavingsDealTier =
  | "Exceptional"
  | "Great"
  | "Good"
  | "Fair"
  | "Slight"
  | "Not a Deal"
  | "Overpriced";

export type DealStrategy = "ratio" | "savings";

export type DealAssessment = {
  description: string;
  itemCategory: ItemCategory;
  strategy: DealStrategy;
  referencePrice: number;
  consensusPrice: number;
  dealScore: number;
  category: RatioDealCategory | SavingsDealTier;
  confidenceLevel: number;
  targetPrice: number | null;
  sourceType: string;
};

export type ItemCategory =
  | "Electric Guitar"
  | "Acoustic Guitar"
  | "Bass Guitar"
  | "Amplifier"
  | "Effects Pedal"
  | "Keyboard"
  | "Microphone"
  | "Ukulele"
  | "Mandolin"
  | "Banjo"
  | "Percussion"
  | "Resonator"
  | "Other Instrument";

export type SimulatedInclusionPolicy = "filler" | "always" | "never";

export type RequestGateConfig = {
  minRequestIntervalMs: number;
  maxRequestsPerSession: number;
  sessionRestMs: number;
  maxRetries: number;
  rateLimitBackoffMs: number;
  retryBackoffMs: number;
  requestTimeoutMs: number;
};

export type ScrapeConfig = {
  maxPages: number;
  targetResults: number;
  pageSize: number;
};

export type DealThresholds = {
  dealThreshold: number;
  overpricedThreshold: number;
  auctionDiscount: number;
};

export type EngineConfig = {
  families: SourceFamily[];
  reverbApiToken?: string;
  ebayApiToken?: string;
  useSandbox: boolean;
  cacheDir: string;
  consensusTtlDays: number;
  scrapeTtlHours: number;
  gate: RequestGateConfig;
  scrape: ScrapeConfig;
  workerPoolSize: number;
  deal: DealThresholds;
  simulatedInclusion: SimulatedInclusionPolicy;
};
