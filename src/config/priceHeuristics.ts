export type PriceRange = readonly [low: number, high: number];

export type CategoryHeuristic = {
  category: string;
  pattern: RegExp;
  premiumRange: PriceRange;
  standardRange: PriceRange;
  premiumBrands: readonly string[];
};

export const KNOWN_BRANDS: readonly string[] = [
  "gibson",
  "fender",
  "martin",
  "taylor",
  "prs",
  "gretsch",
  "ibanez",
  "epiphone",
  "squier",
  "rickenbacker",
  "yamaha",
  "roland",
  "boss",
  "korg",
  "moog",
  "shure",
  "marshall",
  "vox"
];

// First match wins, so bass is checked before the generic guitar keywords.
export const CATEGORY_HEURISTICS: readonly CategoryHeuristic[] = [
  {
    category: "bass",
    pattern: /\bbass\b|\bp-?bass\b|\bj-?bass\b/,
    premiumRange: [700, 2500],
    standardRange: [400, 1000],
    premiumBrands: ["fender", "gibson", "rickenbacker"]
  },
  {
    category: "guitar",
    pattern: /guitar|strat|les paul|telecaster|\btele\b|\bsg\b|acoustic|dreadnought/,
    premiumRange: [800, 3000],
    standardRange: [300, 1200],
    premiumBrands: ["gibson", "fender", "prs", "martin", "taylor", "gretsch", "rickenbacker"]
  },
  {
    category: "amp",
    pattern: /\bamp\b|amplifier|combo|\bcab\b|cabinet/,
    premiumRange: [300, 1500],
    standardRange: [300, 1500],
    premiumBrands: []
  },
  {
    category: "pedal",
    pattern: /pedal|effect|delay|reverb|overdrive|distortion|fuzz|chorus/,
    premiumRange: [80, 300],
    standardRange: [80, 300],
    premiumBrands: []
  },
  {
    category: "keyboard",
    pattern: /synth|keyboard|piano|organ|midi/,
    premiumRange: [500, 2000],
    standardRange: [200, 900],
    premiumBrands: ["moog", "korg", "roland", "yamaha"]
  },
  {
    category: "microphone",
    pattern: /\bmic\b|microphone|condenser/,
    premiumRange: [100, 600],
    standardRange: [60, 300],
    premiumBrands: ["shure"]
  },
  {
    category: "folk",
    pattern: /ukulele|\buke\b|mandolin|banjo|resonator|dobro/,
    premiumRange: [300, 1500],
    standardRange: [120, 600],
    premiumBrands: ["martin", "gibson"]
  }
];

export const FALLBACK_RANGE: PriceRange = [200, 800];

export const FAMILY_PRICE_FACTORS = {
  reverb: [1, 1],
  ebay: [0.85, 0.95]
} as const satisfies Record<string, PriceRange>;

export const JITTER_RANGE: PriceRange = [0.9, 1.1];
