import type { ItemCategory } from "../types/contracts.js";

// Checked top to bottom. Bass and resonator come before the guitar rules
// because their descriptions often say "guitar" too.
const CATEGORY_RULES: Array<[ItemCategory, RegExp]> = [
  ["Bass Guitar", /\bbass\b|\bp-?bass\b|\bj-?bass\b/],
  ["Resonator", /resonator|dobro/],
  ["Ukulele", /ukulele|\buke\b/],
  ["Mandolin", /mandolin/],
  ["Banjo", /banjo/],
  ["Acoustic Guitar", /acoustic|parlor|dreadnought|classical guitar|nylon string/],
  ["Electric Guitar", /guitar|stratocaster|\bstrat\b|les paul|telecaster|\btele\b|\bsg\b|jazzmaster|jaguar/],
  ["Amplifier", /\bamp\b|amplifier|\bcombo\b|\bhead\b|cabinet/],
  ["Effects Pedal", /pedal|effects?\b|delay|reverb|overdrive|distortion|fuzz|chorus/],
  ["Keyboard", /keyboard|synth|piano|organ|\bkeys\b/],
  ["Microphone", /\bmic\b|microphone/],
  ["Percussion", /drum|conga|bongo|cymbal|percussion|snare|cajon/]
];

export function categorizeItem(description: string): ItemCategory {
  const text = description.toLowerCase();
  for (const [category, pattern] of CATEGORY_RULES) {
    if (pattern.test(text)) {
      return category;
    }
  }
  return "Other Instrument";
}
