const NOISE_PATTERNS: RegExp[] = [
  /\b(?:w\/|with)\s*(?:original\s+)?(?:hard\s*shell|hardshell|chipboard|gig|soft|hard|tolex|molded)?\s*(?:case|bag)\b/gi,
  /\b(?:gig\s*bag|hard\s*case|hardshell\s*case)\b/gi,
  /\bnos\b/gi,
  /\bnew\b/gi,
  /\bretail\b/gi,
  /\b(?:mint|near\s+mint|excellent|very\s+good|good\s+condition|great\s+condition|used|pre-?owned|b-stock|open\s+box)\b/gi,
];

/**
 * Reduces a free-text item description to the search query used both for
 * source lookups and as the cache key.
 */
export function normalizeQuery(description: string): string {
  let cleaned = description;
  for (const pattern of NOISE_PATTERNS) {
    cleaned = cleaned.replace(pattern, " ");
  }

  return cleaned
    .toLowerCase()
    .replace(/[^a-z0-9\-/.'\s]+/g, " ")
    .replace(/(^|\s)[-/.']+(?=\s|$)/g, " ")
    .replace(/\s+/g, " ")
    .trim();
}
