/**
 * Suggestion ordering.
 *
 * Total order, reproducible across runs:
 *   1. source tier: exact < user-error < error-map < user-dictionary
 *      < phonetic / edit-distance < elision
 *   2. correction rank, or edit distance (ascending)
 *   3. frequency (descending)
 *   4. Friulian collation key, then raw code units
 */

import { compareCodeUnits, friulianSortKey } from "../utils/strings.js";
import type { Suggestion, SuggestionSource } from "./types.js";

const SOURCE_TIER: Record<SuggestionSource, number> = {
  exact: 0,
  "user-error": 1,
  "error-map": 2,
  "user-dictionary": 3,
  phonetic: 4,
  "edit-distance": 4,
  elision: 5,
};

function frequencyOf(suggestion: Suggestion): number {
  switch (suggestion.source) {
    case "user-dictionary":
    case "phonetic":
    case "edit-distance":
      return suggestion.frequency;
    case "exact":
    case "user-error":
    case "error-map":
    case "elision":
      return 0;
  }
}

export function compareSuggestions(a: Suggestion, b: Suggestion): number {
  const tier = SOURCE_TIER[a.source] - SOURCE_TIER[b.source];
  if (tier !== 0) return tier;

  const score = a.score - b.score;
  if (score !== 0) return score;

  const frequency = frequencyOf(b) - frequencyOf(a);
  if (frequency !== 0) return frequency;

  const collation = compareCodeUnits(friulianSortKey(a.word), friulianSortKey(b.word));
  if (collation !== 0) return collation;

  return compareCodeUnits(a.word, b.word);
}

/**
 * Sort and drop repeated words, keeping each word's best-ranked variant.
 */
export function rankSuggestions(suggestions: Iterable<Suggestion>): Suggestion[] {
  const sorted = [...suggestions].sort(compareSuggestions);
  const seen = new Set<string>();
  return sorted.filter((suggestion) => {
    if (seen.has(suggestion.word)) return false;
    seen.add(suggestion.word);
    return true;
  });
}
