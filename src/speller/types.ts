/**
 * Shared speller types.
 */

// === Dictionary data ===

export interface WordEntry {
  word: string;           // Canonical form
  lower: string;          // Lower-cased canonical form
  frequency: number;
}

export type PhoneticKey = string;

export type WordFeed = Iterable<readonly [word: string, frequency: number]>;

/** Correction slots; "" / whitespace / null are placeholders. */
export type ErrorSlot = string | null;

export type ErrorFeed = Iterable<readonly [misspelling: string, slots: readonly ErrorSlot[]]>;

export interface ElisionRule {
  pattern: string;        // e.g. "l'"
  expansions: string[];   // e.g. ["la", "il"]
}

export interface HyphenRule {
  separator: string;
  joiner: string;
}

export interface DictionaryFeeds {
  words: WordFeed;
  errors?: ErrorFeed;
  frequencies?: WordFeed;
  elidable?: Iterable<string>;
  elisionRules?: ElisionRule[];
  hyphenRule?: HyphenRule;
  /** Per-user additions, ranked above the system dictionary. */
  userWords?: WordFeed;
  userErrors?: ErrorFeed;
}

// === Query types ===

export type CasePattern = "upper" | "capitalized" | "as-is";

export type SegmentationKind = "identity" | "elision" | "hyphen";

export interface Segmentation {
  kind: SegmentationKind;
  parts: string[];
  joiner: string;         // Rejoins per-part candidates
  elidedPrefix?: string;  // "l'" for [la, aghe]: the last part also takes the elided form
}

export type SuggestionSource =
  | "exact"
  | "user-error"
  | "error-map"
  | "user-dictionary"
  | "phonetic"
  | "edit-distance"
  | "elision";

export type Suggestion =
  | { source: "exact"; word: string; score: number }
  | { source: "user-error" | "error-map"; word: string; score: number; rank: number }
  | {
      source: "user-dictionary" | "phonetic" | "edit-distance";
      word: string;
      score: number;
      distance: number;
      frequency: number;
    }
  | { source: "elision"; word: string; score: number; parts: string[] };

export interface CheckResult {
  isCorrect: boolean;
}
