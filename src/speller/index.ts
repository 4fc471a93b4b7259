/**
 * Friulian spell-checking engine.
 *
 * Build a snapshot from dictionary feeds, then check words and rank
 * corrections against it. Queries are synchronous and read-only.
 */

export {
  SpellEngine,
  DEFAULT_ENGINE_OPTIONS,
  type EngineOptions,
  type EngineDeps,
} from "./engine.js";
export {
  buildSnapshot,
  describeSnapshot,
  findKnownWord,
  type DictionarySnapshot,
  type SnapshotStats,
} from "./snapshot.js";
export {
  SpellerError,
  InvalidInputError,
  EngineNotReadyError,
  DataIntegrityError,
  isSpellerError,
  type SpellerErrorCode,
} from "./errors.js";
export { WordStore } from "./radix-tree.js";
export { PhoneticIndex } from "./phonetic-index.js";
export { phoneticHashes, encode, arePhoneticallySimilar } from "./phonetic.js";
export { ErrorMap } from "./error-map.js";
export { FrequencyTable } from "./frequency.js";
export { ElisionNormalizer, DEFAULT_HYPHEN_RULE } from "./elision.js";
export { compareSuggestions, rankSuggestions } from "./ranking.js";
export { classifyCase, applyCase } from "./case.js";
export {
  loadFeedsFromDirectory,
  loadBundledElisionRules,
  readWordFeed,
  readErrorFeed,
  readWordList,
  readElisionRules,
  FEED_FILES,
} from "./feeds.js";
export type {
  WordEntry,
  PhoneticKey,
  WordFeed,
  ErrorFeed,
  ErrorSlot,
  ElisionRule,
  HyphenRule,
  DictionaryFeeds,
  CasePattern,
  Segmentation,
  SegmentationKind,
  Suggestion,
  SuggestionSource,
  CheckResult,
} from "./types.js";
