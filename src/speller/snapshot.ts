/**
 * Immutable dictionary snapshot.
 *
 * Everything a query reads, built once from the feeds. A rebuild makes a
 * new snapshot; nothing here is mutated after buildSnapshot() returns.
 */

import { ElisionNormalizer } from "./elision.js";
import { ErrorMap } from "./error-map.js";
import { loadBundledElisionRules } from "./feeds.js";
import { FrequencyTable } from "./frequency.js";
import { PhoneticIndex } from "./phonetic-index.js";
import { WordStore } from "./radix-tree.js";
import type { DictionaryFeeds, WordEntry, WordFeed } from "./types.js";

export interface DictionarySnapshot {
  readonly generation: number;
  readonly words: WordStore;
  readonly phonetic: PhoneticIndex;
  readonly errors: ErrorMap;
  readonly frequencies: FrequencyTable;
  readonly elision: ElisionNormalizer;
  readonly userWords: WordStore;
  readonly userPhonetic: PhoneticIndex;
  readonly userErrors: ErrorMap;
}

export interface SnapshotStats {
  generation: number;
  words: number;
  phoneticKeys: number;
  errorEntries: number;
  elisionRules: number;
  userWords: number;
  userErrorEntries: number;
}

function buildStore(feed: WordFeed): WordStore {
  const store = new WordStore();
  for (const [word, frequency] of feed) {
    store.insert(word, frequency);
  }
  return store.seal();
}

export function buildSnapshot(feeds: DictionaryFeeds, generation = 1): DictionarySnapshot {
  const words = buildStore(feeds.words);
  const userWords = buildStore(feeds.userWords ?? []);

  const storedFrequencies = Array.from(
    words.entries(),
    (entry) => [entry.word, entry.frequency] as const
  );
  const frequencies = feeds.frequencies
    ? FrequencyTable.build(storedFrequencies, feeds.frequencies)
    : FrequencyTable.build(storedFrequencies);

  const elisionOptions = {
    rules: feeds.elisionRules ?? loadBundledElisionRules(),
    ...(feeds.hyphenRule ? { hyphenRule: feeds.hyphenRule } : {}),
    ...(feeds.elidable
      ? { elidable: new Set(Array.from(feeds.elidable, (word) => word.toLowerCase())) }
      : {}),
  };

  return Object.freeze({
    generation,
    words,
    phonetic: PhoneticIndex.build(words),
    errors: feeds.errors ? ErrorMap.build(feeds.errors) : ErrorMap.empty(),
    frequencies,
    elision: new ElisionNormalizer(elisionOptions),
    userWords,
    userPhonetic: PhoneticIndex.build(userWords),
    userErrors: feeds.userErrors ? ErrorMap.build(feeds.userErrors) : ErrorMap.empty(),
  });
}

export function describeSnapshot(snapshot: DictionarySnapshot): SnapshotStats {
  return {
    generation: snapshot.generation,
    words: snapshot.words.size,
    phoneticKeys: snapshot.phonetic.keyCount,
    errorEntries: snapshot.errors.size,
    elisionRules: snapshot.elision.rules.length,
    userWords: snapshot.userWords.size,
    userErrorEntries: snapshot.userErrors.size,
  };
}

/** Known in the system or the user dictionary, as typed or lower-cased. */
export function findKnownWord(
  snapshot: DictionarySnapshot,
  word: string
): WordEntry | undefined {
  const lower = word.toLowerCase();
  return (
    snapshot.words.get(word) ??
    snapshot.words.get(lower) ??
    snapshot.userWords.get(word) ??
    snapshot.userWords.get(lower)
  );
}
