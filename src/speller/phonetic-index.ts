/**
 * Phonetic key -> dictionary entries.
 *
 * Each entry is filed under both of its hashes, so a query matches when
 * any of its hashes meets any of an entry's hashes.
 */

import { phoneticHashes } from "./phonetic.js";
import type { WordStore } from "./radix-tree.js";
import type { PhoneticKey, WordEntry } from "./types.js";

export class PhoneticIndex {
  private readonly buckets: ReadonlyMap<PhoneticKey, readonly WordEntry[]>;

  private constructor(buckets: Map<PhoneticKey, WordEntry[]>) {
    this.buckets = buckets;
  }

  static build(store: WordStore): PhoneticIndex {
    const buckets = new Map<PhoneticKey, WordEntry[]>();
    const file = (key: PhoneticKey, entry: WordEntry): void => {
      const bucket = buckets.get(key);
      if (bucket) {
        bucket.push(entry);
      } else {
        buckets.set(key, [entry]);
      }
    };

    for (const entry of store.entries()) {
      const [primary, secondary] = phoneticHashes(entry.word);
      file(primary, entry);
      if (secondary !== primary) file(secondary, entry);
    }
    return new PhoneticIndex(buckets);
  }

  get keyCount(): number {
    return this.buckets.size;
  }

  bucket(key: PhoneticKey): readonly WordEntry[] {
    return this.buckets.get(key) ?? [];
  }

  /**
   * Entries sharing a phonetic hash with `word`, minus `word` itself.
   */
  candidatesFor(word: string): Set<WordEntry> {
    const [primary, secondary] = phoneticHashes(word);
    const found = new Set<WordEntry>();
    for (const key of primary === secondary ? [primary] : [primary, secondary]) {
      for (const entry of this.bucket(key)) {
        if (entry.word !== word) found.add(entry);
      }
    }
    return found;
  }
}
