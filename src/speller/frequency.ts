import { DataIntegrityError } from "./errors.js";
import type { WordFeed } from "./types.js";

/**
 * Word usage frequencies; the ranking tie-break after edit distance.
 */
export class FrequencyTable {
  private readonly scores = new Map<string, number>();

  static build(...feeds: WordFeed[]): FrequencyTable {
    const table = new FrequencyTable();
    for (const feed of feeds) {
      for (const [word, frequency] of feed) {
        table.set(word, frequency);
      }
    }
    return table;
  }

  get size(): number {
    return this.scores.size;
  }

  /** Exact form first, then lower-cased; unknown words score 0. */
  get(word: string): number {
    return this.scores.get(word) ?? this.scores.get(word.toLowerCase()) ?? 0;
  }

  private set(word: string, frequency: number): void {
    if (!Number.isFinite(frequency) || frequency < 0) {
      throw new DataIntegrityError(
        `Invalid frequency ${frequency} for "${word}" (expected a non-negative number)`
      );
    }
    this.scores.set(word, frequency);
  }
}
