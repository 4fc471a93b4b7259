/**
 * Curated misspelling -> corrections table.
 *
 * Rows may carry placeholder slots (empty strings or nulls). They are
 * dropped on lookup; the remaining corrections keep their source order.
 */

import { DataIntegrityError } from "./errors.js";
import type { ErrorFeed, ErrorSlot } from "./types.js";

function isPlaceholder(slot: ErrorSlot | undefined): boolean {
  return slot === null || slot === undefined || slot.trim() === "";
}

/**
 * Merge a repeated row into the slots already seen for the same key.
 * Two different corrections at one slot are a conflict.
 */
function mergeSlots(
  misspelling: string,
  existing: ErrorSlot[],
  incoming: readonly ErrorSlot[]
): ErrorSlot[] {
  const merged = [...existing];
  incoming.forEach((slot, index) => {
    if (isPlaceholder(slot)) return;
    while (merged.length < index) merged.push(null);
    const current = merged[index];
    if (isPlaceholder(current)) {
      merged[index] = slot;
      return;
    }
    if (current !== slot) {
      throw new DataIntegrityError(
        `Conflicting corrections for "${misspelling}" at slot ${index + 1}: "${current}" vs "${slot}"`
      );
    }
  });
  return merged;
}

export class ErrorMap {
  private readonly rows: ReadonlyMap<string, readonly string[]>;

  private constructor(rows: Map<string, string[]>) {
    this.rows = rows;
  }

  static empty(): ErrorMap {
    return new ErrorMap(new Map());
  }

  static build(feed: ErrorFeed): ErrorMap {
    const raw = new Map<string, ErrorSlot[]>();

    for (const [misspelling, slots] of feed) {
      if (!misspelling) {
        throw new DataIntegrityError("Error map entry with an empty misspelling");
      }
      const existing = raw.get(misspelling);
      raw.set(
        misspelling,
        existing ? mergeSlots(misspelling, existing, slots) : [...slots]
      );
    }

    const rows = new Map<string, string[]>();
    for (const [misspelling, slots] of raw) {
      const corrections: string[] = [];
      for (const slot of slots) {
        if (slot === null || slot.trim() === "") continue;
        if (slot === misspelling || corrections.includes(slot)) continue;
        corrections.push(slot);
      }
      if (corrections.length > 0) rows.set(misspelling, corrections);
    }
    return new ErrorMap(rows);
  }

  get size(): number {
    return this.rows.size;
  }

  has(misspelling: string): boolean {
    return this.rows.has(misspelling);
  }

  lookup(misspelling: string): readonly string[] {
    return this.rows.get(misspelling) ?? [];
  }
}
