/**
 * WordStore: compact prefix tree over canonical word forms.
 *
 * Edges carry whole substrings, so long shared prefixes cost a single node.
 * Children are keyed by the first character of their label.
 *
 * Build phase: insert() until seal(). Afterwards the tree is read-only and
 * insert() throws. Re-inserting an existing word replaces its entry
 * (last frequency wins); the tree shape is unchanged.
 */

import { DataIntegrityError } from "./errors.js";
import type { WordEntry } from "./types.js";

interface RadixNode {
  label: string;
  children: Map<string, RadixNode>;
  entry: WordEntry | undefined;
}

function createNode(label: string, entry?: WordEntry): RadixNode {
  return { label, children: new Map(), entry };
}

function commonPrefixLength(a: string, b: string): number {
  const max = Math.min(a.length, b.length);
  let index = 0;
  while (index < max && a.charCodeAt(index) === b.charCodeAt(index)) {
    index++;
  }
  return index;
}

function sortedChildren(node: RadixNode): RadixNode[] {
  return [...node.children.keys()]
    .sort()
    .map((key) => node.children.get(key))
    .filter((child): child is RadixNode => child !== undefined);
}

function makeEntry(word: string, frequency: number): WordEntry {
  return { word, lower: word.toLowerCase(), frequency };
}

function* walkEntries(node: RadixNode): Generator<WordEntry> {
  if (node.entry) yield node.entry;
  for (const child of sortedChildren(node)) {
    yield* walkEntries(child);
  }
}

export class WordStore {
  private readonly root: RadixNode = createNode("");
  private readonly lowerIndex = new Map<string, Set<string>>();
  private count = 0;
  private isSealed = false;

  get size(): number {
    return this.count;
  }

  get sealed(): boolean {
    return this.isSealed;
  }

  seal(): this {
    this.isSealed = true;
    return this;
  }

  insert(word: string, frequency: number): void {
    if (this.isSealed) {
      throw new DataIntegrityError(`Cannot insert "${word}": word store is sealed`);
    }
    if (!word) {
      throw new DataIntegrityError("Cannot insert an empty word");
    }
    if (!Number.isFinite(frequency) || frequency < 0) {
      throw new DataIntegrityError(
        `Invalid frequency ${frequency} for "${word}" (expected a non-negative number)`
      );
    }

    const entry = makeEntry(word, frequency);
    let node = this.root;
    let rest = word;

    while (rest.length > 0) {
      const key = rest.charAt(0);
      const child = node.children.get(key);

      if (!child) {
        node.children.set(key, createNode(rest, entry));
        this.register(entry, true);
        return;
      }

      const shared = commonPrefixLength(child.label, rest);
      if (shared === child.label.length) {
        node = child;
        rest = rest.slice(shared);
        continue;
      }

      // Split the edge at the divergence point
      const middle = createNode(child.label.slice(0, shared));
      child.label = child.label.slice(shared);
      middle.children.set(child.label.charAt(0), child);
      node.children.set(key, middle);

      if (shared === rest.length) {
        middle.entry = entry;
      } else {
        const tail = rest.slice(shared);
        middle.children.set(tail.charAt(0), createNode(tail, entry));
      }
      this.register(entry, true);
      return;
    }

    const isNew = node.entry === undefined;
    node.entry = entry;
    this.register(entry, isNew);
  }

  contains(word: string): boolean {
    return this.get(word) !== undefined;
  }

  get(word: string): WordEntry | undefined {
    if (!word) return undefined;
    const found = this.descend(word);
    return found && found.consumed === word.length && found.exact
      ? found.node.entry
      : undefined;
  }

  /**
   * Entries whose lower-cased form matches `lower(word)`, ordered by
   * canonical form.
   */
  findIgnoringCase(word: string): WordEntry[] {
    const canonicals = this.lowerIndex.get(word.toLowerCase());
    if (!canonicals) return [];
    return [...canonicals]
      .sort()
      .map((canonical) => this.get(canonical))
      .filter((entry): entry is WordEntry => entry !== undefined);
  }

  /**
   * Lazily enumerate entries starting with `prefix`, lexicographic by the
   * remaining suffix. Each iteration restarts from the prefix node.
   */
  lookupPrefix(prefix: string): Iterable<WordEntry> {
    const start = (): RadixNode | undefined => {
      if (!prefix) return this.root;
      const found = this.descend(prefix);
      return found && found.consumed === prefix.length ? found.node : undefined;
    };

    return {
      *[Symbol.iterator](): Generator<WordEntry> {
        const node = start();
        if (node) yield* walkEntries(node);
      },
    };
  }

  /**
   * Entries within `maxDistance` plain Levenshtein edits of `word`.
   * Walks the tree with one DP row per consumed character and prunes
   * subtrees whose best row value already exceeds the bound.
   */
  withinDistance(word: string, maxDistance: number): WordEntry[] {
    const results: WordEntry[] = [];
    const firstRow = Array.from({ length: word.length + 1 }, (_, index) => index);

    const visit = (node: RadixNode, previousRow: number[]): void => {
      let row = previousRow;
      for (let index = 0; index < node.label.length; index++) {
        row = nextRow(row, node.label.charAt(index), word);
        if (Math.min(...row) > maxDistance) return;
      }
      if (node.entry && (row[word.length] ?? Infinity) <= maxDistance) {
        results.push(node.entry);
      }
      for (const child of sortedChildren(node)) {
        visit(child, row);
      }
    };

    visit(this.root, firstRow);
    return results;
  }

  entries(): Iterable<WordEntry> {
    return this.lookupPrefix("");
  }

  // === Internals ===

  /**
   * Follow `text` from the root. `exact` is false when the walk ends inside
   * an edge label; `consumed` counts characters matched including that label.
   */
  private descend(
    text: string
  ): { node: RadixNode; consumed: number; exact: boolean } | undefined {
    let node = this.root;
    let consumed = 0;

    while (consumed < text.length) {
      const child = node.children.get(text.charAt(consumed));
      if (!child) return undefined;

      const rest = text.slice(consumed);
      const shared = commonPrefixLength(child.label, rest);
      if (shared === child.label.length) {
        node = child;
        consumed += shared;
        continue;
      }
      if (shared === rest.length) {
        // Text ends inside this label
        return { node: child, consumed: consumed + shared, exact: false };
      }
      return undefined;
    }

    return { node, consumed, exact: true };
  }

  private register(entry: WordEntry, isNew: boolean): void {
    if (isNew) this.count++;
    const bucket = this.lowerIndex.get(entry.lower);
    if (bucket) {
      bucket.add(entry.word);
    } else {
      this.lowerIndex.set(entry.lower, new Set([entry.word]));
    }
  }
}

function nextRow(previous: number[], char: string, word: string): number[] {
  const row = [(previous[0] ?? 0) + 1];
  for (let index = 1; index <= word.length; index++) {
    const cost = word.charAt(index - 1) === char ? 0 : 1;
    row.push(
      Math.min(
        (row[index - 1] ?? 0) + 1,
        (previous[index] ?? 0) + 1,
        (previous[index - 1] ?? 0) + cost
      )
    );
  }
  return row;
}
