/**
 * Local dictionary feeds.
 *
 * Reads an unpacked dictionary directory:
 *   words.tsv          word<TAB>frequency      (required)
 *   errors.tsv         misspelling<TAB>slot<TAB>slot...
 *   frequencies.tsv    word<TAB>frequency
 *   elisions.txt       one elidable word per line
 *   elision-rules.json overrides the bundled rules
 *   user-words.tsv     word<TAB>frequency      (personal additions)
 *   user-errors.tsv    misspelling<TAB>slot... (personal corrections)
 * Blank lines and "#" comments are skipped. Fetching and verifying the
 * archive is someone else's job; this only reads what is on disk.
 */

import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { DataIntegrityError } from "./errors.js";
import type { DictionaryFeeds, ElisionRule, ErrorSlot } from "./types.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export const BUNDLED_ELISION_RULES = path.resolve(__dirname, "../../data/elision-rules.json");

export const FEED_FILES = {
  words: "words.tsv",
  errors: "errors.tsv",
  frequencies: "frequencies.tsv",
  elidable: "elisions.txt",
  elisionRules: "elision-rules.json",
  userWords: "user-words.tsv",
  userErrors: "user-errors.tsv",
} as const;

interface FeedLine {
  number: number;
  columns: string[];
}

function readLines(filePath: string): FeedLine[] {
  const text = fs.readFileSync(filePath, "utf8");
  const lines: FeedLine[] = [];
  text.split(/\r?\n/).forEach((raw, index) => {
    if (raw.trim() === "" || raw.trimStart().startsWith("#")) return;
    lines.push({ number: index + 1, columns: raw.split("\t") });
  });
  return lines;
}

function parseFrequency(value: string | undefined, where: string): number {
  if (value === undefined || value.trim() === "") return 0;
  const frequency = Number(value.trim());
  if (!Number.isFinite(frequency) || frequency < 0) {
    throw new DataIntegrityError(`${where}: invalid frequency "${value}"`);
  }
  return frequency;
}

// === Feed readers ===

export function readWordFeed(filePath: string): Array<[string, number]> {
  const name = path.basename(filePath);
  return readLines(filePath).map(({ number, columns }): [string, number] => {
    const where = `${name}:${number}`;
    const word = (columns[0] ?? "").trim();
    if (!word) {
      throw new DataIntegrityError(`${where}: missing word`);
    }
    if (columns.length > 2) {
      throw new DataIntegrityError(`${where}: expected "word<TAB>frequency"`);
    }
    return [word, parseFrequency(columns[1], where)];
  });
}

export function readErrorFeed(filePath: string): Array<[string, ErrorSlot[]]> {
  const name = path.basename(filePath);
  return readLines(filePath).map(({ number, columns }): [string, ErrorSlot[]] => {
    const [misspelling = "", ...slots] = columns;
    if (!misspelling.trim()) {
      throw new DataIntegrityError(`${name}:${number}: missing misspelling`);
    }
    return [misspelling.trim(), slots.map((slot) => slot.trim())];
  });
}

export function readWordList(filePath: string): string[] {
  return readLines(filePath).map(({ columns }) => (columns[0] ?? "").trim());
}

function isElisionRule(value: unknown): value is ElisionRule {
  if (!value || typeof value !== "object") return false;
  if (!("pattern" in value) || !("expansions" in value)) return false;
  const { pattern, expansions } = value;
  return (
    typeof pattern === "string" &&
    pattern.length > 0 &&
    Array.isArray(expansions) &&
    expansions.length > 0 &&
    expansions.every((expansion) => typeof expansion === "string" && expansion.trim() !== "")
  );
}

export function readElisionRules(filePath: string): ElisionRule[] {
  const name = path.basename(filePath);
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, "utf8"));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new DataIntegrityError(`${name}: ${reason}`);
  }
  if (!Array.isArray(parsed)) {
    throw new DataIntegrityError(`${name}: expected an array of rules`);
  }
  return parsed.map((rule, index) => {
    if (!isElisionRule(rule)) {
      throw new DataIntegrityError(
        `${name}: rule ${index + 1} needs a "pattern" and non-empty "expansions"`
      );
    }
    return { pattern: rule.pattern, expansions: [...rule.expansions] };
  });
}

let bundledRules: ElisionRule[] | undefined;

export function loadBundledElisionRules(): ElisionRule[] {
  bundledRules ??= readElisionRules(BUNDLED_ELISION_RULES);
  return bundledRules;
}

// === Directory loader ===

export function loadFeedsFromDirectory(directory: string): DictionaryFeeds {
  const resolve = (file: string): string => path.join(directory, file);
  const optional = (file: string): string | undefined => {
    const filePath = resolve(file);
    return fs.existsSync(filePath) ? filePath : undefined;
  };

  const wordsPath = resolve(FEED_FILES.words);
  if (!fs.existsSync(wordsPath)) {
    throw new DataIntegrityError(`Dictionary word list not found: ${wordsPath}`);
  }

  const feeds: DictionaryFeeds = { words: readWordFeed(wordsPath) };

  const errorsPath = optional(FEED_FILES.errors);
  if (errorsPath) feeds.errors = readErrorFeed(errorsPath);

  const frequenciesPath = optional(FEED_FILES.frequencies);
  if (frequenciesPath) feeds.frequencies = readWordFeed(frequenciesPath);

  const elidablePath = optional(FEED_FILES.elidable);
  if (elidablePath) feeds.elidable = readWordList(elidablePath);

  const rulesPath = optional(FEED_FILES.elisionRules);
  if (rulesPath) feeds.elisionRules = readElisionRules(rulesPath);

  const userWordsPath = optional(FEED_FILES.userWords);
  if (userWordsPath) feeds.userWords = readWordFeed(userWordsPath);

  const userErrorsPath = optional(FEED_FILES.userErrors);
  if (userErrorsPath) feeds.userErrors = readErrorFeed(userErrorsPath);

  return feeds;
}
