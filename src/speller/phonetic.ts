/**
 * Friulian phonetic encoder.
 *
 * Maps a spelling to two hashes (primary, secondary) that group words
 * which sound alike or are commonly confused. Accents and doubled letters
 * fold away before the sibilant and palatal families collapse to shared
 * codes. Hashes match the phonetic tables of the published Friulian
 * dictionary data.
 *
 * Every pass is a list of rules applied in order. A string rule replaces
 * all non-overlapping occurrences left to right; longer patterns come
 * before the shorter patterns they contain ("ai" before "a").
 * The encoder is total: any string (misspelled or not) encodes.
 */

import { APOSTROPHE_VARIANTS } from "../utils/strings.js";
import type { PhoneticKey } from "./types.js";

type Rule = readonly [pattern: string | RegExp, replacement: string];

const SQUEEZE = /(.)\1+/gsu;

// === Shared passes ===

const PREPARE: Rule[] = [
  [APOSTROPHE_VARIANTS, "'"],
  [/e /, "'"],                    // first "e " only
  [/\s+/g, ""],
  [SQUEEZE, "$1"],
];

const ACCENTS: Rule[] = [
  ["h'", "K"],
  ["à", "a"], ["â", "a"], ["á", "a"], ["'a", "a"],
  ["è", "e"], ["ê", "e"], ["é", "e"], ["'e", "e"],
  ["ì", "i"], ["î", "i"], ["í", "i"], ["'i", "i"],
  ["ò", "o"], ["ô", "o"], ["ó", "o"], ["'o", "o"],
  ["ù", "u"], ["û", "u"], ["ú", "u"], ["'u", "u"],
  ["çi", "ci"], ["çe", "ce"],
  [/ds$/, "ts"],
  ["sci", "ssi"], ["sce", "se"],
  [SQUEEZE, "$1"],
];

const CONSONANTS: Rule[] = [
  ["w", ""], ["y", ""], ["x", ""],
  [/^che/, "chi"],
  ["h", ""],
  ["leng", "X"], ["lingu", "X"],
  ["amentri", "O"], ["ementri", "O"],
  ["amenti", "O"], ["ementi", "O"],
  ["uintri", "W"], ["ontra", "W"],
  ["ur", "Y"], ["uar", "Y"], ["or", "Y"],
  [/^'s/, "s"], [/^'n/, "n"],
  [/ins$/, "1"], [/in$/, "1"],
  [/ims$/, "1"], [/im$/, "1"],
  [/gns$/, "1"], [/gn$/, "1"],
  ["mn", "5"], ["nm", "5"], [/[mn]/g, "5"],
  ["er", "2"], ["ar", "2"],
  [/b$/, "3"], [/p$/, "3"],
  [/v$/, "4"], [/f$/, "4"],
];

// === Hash-specific passes ===

const PRIMARY: Rule[] = [
  ["'c", "A"],
  [/c[ji]us$/, "A"], [/c[ji]u$/, "A"],
  ["c'", "A"],
  ["ti", "A"], ["ci", "A"], ["si", "A"],
  ["zs", "A"], ["zi", "A"], ["cj", "A"],
  ["çs", "A"], ["tz", "A"], ["z", "A"],
  ["ç", "A"], ["c", "A"], ["q", "A"],
  ["k", "A"], ["ts", "A"], ["s", "A"],
];

const SECONDARY: Rule[] = [
  [/c$/, "0"], [/g$/, "0"],
  [/bs$/, "s"], [/cs$/, "s"], [/fs$/, "s"],
  [/gs$/, "s"], [/ps$/, "s"], [/vs$/, "s"],
  [/di(?=.)/g, "E"],
  ["gji", "E"], ["gi", "E"], ["gj", "E"],
  ["g", "E"],
  ["ts", "E"], ["s", "E"],
  ["zi", "E"], ["z", "E"],
];

const VOWELS: Rule[] = [
  ["j", "i"],
  [/i+/g, "i"],
  ["ai", "6"], ["a", "6"],
  ["ei", "7"], ["e", "7"],
  ["ou", "8"], ["oi", "8"], ["o", "8"],
  ["vu", "8"], ["u", "8"],
  ["i", "7"],
  [/^t/, "H"], [/^d/, "I"],
  ["t", "9"], ["d", "9"],
];

function applyRules(text: string, rules: readonly Rule[]): string {
  let result = text;
  for (const [pattern, replacement] of rules) {
    result =
      typeof pattern === "string"
        ? result.replaceAll(pattern, replacement)
        : result.replace(pattern, replacement);
  }
  return result;
}

// === Public API ===

/**
 * Both phonetic hashes of a word: [primary, secondary].
 */
export function phoneticHashes(word: string): [PhoneticKey, PhoneticKey] {
  if (!word) return ["", ""];

  let base = applyRules(word, PREPARE).toLowerCase();
  base = applyRules(base, ACCENTS);
  base = applyRules(base, CONSONANTS);

  const primary = applyRules(applyRules(base, PRIMARY), VOWELS);
  const secondary = applyRules(applyRules(base, SECONDARY), VOWELS);
  return [primary, secondary];
}

/**
 * Primary phonetic key of a word.
 */
export function encode(word: string): PhoneticKey {
  return phoneticHashes(word)[0];
}

export function arePhoneticallySimilar(a: string, b: string): boolean {
  if (!a || !b) return false;
  const [a1, a2] = phoneticHashes(a);
  const [b1, b2] = phoneticHashes(b);
  return a1 === b1 || a1 === b2 || a2 === b1 || a2 === b2;
}
