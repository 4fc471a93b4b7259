import type { CasePattern } from "./types.js";

function hasCasedLetters(text: string): boolean {
  return text.toLowerCase() !== text.toUpperCase();
}

function isUpper(text: string): boolean {
  return hasCasedLetters(text) && text === text.toUpperCase();
}

function isLower(text: string): boolean {
  return hasCasedLetters(text) && text === text.toLowerCase();
}

/**
 * Classify a token's capitalization:
 * - upper: has letters, all upper ("FURLAN", "L'AGHE")
 * - capitalized: upper first letter, lower rest ("Furlan")
 * - as-is: anything else, including plain lower case
 */
export function classifyCase(token: string): CasePattern {
  if (isUpper(token)) return "upper";
  const first = token.charAt(0);
  const rest = token.slice(1);
  if (rest.length > 0 && isUpper(first) && isLower(rest)) return "capitalized";
  return "as-is";
}

export function applyCase(pattern: CasePattern, word: string): string {
  switch (pattern) {
    case "upper":
      return word.toUpperCase();
    case "capitalized":
      return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
    case "as-is":
      return word;
  }
}
