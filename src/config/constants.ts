export const DEFAULT_DICTIONARY_DIR = "dictionary";
export const DEFAULT_MAX_SUGGESTIONS = 10;
export const DEFAULT_MAX_TOKEN_LENGTH = 64;

export const PROMPT = "furlan> ";
export const EXIT_WORDS = ["exit", "quit"];

export const COLOR_CODES = {
  reset: "\u001B[0m",
  correct: "\u001B[32m", // green - known words
  incorrect: "\u001B[31m", // red - unknown words
  suggestion: "\u001B[33m", // yellow - ranked corrections
  toHuman: "\u001B[36m", // cyan - engine status for operator
  warn: "\u001B[35m",
  error: "\u001B[31m",
} as const;

export type ColorCode = (typeof COLOR_CODES)[keyof typeof COLOR_CODES];

export const ENABLE_COLOR =
  process.stdout.isTTY &&
  (process.env["NO_COLOR"] ?? "").toLowerCase() !== "1";
