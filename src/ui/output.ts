import process from "node:process";
import { COLOR_CODES } from "../config/constants.js";
import type { WordReport } from "../types.js";
import { colorize } from "./logger.js";

export function blankLine(debugMode: boolean): void {
  if (debugMode) {
    process.stdout.write("\n");
  }
}

/**
 * One line per word: the word, a verdict, and for misspellings the ranked
 * corrections in order.
 */
export function formatReport(report: WordReport): string {
  if (report.isCorrect) {
    return `${colorize(report.word, COLOR_CODES.correct)}: ok`;
  }
  const head = `${colorize(report.word, COLOR_CODES.incorrect)}: not found`;
  if (report.suggestions.length === 0) {
    return `${head} (no suggestions)`;
  }
  const list = report.suggestions
    .map((word) => colorize(word, COLOR_CODES.suggestion))
    .join(", ");
  return `${head} -> ${list}`;
}
