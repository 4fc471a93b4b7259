import path from "node:path";
import process from "node:process";
import { parseArgs } from "node:util";
import type { ParseResult } from "../types.js";
import {
  DEFAULT_DICTIONARY_DIR,
  DEFAULT_MAX_SUGGESTIONS,
  DEFAULT_MAX_TOKEN_LENGTH,
} from "./constants.js";

type Env = Record<string, string | undefined>;

function resolveDictionaryDir(dir: string | undefined): string {
  const value = dir && dir.trim() ? dir.trim() : DEFAULT_DICTIONARY_DIR;
  return path.isAbsolute(value) ? value : path.resolve(process.cwd(), value);
}

export function parsePositiveInt(value: string, defaultValue: number): number {
  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) || parsed < 1 ? defaultValue : parsed;
}

function isTruthy(value: string | undefined): boolean {
  return value === "1" || value?.toLowerCase() === "true";
}

export function parseConfig(
  argv: string[] = process.argv.slice(2),
  env: Env = process.env
): ParseResult {
  const {
    values: {
      dictionary,
      maxSuggestions,
      maxTokenLength,
      noEditDistance,
      debug,
      check,
    },
    positionals,
  } = parseArgs({
    args: argv,
    options: {
      dictionary: {
        type: "string",
        short: "d",
        default: env["DICTIONARY_DIR"] ?? DEFAULT_DICTIONARY_DIR,
      },
      maxSuggestions: {
        type: "string",
        short: "n",
        default: env["MAX_SUGGESTIONS"] ?? String(DEFAULT_MAX_SUGGESTIONS),
      },
      maxTokenLength: {
        type: "string",
        default: env["MAX_TOKEN_LENGTH"] ?? String(DEFAULT_MAX_TOKEN_LENGTH),
      },
      noEditDistance: {
        type: "boolean",
        default: (env["EDIT_DISTANCE_SUGGESTIONS"] ?? "").toLowerCase() === "false",
      },
      debug: {
        type: "boolean",
        default: isTruthy(env["DEBUG"]),
      },
      check: {
        type: "boolean",
        short: "c",
        default: false,
      },
    },
    allowPositionals: true,
  });

  return {
    config: {
      dictionaryDir: resolveDictionaryDir(dictionary),
      maxSuggestions: parsePositiveInt(
        maxSuggestions ?? String(DEFAULT_MAX_SUGGESTIONS),
        DEFAULT_MAX_SUGGESTIONS
      ),
      maxTokenLength: parsePositiveInt(
        maxTokenLength ?? String(DEFAULT_MAX_TOKEN_LENGTH),
        DEFAULT_MAX_TOKEN_LENGTH
      ),
      editDistance: !(noEditDistance ?? false),
      debug: debug ?? false,
      checkOnly: check ?? false,
    },
    words: positionals,
  };
}
