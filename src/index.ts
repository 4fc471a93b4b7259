#!/usr/bin/env node
import "dotenv/config";
import process from "node:process";
import readline from "node:readline/promises";
import { stdin as input, stdout as output } from "node:process";

import { parseConfig } from "./config/parser.js";
import { EXIT_WORDS, PROMPT } from "./config/constants.js";
import { createLoggers, describeError, type Loggers } from "./ui/logger.js";
import { blankLine, formatReport } from "./ui/output.js";
import {
  InvalidInputError,
  SpellEngine,
  isSpellerError,
  loadFeedsFromDirectory,
} from "./speller/index.js";
import type { Config, WordReport } from "./types.js";

function checkToken(
  engine: SpellEngine,
  word: string,
  config: Pick<Config, "checkOnly" | "maxSuggestions">
): WordReport {
  const { isCorrect } = engine.checkWord(word);
  const suggestions =
    isCorrect || config.checkOnly ? [] : engine.suggest(word, config.maxSuggestions);
  return { word: word.trim(), isCorrect, suggestions };
}

function reportToken(
  engine: SpellEngine,
  word: string,
  config: Config,
  loggers: Loggers
): boolean {
  try {
    const report = checkToken(engine, word, config);
    loggers.resultLog(formatReport(report));
    return report.isCorrect;
  } catch (error) {
    if (error instanceof InvalidInputError) {
      loggers.engineWarn(`[speller] Skipped "${word}": ${error.message}`);
      return false;
    }
    throw error;
  }
}

function isClosedInput(error: unknown): boolean {
  if (error && typeof error === "object" && "code" in error) {
    return error.code === "ERR_USE_AFTER_CLOSE" || error.code === "ABORT_ERR";
  }
  return false;
}

async function main(): Promise<void> {
  const { config, words } = parseConfig();
  const loggers = createLoggers(config.debug);

  const engine = new SpellEngine(
    {
      maxSuggestions: config.maxSuggestions,
      maxTokenLength: config.maxTokenLength,
      editDistance: config.editDistance,
    },
    { engineLog: loggers.engineLog }
  );

  loggers.engineLog(`[speller] Loading dictionary from ${config.dictionaryDir}...`);
  try {
    engine.load(loadFeedsFromDirectory(config.dictionaryDir));
  } catch (error) {
    const code = isSpellerError(error) ? ` (${error.code})` : "";
    loggers.engineError(`[speller] Failed to load dictionary${code}: ${describeError(error)}`);
    process.exitCode = 1;
    return;
  }

  // Word-list mode: check each positional and exit non-zero on any miss
  if (words.length > 0) {
    let allCorrect = true;
    for (const word of words) {
      if (!reportToken(engine, word, config, loggers)) {
        allCorrect = false;
      }
    }
    process.exitCode = allCorrect ? 0 : 1;
    return;
  }

  // Interactive mode
  const rl = readline.createInterface({ input, output });
  let shuttingDown = false;
  const shutdown = (): void => {
    if (shuttingDown) return;
    shuttingDown = true;
    rl.close();
  };

  process.on("SIGINT", () => {
    loggers.engineLog("\n[speller] Caught Ctrl+C. Shutting down...");
    shutdown();
    process.exit(0);
  });

  loggers.engineLog(`[speller] Type a word to check (or "${EXIT_WORDS[0]}" to quit).`);

  while (true) {
    let line: string;
    try {
      line = await rl.question(PROMPT);
    } catch (error) {
      if (isClosedInput(error)) break;
      throw error;
    }

    const trimmed = line.trim();
    if (!trimmed) continue;
    if (EXIT_WORDS.includes(trimmed.toLowerCase())) break;

    for (const word of trimmed.split(/\s+/u)) {
      reportToken(engine, word, config, loggers);
    }
    blankLine(config.debug);
  }

  shutdown();
}

try {
  await main();
} catch (error) {
  console.error(`[speller] Fatal error: ${describeError(error)}`);
  process.exit(1);
}
