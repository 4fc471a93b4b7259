/**
 * Spell engine: the query surface over the active dictionary snapshot.
 *
 * The snapshot reference is the only mutable state. load()/swap() replace
 * it in a single assignment; every query reads it once up front, so a
 * query in flight keeps the snapshot it started with.
 */

import type { Logger } from "../ui/logger.js";
import { normalizeApostrophes } from "../utils/strings.js";
import { applyCase, classifyCase } from "./case.js";
import { EngineNotReadyError } from "./errors.js";
import {
  defaultSteps,
  runPipeline,
  validateMaxSuggestions,
  validateToken,
  type PipelineDeps,
  type PipelineStep,
} from "./pipeline.js";
import {
  buildSnapshot,
  describeSnapshot,
  findKnownWord,
  type DictionarySnapshot,
} from "./snapshot.js";
import type { CheckResult, DictionaryFeeds, Suggestion } from "./types.js";

export interface EngineOptions {
  maxSuggestions: number;
  maxTokenLength: number;
  editDistance: boolean;
}

export const DEFAULT_ENGINE_OPTIONS: EngineOptions = {
  maxSuggestions: 10,
  maxTokenLength: 64,
  editDistance: true,
};

export interface EngineDeps {
  engineLog: Logger;
  steps?: readonly PipelineStep[];
}

const silent: Logger = () => {};

export class SpellEngine {
  private readonly options: EngineOptions;
  private readonly engineLog: Logger;
  private readonly steps: readonly PipelineStep[];
  private current: DictionarySnapshot | undefined;

  constructor(options: Partial<EngineOptions> = {}, deps: Partial<EngineDeps> = {}) {
    this.options = { ...DEFAULT_ENGINE_OPTIONS, ...options };
    validateMaxSuggestions(this.options.maxSuggestions);
    this.engineLog = deps.engineLog ?? silent;
    this.steps = deps.steps ?? defaultSteps;
  }

  get snapshot(): DictionarySnapshot | undefined {
    return this.current;
  }

  get generation(): number {
    return this.current?.generation ?? 0;
  }

  get isReady(): boolean {
    return this.current !== undefined;
  }

  /**
   * Build a snapshot from feeds and make it active. A failed build throws
   * and leaves the previous snapshot in place.
   */
  load(feeds: DictionaryFeeds): DictionarySnapshot {
    const snapshot = buildSnapshot(feeds, this.generation + 1);
    this.swap(snapshot);
    return snapshot;
  }

  swap(snapshot: DictionarySnapshot): void {
    this.current = snapshot;
    const stats = describeSnapshot(snapshot);
    this.engineLog(
      `[engine] Snapshot #${stats.generation}: ${stats.words} words, ` +
        `${stats.phoneticKeys} phonetic keys, ${stats.errorEntries} error entries, ` +
        `${stats.elisionRules} elision rules`
    );
    if (stats.userWords > 0 || stats.userErrorEntries > 0) {
      this.engineLog(
        `[engine] User dictionary: ${stats.userWords} words, ${stats.userErrorEntries} error entries`
      );
    }
  }

  checkWord(token: string): CheckResult {
    const snapshot = this.requireSnapshot();
    validateToken(token, this.options.maxTokenLength);

    const normalized = normalizeApostrophes(token.trim());
    if (findKnownWord(snapshot, normalized)) {
      return { isCorrect: true };
    }

    const pattern = classifyCase(normalized);
    const caseMatch = [snapshot.words, snapshot.userWords]
      .flatMap((store) => store.findIgnoringCase(normalized))
      .some((entry) => applyCase(pattern, entry.word) === normalized);
    if (caseMatch) {
      return { isCorrect: true };
    }

    const isKnown = (word: string): boolean => findKnownWord(snapshot, word) !== undefined;
    return { isCorrect: snapshot.elision.isElidedForm(normalized, isKnown) };
  }

  suggest(token: string, maxSuggestions = this.options.maxSuggestions): string[] {
    return this.rank(token, maxSuggestions).map((suggestion) => suggestion.word);
  }

  /**
   * Same query as suggest(), keeping each suggestion's source and score.
   */
  rank(token: string, maxSuggestions = this.options.maxSuggestions): Suggestion[] {
    const snapshot = this.requireSnapshot();
    validateMaxSuggestions(maxSuggestions);

    const deps: PipelineDeps = {
      snapshot,
      options: {
        maxTokenLength: this.options.maxTokenLength,
        editDistance: this.options.editDistance,
      },
      engineLog: this.engineLog,
    };
    const ctx = runPipeline(this.steps, { token, maxSuggestions }, deps);
    return ctx.suggestions ?? [];
  }

  private requireSnapshot(): DictionarySnapshot {
    if (!this.current) throw new EngineNotReadyError();
    return this.current;
  }
}
