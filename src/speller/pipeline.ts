/**
 * Suggestion pipeline for a single token.
 *
 * normalize -> lookup -> rejoin -> restore-case -> dedupe
 *
 * A token that is itself a known word ends the pipeline in normalize.
 *
 * Steps are synchronous and only read the snapshot; all per-query state
 * lives in the QueryContext, so concurrent queries never share anything
 * mutable.
 */

import type { Logger } from "../ui/logger.js";
import { codePointLength, friulianDistance, hasLoneSurrogate, normalizeApostrophes } from "../utils/strings.js";
import { applyCase, classifyCase } from "./case.js";
import { InvalidInputError } from "./errors.js";
import { rankSuggestions } from "./ranking.js";
import { findKnownWord, type DictionarySnapshot } from "./snapshot.js";
import type { CasePattern, Segmentation, Suggestion, WordEntry } from "./types.js";

// --- Query Context ---

export interface QueryContext {
  // Input
  token: string;
  maxSuggestions: number;

  // Accumulated state
  normalized?: string;
  casePattern?: CasePattern;
  segmentations?: Segmentation[];
  corrections?: Suggestion[];     // Whole-token error-map hits
  partCandidates?: Map<string, Suggestion[]>;
  suggestions?: Suggestion[];

  // Control flow
  skipRemaining?: boolean;
}

// --- Pipeline Step ---

export interface PipelineStep {
  name: string;
  enabled: boolean;
  shouldRun?: (ctx: QueryContext) => boolean;
  run: (ctx: QueryContext, deps: PipelineDeps) => void;
}

// --- Pipeline Dependencies ---

export interface PipelineOptions {
  maxTokenLength: number;
  editDistance: boolean;
}

export interface PipelineDeps {
  snapshot: DictionarySnapshot;
  options: PipelineOptions;
  engineLog: Logger;
}

// --- Pipeline Runner ---

export function runPipeline(
  steps: readonly PipelineStep[],
  ctx: QueryContext,
  deps: PipelineDeps
): QueryContext {
  for (const step of steps) {
    if (!step.enabled) {
      deps.engineLog(`[pipeline] Skipping ${step.name} (disabled)`);
      continue;
    }
    if (step.shouldRun && !step.shouldRun(ctx)) {
      deps.engineLog(`[pipeline] Skipping ${step.name} (condition not met)`);
      continue;
    }
    if (ctx.skipRemaining) {
      deps.engineLog(`[pipeline] Skipping ${step.name} (skipRemaining=true)`);
      break;
    }

    deps.engineLog(`[pipeline] Running ${step.name}...`);
    step.run(ctx, deps);
  }
  return ctx;
}

export function createStep(
  name: string,
  run: PipelineStep["run"],
  shouldRun?: (ctx: QueryContext) => boolean
): PipelineStep {
  const step: PipelineStep = {
    name,
    enabled: true,
    run,
  };
  if (shouldRun) {
    step.shouldRun = shouldRun;
  }
  return step;
}

// === Validation ===

export function validateToken(token: string, maxTokenLength: number): void {
  if (token.trim() === "") {
    throw new InvalidInputError("Token is empty");
  }
  if (hasLoneSurrogate(token)) {
    throw new InvalidInputError("Token is not valid UTF-16 text");
  }
  const length = codePointLength(token);
  if (length > maxTokenLength) {
    throw new InvalidInputError(
      `Token is ${length} characters long (limit ${maxTokenLength})`
    );
  }
}

export function validateMaxSuggestions(maxSuggestions: number): void {
  if (!Number.isInteger(maxSuggestions) || maxSuggestions < 1) {
    throw new InvalidInputError(
      `maxSuggestions must be a positive integer (got ${maxSuggestions})`
    );
  }
}

// === Candidate gathering ===

function scoreEntry(
  source: "user-dictionary" | "phonetic" | "edit-distance",
  lower: string,
  entry: WordEntry,
  snapshot: DictionarySnapshot
): Suggestion {
  const distance = friulianDistance(lower, entry.lower);
  return {
    source,
    word: entry.word,
    score: distance,
    distance,
    frequency: snapshot.frequencies.get(entry.word),
  };
}

/**
 * User exceptions, then the system error map. Each table is tried with the
 * text as typed, then lower-cased.
 */
export function correctionsFor(text: string, snapshot: DictionarySnapshot): Suggestion[] {
  const lower = text.toLowerCase();
  const tables = [
    ["user-error", snapshot.userErrors],
    ["error-map", snapshot.errors],
  ] as const;

  return tables.flatMap(([source, table]) => {
    const typed = table.lookup(text);
    const corrections = typed.length > 0 ? typed : table.lookup(lower);
    return corrections.map((word, rank): Suggestion => ({ source, word, score: rank, rank }));
  });
}

/**
 * Ranked candidates for one sub-token. A known word is its own single
 * candidate; otherwise corrections lead, followed by user-dictionary and
 * system phonetic (and optionally edit-distance) neighbours.
 */
export function gatherCandidates(
  part: string,
  snapshot: DictionarySnapshot,
  options: PipelineOptions
): Suggestion[] {
  const lower = part.toLowerCase();
  const known = findKnownWord(snapshot, part);
  if (known) {
    return [{ source: "exact", word: known.word, score: 0 }];
  }

  const found = correctionsFor(part, snapshot);

  for (const entry of snapshot.userPhonetic.candidatesFor(lower)) {
    found.push(scoreEntry("user-dictionary", lower, entry, snapshot));
  }

  const phonetic = snapshot.phonetic.candidatesFor(lower);
  for (const entry of phonetic) {
    found.push(scoreEntry("phonetic", lower, entry, snapshot));
  }

  if (options.editDistance) {
    for (const entry of snapshot.words.withinDistance(lower, 1)) {
      if (!phonetic.has(entry)) {
        found.push(scoreEntry("edit-distance", lower, entry, snapshot));
      }
    }
  }

  return rankSuggestions(found);
}

// === Rejoin ===

/**
 * Odometer walk over per-part candidate lists (first part slowest),
 * stopping at `limit` combinations.
 */
export function rejoinParts(
  lists: readonly (readonly Suggestion[])[],
  joiner: string,
  limit: number
): Suggestion[] {
  if (lists.length === 0 || lists.some((list) => list.length === 0)) return [];

  const results: Suggestion[] = [];
  const positions = lists.map(() => 0);

  while (results.length < limit) {
    const picked = lists.map((list, index) => list[positions[index] ?? 0]);
    const parts = picked
      .filter((suggestion): suggestion is Suggestion => suggestion !== undefined)
      .map((suggestion) => suggestion.word);
    results.push({
      source: "elision",
      word: parts.join(joiner),
      score: positions.reduce((sum, position) => sum + position, 0),
      parts,
    });

    // Advance the odometer from the last part
    let index = lists.length - 1;
    while (index >= 0) {
      const next = (positions[index] ?? 0) + 1;
      if (next < (lists[index]?.length ?? 0)) {
        positions[index] = next;
        break;
      }
      positions[index] = 0;
      index--;
    }
    if (index < 0) break;
  }
  return results;
}

/**
 * Elided spellings of the base candidates that accept the article,
 * e.g. "l'" + aghe -> "l'aghe".
 */
export function elidedForms(
  prefix: string,
  candidates: readonly Suggestion[],
  snapshot: DictionarySnapshot,
  limit: number
): Suggestion[] {
  const isKnown = (word: string): boolean => findKnownWord(snapshot, word) !== undefined;
  return candidates
    .slice(0, limit)
    .filter((candidate) => snapshot.elision.acceptsElision(candidate.word, isKnown))
    .map((candidate, position): Suggestion => ({
      source: "elision",
      word: `${prefix}${candidate.word}`,
      score: position,
      parts: [prefix, candidate.word],
    }));
}

// === Steps ===

export const normalizeStep = createStep("normalize", (ctx, deps) => {
  const { snapshot, options } = deps;
  validateToken(ctx.token, options.maxTokenLength);

  const normalized = normalizeApostrophes(ctx.token.trim());
  const pattern = classifyCase(normalized);
  ctx.normalized = normalized;
  ctx.casePattern = pattern;

  const known = findKnownWord(snapshot, normalized);
  if (known) {
    deps.engineLog(`[normalize] "${ctx.token}" is known as "${known.word}"`);
    ctx.suggestions = [{ source: "exact", word: applyCase(pattern, known.word), score: 0 }];
    ctx.skipRemaining = true;
    return;
  }

  ctx.corrections = correctionsFor(normalized, snapshot);
  ctx.segmentations = snapshot.elision.normalize(normalized);

  deps.engineLog(
    `[normalize] "${ctx.token}" -> ${ctx.segmentations
      .map((segmentation) => `${segmentation.kind}(${segmentation.parts.join("|")})`)
      .join(", ")}`
  );
});

export const lookupStep = createStep("lookup", (ctx, deps) => {
  const candidates = new Map<string, Suggestion[]>();
  for (const segmentation of ctx.segmentations ?? []) {
    for (const part of segmentation.parts) {
      if (candidates.has(part)) continue;
      const ranked = gatherCandidates(part, deps.snapshot, deps.options);
      candidates.set(part, ranked);
      deps.engineLog(`[lookup] "${part}": ${ranked.length} candidates`);
    }
  }
  ctx.partCandidates = candidates;
});

export const rejoinStep = createStep("rejoin", (ctx, deps) => {
  const limit = ctx.maxSuggestions;
  const merged: Suggestion[] = [...(ctx.corrections ?? []).slice(0, limit)];
  const elided: Suggestion[] = [];

  for (const segmentation of ctx.segmentations ?? []) {
    const lists = segmentation.parts.map((part) => ctx.partCandidates?.get(part) ?? []);
    const [single] = lists;
    if (lists.length === 1 && single) {
      merged.push(...single.slice(0, limit));
    } else {
      merged.push(...rejoinParts(lists, segmentation.joiner, limit));
    }

    const base = lists[lists.length - 1];
    if (segmentation.elidedPrefix !== undefined && base) {
      elided.push(...elidedForms(segmentation.elidedPrefix, base, deps.snapshot, limit));
    }
  }

  // Elided spellings rank after every expanded reading
  ctx.suggestions = [...merged, ...elided];
});

export const restoreCaseStep = createStep(
  "restore-case",
  (ctx) => {
    const pattern = ctx.casePattern ?? "as-is";
    ctx.suggestions = (ctx.suggestions ?? []).map((suggestion) => ({
      ...suggestion,
      word: applyCase(pattern, suggestion.word),
    }));
  },
  (ctx) => ctx.casePattern !== undefined && ctx.casePattern !== "as-is"
);

export const dedupeStep = createStep("dedupe", (ctx) => {
  const seen = new Set<string>();
  ctx.suggestions = (ctx.suggestions ?? [])
    .filter((suggestion) => {
      if (seen.has(suggestion.word)) return false;
      seen.add(suggestion.word);
      return true;
    })
    .slice(0, ctx.maxSuggestions);
});

export const defaultSteps: readonly PipelineStep[] = [
  normalizeStep,
  lookupStep,
  rejoinStep,
  restoreCaseStep,
  dedupeStep,
];
