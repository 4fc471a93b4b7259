/**
 * Elision and compound normalizer.
 *
 * Turns a token into the candidate re-segmentations worth checking:
 *   l'aghe      -> [la, aghe], [il, aghe]
 *   dal'ore     -> [de, la, ore], [dal, ore]
 *   cjase-parol -> [cjase, parol]
 * A token no rule touches comes back as the single identity segmentation.
 */

import { normalizeApostrophes } from "../utils/strings.js";
import type { ElisionRule, HyphenRule, Segmentation } from "./types.js";

export const DEFAULT_HYPHEN_RULE: HyphenRule = { separator: "-", joiner: " " };

export interface ElidedForm {
  rule: ElisionRule;
  base: string;
}

export interface ElisionNormalizerOptions {
  rules: readonly ElisionRule[];
  hyphenRule?: HyphenRule;
  /** Words that accept an elided article. Absent = every known word. */
  elidable?: ReadonlySet<string>;
}

export class ElisionNormalizer {
  readonly rules: readonly ElisionRule[];
  readonly hyphenRule: HyphenRule;
  private readonly elidable: ReadonlySet<string> | undefined;

  constructor(options: ElisionNormalizerOptions) {
    this.rules = options.rules.map((rule) => ({
      pattern: normalizeApostrophes(rule.pattern).toLowerCase(),
      expansions: [...rule.expansions],
    }));
    this.hyphenRule = options.hyphenRule ?? DEFAULT_HYPHEN_RULE;
    this.elidable = options.elidable;
  }

  /**
   * Every elision rule whose pattern prefixes the token, with the
   * remaining base. Rule order is preserved.
   */
  matchElisions(token: string): ElidedForm[] {
    const normalized = normalizeApostrophes(token);
    const lower = normalized.toLowerCase();
    return this.rules
      .filter((rule) => lower.length > rule.pattern.length && lower.startsWith(rule.pattern))
      .map((rule) => ({ rule, base: normalized.slice(rule.pattern.length) }));
  }

  normalize(token: string): Segmentation[] {
    const normalized = normalizeApostrophes(token);

    const elided: Segmentation[] = [];
    for (const { rule, base } of this.matchElisions(normalized)) {
      for (const expansion of rule.expansions) {
        const words = expansion.split(" ").filter((word) => word.length > 0);
        elided.push({
          kind: "elision",
          parts: [...words, base],
          joiner: " ",
          elidedPrefix: rule.pattern,
        });
      }
    }

    const initial: Segmentation[] =
      elided.length > 0
        ? elided
        : [{ kind: "identity", parts: [normalized], joiner: " " }];

    return initial.map((segmentation): Segmentation => {
      const parts = segmentation.parts.flatMap((part) => this.splitCompound(part));
      if (parts.length === segmentation.parts.length) return segmentation;
      if (segmentation.kind === "identity") {
        return { kind: "hyphen", parts, joiner: this.hyphenRule.joiner };
      }
      // A split base no longer takes the elided article as one word
      return { kind: segmentation.kind, parts, joiner: segmentation.joiner };
    });
  }

  /**
   * Whether `base` may follow an elided article. `isKnown` checks the
   * dictionary; the elidable list narrows it further when supplied.
   */
  acceptsElision(base: string, isKnown: (word: string) => boolean): boolean {
    const lower = base.toLowerCase();
    if (!isKnown(lower)) return false;
    return this.elidable ? this.elidable.has(lower) : true;
  }

  isElidedForm(token: string, isKnown: (word: string) => boolean): boolean {
    return this.matchElisions(token).some(({ base }) =>
      this.acceptsElision(base, isKnown)
    );
  }

  private splitCompound(part: string): string[] {
    const { separator } = this.hyphenRule;
    if (!part.includes(separator)) return [part];
    const pieces = part.split(separator);
    return pieces.every((piece) => piece.length > 0) ? pieces : [part];
  }
}
