import { fileURLToPath } from "node:url";
import { beforeAll, describe, expect, it, vi } from "vitest";
import { SpellEngine } from "../../src/speller/engine.js";
import {
  DataIntegrityError,
  EngineNotReadyError,
  InvalidInputError,
} from "../../src/speller/errors.js";
import { loadFeedsFromDirectory } from "../../src/speller/feeds.js";
import type { DictionaryFeeds } from "../../src/speller/types.js";

const FIXTURES = fileURLToPath(new URL("../fixtures/dictionary", import.meta.url));

function loadedEngine(options: ConstructorParameters<typeof SpellEngine>[0] = {}): SpellEngine {
  const engine = new SpellEngine(options);
  engine.load(loadFeedsFromDirectory(FIXTURES));
  return engine;
}

describe("SpellEngine before loading", () => {
  it("refuses queries", () => {
    const engine = new SpellEngine();
    expect(engine.isReady).toBe(false);
    expect(engine.generation).toBe(0);
    expect(() => engine.checkWord("furlan")).toThrow(EngineNotReadyError);
    expect(() => engine.suggest("furlan")).toThrow(EngineNotReadyError);
  });

  it("rejects a non-positive default limit", () => {
    expect(() => new SpellEngine({ maxSuggestions: 0 })).toThrow(InvalidInputError);
  });
});

describe("SpellEngine.checkWord", () => {
  let engine: SpellEngine;
  beforeAll(() => {
    engine = loadedEngine();
  });

  it("accepts dictionary words", () => {
    expect(engine.checkWord("furlan")).toEqual({ isCorrect: true });
    expect(engine.checkWord("cafè")).toEqual({ isCorrect: true });
  });

  it("accepts capitalized and upper-case forms of known words", () => {
    expect(engine.checkWord("Furlan").isCorrect).toBe(true);
    expect(engine.checkWord("FURLAN").isCorrect).toBe(true);
    expect(engine.checkWord("UDIN").isCorrect).toBe(true);
  });

  it("keeps proper nouns capitalized", () => {
    expect(engine.checkWord("Udin").isCorrect).toBe(true);
    expect(engine.checkWord("udin").isCorrect).toBe(false);
  });

  it("accepts elided articles before elidable words", () => {
    expect(engine.checkWord("l'aghe").isCorrect).toBe(true);
    expect(engine.checkWord("l’aghe").isCorrect).toBe(true);
    expect(engine.checkWord("un'ore").isCorrect).toBe(true);
    expect(engine.checkWord("l'furlan").isCorrect).toBe(false);
  });

  it("rejects misspellings", () => {
    expect(engine.checkWord("furlen").isCorrect).toBe(false);
    expect(engine.checkWord("xyzzy").isCorrect).toBe(false);
  });

  it("validates the token", () => {
    expect(() => engine.checkWord("   ")).toThrow(InvalidInputError);
    expect(() => engine.checkWord("a\uD800")).toThrow("Token is not valid UTF-16 text");
    expect(() => engine.checkWord("a".repeat(65))).toThrow(
      "Token is 65 characters long (limit 64)"
    );
  });
});

describe("SpellEngine.suggest", () => {
  let engine: SpellEngine;
  beforeAll(() => {
    engine = loadedEngine();
  });

  it("offers a known word back unchanged", () => {
    expect(engine.suggest("lenghe")).toEqual(["lenghe"]);
    expect(engine.rank("lenghe")).toEqual([{ source: "exact", word: "lenghe", score: 0 }]);
    expect(engine.suggest("FURLAN")).toEqual(["FURLAN"]);
  });

  it("puts error-map corrections first, in table order", () => {
    expect(engine.suggest("furlen")).toEqual(["furlan"]);
    expect(engine.suggest("cjasa")).toEqual(["cjase", "cjasis"]);
    expect(engine.suggest("scuela")).toEqual(["scuele"]);
    expect(engine.suggest("lengua")).toEqual(["lenghe"]);
  });

  it("restores the token's capitalization", () => {
    expect(engine.suggest("Cjasa")).toEqual(["Cjase", "Cjasis"]);
    expect(engine.suggest("CJASA")).toEqual(["CJASE", "CJASIS"]);
    expect(engine.suggest("Furlen")).toEqual(["Furlan"]);
  });

  it("finds sound-alike words", () => {
    expect(engine.rank("furlam")).toEqual([
      { source: "phonetic", word: "furlan", score: 1, distance: 1, frequency: 120 },
    ]);
    expect(engine.suggest("cjàse")).toEqual(["cjase"]);
    expect(engine.suggest("cjasse")).toEqual(["cjase"]);
    expect(engine.suggest("cafe")).toEqual(["cafè"]);
    expect(engine.suggest("gnuf")).toEqual(["gnûf"]);
    expect(engine.suggest("udin")).toEqual(["Udin"]);
  });

  it("fills in one-edit neighbours ordered by frequency", () => {
    expect(engine.rank("frute")).toEqual([
      { source: "edit-distance", word: "frut", score: 1, distance: 1, frequency: 45 },
      { source: "edit-distance", word: "fruts", score: 1, distance: 1, frequency: 20 },
    ]);
    expect(engine.suggest("furla")).toEqual(["furlan"]);
    expect(engine.suggest("peraul")).toEqual(["peraule"]);
  });

  it("expands elisions and rejoins the parts", () => {
    expect(engine.suggest("l'aghe")).toEqual(["la aghe", "il aghe", "l'aghe"]);
    expect(engine.suggest("l’aghe")).toEqual(["la aghe", "il aghe", "l'aghe"]);
    expect(engine.suggest("un'ore")).toEqual(["une ore", "un'ore"]);
    expect(engine.suggest("dal'ore")).toEqual(["de la ore", "dal ore", "dal'ore"]);
    expect(engine.suggest("L'AGHE")).toEqual(["LA AGHE", "IL AGHE", "L'AGHE"]);
  });

  it("corrects a misspelled base after an elision", () => {
    expect(engine.suggest("un'ora")).toEqual(["une ore", "un'ore"]);
    expect(engine.suggest("l'scuela")).toEqual(["la scuele", "il scuele", "l'scuele"]);
  });

  it("offers the elided spelling only for bases that take it", () => {
    expect(engine.rank("un'ora").at(-1)).toEqual({
      source: "elision",
      word: "un'ore",
      score: 0,
      parts: ["un'", "ore"],
    });
    expect(engine.suggest("l'frute")).not.toContain("l'frut");
  });

  it("combines part candidates first part slowest", () => {
    expect(engine.rank("l'frute")).toEqual([
      { source: "elision", word: "la frut", score: 0, parts: ["la", "frut"] },
      { source: "elision", word: "la fruts", score: 1, parts: ["la", "fruts"] },
      { source: "elision", word: "il frut", score: 0, parts: ["il", "frut"] },
      { source: "elision", word: "il fruts", score: 1, parts: ["il", "fruts"] },
    ]);
    expect(engine.suggest("frute-cjasa")).toEqual([
      "frut cjase",
      "frut cjasis",
      "fruts cjase",
      "fruts cjasis",
    ]);
  });

  it("splits hyphenated compounds", () => {
    expect(engine.suggest("cjase-parol")).toEqual(["cjase parol"]);
    expect(engine.suggest("cjase-furlen")).toEqual(["cjase furlan"]);
  });

  it("drops a segmentation whose part has no candidates", () => {
    expect(engine.suggest("l'aghis")).toEqual([]);
  });

  it("returns nothing for unrelated input", () => {
    expect(engine.suggest("xyzzy")).toEqual([]);
  });

  it("honours the suggestion limit", () => {
    expect(engine.suggest("cjasa", 1)).toEqual(["cjase"]);
    expect(engine.suggest("l'aghe", 1)).toEqual(["la aghe"]);
    expect(engine.suggest("l'frute", 3)).toEqual(["la frut", "la fruts", "il frut"]);
    expect(() => engine.suggest("cjasa", 0)).toThrow(InvalidInputError);
    expect(() => engine.suggest("cjasa", 1.5)).toThrow(InvalidInputError);
  });

  it("answers the same query the same way", () => {
    expect(engine.suggest("frute-cjasa")).toEqual(engine.suggest("frute-cjasa"));
  });

  it("rejects invalid tokens", () => {
    expect(() => engine.suggest("")).toThrow(InvalidInputError);
    expect(() => engine.suggest("a".repeat(65))).toThrow(InvalidInputError);
  });
});

describe("SpellEngine whole-token corrections", () => {
  it("applies an error-map row keyed on an elided token", () => {
    const engine = new SpellEngine();
    engine.load({
      words: [["la", 500], ["il", 450], ["aghe", 60]],
      errors: [["l'acue", ["la aghe"]]],
      elidable: ["aghe"],
    });
    expect(engine.suggest("l'acue")).toEqual(["la aghe"]);
    expect(engine.suggest("l’acue")).toEqual(["la aghe"]);
    expect(engine.suggest("L'ACUE")).toEqual(["LA AGHE"]);
  });

  it("applies an error-map row keyed on a hyphenated token before the split", () => {
    const engine = new SpellEngine();
    engine.load({
      words: [["ben", 10], ["vignût", 5], ["benvignût", 20]],
      errors: [["ben-vignût", ["benvignût"]]],
    });
    expect(engine.rank("ben-vignût")).toEqual([
      { source: "error-map", word: "benvignût", score: 0, rank: 0 },
      { source: "elision", word: "ben vignût", score: 0, parts: ["ben", "vignût"] },
    ]);
    expect(engine.suggest("Ben-vignût")).toEqual(["Benvignût", "Ben vignût"]);
  });
});

describe("SpellEngine user dictionary", () => {
  const feeds: DictionaryFeeds = {
    words: [["cjase", 90], ["furlane", 35], ["furlan", 120]],
    errors: [["furlen", ["furlan"]]],
    userWords: [["furlanè", 2]],
    userErrors: [["furlen", ["furlanut"]]],
  };

  it("accepts user words", () => {
    const engine = new SpellEngine();
    engine.load(feeds);
    expect(engine.checkWord("furlanè").isCorrect).toBe(true);
    expect(engine.checkWord("FURLANÈ").isCorrect).toBe(true);
    expect(engine.suggest("furlanè")).toEqual(["furlanè"]);
  });

  it("ranks user exceptions above the system error map", () => {
    const engine = new SpellEngine();
    engine.load(feeds);
    expect(engine.rank("furlen")).toEqual([
      { source: "user-error", word: "furlanut", score: 0, rank: 0 },
      { source: "error-map", word: "furlan", score: 0, rank: 0 },
    ]);
  });

  it("ranks user-dictionary sound-alikes above system ones", () => {
    const engine = new SpellEngine();
    engine.load(feeds);
    expect(engine.rank("furlani")).toEqual([
      { source: "user-dictionary", word: "furlanè", score: 0, distance: 0, frequency: 0 },
      { source: "phonetic", word: "furlane", score: 0, distance: 0, frequency: 35 },
      { source: "edit-distance", word: "furlan", score: 1, distance: 1, frequency: 120 },
    ]);
    expect(engine.suggest("Furlani")).toEqual(["Furlanè", "Furlane", "Furlan"]);
  });

  it("logs the user dictionary size on swap", () => {
    const engineLog = vi.fn();
    new SpellEngine({}, { engineLog }).load(feeds);
    expect(engineLog).toHaveBeenCalledWith("[engine] User dictionary: 1 words, 1 error entries");
  });
});

describe("SpellEngine options", () => {
  it("can disable edit-distance candidates", () => {
    const engine = loadedEngine({ editDistance: false });
    expect(engine.suggest("frute")).toEqual([]);
    expect(engine.suggest("furlam")).toEqual(["furlan"]);
  });

  it("applies a configured token length limit", () => {
    const engine = loadedEngine({ maxTokenLength: 5 });
    expect(engine.checkWord("cjase").isCorrect).toBe(true);
    expect(() => engine.checkWord("furlan")).toThrow(InvalidInputError);
  });

  it("uses the configured default limit", () => {
    const engine = loadedEngine({ maxSuggestions: 1 });
    expect(engine.suggest("cjasa")).toEqual(["cjase"]);
  });
});

describe("SpellEngine snapshots", () => {
  const small: DictionaryFeeds = { words: [["aghe", 1]] };

  it("swaps in a new snapshot on each load", () => {
    const engineLog = vi.fn();
    const engine = new SpellEngine({}, { engineLog });
    const first = engine.load(small);
    const second = engine.load({ words: [["aghe", 1], ["ore", 2]] });

    expect(first.generation).toBe(1);
    expect(second.generation).toBe(2);
    expect(engine.snapshot).toBe(second);
    expect(engine.checkWord("ore").isCorrect).toBe(true);
    expect(first.words.contains("ore")).toBe(false);
    expect(engineLog).toHaveBeenCalledWith(
      "[engine] Snapshot #2: 2 words, 3 phonetic keys, 0 error entries, 7 elision rules"
    );
  });

  it("keeps the previous snapshot when a rebuild fails", () => {
    const engine = new SpellEngine();
    const loaded = engine.load(small);
    expect(() => engine.load({ words: [["aghe", -1]] })).toThrow(DataIntegrityError);
    expect(engine.snapshot).toBe(loaded);
    expect(engine.checkWord("aghe").isCorrect).toBe(true);
  });

  it("freezes snapshots", () => {
    const engine = new SpellEngine();
    expect(Object.isFrozen(engine.load(small))).toBe(true);
  });
});
