import { describe, expect, it } from "vitest";
import { DataIntegrityError } from "../../src/speller/errors.js";
import { WordStore } from "../../src/speller/radix-tree.js";

function storeOf(...words: string[]): WordStore {
  const store = new WordStore();
  words.forEach((word, index) => store.insert(word, index + 1));
  return store;
}

const words = (entries: Iterable<{ word: string }>): string[] =>
  Array.from(entries, (entry) => entry.word);

describe("WordStore", () => {
  it("finds inserted words and nothing else", () => {
    const store = storeOf("furlan", "furlane", "fur");
    expect(store.contains("furlan")).toBe(true);
    expect(store.contains("furlane")).toBe(true);
    expect(store.contains("fur")).toBe(true);
    expect(store.contains("furl")).toBe(false);
    expect(store.contains("furlanis")).toBe(false);
    expect(store.contains("")).toBe(false);
    expect(store.size).toBe(3);
  });

  it("lists every inserted word under its own prefix", () => {
    const inserted = ["furlan", "furlane", "fur", "cjase", "cjàse", "gnûf", "Udin", "l'aghe"];
    const store = storeOf(...inserted);
    for (const word of inserted) {
      expect(store.contains(word)).toBe(true);
      expect(words(store.lookupPrefix(word))).toContain(word);
    }
  });

  it("splits an edge when a shorter word shares its prefix", () => {
    const store = storeOf("cjasis", "cjase", "cja");
    expect(store.get("cja")?.frequency).toBe(3);
    expect(store.get("cjase")?.frequency).toBe(2);
    expect(store.get("cjasis")?.frequency).toBe(1);
    expect(store.contains("cjas")).toBe(false);
  });

  it("records the lower-cased form beside the canonical one", () => {
    const store = storeOf("Udin");
    expect(store.get("Udin")).toEqual({ word: "Udin", lower: "udin", frequency: 1 });
    expect(store.get("udin")).toBeUndefined();
  });

  it("keeps the last frequency for a repeated word", () => {
    const store = new WordStore();
    store.insert("aghe", 10);
    store.insert("aghe", 25);
    expect(store.size).toBe(1);
    expect(store.get("aghe")?.frequency).toBe(25);
  });

  it("rejects inserts after sealing and invalid rows", () => {
    const store = storeOf("la");
    expect(() => store.insert("", 1)).toThrow(DataIntegrityError);
    expect(() => store.insert("il", -1)).toThrow(DataIntegrityError);
    expect(() => store.insert("il", Number.NaN)).toThrow(DataIntegrityError);
    store.seal();
    expect(store.sealed).toBe(true);
    expect(() => store.insert("il", 1)).toThrow('Cannot insert "il": word store is sealed');
  });

  it("groups case variants under one lower-cased key", () => {
    const store = storeOf("udin", "Udin", "UDIN", "furlan");
    expect(words(store.findIgnoringCase("uDiN"))).toEqual(["UDIN", "Udin", "udin"]);
    expect(store.findIgnoringCase("cjase")).toEqual([]);
  });

  describe("lookupPrefix", () => {
    it("enumerates matches in lexicographic order", () => {
      const store = storeOf("fruts", "furlan", "frut", "furlane", "fur", "cjase");
      expect(words(store.lookupPrefix("fur"))).toEqual(["fur", "furlan", "furlane"]);
      expect(words(store.lookupPrefix("fr"))).toEqual(["frut", "fruts"]);
    });

    it("matches a prefix that ends inside an edge", () => {
      const store = storeOf("furlan", "furlane");
      expect(words(store.lookupPrefix("furl"))).toEqual(["furlan", "furlane"]);
    });

    it("yields nothing for an unknown prefix", () => {
      const store = storeOf("furlan");
      expect(words(store.lookupPrefix("fa"))).toEqual([]);
      expect(words(store.lookupPrefix("furlanis"))).toEqual([]);
    });

    it("restarts on every iteration", () => {
      const store = storeOf("la", "lenghe");
      const matches = store.lookupPrefix("l");
      expect(words(matches)).toEqual(["la", "lenghe"]);
      expect(words(matches)).toEqual(["la", "lenghe"]);
    });

    it("can be consumed partially", () => {
      const store = storeOf("a", "ab", "abc", "abcd");
      const iterator = store.lookupPrefix("a")[Symbol.iterator]();
      expect(iterator.next().value?.word).toBe("a");
      expect(iterator.next().value?.word).toBe("ab");
    });

    it("lists every entry for the empty prefix", () => {
      const store = storeOf("ore", "aghe", "la");
      expect(words(store.entries())).toEqual(["aghe", "la", "ore"]);
    });
  });

  describe("withinDistance", () => {
    const store = storeOf("frut", "fruts", "furlan", "cjase", "ore", "Udin");

    it("returns words one edit away", () => {
      expect(words(store.withinDistance("frute", 1))).toEqual(["frut", "fruts"]);
      expect(words(store.withinDistance("furla", 1))).toEqual(["furlan"]);
      expect(words(store.withinDistance("ora", 1))).toEqual(["ore"]);
    });

    it("includes an exact match at distance zero", () => {
      expect(words(store.withinDistance("cjase", 0))).toEqual(["cjase"]);
    });

    it("compares case-sensitively", () => {
      expect(words(store.withinDistance("udin", 0))).toEqual([]);
      expect(words(store.withinDistance("udin", 1))).toEqual(["Udin"]);
    });
  });
});
