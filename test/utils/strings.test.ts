import { describe, expect, it } from "vitest";
import {
  codePointLength,
  compareCodeUnits,
  friulianDistance,
  friulianSortKey,
  hasLoneSurrogate,
  levenshteinDistance,
  normalizeApostrophes,
} from "../../src/utils/strings.js";

describe("levenshteinDistance", () => {
  it.each([
    ["kitten", "sitting", 3],
    ["frut", "fruts", 1],
    ["", "abc", 3],
    ["cjase", "cjasis", 2],
    ["furlan", "FURLAN", 6],
  ])("%s -> %s = %i", (a, b, expected) => {
    expect(levenshteinDistance(a, b)).toBe(expected);
  });
});

describe("friulianDistance", () => {
  it("ignores case", () => {
    expect(friulianDistance("furlan", "FURLAN")).toBe(0);
  });

  it("treats vowel substitutions as free", () => {
    expect(friulianDistance("cafe", "cafè")).toBe(0);
    expect(friulianDistance("aghe", "oghi")).toBe(0);
    expect(friulianDistance("cjase", "cjasis")).toBe(1);
    expect(friulianDistance("lenghe", "lengua")).toBe(1);
  });

  it("charges consonant edits", () => {
    expect(friulianDistance("kitten", "sitting")).toBe(2);
    expect(friulianDistance("frut", "fruts")).toBe(1);
  });
});

describe("friulianSortKey", () => {
  it("folds accents and cedilla", () => {
    expect(friulianSortKey("àghe")).toBe("aghe");
    expect(friulianSortKey("çavatis")).toBe("cavatis");
    expect(friulianSortKey("gnûf")).toBe("gnuf");
  });

  it("sorts a leading 's as s", () => {
    expect(friulianSortKey("'sere")).toBe("sere");
  });

  it("orders words alphabetically with raw code units as tie-break", () => {
    const sorted = ["zucar", "ça", "cjase", "àghe", "aghe", "'sere", "sal"].sort(
      (a, b) =>
        compareCodeUnits(friulianSortKey(a), friulianSortKey(b)) || compareCodeUnits(a, b)
    );
    expect(sorted).toEqual(["aghe", "àghe", "ça", "cjase", "sal", "'sere", "zucar"]);
  });
});

describe("normalizeApostrophes", () => {
  it("maps typographic apostrophes to ASCII", () => {
    expect(normalizeApostrophes("l’aghe")).toBe("l'aghe");
    expect(normalizeApostrophes("l`aghe")).toBe("l'aghe");
    expect(normalizeApostrophes("un´ore")).toBe("un'ore");
  });

  it("collapses runs into one apostrophe", () => {
    expect(normalizeApostrophes("l''aghe")).toBe("l'aghe");
  });
});

describe("text validation helpers", () => {
  it("counts code points, not code units", () => {
    expect(codePointLength("furlan")).toBe(6);
    expect(codePointLength("a😀b")).toBe(3);
  });

  it("detects lone surrogates", () => {
    expect(hasLoneSurrogate("a😀b")).toBe(false);
    expect(hasLoneSurrogate("a\uD83Db")).toBe(true);
  });
});
