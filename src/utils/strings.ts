export const APOSTROPHE_VARIANTS = /['`´′ʼʹ\u0091\u0092‘’]+/g;

const VOWELS = new Set("aeiouàáâèéêìíîòóôùúû");

const FOLDED: Record<string, string> = {
  à: "a", á: "a", â: "a",
  è: "e", é: "e", ê: "e",
  ì: "i", í: "i", î: "i",
  ò: "o", ó: "o", ô: "o",
  ù: "u", ú: "u", û: "u",
  ç: "c",
};

export type SubstitutionCost = (a: string, b: string) => number;

const plainCost: SubstitutionCost = (a, b) => (a === b ? 0 : 1);

export function levenshteinDistance(
  a: string,
  b: string,
  substitutionCost: SubstitutionCost = plainCost
): number {
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  let previous = Array.from({ length: b.length + 1 }, (_, index) => index);
  for (let i = 1; i <= a.length; i++) {
    const current = [i];
    for (let j = 1; j <= b.length; j++) {
      const cost = substitutionCost(a.charAt(i - 1), b.charAt(j - 1));
      current.push(
        Math.min(
          (previous[j - 1] ?? 0) + cost,
          (current[j - 1] ?? 0) + 1,
          (previous[j] ?? 0) + 1
        )
      );
    }
    previous = current;
  }
  return previous[b.length] ?? 0;
}

/**
 * Case-insensitive; swapping one vowel (plain or accented) for another
 * is free.
 */
export function friulianDistance(a: string, b: string): number {
  return levenshteinDistance(a, b, (x, y) => {
    const lowerX = x.toLowerCase();
    const lowerY = y.toLowerCase();
    if (lowerX === lowerY) return 0;
    return VOWELS.has(lowerX) && VOWELS.has(lowerY) ? 0 : 1;
  });
}

/**
 * Collation key for Friulian alphabetical order: accents fold onto their
 * base letter, ç onto c, and a leading 's (elided "is") sorts as s.
 */
export function friulianSortKey(word: string): string {
  let key = "";
  for (const char of word) {
    key += FOLDED[char] ?? char;
  }
  return key.startsWith("'s") ? `s${key.slice(2)}` : key;
}

export function compareCodeUnits(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

export function normalizeApostrophes(text: string): string {
  return text.replaceAll(APOSTROPHE_VARIANTS, "'");
}

export function codePointLength(text: string): number {
  return [...text].length;
}

export function hasLoneSurrogate(text: string): boolean {
  return /\p{Surrogate}/u.test(text);
}
