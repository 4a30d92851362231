// Polish inflection
//
// Names appear declined in session notes: "Sandrem", "Kormowi",
// "w Pradze". The resolver strips one case ending and, where the ending
// also softened the stem ("Praga" -> "Pradze"), restores the stem's final
// consonant.

/**
 * Case endings, longest first. Only one is stripped per attempt.
 */
export const INFLECTION_SUFFIXES: readonly string[] = [
  'owie',
  'ami',
  'ach',
  'ego',
  'emu',
  'iej',
  'iem',
  'owi',
  'om',
  'em',
  'ie',
  'ów',
  'ej',
  'ym',
  'im',
  'ia',
  'iu',
  'ii',
  'ą',
  'ę',
  'a',
  'e',
  'i',
  'o',
  'u',
  'y',
];

export type AlternationRule = {
  /**
   * Ending of the inflected form
   */
  inflected: string;

  /**
   * Ending of the stem it came from
   */
  base: string;
};

/**
 * Consonant alternations, longest inflected ending first.
 */
export const STEM_ALTERNATIONS: readonly AlternationRule[] = [
  { inflected: 'dzie', base: 'd' },
  { inflected: 'ście', base: 'st' },
  { inflected: 'cie', base: 't' },
  { inflected: 'rze', base: 'r' },
  { inflected: 'dze', base: 'g' },
  { inflected: 'sze', base: 'ch' },
  { inflected: 'źle', base: 'zł' },
  { inflected: 'ce', base: 'k' },
  { inflected: 'le', base: 'ł' },
  { inflected: 'ni', base: 'ń' },
  { inflected: 'ow', base: 'ów' },
  { inflected: 'or', base: 'ór' },
  { inflected: 'ol', base: 'ół' },
];

/**
 * Stems left after removing one case ending, in suffix order.
 *
 * @param word - Lower-cased word
 * @param minStemLength - Shorter stems are dropped
 */
export function stripSuffixes(word: string, minStemLength: number): string[] {
  const stems: string[] = [];
  for (const suffix of INFLECTION_SUFFIXES) {
    if (!word.endsWith(suffix)) continue;
    const stem = word.slice(0, word.length - suffix.length);
    if (stem.length >= minStemLength && !stems.includes(stem)) {
      stems.push(stem);
    }
  }
  return stems;
}

/**
 * Base forms reached by undoing one consonant alternation, tried on the
 * word itself and on each of its stripped stems.
 *
 * @example
 * ```typescript
 * reverseAlternations('pradze', 3); // ['prag', ...]
 * ```
 */
export function reverseAlternations(word: string, minStemLength: number): string[] {
  const candidates: string[] = [];
  for (const form of [word, ...stripSuffixes(word, minStemLength)]) {
    for (const rule of STEM_ALTERNATIONS) {
      if (!form.endsWith(rule.inflected)) continue;
      const candidate = form.slice(0, form.length - rule.inflected.length) + rule.base;
      if (candidate.length >= minStemLength && candidate !== word && !candidates.includes(candidate)) {
        candidates.push(candidate);
      }
    }
  }
  return candidates;
}
