/**
 * Text matching helpers shared by the security gate and the priority engine.
 *
 * Matching runs on accent-folded, lower-cased text so "inversión" and
 * "inversion" hit the same keyword.
 */

const DIACRITICS = /[̀-ͯ]/g;
const REGEX_SPECIALS = /[.*+?^${}()|[\]\\]/g;

export function normalizeText(text: string): string {
  return text.normalize('NFD').replace(DIACRITICS, '').toLowerCase();
}

/** Whole-word (or whole-phrase) matcher for a plain keyword */
export function compileKeyword(keyword: string): RegExp {
  const body = normalizeText(keyword.trim()).replace(REGEX_SPECIALS, '\\$&').replace(/\s+/g, '\\s+');
  return new RegExp(`(?<![\\p{L}\\p{N}])${body}(?![\\p{L}\\p{N}])`, 'u');
}

export function compilePattern(source: string): RegExp {
  return new RegExp(source, 'iu');
}

export class KeywordMatcher {
  private readonly entries: Array<{ keyword: string; regex: RegExp }>;

  constructor(keywords: readonly string[]) {
    this.entries = keywords
      .filter((k) => k.trim().length > 0)
      .map((keyword) => ({ keyword, regex: compileKeyword(keyword) }));
  }

  /** First keyword found in already-normalized text */
  firstMatch(normalized: string): string | undefined {
    return this.entries.find((e) => e.regex.test(normalized))?.keyword;
  }

  get size(): number {
    return this.entries.length;
  }
}
