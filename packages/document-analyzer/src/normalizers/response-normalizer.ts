import type { ScoredValue } from '@docsense/model';

import { QualityBand } from '@docsense/model';

/**
 * Score used when the oracle text holds no number
 */
export const FALLBACK_SCORE = 5;

/**
 * Inclusive bounds of a numeric score
 */
export interface ScoreRange {
  min: number;
  max: number;
}

/**
 * Item separators used by list fields: `;` for prose bullets, `,` for short
 * labels
 */
export type ListDelimiter = ';' | ',';

const FIRST_NUMBER_PATTERN = /-?\d+(?:\.\d+)?(?:[eE][+-]?\d+)?/;

/**
 * Checked in order; the first band whose keyword occurs wins
 */
export const QUALITY_KEYWORDS: ReadonlyArray<readonly [string, QualityBand]> =
  [
    ['excellent', QualityBand.EXCELLENT],
    ['good', QualityBand.GOOD],
    ['average', QualityBand.AVERAGE],
    ['poor', QualityBand.POOR],
  ];

function clamp(value: number, range: ScoreRange): number {
  return Math.min(range.max, Math.max(range.min, value));
}

/**
 * Parse the first number in `text`, clamped to `range`.
 *
 * Text without a number yields {@link FALLBACK_SCORE} (clamped as well) with
 * source 'fallback'.
 */
export function parseScore(text: string, range: ScoreRange): ScoredValue {
  const match = FIRST_NUMBER_PATTERN.exec(text);
  if (!match) {
    return { value: clamp(FALLBACK_SCORE, range), source: 'fallback' };
  }
  return { value: clamp(Number(match[0]), range), source: 'parsed' };
}

export function extractScore(text: string, min: number, max: number): number {
  return parseScore(text, { min, max }).value;
}

/**
 * Split on `delimiter`, trim, drop empty pieces. Order and duplicates are
 * kept.
 */
export function extractList(text: string, delimiter: ListDelimiter): string[] {
  return text
    .split(delimiter)
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * Trim and title-case a short categorical label ("science fiction" ->
 * "Science Fiction", "SCI-FI" -> "Sci-Fi")
 */
export function normalizeLabel(text: string): string {
  return text
    .trim()
    .toLowerCase()
    .replace(
      /(^|[^\p{L}])(\p{L})/gu,
      (_match, boundary: string, letter: string) =>
        `${boundary}${letter.toUpperCase()}`,
    );
}

/**
 * Map a free-text quality judgement to a band. Matching is a
 * case-insensitive substring test; no keyword means AVERAGE.
 */
export function mapQualityToStars(text: string): QualityBand {
  const lowered = text.toLowerCase();
  for (const [keyword, band] of QUALITY_KEYWORDS) {
    if (lowered.includes(keyword)) {
      return band;
    }
  }
  return QualityBand.AVERAGE;
}
