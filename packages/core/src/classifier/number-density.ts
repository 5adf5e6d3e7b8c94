/**
 * Number Density Scoring
 *
 * Financial statement pages are dense with amounts; narrative pages are not.
 * Density is the share of unique financial-looking numeric tokens among all
 * words on the page, mapped to a fixed score bucket.
 */

const FINANCIAL_NUMBER_PATTERNS: RegExp[] = [
  // Currency amounts: $1,000.00, ₱500,000
  /[$₱€£¥¢][\d,]+\.?\d*/g,
  // Comma-grouped numbers: 1,000,000.50
  /\b\d{1,3}(?:,\d{3})+(?:\.\d+)?\b/g,
  // Bare numbers of four or more digits: 50000, 2024
  /\b\d{4,}(?:\.\d+)?\b/g,
  // Parenthesized negatives: (1,000.00), (50000)
  /\(\d{1,3}(?:,\d{3})+(?:\.\d+)?\)/g,
  /\(\d{4,}(?:\.\d+)?\)/g,
  // Percentages: 15.5%, 20%
  /\b\d+(?:\.\d+)?%/g,
];

/** Lower bound (inclusive) of density percentage -> score, checked top to bottom */
export const DENSITY_BUCKETS: ReadonlyArray<readonly [number, number]> = [
  [30, 6],
  [20, 4],
  [15, 2.5],
  [10, 1.5],
  [7, 0.5],
  [5, 0],
  [3, -1],
];

export const MIN_DENSITY_SCORE = -3;

export interface NumberDensity {
  score: number;
  densityPct: number;
  numbers: string[];
  wordCount: number;
}

/**
 * Unique financial-looking tokens, in first-seen order across patterns
 */
export function findFinancialNumbers(text: string): string[] {
  const seen = new Set<string>();
  const unique: string[] = [];

  for (const pattern of FINANCIAL_NUMBER_PATTERNS) {
    for (const match of text.match(pattern) ?? []) {
      if (!seen.has(match)) {
        seen.add(match);
        unique.push(match);
      }
    }
  }

  return unique;
}

export function countWords(text: string): number {
  return text.split(/\s+/).filter((word) => word.length > 0).length;
}

export function densityScoreForPct(densityPct: number): number {
  for (const [threshold, score] of DENSITY_BUCKETS) {
    if (densityPct >= threshold) return score;
  }
  return MIN_DENSITY_SCORE;
}

export function calculateNumberDensity(text: string): NumberDensity {
  const numbers = findFinancialNumbers(text);
  const wordCount = countWords(text);
  const densityPct = (numbers.length / Math.max(wordCount, 1)) * 100;

  return {
    score: densityScoreForPct(densityPct),
    densityPct,
    numbers,
    wordCount,
  };
}
