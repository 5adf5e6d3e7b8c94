/**
 * Heuristic Page Classifier
 *
 * Scores every page against the four statement types using phrase patterns
 * and number density, then ranks pages by their best score. Scoring is a
 * pure function of the page text.
 */

import pLimit from 'p-limit';
import { config } from '../config';
import { logger } from '../logger';
import { pagesClassifiedCounter } from '../metrics';
import {
  STATEMENT_TYPES,
  type ClassificationScore,
  type ClassificationSkipReason,
  type Page,
  type RankedPage,
  type StatementType,
} from '../types';
import {
  TITLE_PATTERNS,
  LINE_ITEM_PATTERNS,
  SUPPORTING_PATTERNS,
  TITLE_WEIGHT,
  LINE_ITEM_WEIGHT,
  SUPPORTING_WEIGHT,
  findMatches,
} from './patterns';
import { calculateNumberDensity } from './number-density';

export interface ClassifierOptions {
  /** Minimum best score for a page to count as a financial statement */
  threshold?: number;
  /** Pages with fewer non-whitespace characters are skipped unscored */
  minTextLength?: number;
  /** Upper bound on the classification pool */
  concurrency?: number;
  /** Page counts above this use the pool instead of a sequential pass */
  parallelMinPages?: number;
}

function perType<T>(make: (type: StatementType) => T): Record<StatementType, T> {
  return {
    balance_sheet: make('balance_sheet'),
    income_statement: make('income_statement'),
    cash_flow: make('cash_flow'),
    equity: make('equity'),
  };
}

function skippedScore(pageNum: number, reason: ClassificationSkipReason): ClassificationScore {
  return {
    page_num: pageNum,
    statement_type: STATEMENT_TYPES[0],
    score: 0,
    number_density_pct: 0,
    classified: false,
    statement_scores: perType(() => 0),
    matches: perType(() => []),
    financial_numbers_count: 0,
    skip_reason: reason,
  };
}

function countNonWhitespace(text: string): number {
  return text.replace(/\s/g, '').length;
}

/**
 * Score a single page against every statement type.
 */
export function scorePage(page: Page, options: ClassifierOptions = {}): ClassificationScore {
  const threshold = options.threshold ?? config.classificationThreshold;
  const minTextLength = options.minTextLength ?? config.classificationMinTextLength;
  const text = typeof page.text === 'string' ? page.text : '';

  if (countNonWhitespace(text) < minTextLength) {
    return skippedScore(page.page_num, 'text_too_short');
  }

  const density = calculateNumberDensity(text);

  const supportingMatches = SUPPORTING_PATTERNS.flatMap((pattern) => findMatches(text, pattern));
  const supportingScore = supportingMatches.length * SUPPORTING_WEIGHT;

  const statementScores = perType(() => 0);
  const matches = perType<string[]>(() => []);

  for (const type of STATEMENT_TYPES) {
    const found: string[] = [];
    let score = 0;

    for (const pattern of TITLE_PATTERNS[type]) {
      const hits = findMatches(text, pattern);
      score += hits.length * TITLE_WEIGHT;
      found.push(...hits.map((hit) => `Title: '${hit}'`));
    }

    for (const pattern of LINE_ITEM_PATTERNS[type]) {
      const hits = findMatches(text, pattern);
      score += hits.length * LINE_ITEM_WEIGHT;
      found.push(...hits.map((hit) => `Line: '${hit}'`));
    }

    found.push(...supportingMatches.map((hit) => `Support: '${hit}'`));
    score += supportingScore + density.score;

    statementScores[type] = score;
    matches[type] = found;
  }

  // Strict comparison keeps the earliest declared type on ties
  let winner: StatementType = STATEMENT_TYPES[0];
  for (const type of STATEMENT_TYPES) {
    if (statementScores[type] > statementScores[winner]) {
      winner = type;
    }
  }

  const maxScore = statementScores[winner];

  return {
    page_num: page.page_num,
    statement_type: winner,
    score: maxScore,
    number_density_pct: density.densityPct,
    classified: maxScore >= threshold,
    statement_scores: statementScores,
    matches,
    financial_numbers_count: density.numbers.length,
  };
}

/**
 * Score a page, converting any unexpected failure into an unclassified result.
 */
function scorePageSafely(page: Page, options: ClassifierOptions): ClassificationScore {
  try {
    const score = scorePage(page, options);
    pagesClassifiedCounter.inc({
      statement_type: score.statement_type,
      outcome: score.skip_reason ? 'skipped' : score.classified ? 'classified' : 'unclassified',
    });
    return score;
  } catch (error) {
    logger.warn('Page scoring failed, treating page as unclassified', {
      page_num: page.page_num,
      error: error instanceof Error ? error.message : String(error),
    });
    pagesClassifiedCounter.inc({ statement_type: STATEMENT_TYPES[0], outcome: 'skipped' });
    return skippedScore(page.page_num, 'scoring_failed');
  }
}

/**
 * Pool size by page count: small documents do not need the full pool.
 */
export function classificationWorkers(pageCount: number, maxWorkers: number): number {
  if (pageCount <= 20) return Math.min(6, maxWorkers);
  if (pageCount <= 40) return Math.min(8, maxWorkers);
  return maxWorkers;
}

/**
 * Order pages by score (descending). Equal scores keep input order.
 */
export function rankPages(pages: Page[], scores: ClassificationScore[]): RankedPage[] {
  return pages
    .map((page, index) => ({ page, index, classification: scores[index] }))
    .sort((a, b) => b.classification.score - a.classification.score || a.index - b.index)
    .map(({ page, classification }, position) => ({
      ...page,
      classification,
      rank: position + 1,
    }));
}

/**
 * Classify and rank every page of a document.
 * Scoring fans out over a bounded pool when the document is large enough.
 */
export async function classifyPages(
  pages: Page[],
  options: ClassifierOptions = {}
): Promise<RankedPage[]> {
  const parallelMinPages = options.parallelMinPages ?? config.classificationParallelMinPages;
  const startTime = Date.now();
  let scores: ClassificationScore[];

  if (pages.length <= parallelMinPages) {
    scores = pages.map((page) => scorePageSafely(page, options));
  } else {
    const workers = classificationWorkers(
      pages.length,
      options.concurrency ?? config.classificationConcurrency
    );
    const limit = pLimit(Math.max(1, workers));
    const collected: Array<{ index: number; score: ClassificationScore }> = [];

    logger.debug('Parallel classification', { page_count: pages.length, workers });

    await Promise.all(
      pages.map((page, index) =>
        limit(async () => {
          collected.push({ index, score: scorePageSafely(page, options) });
        })
      )
    );

    scores = collected.sort((a, b) => a.index - b.index).map((entry) => entry.score);
  }

  const ranked = rankPages(pages, scores);
  const classifiedCount = ranked.filter((page) => page.classification.classified).length;

  logger.info('Page classification complete', {
    page_count: pages.length,
    classified_count: classifiedCount,
    skipped_count: scores.filter((score) => score.skip_reason).length,
    duration_ms: Date.now() - startTime,
  });

  return ranked;
}

/**
 * Pages that passed the classification threshold, in rank order.
 */
export function selectClassified(ranked: RankedPage[]): RankedPage[] {
  return ranked.filter((page) => page.classification.classified);
}

/**
 * Map a raw page score to a [0, 1] confidence.
 */
export function classificationConfidence(score: number): number {
  return Math.min(Math.max(score / 20, 0), 1);
}
