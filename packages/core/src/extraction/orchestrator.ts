/**
 * Extraction Orchestrator
 *
 * Sends the top-ranked classified pages to the extraction service through a
 * bounded pool. Each page is an independent task: rate limits are retried
 * with backoff, anything else fails that page alone. The run only fails when
 * no page succeeds.
 */

import pLimit from 'p-limit';
import { config } from '../config';
import { logger } from '../logger';
import {
  extractionAttemptsCounter,
  pageExtractionDurationHistogram,
  rateLimitRetriesCounter,
} from '../metrics';
import { ExtractionFatalError, PipelineExhausted, type PageFailure } from '../errors';
import { classificationConfidence } from '../classifier/page-classifier';
import type { ExtractionError, ExtractionResult, PageExtraction, PageImage, RankedPage } from '../types';
import type { ExtractionService } from './types';
import {
  isRetryableError,
  withRateLimitRetry,
  type RandomFn,
  type RetryPolicy,
  type SleepFn,
} from './retry';

export interface ExtractPagesOptions {
  service: ExtractionService;
  topK?: number;
  concurrency?: number;
  retryPolicy?: Partial<RetryPolicy>;
  /** Minimum trimmed text length for a page to be sent */
  minTextLength?: number;
  sleep?: SleepFn;
  random?: RandomFn;
}

export interface ExtractionBatch {
  /** Every selected page, successful or not, sorted by page number */
  results: ExtractionResult[];
  successes: ExtractionResult[];
  failures: PageFailure[];
  selected_pages: number[];
}

export function defaultRetryPolicy(): RetryPolicy {
  return {
    maxRetries: config.extractionMaxRetries,
    baseDelayMs: config.backoffBaseMs,
    maxDelayMs: config.backoffMaxMs,
    jitterMs: config.backoffJitterMs,
  };
}

/**
 * First `topK` classified pages, in rank order.
 */
export function selectPages(ranked: RankedPage[], topK: number = config.extractionTopK): RankedPage[] {
  return ranked.filter((page) => page.classification.classified).slice(0, Math.max(0, topK));
}

function failedResult(
  page: RankedPage,
  error: ExtractionError,
  attempts: number,
  durationMs: number
): ExtractionResult {
  return {
    page_num: page.page_num,
    statement_type: page.classification.statement_type,
    confidence: classificationConfidence(page.classification.score),
    line_items: {},
    summary_metrics: {},
    notes: '',
    success: false,
    error,
    attempts,
    duration_ms: durationMs,
    years_detected: [],
    base_year: '',
  };
}

function successfulResult(
  page: RankedPage,
  extraction: PageExtraction,
  attempts: number,
  durationMs: number
): ExtractionResult {
  return {
    page_num: page.page_num,
    statement_type: page.classification.statement_type,
    confidence: classificationConfidence(page.classification.score),
    line_items: extraction.line_items,
    summary_metrics: extraction.summary_metrics ?? {},
    notes: extraction.notes ?? '',
    success: true,
    attempts,
    duration_ms: durationMs,
    company_name: extraction.company_name,
    period: extraction.period,
    currency: extraction.currency,
    years_detected: extraction.years_detected ?? [],
    base_year: extraction.base_year ?? '',
  };
}

type Precondition = { ok: true; image: PageImage } | { ok: false; error: ExtractionFatalError };

/**
 * Inputs the service cannot work without. No call is made when these fail.
 */
function checkPreconditions(page: RankedPage, minTextLength: number): Precondition {
  if (!page.image_ref) {
    return {
      ok: false,
      error: new ExtractionFatalError('missing_image', `Page ${page.page_num} has no rendered image`),
    };
  }
  const textLength = (page.text ?? '').trim().length;
  if (textLength < minTextLength) {
    return {
      ok: false,
      error: new ExtractionFatalError(
        'missing_text',
        `Page ${page.page_num} text is too short (${textLength} < ${minTextLength} characters)`
      ),
    };
  }
  return { ok: true, image: page.image_ref };
}

async function extractPage(
  page: RankedPage,
  options: ExtractPagesOptions,
  policy: RetryPolicy,
  minTextLength: number
): Promise<ExtractionResult> {
  const startTime = Date.now();
  const statementType = page.classification.statement_type;

  const precondition = checkPreconditions(page, minTextLength);
  if (!precondition.ok) {
    extractionAttemptsCounter.inc({ statement_type: statementType, outcome: 'precondition_failed' });
    logger.warn('Page not sent for extraction', {
      page_num: page.page_num,
      code: precondition.error.code,
      error: precondition.error.message,
    });
    return failedResult(page, precondition.error.toExtractionError(), 0, Date.now() - startTime);
  }
  const image = precondition.image;

  const outcome = await withRateLimitRetry(
    async () => {
      try {
        const extraction = await options.service.extract({
          pageNum: page.page_num,
          image,
          statementTypeHint: statementType,
          rawText: page.text,
        });
        extractionAttemptsCounter.inc({ statement_type: statementType, outcome: 'success' });
        return extraction;
      } catch (error) {
        extractionAttemptsCounter.inc({
          statement_type: statementType,
          outcome: isRetryableError(error) ? 'rate_limited' : 'fatal',
        });
        throw error;
      }
    },
    policy,
    {
      sleep: options.sleep,
      random: options.random,
      onRetry: ({ attempt, delayMs }) => {
        rateLimitRetriesCounter.inc();
        logger.warn('Rate limited, backing off', {
          page_num: page.page_num,
          attempt: attempt + 1,
          delay_ms: Math.round(delayMs),
        });
      },
    }
  );

  const durationMs = Date.now() - startTime;
  pageExtractionDurationHistogram.observe({ status: outcome.ok ? 'success' : 'failure' }, durationMs / 1000);

  if (!outcome.ok) {
    logger.warn('Page extraction failed', {
      page_num: page.page_num,
      statement_type: statementType,
      code: outcome.error.code,
      attempts: outcome.attempts,
      error: outcome.error.message,
    });
    return failedResult(page, outcome.error.toExtractionError(), outcome.attempts, durationMs);
  }

  logger.debug('Page extracted', {
    page_num: page.page_num,
    statement_type: statementType,
    attempts: outcome.attempts,
    duration_ms: durationMs,
  });
  return successfulResult(page, outcome.value, outcome.attempts, durationMs);
}

/**
 * Extract the selected pages concurrently.
 * Throws PipelineExhausted when no page succeeds.
 */
export async function extractPages(
  ranked: RankedPage[],
  options: ExtractPagesOptions
): Promise<ExtractionBatch> {
  const selected = selectPages(ranked, options.topK ?? config.extractionTopK);
  const policy: RetryPolicy = { ...defaultRetryPolicy(), ...options.retryPolicy };
  const minTextLength = options.minTextLength ?? config.minExtractionTextLength;
  const limit = pLimit(Math.max(1, options.concurrency ?? config.extractionConcurrency));
  const startTime = Date.now();

  logger.info('Starting page extraction', {
    service: options.service.name,
    selected_pages: selected.map((page) => page.page_num),
  });

  const results: ExtractionResult[] = [];
  await Promise.all(
    selected.map((page) =>
      limit(async () => {
        results.push(await extractPage(page, options, policy, minTextLength));
      })
    )
  );
  results.sort((a, b) => a.page_num - b.page_num);

  const successes = results.filter((result) => result.success);
  const failures: PageFailure[] = [];
  for (const result of results) {
    if (!result.success && result.error) {
      failures.push({
        page_num: result.page_num,
        statement_type: result.statement_type,
        error: result.error,
        attempts: result.attempts,
      });
    }
  }

  logger.info('Page extraction complete', {
    selected_count: selected.length,
    success_count: successes.length,
    failure_count: failures.length,
    duration_ms: Date.now() - startTime,
  });

  if (successes.length === 0) {
    throw new PipelineExhausted(failures);
  }

  return {
    results,
    successes,
    failures,
    selected_pages: selected.map((page) => page.page_num).sort((a, b) => a - b),
  };
}
