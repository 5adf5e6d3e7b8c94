/**
 * Document Pipeline
 *
 * classify -> extract -> consolidate, inside one run context so every log
 * line of the run carries the same correlation ID.
 */

import { createRunContext, runWithContextAsync } from './context';
import { logger } from './logger';
import { pipelineRunsCounter } from './metrics';
import { validateConsolidatedStatement } from './schemas';
import { PipelineExhausted, type ClassificationSkip, type ConsolidationValidationWarning, type PageFailure } from './errors';
import { classifyPages, type ClassifierOptions } from './classifier/page-classifier';
import { extractPages, type ExtractPagesOptions, type ExtractionBatch } from './extraction/orchestrator';
import type { ExtractionService } from './extraction/types';
import { consolidate, validationWarnings, type ConsolidateOptions } from './consolidation/consolidator';
import type { ConsolidatedStatement, Page, RankedPage } from './types';

export interface PipelineDeps {
  service: ExtractionService;
}

export interface PipelineOptions {
  /** Attached to every log line of the run */
  documentName?: string;
  classifier?: ClassifierOptions;
  extraction?: Omit<ExtractPagesOptions, 'service'>;
  consolidation?: ConsolidateOptions;
}

export interface RunManifest {
  failures: PageFailure[];
  warnings: ConsolidationValidationWarning[];
  skipped_pages: ClassificationSkip[];
}

export interface PipelineOutcome {
  statement: ConsolidatedStatement;
  ranked_pages: RankedPage[];
  extraction: ExtractionBatch;
  manifest: RunManifest;
}

/**
 * Produces the pages of a source document. Rendering lives outside this package.
 */
export interface DocumentRenderer<TSource> {
  render(source: TSource): Promise<Page[]>;
}

function skippedPages(ranked: RankedPage[]): ClassificationSkip[] {
  const skipped: ClassificationSkip[] = [];
  for (const page of ranked) {
    const reason = page.classification.skip_reason;
    if (reason) skipped.push({ page_num: page.page_num, reason });
  }
  return skipped.sort((a, b) => a.page_num - b.page_num);
}

/**
 * Run the full pipeline over rendered pages.
 * PipelineExhausted propagates when no page could be extracted.
 */
export async function runPipeline(
  pages: Page[],
  deps: PipelineDeps,
  options: PipelineOptions = {}
): Promise<PipelineOutcome> {
  const context = createRunContext(options.documentName);

  return runWithContextAsync(context, async () => {
    const startTime = Date.now();
    logger.info('Pipeline run started', { page_count: pages.length, service: deps.service.name });

    try {
      const ranked = await classifyPages(pages, options.classifier);
      const extraction = await extractPages(ranked, { ...options.extraction, service: deps.service });
      const statement = consolidate(extraction.results, options.consolidation);

      const schemaCheck = validateConsolidatedStatement(statement);
      if (!schemaCheck.valid) {
        logger.warn('Consolidated statement does not match its contract', { errors: schemaCheck.errors });
      }

      const manifest: RunManifest = {
        failures: extraction.failures,
        warnings: validationWarnings(statement),
        skipped_pages: skippedPages(ranked),
      };

      pipelineRunsCounter.inc({ status: 'success' });
      logger.info('Pipeline run complete', {
        source_pages: statement.consolidation_info.source_pages,
        failed_pages: manifest.failures.map((failure) => failure.page_num),
        warning_count: manifest.warnings.length,
        duration_ms: Date.now() - startTime,
      });

      return { statement, ranked_pages: ranked, extraction, manifest };
    } catch (error) {
      if (error instanceof PipelineExhausted) {
        pipelineRunsCounter.inc({ status: 'exhausted' });
        logger.error('Pipeline run exhausted', error, {
          failed_pages: error.failures.map((failure) => failure.page_num),
        });
      } else {
        pipelineRunsCounter.inc({ status: 'error' });
        logger.error('Pipeline run failed', error);
      }
      throw error;
    }
  });
}

/**
 * Render a source document and run the pipeline over its pages.
 */
export async function processDocument<TSource>(
  source: TSource,
  renderer: DocumentRenderer<TSource>,
  deps: PipelineDeps,
  options: PipelineOptions = {}
): Promise<PipelineOutcome> {
  const pages = await renderer.render(source);
  return runPipeline(pages, deps, options);
}
