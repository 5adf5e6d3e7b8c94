/**
 * Extraction Service Types
 *
 * The vision extraction capability is a remote, rate-limited black box.
 * The orchestrator only depends on this contract, so tests can pass a fake.
 */

import type { PageExtraction, PageImage, StatementType } from '../types';

export interface ExtractionRequest {
  pageNum: number;
  image: PageImage;
  /** Statement type the classifier assigned to the page */
  statementTypeHint: StatementType;
  /** Raw page text from the renderer, sent alongside the image */
  rawText: string;
}

/**
 * A vision-capable extraction backend.
 *
 * Implementations reject with ExtractionTransientError for rate limits and
 * ExtractionFatalError for anything that must not be retried. Other errors
 * are classified by the orchestrator.
 */
export interface ExtractionService {
  readonly name: string;
  extract(request: ExtractionRequest): Promise<PageExtraction>;
}
