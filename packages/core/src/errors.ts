/**
 * Pipeline Error Taxonomy
 *
 * Per-page failures are contained at the page level and listed in the run
 * manifest. PipelineExhausted is the only error that ends a run without a
 * consolidated statement.
 */

import type { ExtractionError, ExtractionErrorCode, ClassificationSkipReason, ValidationCheck } from './types';

/**
 * Base class for all pipeline errors
 */
export class PipelineError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

/**
 * Rate-limit class failure from the extraction service. Retried with backoff.
 */
export class ExtractionTransientError extends PipelineError {
  readonly retryable = true;
  readonly status?: number;

  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super(message, options);
    this.status = options?.status;
  }
}

/**
 * Non-retryable extraction failure (bad response, missing inputs, exhausted retries).
 */
export class ExtractionFatalError extends PipelineError {
  readonly retryable = false;
  readonly code: ExtractionErrorCode;

  constructor(code: ExtractionErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
  }

  toExtractionError(): ExtractionError {
    return { code: this.code, message: this.message, retryable: false };
  }
}

/**
 * A page whose text was too short (or unscorable) to classify.
 * A determination, not a failure: it is reported, never thrown.
 */
export interface ClassificationSkip {
  page_num: number;
  reason: ClassificationSkipReason;
}

/**
 * An arithmetic identity that failed to reconcile during consolidation.
 * Informational only.
 */
export interface ConsolidationValidationWarning {
  check: ValidationCheck['name'];
  message: string;
  difference?: number;
}

/**
 * Failed page entry in the run manifest
 */
export interface PageFailure {
  page_num: number;
  statement_type: string;
  error: ExtractionError;
  attempts: number;
}

/**
 * Zero pages succeeded extraction. Carries the failure manifest.
 */
export class PipelineExhausted extends PipelineError {
  readonly failures: PageFailure[];

  constructor(failures: PageFailure[]) {
    super(
      failures.length === 0
        ? 'No classified pages were available for extraction'
        : `All ${failures.length} selected pages failed extraction`
    );
    this.failures = failures;
  }
}
