/**
 * Core Package - Main Export
 */

// Context
export {
  getContext,
  getCorrelationId,
  createRunContext,
  runWithContextAsync,
  type RunContext,
} from './context';

// Logger
export { logger, type LogContext } from './logger';

// Config
export { config, type Config } from './config';

// Types
export * from './types';

// Errors
export {
  PipelineError,
  ExtractionTransientError,
  ExtractionFatalError,
  PipelineExhausted,
  type ClassificationSkip,
  type ConsolidationValidationWarning,
  type PageFailure,
} from './errors';

// Metrics
export {
  register,
  enableDefaultMetrics,
  pagesClassifiedCounter,
  extractionAttemptsCounter,
  rateLimitRetriesCounter,
  pageExtractionDurationHistogram,
  llmRequestsCounter,
  llmRequestDurationHistogram,
  validationFailuresCounter,
  pipelineRunsCounter,
  getMetrics,
  getMetricsContentType,
} from './metrics';

// Schemas
export {
  validatePageExtraction,
  validateConsolidatedStatement,
  PAGE_EXTRACTION_SCHEMA,
  CONSOLIDATED_STATEMENT_SCHEMA,
  type ValidationResult,
} from './schemas';

// Classification
export {
  TITLE_WEIGHT,
  LINE_ITEM_WEIGHT,
  SUPPORTING_WEIGHT,
  TITLE_PATTERNS,
  LINE_ITEM_PATTERNS,
  SUPPORTING_PATTERNS,
  findMatches,
  type CompiledPattern,
} from './classifier/patterns';
export {
  calculateNumberDensity,
  findFinancialNumbers,
  countWords,
  densityScoreForPct,
  DENSITY_BUCKETS,
  MIN_DENSITY_SCORE,
  type NumberDensity,
} from './classifier/number-density';
export {
  scorePage,
  classifyPages,
  rankPages,
  selectClassified,
  classificationWorkers,
  classificationConfidence,
  type ClassifierOptions,
} from './classifier/page-classifier';

// Templates
export {
  getTemplateForStatementType,
  renderUserPrompt,
  BALANCE_SHEET_TEMPLATE,
  INCOME_STATEMENT_TEMPLATE,
  CASH_FLOW_TEMPLATE,
  EQUITY_TEMPLATE,
  type ExtractionTemplate,
  type PromptValues,
} from './templates';

// Extraction
export type { ExtractionRequest, ExtractionService } from './extraction/types';
export {
  withRateLimitRetry,
  computeBackoffDelay,
  isRetryableError,
  toFatalError,
  defaultSleep,
  type RetryPolicy,
  type RetryHooks,
  type RetryOutcome,
  type SleepFn,
  type RandomFn,
} from './extraction/retry';
export {
  parseExtractionContent,
  normalizePageExtraction,
  normalizeLineItems,
  parseAmount,
  clampConfidence,
} from './extraction/normalize';
export {
  OpenAiVisionExtractionService,
  classifyServiceError,
  toDataUrl,
  type OpenAiVisionOptions,
} from './extraction/openai-vision';
export {
  selectPages,
  extractPages,
  defaultRetryPolicy,
  type ExtractPagesOptions,
  type ExtractionBatch,
} from './extraction/orchestrator';

// Consolidation
export {
  mergeLineItems,
  mergeSummaryMetrics,
  isSameLineItem,
  populatedYearCount,
  type MergeSource,
  type MergeStats,
  type MergedTree,
} from './consolidation/merge';
export {
  mergeEquityIntoBalanceSheet,
  mapEquityField,
  isMovementField,
  EQUITY_FIELD_MAPPING,
  EXCLUDED_EQUITY_FIELDS,
  EQUITY_CATEGORY,
  EQUITY_SOURCE_LABEL,
} from './consolidation/equity-merge';
export {
  validateStatements,
  findFigure,
  withinTolerance,
  FIELD_CANDIDATES,
  type ValidationInput,
} from './consolidation/validation';
export { collectYears, resolveBaseYear, type YearSource } from './consolidation/years';
export { consolidate, validationWarnings, type ConsolidateOptions } from './consolidation/consolidator';

// Export
export {
  buildReportRows,
  toCsv,
  confidenceLabel,
  titleCase,
  REPORT_COLUMNS,
  MAX_REPORT_YEARS,
  type ReportRow,
  type ConfidenceLabel,
} from './export/report-rows';

// Pipeline
export {
  runPipeline,
  processDocument,
  type PipelineDeps,
  type PipelineOptions,
  type PipelineOutcome,
  type RunManifest,
  type DocumentRenderer,
} from './pipeline';
