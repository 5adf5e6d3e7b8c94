/**
 * Centralized Configuration
 *
 * All configuration values can be tuned via environment variables.
 */

export interface Config {
  // LLM
  openaiApiKey: string;
  openaiModel: string;
  openaiMaxTokens: number;
  llmRequestTimeoutMs: number;

  // Extraction
  extractionConcurrency: number;
  extractionTopK: number;
  extractionMaxRetries: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
  backoffJitterMs: number;
  minExtractionTextLength: number;

  // Classification
  classificationThreshold: number;
  classificationMinTextLength: number;
  classificationConcurrency: number;
  classificationParallelMinPages: number;

  // Consolidation
  validationTolerancePct: number;
}

function parseNumber(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === '') return fallback;
  const parsed = Number(raw);
  return Number.isFinite(parsed) ? parsed : fallback;
}

export const config: Config = {
  // LLM
  openaiApiKey: process.env.OPENAI_API_KEY || '',
  openaiModel: process.env.OPENAI_MODEL || 'gpt-4o',
  openaiMaxTokens: parseInt(process.env.OPENAI_MAX_TOKENS || '4000', 10),
  llmRequestTimeoutMs: parseInt(process.env.LLM_REQUEST_TIMEOUT_MS || '60000', 10),

  // Extraction
  extractionConcurrency: parseInt(process.env.EXTRACTION_CONCURRENCY || '5', 10),
  extractionTopK: parseInt(process.env.EXTRACTION_TOP_K || '10', 10),
  extractionMaxRetries: parseInt(process.env.EXTRACTION_MAX_RETRIES || '3', 10),
  backoffBaseMs: parseInt(process.env.BACKOFF_BASE_MS || '1000', 10),
  backoffMaxMs: parseInt(process.env.BACKOFF_MAX_MS || '60000', 10),
  backoffJitterMs: parseInt(process.env.BACKOFF_JITTER_MS || '1000', 10),
  minExtractionTextLength: parseInt(process.env.MIN_EXTRACTION_TEXT_LENGTH || '20', 10),

  // Classification
  classificationThreshold: parseNumber(process.env.CLASSIFICATION_THRESHOLD, 3.0),
  classificationMinTextLength: parseInt(process.env.CLASSIFICATION_MIN_TEXT_LENGTH || '20', 10),
  classificationConcurrency: parseInt(process.env.CLASSIFICATION_CONCURRENCY || '10', 10),
  classificationParallelMinPages: parseInt(process.env.CLASSIFICATION_PARALLEL_MIN_PAGES || '3', 10),

  // Consolidation
  validationTolerancePct: parseNumber(process.env.VALIDATION_TOLERANCE_PCT, 1),
};
