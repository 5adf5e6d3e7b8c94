/**
 * Shared TypeScript Types
 *
 * Types for the financial statement pipeline, matching JSON schemas in docs/contracts/
 */

// ============================================================================
// Statement Types
// ============================================================================

/** Declaration order doubles as the tie-break order between equal scores. */
export const STATEMENT_TYPES = ['balance_sheet', 'income_statement', 'cash_flow', 'equity'] as const;

export type StatementType = (typeof STATEMENT_TYPES)[number];

export const STATEMENT_TYPE_LABELS: Record<StatementType, string> = {
  balance_sheet: 'Balance Sheet',
  income_statement: 'Income Statement',
  cash_flow: 'Cash Flow Statement',
  equity: 'Statement of Equity',
};

// ============================================================================
// Pages
// ============================================================================

export type ImageMediaType = 'image/png' | 'image/jpeg';

/** Rendered page image. `data` is raw bytes or an already base64-encoded string. */
export interface PageImage {
  data: Buffer | string;
  media_type: ImageMediaType;
}

export interface Page {
  page_num: number;
  text: string;
  image_ref: PageImage | null;
}

// ============================================================================
// Classification
// ============================================================================

export type ClassificationSkipReason = 'text_too_short' | 'scoring_failed';

export interface ClassificationScore {
  page_num: number;
  statement_type: StatementType;
  score: number;
  number_density_pct: number;
  classified: boolean;
  /** Total per statement type; all zero when the page was skipped */
  statement_scores: Record<StatementType, number>;
  /** Matched phrases per statement type, prefixed with Title/Line/Support */
  matches: Record<StatementType, string[]>;
  financial_numbers_count: number;
  skip_reason?: ClassificationSkipReason;
}

export interface RankedPage extends Page {
  classification: ClassificationScore;
  /** 1-based position in the ranking */
  rank: number;
}

// ============================================================================
// Extraction
// ============================================================================

export type YearKey = 'base_year' | 'year_1' | 'year_2' | 'year_3';

export const YEAR_KEYS: readonly YearKey[] = ['base_year', 'year_1', 'year_2', 'year_3'];

export interface LineItem {
  value: number | null;
  confidence: number;
  base_year?: number | null;
  year_1?: number | null;
  year_2?: number | null;
  year_3?: number | null;
  /** Provenance label, e.g. "Statement of Equity" */
  source?: string;
  source_pages?: number[];
}

export type LineItemCategory = Record<string, LineItem>;

export type LineItemTree = Record<string, LineItemCategory>;

export interface SummaryMetric {
  value: number | null;
  confidence: number;
}

/** Structured tree returned by the extraction service for one page */
export interface PageExtraction {
  statement_type?: string;
  company_name?: string;
  period?: string;
  currency?: string;
  years_detected?: string[];
  base_year?: string;
  line_items: LineItemTree;
  summary_metrics?: Record<string, SummaryMetric>;
  notes?: string;
}

export type ExtractionErrorCode =
  | 'missing_image'
  | 'missing_text'
  | 'empty_response'
  | 'invalid_json'
  | 'schema_violation'
  | 'rate_limit_exhausted'
  | 'service_error';

export interface ExtractionError {
  code: ExtractionErrorCode;
  message: string;
  retryable: boolean;
}

export interface ExtractionResult {
  page_num: number;
  statement_type: StatementType;
  /** Classification confidence of the page, in [0, 1] */
  confidence: number;
  line_items: LineItemTree;
  summary_metrics: Record<string, SummaryMetric>;
  notes: string;
  success: boolean;
  error?: ExtractionError;
  attempts: number;
  duration_ms: number;
  company_name?: string;
  period?: string;
  currency?: string;
  years_detected: string[];
  base_year: string;
}

// ============================================================================
// Consolidation
// ============================================================================

export type ValidationCheckName =
  | 'balance_sheet_balances'
  | 'income_statement_reconciles'
  | 'cash_flow_reconciles'
  | 'net_income_consistency';

export interface ValidationCheck {
  name: ValidationCheckName;
  /** null when the inputs needed for the check were not extracted */
  passed: boolean | null;
  expected?: number;
  actual?: number;
  difference?: number;
  detail: string;
}

export interface ValidationResults {
  balance_sheet_balances: boolean | null;
  income_statement_reconciles: boolean | null;
  cash_flow_reconciles: boolean | null;
  net_income_consistency: boolean | null;
  checks: ValidationCheck[];
  data_quality_score: number;
  completeness_score: number;
}

export interface ConsolidationInfo {
  source_pages: number[];
  duplicates_removed: number;
  conflicts_resolved: number;
  validation_results: ValidationResults;
  notes: string[];
}

export interface ConsolidatedStatement {
  line_items: LineItemTree;
  statements: Partial<Record<StatementType, LineItemTree>>;
  summary_metrics: Record<string, SummaryMetric>;
  company_name: string;
  period: string;
  currency: string;
  years_detected: string[];
  base_year: string;
  /** ISO 8601 timestamp of consolidation */
  generated_at: string;
  consolidation_info: ConsolidationInfo;
}
