/**
 * Test Fixtures
 *
 * Page texts, ranked-page builders and an in-process extraction service.
 */

import type {
  ClassificationScore,
  ExtractionRequest,
  ExtractionResult,
  ExtractionService,
  LineItemTree,
  Page,
  PageExtraction,
  PageImage,
  RankedPage,
  StatementType,
} from '@finstatement/core';

export const BALANCE_SHEET_TEXT = [
  'ACME HOLDINGS INC.',
  'STATEMENT OF FINANCIAL POSITION',
  'Current assets',
  'Cash and cash equivalents 1,250,000 980,000',
  'Accounts receivable 430,000 410,000',
  'Total assets 5,000,000 4,600,000',
  'Total liabilities 2,000,000 1,900,000',
  'Retained earnings 1,800,000 1,500,000',
].join('\n');

export const INCOME_STATEMENT_TEXT = [
  'ACME HOLDINGS INC.',
  'INCOME STATEMENT',
  'For the year ended December 31, 2024',
  'Revenue 8,200,000',
  'Cost of goods sold 5,100,000',
  'Gross profit 3,100,000',
  'Operating expenses 1,400,000',
  'Net income 1,200,000',
].join('\n');

export const CASH_FLOW_TEXT = [
  'STATEMENT OF CASH FLOWS',
  'Cash flows from operating activities',
  'Net income 1,200,000',
  'Depreciation and amortization 300,000',
  'Cash flows from investing activities',
  'Capital expenditures (450,000)',
  'Cash flows from financing activities',
  'Dividends paid (200,000)',
  'Net increase in cash 850,000',
].join('\n');

export const NARRATIVE_TEXT =
  'The company continued to expand its retail footprint across the region during the period, ' +
  'opening new branches and hiring additional staff to support growth.';

export const TEST_IMAGE: PageImage = { data: Buffer.from('test-image'), media_type: 'image/png' };

export function makePage(pageNum: number, text: string, image: PageImage | null = TEST_IMAGE): Page {
  return { page_num: pageNum, text, image_ref: image };
}

export function makeClassification(
  pageNum: number,
  statementType: StatementType,
  score: number,
  classified = score >= 3
): ClassificationScore {
  return {
    page_num: pageNum,
    statement_type: statementType,
    score,
    number_density_pct: 0,
    classified,
    statement_scores: { balance_sheet: 0, income_statement: 0, cash_flow: 0, equity: 0, [statementType]: score },
    matches: { balance_sheet: [], income_statement: [], cash_flow: [], equity: [] },
    financial_numbers_count: 0,
  };
}

export interface RankedPageInput {
  pageNum: number;
  statementType: StatementType;
  score: number;
  text?: string;
  image?: PageImage | null;
}

/**
 * Ranked pages in the given order, ranks assigned 1..n
 */
export function makeRankedPages(inputs: RankedPageInput[]): RankedPage[] {
  return inputs.map((input, index) => ({
    ...makePage(input.pageNum, input.text ?? BALANCE_SHEET_TEXT, input.image === undefined ? TEST_IMAGE : input.image),
    classification: makeClassification(input.pageNum, input.statementType, input.score),
    rank: index + 1,
  }));
}

export function makeExtraction(lineItems: LineItemTree, extra: Partial<PageExtraction> = {}): PageExtraction {
  return { line_items: lineItems, summary_metrics: {}, ...extra };
}

export function makeResult(
  pageNum: number,
  statementType: StatementType,
  lineItems: LineItemTree,
  extra: Partial<ExtractionResult> = {}
): ExtractionResult {
  return {
    page_num: pageNum,
    statement_type: statementType,
    confidence: 1,
    line_items: lineItems,
    summary_metrics: {},
    notes: '',
    success: true,
    attempts: 1,
    duration_ms: 0,
    years_detected: [],
    base_year: '',
    ...extra,
  };
}

export type Responder = (request: ExtractionRequest, call: number) => PageExtraction | Promise<PageExtraction>;

/**
 * In-process ExtractionService. `call` counts attempts per page, from 1.
 */
export class FakeExtractionService implements ExtractionService {
  readonly name = 'fake';
  readonly requests: ExtractionRequest[] = [];
  private readonly callsByPage = new Map<number, number>();

  constructor(private readonly responder: Responder) {}

  async extract(request: ExtractionRequest): Promise<PageExtraction> {
    const call = (this.callsByPage.get(request.pageNum) ?? 0) + 1;
    this.callsByPage.set(request.pageNum, call);
    this.requests.push(request);
    return this.responder(request, call);
  }

  callCount(pageNum: number): number {
    return this.callsByPage.get(pageNum) ?? 0;
  }
}

export function rateLimitError(): Error {
  return Object.assign(new Error('Too Many Requests'), { status: 429 });
}

export const noSleep = async (): Promise<void> => {};

/**
 * Run fn and return what it threw, or undefined
 */
export async function captureError(fn: () => unknown): Promise<unknown> {
  try {
    await fn();
  } catch (error) {
    return error;
  }
  return undefined;
}
