/**
 * Cross-Statement Validation
 *
 * Arithmetic identities between the consolidated statements. Failures are
 * recorded, never thrown. A check whose inputs were not extracted is null.
 */

import { config } from '../config';
import { validationFailuresCounter } from '../metrics';
import type {
  LineItemTree,
  StatementType,
  SummaryMetric,
  ValidationCheck,
  ValidationCheckName,
  ValidationResults,
} from '../types';

/** Candidate field names per figure, in lookup order */
export const FIELD_CANDIDATES = {
  totalAssets: ['total_assets'],
  totalLiabilities: ['total_liabilities'],
  totalEquity: ['total_equity', 'total_shareholders_equity', 'total_stockholders_equity'],
  revenue: ['total_revenue', 'total_revenues', 'revenue', 'revenues', 'net_sales'],
  expenses: ['total_expenses', 'total_costs_and_expenses', 'expenses'],
  netIncome: ['net_income', 'net_income_loss', 'net_profit'],
  operatingCash: [
    'net_cash_from_operating_activities',
    'net_cash_provided_by_operating_activities',
    'net_cash_used_in_operating_activities',
    'operating_cash_flow',
  ],
  investingCash: [
    'net_cash_from_investing_activities',
    'net_cash_used_in_investing_activities',
    'net_cash_provided_by_investing_activities',
  ],
  financingCash: [
    'net_cash_from_financing_activities',
    'net_cash_used_in_financing_activities',
    'net_cash_provided_by_financing_activities',
  ],
  netChangeInCash: [
    'net_change_in_cash',
    'net_increase_in_cash',
    'net_decrease_in_cash',
    'net_increase_decrease_in_cash',
  ],
} as const;

type Figure = keyof typeof FIELD_CANDIDATES;

/**
 * First non-null value for any candidate name, searching tree categories in
 * order and then the summary metrics.
 */
export function findFigure(
  tree: LineItemTree | undefined,
  candidates: readonly string[],
  summary: Record<string, SummaryMetric> = {}
): number | null {
  for (const name of candidates) {
    for (const fields of Object.values(tree ?? {})) {
      const value = fields[name]?.value;
      if (value !== undefined && value !== null) return value;
    }
  }
  for (const name of candidates) {
    const value = summary[name]?.value;
    if (value !== undefined && value !== null) return value;
  }
  return null;
}

export function withinTolerance(expected: number, actual: number, tolerancePct: number): boolean {
  const allowed = Math.max((Math.abs(expected) * tolerancePct) / 100, 1);
  return Math.abs(expected - actual) <= allowed;
}

function compare(
  name: ValidationCheckName,
  expected: number | null,
  actual: number | null,
  tolerancePct: number,
  describe: string
): ValidationCheck {
  if (expected === null || actual === null) {
    return { name, passed: null, detail: `Not evaluated: ${describe} inputs not extracted` };
  }
  const difference = expected - actual;
  const passed = withinTolerance(expected, actual, tolerancePct);
  return {
    name,
    passed,
    expected,
    actual,
    difference,
    detail: passed ? `${describe} reconciles` : `${describe} off by ${difference}`,
  };
}

function sumOrNull(values: Array<number | null>): number | null {
  let total = 0;
  for (const value of values) {
    if (value === null) return null;
    total += value;
  }
  return total;
}

export interface ValidationInput {
  statements: Partial<Record<StatementType, LineItemTree>>;
  summary_metrics: Record<string, SummaryMetric>;
}

/**
 * Run the four cross-statement checks.
 */
export function validateStatements(
  input: ValidationInput,
  tolerancePct: number = config.validationTolerancePct
): ValidationResults {
  const { statements, summary_metrics: summary } = input;
  const find = (type: StatementType, figure: Figure, useSummary = true): number | null =>
    findFigure(statements[type], FIELD_CANDIDATES[figure], useSummary ? summary : {});

  const liabilities = find('balance_sheet', 'totalLiabilities');
  const equity = find('balance_sheet', 'totalEquity');
  const balanceSheet = compare(
    'balance_sheet_balances',
    find('balance_sheet', 'totalAssets'),
    sumOrNull([liabilities, equity]),
    tolerancePct,
    'Assets = Liabilities + Equity'
  );

  const revenue = find('income_statement', 'revenue');
  const expenses = find('income_statement', 'expenses');
  // Expenses may be printed as negatives
  const incomeStatement = compare(
    'income_statement_reconciles',
    revenue === null || expenses === null ? null : revenue - Math.abs(expenses),
    find('income_statement', 'netIncome'),
    tolerancePct,
    'Revenue - Expenses = Net Income'
  );

  const cashFlow = compare(
    'cash_flow_reconciles',
    find('cash_flow', 'netChangeInCash'),
    sumOrNull([
      find('cash_flow', 'operatingCash'),
      find('cash_flow', 'investingCash'),
      find('cash_flow', 'financingCash'),
    ]),
    tolerancePct,
    'Operating + Investing + Financing = Net change in cash'
  );

  // Statement trees only, never the shared summary metrics
  const netIncome = compare(
    'net_income_consistency',
    find('income_statement', 'netIncome', false),
    find('cash_flow', 'netIncome', false),
    tolerancePct,
    'Income statement net income = Cash flow net income'
  );

  const checks = [balanceSheet, incomeStatement, cashFlow, netIncome];
  const evaluated = checks.filter((check) => check.passed !== null);
  const passed = evaluated.filter((check) => check.passed === true);

  for (const check of checks) {
    if (check.passed === false) {
      validationFailuresCounter.inc({ check: check.name });
    }
  }

  return {
    balance_sheet_balances: balanceSheet.passed,
    income_statement_reconciles: incomeStatement.passed,
    cash_flow_reconciles: cashFlow.passed,
    net_income_consistency: netIncome.passed,
    checks,
    data_quality_score: evaluated.length === 0 ? 0 : passed.length / evaluated.length,
    completeness_score: evaluated.length / checks.length,
  };
}
