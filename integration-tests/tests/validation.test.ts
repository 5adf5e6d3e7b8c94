/**
 * Cross-Statement Validation Tests
 */

import { validateStatements, withinTolerance, findFigure, consolidate, validationWarnings } from '@finstatement/core';
import { makeResult } from './fixtures';

describe('withinTolerance', () => {
  it('should allow 1% relative difference with a floor of 1', () => {
    expect(withinTolerance(1000, 990, 1)).toBe(true);
    expect(withinTolerance(1000, 989, 1)).toBe(false);
    expect(withinTolerance(0, 0.5, 1)).toBe(true);
    expect(withinTolerance(100, 102, 1)).toBe(false);
  });
});

describe('findFigure', () => {
  it('should search categories in order, then summary metrics', () => {
    const tree = {
      revenues: { net_sales: { value: 700, confidence: 0.9 } },
      totals: { total_revenue: { value: null, confidence: 0.2 } },
    };

    expect(findFigure(tree, ['total_revenue', 'net_sales'])).toBe(700);
    expect(findFigure(tree, ['net_income'], { net_income: { value: 42, confidence: 0.9 } })).toBe(42);
    expect(findFigure(undefined, ['net_income'])).toBeNull();
  });
});

describe('validateStatements', () => {
  it('should pass reconciling statements', () => {
    const results = validateStatements(
      {
        statements: {
          balance_sheet: {
            totals: {
              total_assets: { value: 5000000, confidence: 0.95 },
              total_liabilities: { value: 2000000, confidence: 0.95 },
              total_equity: { value: 3000000, confidence: 0.9 },
            },
          },
          income_statement: {
            revenues: { total_revenue: { value: 8200000, confidence: 0.95 } },
            expenses: { total_expenses: { value: -7000000, confidence: 0.9 } },
            results: { net_income: { value: 1200000, confidence: 0.95 } },
          },
          cash_flow: {
            operating_activities: {
              net_income: { value: 1200000, confidence: 0.9 },
              net_cash_from_operating_activities: { value: 1000, confidence: 0.9 },
            },
            investing_activities: { net_cash_used_in_investing_activities: { value: -400, confidence: 0.9 } },
            financing_activities: { net_cash_from_financing_activities: { value: -100, confidence: 0.9 } },
            summary: { net_increase_in_cash: { value: 500, confidence: 0.9 } },
          },
        },
        summary_metrics: {},
      },
      1
    );

    expect(results.balance_sheet_balances).toBe(true);
    expect(results.income_statement_reconciles).toBe(true);
    expect(results.cash_flow_reconciles).toBe(true);
    expect(results.net_income_consistency).toBe(true);
    expect(results.data_quality_score).toBe(1);
    expect(results.completeness_score).toBe(1);
    expect(results.checks[0]).toEqual({
      name: 'balance_sheet_balances',
      passed: true,
      expected: 5000000,
      actual: 5000000,
      difference: 0,
      detail: 'Assets = Liabilities + Equity reconciles',
    });
  });

  it('should record checks with missing inputs as not evaluated', () => {
    const results = validateStatements({
      statements: {
        balance_sheet: {
          totals: {
            total_assets: { value: 1000, confidence: 0.9 },
            total_liabilities: { value: 400, confidence: 0.9 },
          },
        },
      },
      summary_metrics: { total_equity: { value: 580, confidence: 0.9 } },
    });

    expect(results.balance_sheet_balances).toBe(false);
    expect(results.income_statement_reconciles).toBeNull();
    expect(results.cash_flow_reconciles).toBeNull();
    expect(results.net_income_consistency).toBeNull();
    expect(results.checks[1]).toEqual({
      name: 'income_statement_reconciles',
      passed: null,
      detail: 'Not evaluated: Revenue - Expenses = Net Income inputs not extracted',
    });
    expect(results.data_quality_score).toBe(0);
    expect(results.completeness_score).toBe(0.25);
  });

  it('should not compare the summary metric with itself', () => {
    const results = validateStatements({
      statements: { income_statement: {}, cash_flow: {} },
      summary_metrics: { net_income: { value: 10, confidence: 0.9 } },
    });

    expect(results.net_income_consistency).toBeNull();
  });
});

describe('validation warnings', () => {
  it('should report failed checks in the consolidated statement', () => {
    const statement = consolidate([
      makeResult(1, 'income_statement', { results: { net_income: { value: 1200, confidence: 0.9 } } }),
      makeResult(2, 'cash_flow', { operating_activities: { net_income: { value: 1150, confidence: 0.9 } } }),
    ]);

    expect(statement.consolidation_info.validation_results.net_income_consistency).toBe(false);
    expect(validationWarnings(statement)).toEqual([
      {
        check: 'net_income_consistency',
        message: 'Income statement net income = Cash flow net income off by 50',
        difference: 50,
      },
    ]);
  });
});
