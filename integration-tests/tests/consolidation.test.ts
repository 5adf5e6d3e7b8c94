/**
 * Consolidation Tests
 *
 * Line-item merge, equity-into-balance-sheet merge, year labels and the
 * frozen consolidated statement.
 */

import {
  consolidate,
  mergeLineItems,
  mergeSummaryMetrics,
  mergeEquityIntoBalanceSheet,
  isMovementField,
  mapEquityField,
  collectYears,
  resolveBaseYear,
  type LineItemTree,
} from '@finstatement/core';
import { makeResult } from './fixtures';

describe('mergeLineItems', () => {
  const merged = mergeLineItems([
    {
      page_num: 2,
      line_items: {
        current_assets: {
          cash: { value: 100, confidence: 0.95 },
          inventory: { value: 55, confidence: 0.7 },
          receivables: { value: 12, confidence: 0.8, base_year: 12, year_1: 11 },
          payables: { value: 6, confidence: 0.8 },
        },
      },
    },
    {
      page_num: 1,
      line_items: {
        current_assets: {
          cash: { value: 100, confidence: 0.9 },
          inventory: { value: 50, confidence: 0.8 },
          receivables: { value: 10, confidence: 0.8 },
          payables: { value: 5, confidence: 0.8 },
        },
        noncurrent_assets: {
          equipment: { value: 900, confidence: 0.85 },
        },
      },
    },
  ]);
  const assets = merged.tree.current_assets;

  it('should keep one instance of identical values at the higher confidence', () => {
    expect(assets.cash).toEqual({ value: 100, confidence: 0.95, source_pages: [1, 2] });
    expect(merged.stats.duplicates_removed).toBe(1);
  });

  it('should resolve differing values by strictly higher confidence', () => {
    expect(assets.inventory).toEqual({ value: 50, confidence: 0.8, source_pages: [1] });
  });

  it('should prefer the more complete entry on equal confidence', () => {
    expect(assets.receivables).toEqual({ value: 12, confidence: 0.8, base_year: 12, year_1: 11, source_pages: [2] });
  });

  it('should keep the earlier page on a full tie', () => {
    expect(assets.payables).toEqual({ value: 5, confidence: 0.8, source_pages: [1] });
    expect(merged.stats.conflicts_resolved).toBe(3);
  });

  it('should carry fields seen on one page only', () => {
    expect(merged.tree.noncurrent_assets.equipment).toEqual({ value: 900, confidence: 0.85, source_pages: [1] });
  });
});

describe('mergeSummaryMetrics', () => {
  it('should prefer known values, then higher confidence, then the earlier page', () => {
    const merged = mergeSummaryMetrics([
      { page_num: 1, summary_metrics: { total_assets: { value: null, confidence: 0.99 }, net_income: { value: 7, confidence: 0.8 } } },
      { page_num: 2, summary_metrics: { total_assets: { value: 500, confidence: 0.6 }, net_income: { value: 9, confidence: 0.8 } } },
    ]);

    expect(merged).toEqual({
      total_assets: { value: 500, confidence: 0.6 },
      net_income: { value: 7, confidence: 0.8 },
    });
  });
});

describe('mergeEquityIntoBalanceSheet', () => {
  const balanceSheet: LineItemTree = {
    current_assets: { cash: { value: 10, confidence: 0.9 } },
    equity: {
      share_capital: { value: 1000, confidence: 0.9 },
      retained_earnings: { value: 500, confidence: 0.95 },
    },
  };
  const equityStatement: LineItemTree = {
    equity: {
      capital_stock: { value: 1000, confidence: 0.95 },
      retained_earnings: { value: 480, confidence: 0.9 },
      total_shareholders_equity: { value: 1500, confidence: 0.97 },
      treasury_stock: { value: null, confidence: 0.99 },
    },
    movements: {
      dividends_paid: { value: -50, confidence: 0.99 },
      beginning_retained_earnings: { value: 400, confidence: 0.99 },
      change_in_reserves: { value: 20, confidence: 0.99 },
      issued_during_year: { value: 30, confidence: 0.99 },
    },
  };
  const before = JSON.parse(JSON.stringify(balanceSheet));
  const merged = mergeEquityIntoBalanceSheet(balanceSheet, equityStatement);

  it('should write mapped closing balances at higher confidence', () => {
    expect(merged.equity).toEqual({
      share_capital: { value: 1000, confidence: 0.95, source: 'Statement of Equity' },
      retained_earnings: { value: 500, confidence: 0.95 },
      total_equity: { value: 1500, confidence: 0.97, source: 'Statement of Equity' },
    });
  });

  it('should leave other categories untouched', () => {
    expect(merged.current_assets).toEqual({ cash: { value: 10, confidence: 0.9 } });
  });

  it('should not modify its inputs', () => {
    expect(balanceSheet).toEqual(before);
    expect(equityStatement.equity.capital_stock).toEqual({ value: 1000, confidence: 0.95 });
  });

  it('should create the equity section when the balance sheet has none', () => {
    const result = mergeEquityIntoBalanceSheet({}, { equity: { common_stock: { value: 5, confidence: 0.5 } } });
    expect(result).toEqual({ equity: { share_capital: { value: 5, confidence: 0.5, source: 'Statement of Equity' } } });
  });

  it('should read closing balances from the equity category only', () => {
    const result = mergeEquityIntoBalanceSheet(
      { equity: { share_capital: { value: 1000, confidence: 0.9 } } },
      {
        equity: { retained_earnings: { value: 700, confidence: 0.9 } },
        movements: {
          net_income: { value: 250, confidence: 0.95 },
          dividends_declared: { value: -80, confidence: 0.95 },
          other_comprehensive_income: { value: 15, confidence: 0.95 },
        },
      }
    );

    expect(Object.keys(result.equity).sort()).toEqual(['retained_earnings', 'share_capital']);
    expect(result.equity.retained_earnings).toEqual({ value: 700, confidence: 0.9, source: 'Statement of Equity' });
  });

  it('should recognise movement fields', () => {
    expect(isMovementField('ending_balance')).toBe(true);
    expect(isMovementField('movement_in_reserves')).toBe(true);
    expect(isMovementField('net_increase_during_year')).toBe(true);
    expect(isMovementField('total_equity')).toBe(false);
    expect(mapEquityField('total_shareholders_equity')).toBe('total_equity');
    expect(mapEquityField('revaluation_surplus')).toBe('revaluation_surplus');
  });
});

describe('Year labels', () => {
  it('should union years most recent first', () => {
    expect(
      collectYears([
        { years_detected: ['2022', '2024'], base_year: '' },
        { years_detected: ['2023', '2024', ' '], base_year: '2023' },
      ])
    ).toEqual(['2024', '2023', '2022']);
  });

  it('should take the first reported base year, else the most recent year', () => {
    const sources = [
      { years_detected: ['2024'], base_year: '' },
      { years_detected: ['2023'], base_year: '2023' },
    ];
    expect(resolveBaseYear(sources, ['2024', '2023'])).toBe('2023');
    expect(resolveBaseYear([{ years_detected: [], base_year: '' }], ['2021'])).toBe('2021');
    expect(resolveBaseYear([], [])).toBe('');
  });
});

describe('consolidate', () => {
  const results = [
    makeResult(
      1,
      'balance_sheet',
      {
        totals: {
          total_assets: { value: 5000, confidence: 0.95 },
          total_liabilities: { value: 2000, confidence: 0.95 },
        },
        equity: { total_equity: { value: 2900, confidence: 0.8 } },
      },
      { years_detected: ['2024', '2023'], base_year: '2024', company_name: 'Acme Holdings Inc.', currency: 'USD' }
    ),
    makeResult(2, 'income_statement', {}, { success: false, error: { code: 'invalid_json', message: 'x', retryable: false } }),
    makeResult(
      3,
      'equity',
      { equity: { total_shareholders_equity: { value: 3000, confidence: 0.9 } } },
      { years_detected: ['2022'], period: 'For the year ended December 31, 2024', notes: ' Wide table ' }
    ),
  ];
  const statement = consolidate(results, { now: () => new Date('2024-03-01T00:00:00.000Z') });

  it('should consolidate only successful results', () => {
    expect(statement.consolidation_info.source_pages).toEqual([1, 3]);
    expect(Object.keys(statement.statements)).toEqual(['balance_sheet', 'equity']);
  });

  it('should fill metadata from the first source that has it', () => {
    expect(statement.company_name).toBe('Acme Holdings Inc.');
    expect(statement.currency).toBe('USD');
    expect(statement.period).toBe('For the year ended December 31, 2024');
    expect(statement.years_detected).toEqual(['2024', '2023', '2022']);
    expect(statement.base_year).toBe('2024');
    expect(statement.generated_at).toBe('2024-03-01T00:00:00.000Z');
  });

  it('should fold the statement of equity into the balance sheet', () => {
    expect(statement.statements.balance_sheet?.equity.total_equity).toEqual({
      value: 3000,
      confidence: 0.9,
      source_pages: [3],
      source: 'Statement of Equity',
    });
    expect(statement.consolidation_info.validation_results.balance_sheet_balances).toBe(true);
    expect(statement.consolidation_info.notes).toEqual([
      'Statement of Equity closing balances merged into Balance Sheet equity section',
      'Page 3: Wide table',
    ]);
  });

  it('should merge every source into the top-level tree', () => {
    expect(statement.line_items.equity).toEqual({
      total_equity: { value: 2900, confidence: 0.8, source_pages: [1] },
      total_shareholders_equity: { value: 3000, confidence: 0.9, source_pages: [3] },
    });
  });

  it('should freeze the statement', () => {
    expect(Object.isFrozen(statement)).toBe(true);
    expect(Object.isFrozen(statement.line_items.totals.total_assets)).toBe(true);
    expect(Object.isFrozen(statement.years_detected)).toBe(true);
    expect(Object.isFrozen(results[0].line_items)).toBe(false);
  });

  it('should produce an empty statement from no successes', () => {
    const empty = consolidate([], { now: () => new Date('2024-03-01T00:00:00.000Z') });

    expect(empty.line_items).toEqual({});
    expect(empty.years_detected).toEqual([]);
    expect(empty.base_year).toBe('');
    expect(empty.consolidation_info.validation_results.completeness_score).toBe(0);
  });
});
