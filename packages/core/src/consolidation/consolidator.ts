/**
 * Consolidator
 *
 * Merges successful page extractions into one frozen ConsolidatedStatement:
 * the cross-page line-item tree, a tree per statement type (with the
 * statement of equity folded into the balance sheet), summary metrics,
 * year labels and cross-statement validation.
 */

import { config } from '../config';
import { logger } from '../logger';
import type { ConsolidationValidationWarning } from '../errors';
import {
  STATEMENT_TYPES,
  type ConsolidatedStatement,
  type ExtractionResult,
  type LineItemTree,
  type StatementType,
} from '../types';
import { mergeLineItems, mergeSummaryMetrics } from './merge';
import { mergeEquityIntoBalanceSheet } from './equity-merge';
import { validateStatements } from './validation';
import { collectYears, resolveBaseYear } from './years';

export interface ConsolidateOptions {
  /** Relative tolerance for validation checks, in percent */
  tolerancePct?: number;
  now?: () => Date;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

function firstPresent(results: ExtractionResult[], pick: (result: ExtractionResult) => string | undefined): string {
  for (const result of results) {
    const value = pick(result)?.trim();
    if (value) return value;
  }
  return '';
}

/**
 * Consolidate extraction results. Failed results are ignored.
 */
export function consolidate(results: ExtractionResult[], options: ConsolidateOptions = {}): ConsolidatedStatement {
  const tolerancePct = options.tolerancePct ?? config.validationTolerancePct;
  const now = options.now ?? (() => new Date());
  const sources = results.filter((result) => result.success).sort((a, b) => a.page_num - b.page_num);
  const notes: string[] = [];

  const overall = mergeLineItems(sources);

  const statements: Partial<Record<StatementType, LineItemTree>> = {};
  for (const type of STATEMENT_TYPES) {
    const ofType = sources.filter((source) => source.statement_type === type);
    if (ofType.length > 0) {
      statements[type] = mergeLineItems(ofType).tree;
    }
  }

  const balanceSheet = statements.balance_sheet;
  const equityStatement = statements.equity;
  if (balanceSheet && equityStatement) {
    statements.balance_sheet = mergeEquityIntoBalanceSheet(balanceSheet, equityStatement);
    notes.push('Statement of Equity closing balances merged into Balance Sheet equity section');
  }

  const summaryMetrics = mergeSummaryMetrics(sources);
  const years = collectYears(sources);
  const validation = validateStatements({ statements, summary_metrics: summaryMetrics }, tolerancePct);

  for (const source of sources) {
    if (source.notes.trim()) {
      notes.push(`Page ${source.page_num}: ${source.notes.trim()}`);
    }
  }

  const statement: ConsolidatedStatement = {
    line_items: overall.tree,
    statements,
    summary_metrics: summaryMetrics,
    company_name: firstPresent(sources, (source) => source.company_name),
    period: firstPresent(sources, (source) => source.period),
    currency: firstPresent(sources, (source) => source.currency),
    years_detected: years,
    base_year: resolveBaseYear(sources, years),
    generated_at: now().toISOString(),
    consolidation_info: {
      source_pages: sources.map((source) => source.page_num),
      duplicates_removed: overall.stats.duplicates_removed,
      conflicts_resolved: overall.stats.conflicts_resolved,
      validation_results: validation,
      notes,
    },
  };

  logger.info('Consolidation complete', {
    source_pages: statement.consolidation_info.source_pages,
    duplicates_removed: overall.stats.duplicates_removed,
    conflicts_resolved: overall.stats.conflicts_resolved,
    data_quality_score: validation.data_quality_score,
    completeness_score: validation.completeness_score,
  });

  return deepFreeze(statement);
}

/**
 * Warnings for every validation check that was evaluated and failed.
 */
export function validationWarnings(statement: ConsolidatedStatement): ConsolidationValidationWarning[] {
  return statement.consolidation_info.validation_results.checks
    .filter((check) => check.passed === false)
    .map((check) => ({ check: check.name, message: check.detail, difference: check.difference }));
}
