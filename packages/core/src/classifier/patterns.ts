/**
 * Statement Classification Patterns
 *
 * Phrase lists live in patterns.json; this module compiles them once into
 * case-insensitive global regular expressions.
 *
 * Weights:
 * - Title phrases (e.g. "statement of financial position"): 5 per match
 * - Line-item vocabulary (e.g. "current assets"): 2 per match
 * - Supporting indicators shared by every type (e.g. "audited"): 1 per match
 */

import patternData from './patterns.json';
import type { StatementType } from '../types';

export const TITLE_WEIGHT = 5;
export const LINE_ITEM_WEIGHT = 2;
export const SUPPORTING_WEIGHT = 1;

export interface CompiledPattern {
  source: string;
  regex: RegExp;
}

function compile(sources: readonly string[]): CompiledPattern[] {
  return sources.map((source) => ({ source, regex: new RegExp(source, 'gi') }));
}

function compilePerType(table: Record<StatementType, string[]>): Record<StatementType, CompiledPattern[]> {
  return {
    balance_sheet: compile(table.balance_sheet),
    income_statement: compile(table.income_statement),
    cash_flow: compile(table.cash_flow),
    equity: compile(table.equity),
  };
}

export const TITLE_PATTERNS = compilePerType(patternData.title);
export const LINE_ITEM_PATTERNS = compilePerType(patternData.line_item);
export const SUPPORTING_PATTERNS = compile(patternData.supporting);

/**
 * All matches of a pattern in the text
 */
export function findMatches(text: string, pattern: CompiledPattern): string[] {
  return text.match(pattern.regex) ?? [];
}

