/**
 * Balance Sheet Extraction Template
 *
 * Sections follow the document: current and non-current assets, liabilities
 * and equity, each with their printed subtotals.
 */

import type { ExtractionTemplate } from './types';
import { CONFIDENCE_RULES, NUMBER_RULES, OUTPUT_SHAPE, USER_PROMPT_TEMPLATE, YEAR_RULES } from './shared';

export const BALANCE_SHEET_TEMPLATE: ExtractionTemplate = {
  statementType: 'balance_sheet',
  description: 'Statement of financial position - assets, liabilities and equity with totals',

  systemPrompt: `You are a financial data extraction specialist for balance sheets (statements of financial position).

DOCUMENT STRUCTURE:
- Current assets, then non-current assets, then TOTAL ASSETS
- Current liabilities, then non-current liabilities, then TOTAL LIABILITIES
- Equity (share capital, additional paid-in capital, retained earnings, other reserves), then TOTAL EQUITY
- A final TOTAL LIABILITIES AND EQUITY line

EXTRACTION RULES:
1. Use the document's own section headers as line_items categories
2. Always extract subtotals and grand totals as their own line items
3. Put total_assets, total_liabilities and total_equity in summary_metrics as well

${NUMBER_RULES}

${YEAR_RULES}

${CONFIDENCE_RULES}

${OUTPUT_SHAPE}`,

  userPromptTemplate: USER_PROMPT_TEMPLATE,
};
