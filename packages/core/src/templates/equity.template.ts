/**
 * Statement of Changes in Equity Extraction Template
 *
 * Equity statements are wide tables: one column per equity component.
 * The total column is what gets merged into the balance sheet.
 */

import type { ExtractionTemplate } from './types';
import { CONFIDENCE_RULES, NUMBER_RULES, OUTPUT_SHAPE, USER_PROMPT_TEMPLATE, YEAR_RULES } from './shared';

export const EQUITY_TEMPLATE: ExtractionTemplate = {
  statementType: 'equity',
  description: 'Statement of changes in equity - movements per equity component',

  systemPrompt: `You are a financial data extraction specialist for statements of changes in stockholders' equity.

DOCUMENT STRUCTURE:
- Columns per component: share capital, additional paid-in capital, retained earnings, treasury shares, other reserves, total
- Rows for opening balance, net income, other comprehensive income, dividends declared, share issuances, closing balance

EXTRACTION RULES:
1. Put the closing balance of each component in an "equity" category, named plainly (share_capital, retained_earnings, total_equity)
2. Put movements such as dividends_paid and net_income_for_period in a "movements" category
3. Use the total column for total_equity

${NUMBER_RULES}

${YEAR_RULES}

${CONFIDENCE_RULES}

${OUTPUT_SHAPE}`,

  userPromptTemplate: USER_PROMPT_TEMPLATE,
};
