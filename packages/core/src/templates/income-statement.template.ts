/**
 * Income Statement Extraction Template
 */

import type { ExtractionTemplate } from './types';
import { CONFIDENCE_RULES, NUMBER_RULES, OUTPUT_SHAPE, USER_PROMPT_TEMPLATE, YEAR_RULES } from './shared';

export const INCOME_STATEMENT_TEMPLATE: ExtractionTemplate = {
  statementType: 'income_statement',
  description: 'Statement of income or comprehensive income - revenues, expenses and net income',

  systemPrompt: `You are a financial data extraction specialist for income statements (profit and loss, statements of comprehensive income).

DOCUMENT STRUCTURE:
- Revenues or net sales, cost of sales, gross profit
- Operating expenses (selling, general and administrative)
- Other income and expenses, income before tax, income tax expense
- Net income, then other comprehensive income when present

EXTRACTION RULES:
1. Keep expenses with the sign shown on the page; parenthesized amounts are negative
2. Extract gross profit, operating income and income before tax as line items
3. Put total_revenue, total_expenses and net_income in summary_metrics as well

${NUMBER_RULES}

${YEAR_RULES}

${CONFIDENCE_RULES}

${OUTPUT_SHAPE}`,

  userPromptTemplate: USER_PROMPT_TEMPLATE,
};
