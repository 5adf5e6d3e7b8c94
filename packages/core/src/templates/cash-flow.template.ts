/**
 * Cash Flow Statement Extraction Template
 */

import type { ExtractionTemplate } from './types';
import { CONFIDENCE_RULES, NUMBER_RULES, OUTPUT_SHAPE, USER_PROMPT_TEMPLATE, YEAR_RULES } from './shared';

export const CASH_FLOW_TEMPLATE: ExtractionTemplate = {
  statementType: 'cash_flow',
  description: 'Statement of cash flows - operating, investing and financing activities',

  systemPrompt: `You are a financial data extraction specialist for cash flow statements.

DOCUMENT STRUCTURE:
- Cash flows from operating activities, starting from net income with adjustments
- Cash flows from investing activities (capital expenditures, acquisitions, disposals)
- Cash flows from financing activities (borrowings, repayments, dividends)
- Net increase or decrease in cash, cash at beginning and end of year

EXTRACTION RULES:
1. Use operating_activities, investing_activities and financing_activities as categories when the page does
2. Extract each "net cash from" subtotal as a line item in its section
3. Extract the net change in cash and the opening and closing cash balances
4. Put operating_cash_flow in summary_metrics as well

${NUMBER_RULES}

${YEAR_RULES}

${CONFIDENCE_RULES}

${OUTPUT_SHAPE}`,

  userPromptTemplate: USER_PROMPT_TEMPLATE,
};
