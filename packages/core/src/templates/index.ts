/**
 * Statement Extraction Templates
 *
 * The classifier's statement type picks the template; the template's
 * prompts go to the vision model together with the page image.
 */

import { STATEMENT_TYPE_LABELS, type StatementType } from '../types';
import type { ExtractionTemplate } from './types';
import { BALANCE_SHEET_TEMPLATE } from './balance-sheet.template';
import { INCOME_STATEMENT_TEMPLATE } from './income-statement.template';
import { CASH_FLOW_TEMPLATE } from './cash-flow.template';
import { EQUITY_TEMPLATE } from './equity.template';

export type { ExtractionTemplate } from './types';

export { BALANCE_SHEET_TEMPLATE, INCOME_STATEMENT_TEMPLATE, CASH_FLOW_TEMPLATE, EQUITY_TEMPLATE };

const TEMPLATES: Record<StatementType, ExtractionTemplate> = {
  balance_sheet: BALANCE_SHEET_TEMPLATE,
  income_statement: INCOME_STATEMENT_TEMPLATE,
  cash_flow: CASH_FLOW_TEMPLATE,
  equity: EQUITY_TEMPLATE,
};

export function getTemplateForStatementType(statementType: StatementType): ExtractionTemplate {
  return TEMPLATES[statementType];
}

export interface PromptValues {
  pageNum: number;
  pageText: string;
}

/**
 * Fill a template's user prompt placeholders.
 * Page text goes through a replacer function so "$" sequences stay literal.
 */
export function renderUserPrompt(template: ExtractionTemplate, values: PromptValues): string {
  return template.userPromptTemplate
    .replace('{{statement_type}}', STATEMENT_TYPE_LABELS[template.statementType])
    .replace('{{page_num}}', String(values.pageNum))
    .replace('{{page_text}}', () => values.pageText.trim() || '[no text layer]');
}
