/**
 * Equity-into-Balance-Sheet Merge
 *
 * A statement of changes in equity carries closing balances that belong in
 * the balance sheet's equity section, next to movements that do not.
 * Closing balances are read from the `equity` category only; movements and
 * any other category stay behind.
 */

import { STATEMENT_TYPE_LABELS, type LineItemCategory, type LineItemTree } from '../types';

export const EQUITY_CATEGORY = 'equity';
export const EQUITY_SOURCE_LABEL = STATEMENT_TYPE_LABELS.equity;

/** Statement of equity field -> balance sheet field */
export const EQUITY_FIELD_MAPPING: Readonly<Record<string, string>> = {
  share_capital: 'share_capital',
  capital_stock: 'share_capital',
  common_stock: 'share_capital',
  preferred_stock: 'preferred_stock',
  retained_earnings: 'retained_earnings',
  accumulated_other_comprehensive_income: 'accumulated_other_comprehensive_income',
  additional_paid_in_capital: 'additional_paid_in_capital',
  treasury_stock: 'treasury_stock',
  total_equity: 'total_equity',
  total_shareholders_equity: 'total_equity',
};

export const EXCLUDED_EQUITY_FIELDS: ReadonlySet<string> = new Set([
  'dividends_paid',
  'dividend_payments',
  'cash_dividends',
  'stock_issuance',
  'share_issuance',
  'stock_repurchase',
  'beginning_balance',
  'ending_balance',
  'net_income_for_period',
  'comprehensive_income',
  'foreign_currency_translation',
]);

const EXCLUDED_PREFIXES = ['beginning_', 'change_', 'movement_'];
const EXCLUDED_INFIXES = ['_during_'];

export function mapEquityField(field: string): string {
  return Object.prototype.hasOwnProperty.call(EQUITY_FIELD_MAPPING, field) ? EQUITY_FIELD_MAPPING[field] : field;
}

export function isMovementField(field: string): boolean {
  return (
    EXCLUDED_EQUITY_FIELDS.has(field) ||
    EXCLUDED_PREFIXES.some((prefix) => field.startsWith(prefix)) ||
    EXCLUDED_INFIXES.some((infix) => field.includes(infix))
  );
}

/**
 * Copy closing equity balances into the balance sheet's equity section.
 * An entry is written when the balance sheet lacks the field or holds it at
 * strictly lower confidence. Neither input is modified.
 */
export function mergeEquityIntoBalanceSheet(
  balanceSheet: LineItemTree,
  equityStatement: LineItemTree
): LineItemTree {
  const equity: LineItemCategory = { ...balanceSheet[EQUITY_CATEGORY] };

  for (const [field, item] of Object.entries(equityStatement[EQUITY_CATEGORY] ?? {})) {
    if (item.value === null) continue;

    const target = mapEquityField(field);
    if (isMovementField(field) || isMovementField(target)) continue;

    const existing = equity[target];
    if (!existing || existing.confidence < item.confidence) {
      equity[target] = { ...item, source: EQUITY_SOURCE_LABEL };
    }
  }

  return { ...balanceSheet, [EQUITY_CATEGORY]: equity };
}
