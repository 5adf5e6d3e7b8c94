/**
 * Analysis-Ready Report Rows
 *
 * Flattens a consolidated statement into one row per line item with fixed
 * Value_Year_1..4 columns. The first row maps each column to its year label.
 */

import Papa from 'papaparse';
import { STATEMENT_TYPES, STATEMENT_TYPE_LABELS, type ConsolidatedStatement, type LineItem, type YearKey } from '../types';

export const MAX_REPORT_YEARS = 4;

export const REPORT_COLUMNS = [
  'Category',
  'Subcategory',
  'Field',
  'Confidence',
  'Confidence_Score',
  'Value_Year_1',
  'Value_Year_2',
  'Value_Year_3',
  'Value_Year_4',
] as const;

export type ConfidenceLabel = 'High' | 'Medium' | 'Low';

export interface ReportRow {
  Category: string;
  Subcategory: string;
  Field: string;
  Confidence: ConfidenceLabel | '';
  Confidence_Score: number;
  Value_Year_1: number | string;
  Value_Year_2: number | string;
  Value_Year_3: number | string;
  Value_Year_4: number | string;
}

export function confidenceLabel(score: number): ConfidenceLabel {
  if (score >= 0.9) return 'High';
  if (score >= 0.7) return 'Medium';
  return 'Low';
}

/**
 * "cash_and_equivalents" -> "Cash And Equivalents"
 */
export function titleCase(name: string): string {
  return name
    .split('_')
    .filter((word) => word.length > 0)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}

function amount(item: LineItem, key: YearKey): number | string {
  return item[key] ?? '';
}

function headerRow(years: string[]): ReportRow {
  return {
    Category: 'Date',
    Subcategory: 'Year',
    Field: 'Year',
    Confidence: '',
    Confidence_Score: 0.0,
    Value_Year_1: years[0] ?? '',
    Value_Year_2: years[1] ?? '',
    Value_Year_3: years[2] ?? '',
    Value_Year_4: years[3] ?? '',
  };
}

/**
 * Header row followed by every line item, grouped by statement type.
 */
export function buildReportRows(statement: ConsolidatedStatement): ReportRow[] {
  const rows: ReportRow[] = [headerRow(statement.years_detected.slice(0, MAX_REPORT_YEARS))];

  for (const type of STATEMENT_TYPES) {
    const tree = statement.statements[type];
    if (!tree) continue;

    for (const [category, fields] of Object.entries(tree)) {
      for (const [field, item] of Object.entries(fields)) {
        rows.push({
          Category: STATEMENT_TYPE_LABELS[type],
          Subcategory: titleCase(category),
          Field: titleCase(field),
          Confidence: confidenceLabel(item.confidence),
          Confidence_Score: item.confidence,
          Value_Year_1: item.base_year ?? item.value ?? '',
          Value_Year_2: amount(item, 'year_1'),
          Value_Year_3: amount(item, 'year_2'),
          Value_Year_4: amount(item, 'year_3'),
        });
      }
    }
  }

  return rows;
}

/**
 * Serialize report rows as CSV with a header line.
 */
export function toCsv(rows: ReportRow[]): string {
  return Papa.unparse(rows, { columns: [...REPORT_COLUMNS], newline: '\n' });
}
