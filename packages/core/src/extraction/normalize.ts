/**
 * Extraction Response Normalization
 *
 * Turns the raw text returned by the vision model into a PageExtraction.
 * The model is asked for JSON but amounts still arrive as printed strings,
 * categories arrive nested one level too deep, and confidences drift outside
 * [0, 1]; all of that is folded into the typed tree here.
 */

import { ExtractionFatalError } from '../errors';
import { validatePageExtraction } from '../schemas';
import {
  YEAR_KEYS,
  type LineItem,
  type LineItemCategory,
  type LineItemTree,
  type PageExtraction,
  type SummaryMetric,
} from '../types';

const UNCATEGORIZED = 'other_items';

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed === '' ? undefined : trimmed;
  }
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return undefined;
}

export function clampConfidence(value: unknown): number {
  const parsed = typeof value === 'string' ? Number(value) : value;
  if (typeof parsed !== 'number' || !Number.isFinite(parsed)) return 0;
  return Math.min(Math.max(parsed, 0), 1);
}

/**
 * Parse a printed amount: "₱(26,278)" -> -26278, "1,234.50" -> 1234.5.
 * Blank, dash-only and unreadable strings are null.
 */
export function parseAmount(raw: unknown): number | null {
  if (typeof raw === 'number') return Number.isFinite(raw) ? raw : null;
  if (typeof raw !== 'string') return null;

  const trimmed = raw.trim();
  const negative = /\(\s*[\d.,]+\s*\)/.test(trimmed) || /^[^\d]*-/.test(trimmed);
  const digits = trimmed.replace(/[^\d.]/g, '');
  if (digits === '' || digits === '.') return null;

  const parsed = Number(digits);
  if (!Number.isFinite(parsed)) return null;
  return negative ? -parsed : parsed;
}

const LINE_ITEM_KEYS = new Set<string>(['value', 'confidence', ...YEAR_KEYS]);

function looksLikeLineItem(value: JsonRecord): boolean {
  return Object.keys(value).some((key) => LINE_ITEM_KEYS.has(key));
}

function normalizeLineItem(raw: unknown): LineItem {
  if (!isRecord(raw)) {
    return { value: parseAmount(raw), confidence: 0 };
  }

  const item: LineItem = {
    value: 'value' in raw ? parseAmount(raw.value) : parseAmount(raw.base_year),
    confidence: clampConfidence(raw.confidence),
  };

  for (const key of YEAR_KEYS) {
    if (key in raw) {
      item[key] = parseAmount(raw[key]);
    }
  }

  return item;
}

/**
 * Collect a category's entries, flattening nested groups into
 * `${group}_${field}` keys.
 */
function normalizeCategory(raw: JsonRecord): LineItemCategory {
  const category: LineItemCategory = {};

  for (const [field, entry] of Object.entries(raw)) {
    if (isRecord(entry) && !looksLikeLineItem(entry)) {
      for (const [subField, subEntry] of Object.entries(entry)) {
        category[`${field}_${subField}`] = normalizeLineItem(subEntry);
      }
    } else {
      category[field] = normalizeLineItem(entry);
    }
  }

  return category;
}

export function normalizeLineItems(raw: unknown): LineItemTree {
  const tree: LineItemTree = {};
  if (!isRecord(raw)) return tree;

  for (const [name, entry] of Object.entries(raw)) {
    if (isRecord(entry) && !looksLikeLineItem(entry)) {
      tree[name] = normalizeCategory(entry);
    } else {
      // A bare line item at the top level
      tree[UNCATEGORIZED] = { ...tree[UNCATEGORIZED], [name]: normalizeLineItem(entry) };
    }
  }

  return tree;
}

function normalizeSummaryMetrics(raw: unknown): Record<string, SummaryMetric> {
  const metrics: Record<string, SummaryMetric> = {};
  if (!isRecord(raw)) return metrics;

  for (const [name, entry] of Object.entries(raw)) {
    const item = normalizeLineItem(entry);
    metrics[name] = { value: item.value, confidence: item.confidence };
  }

  return metrics;
}

function normalizeYears(raw: unknown): string[] {
  if (!Array.isArray(raw)) return [];
  const years: string[] = [];
  for (const entry of raw) {
    const year = optionalString(entry);
    if (year !== undefined && !years.includes(year)) years.push(year);
  }
  return years;
}

/**
 * Build a typed PageExtraction from an already-validated JSON value.
 */
export function normalizePageExtraction(raw: JsonRecord): PageExtraction {
  return {
    statement_type: optionalString(raw.statement_type),
    company_name: optionalString(raw.company_name),
    period: optionalString(raw.period),
    currency: optionalString(raw.currency),
    years_detected: normalizeYears(raw.years_detected),
    base_year: optionalString(raw.base_year),
    line_items: normalizeLineItems(raw.line_items),
    summary_metrics: normalizeSummaryMetrics(raw.summary_metrics),
    notes: optionalString(raw.notes),
  };
}

/**
 * Parse model output into a PageExtraction.
 * Anything around the outermost JSON object (code fences, prose) is ignored.
 */
export function parseExtractionContent(content: string | null | undefined): PageExtraction {
  if (!content || content.trim() === '') {
    throw new ExtractionFatalError('empty_response', 'Empty response from extraction service');
  }

  const start = content.indexOf('{');
  const end = content.lastIndexOf('}');
  if (start === -1 || end <= start) {
    throw new ExtractionFatalError('invalid_json', 'No JSON object found in extraction response');
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content.slice(start, end + 1));
  } catch (error) {
    throw new ExtractionFatalError(
      'invalid_json',
      `Extraction response is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error }
    );
  }

  const validation = validatePageExtraction(parsed);
  if (!validation.valid || !isRecord(parsed)) {
    throw new ExtractionFatalError(
      'schema_violation',
      `Extraction response failed schema validation: ${(validation.errors ?? ['not an object']).join('; ')}`
    );
  }

  return normalizePageExtraction(parsed);
}
