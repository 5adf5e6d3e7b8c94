/**
 * Line-Item Merge
 *
 * Folds per-page line-item trees into one. For a (category, field) pair seen
 * on more than one page, the retained entry's confidence is never lower than
 * any discarded entry's.
 */

import { YEAR_KEYS, type LineItem, type LineItemTree, type SummaryMetric } from '../types';

export interface MergeSource {
  page_num: number;
  line_items: LineItemTree;
}

export interface MergeStats {
  duplicates_removed: number;
  conflicts_resolved: number;
}

export interface MergedTree {
  tree: LineItemTree;
  stats: MergeStats;
}

function sameNumber(a: number | null | undefined, b: number | null | undefined): boolean {
  return (a ?? null) === (b ?? null);
}

/**
 * Same amount and same per-year amounts.
 */
export function isSameLineItem(a: LineItem, b: LineItem): boolean {
  return sameNumber(a.value, b.value) && YEAR_KEYS.every((key) => sameNumber(a[key], b[key]));
}

/**
 * Number of per-year sub-fields holding an amount.
 */
export function populatedYearCount(item: LineItem): number {
  return YEAR_KEYS.filter((key) => item[key] !== undefined && item[key] !== null).length;
}

/**
 * Whether an incoming conflicting entry replaces the one already kept.
 * The kept entry always comes from an earlier page, so it wins full ties.
 */
function replacesKept(kept: LineItem, incoming: LineItem): boolean {
  if (incoming.confidence !== kept.confidence) {
    return incoming.confidence > kept.confidence;
  }
  return populatedYearCount(incoming) > populatedYearCount(kept);
}

/**
 * Merge line-item trees in page order.
 */
export function mergeLineItems(sources: MergeSource[]): MergedTree {
  const tree: LineItemTree = {};
  const stats: MergeStats = { duplicates_removed: 0, conflicts_resolved: 0 };
  const ordered = [...sources].sort((a, b) => a.page_num - b.page_num);

  for (const source of ordered) {
    for (const [category, fields] of Object.entries(source.line_items)) {
      const target = tree[category] ?? {};
      tree[category] = target;

      for (const [field, item] of Object.entries(fields)) {
        const kept = target[field];
        const incoming: LineItem = { ...item, source_pages: [source.page_num] };

        if (!kept) {
          target[field] = incoming;
        } else if (isSameLineItem(kept, incoming)) {
          stats.duplicates_removed++;
          const pages = [...(kept.source_pages ?? []), source.page_num];
          const winner = incoming.confidence > kept.confidence ? incoming : kept;
          target[field] = { ...winner, source_pages: pages };
        } else {
          stats.conflicts_resolved++;
          if (replacesKept(kept, incoming)) {
            target[field] = incoming;
          }
        }
      }
    }
  }

  return { tree, stats };
}

/**
 * Merge summary metrics: a known value beats null, then higher confidence
 * wins, earlier page on ties.
 */
export function mergeSummaryMetrics(
  sources: Array<{ page_num: number; summary_metrics: Record<string, SummaryMetric> }>
): Record<string, SummaryMetric> {
  const merged: Record<string, SummaryMetric> = {};
  const ordered = [...sources].sort((a, b) => a.page_num - b.page_num);

  for (const source of ordered) {
    for (const [name, metric] of Object.entries(source.summary_metrics)) {
      const kept = merged[name];
      if (!kept || (metric.value !== null && (kept.value === null || metric.confidence > kept.confidence))) {
        merged[name] = { value: metric.value, confidence: metric.confidence };
      }
    }
  }

  return merged;
}
