/**
 * ランキングの派生ビュー（フィルタ・並び替え・内訳）
 */

import type { CaptainMetrics, ScoreBreakdownItem, ScoredRecord, SortField, WeightConfig } from '../../types/CaptainData';
import { METRIC_LABELS, SORT_FIELDS } from '../../constants/ScoringConstants';
import { ProcessingError } from '../errors/ScoringErrors';
import { ScoreComponents } from '../valueObjects/ScoreComponents';

const BREAKDOWN_METRICS: readonly (keyof CaptainMetrics)[] = [
  'winPercentage',
  'closeMatchSuccess',
  'playerImpact',
  'strategySuccess'
];

export function isSortField(value: string): value is SortField {
  return SORT_FIELDS.some(field => field === value);
}

/**
 * 出場試合数で絞り込み、指定項目の降順に並べ替える
 *
 * @remarks
 * 同値の場合は元の並び（通常は総合スコア順）を維持する。
 *
 * @param scored - スコア算出済み一覧
 * @param minMatches - 出場試合数の下限（0以上の整数）
 * @param sortField - 並び替え項目
 * @returns 新しい配列
 */
export function filterAndSort(
  scored: readonly ScoredRecord[],
  minMatches: number,
  sortField: SortField
): ScoredRecord[] {
  if (!Number.isInteger(minMatches) || minMatches < 0) {
    throw new ProcessingError(`Minimum matches must be a non-negative integer, got: ${minMatches}`);
  }

  return scored
    .filter(record => record.matchesPlayed >= minMatches)
    .sort((a, b) => b[sortField] - a[sortField]);
}

export function findCaptain(scored: readonly ScoredRecord[], name: string): ScoredRecord | undefined {
  return scored.find(record => record.name === name);
}

/**
 * 1名分の4指標の内訳（値・重み・寄与）
 */
export function breakdown(record: ScoredRecord, weights: WeightConfig): ScoreBreakdownItem[] {
  const contributions = new ScoreComponents(record).calculateContributions(weights);

  return BREAKDOWN_METRICS.map(metric => ({
    metric,
    label: METRIC_LABELS[metric],
    value: record[metric],
    weight: ScoreComponents.weightFor(metric, weights),
    contribution: contributions[metric]
  }));
}
