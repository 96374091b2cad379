/**
 * サマリー指標（最高・平均スコア、首位キャプテン、人数）
 */

import * as ss from 'simple-statistics';
import type { ScoredRecord, ScoreSummary } from '../../types/CaptainData';
import { SCORE_DECIMALS } from '../../constants/ScoringConstants';
import { roundTo } from '../../utils/Format';

/**
 * ソート済みのスコア一覧からサマリーを算出
 *
 * @param scored - score() の結果（総合スコア降順）
 * @throws {Error} 空の一覧の場合
 */
export function summarize(scored: readonly ScoredRecord[]): ScoreSummary {
  if (scored.length === 0) {
    throw new Error('Cannot summarize an empty ranking');
  }

  const scores = scored.map(record => record.captaincyScore);

  return {
    topScore: ss.max(scores),
    averageScore: roundTo(ss.mean(scores), SCORE_DECIMALS),
    bestCaptain: scored[0].name,
    totalCaptains: scored.length
  };
}
