/**
 * スコア構成要素（値オブジェクト）
 *
 * @remarks
 * 4指標 × 重みの単純な加重合計。重みは呼び出し側から明示的に渡す。
 */

import type { CaptainMetrics, WeightConfig } from '../../types/CaptainData';
import { SCORE_DECIMALS } from '../../constants/ScoringConstants';
import { roundTo } from '../../utils/Format';

export type ScoreComponentsData = CaptainMetrics;

/** 指標 → 重みキーの対応 */
const WEIGHT_KEYS: Record<keyof CaptainMetrics, keyof WeightConfig> = {
  winPercentage: 'win',
  closeMatchSuccess: 'close',
  playerImpact: 'player',
  strategySuccess: 'strategy'
};

export class ScoreComponents {
  constructor(private readonly data: ScoreComponentsData) {}

  /**
   * 指標ごとの重みを取得
   */
  static weightFor(metric: keyof CaptainMetrics, weights: WeightConfig): number {
    return weights[WEIGHT_KEYS[metric]];
  }

  /**
   * 指標ごとの寄与（指標値 × 重み）
   */
  calculateContributions(weights: WeightConfig): Record<keyof CaptainMetrics, number> {
    return {
      winPercentage: this.data.winPercentage * weights.win,
      closeMatchSuccess: this.data.closeMatchSuccess * weights.close,
      playerImpact: this.data.playerImpact * weights.player,
      strategySuccess: this.data.strategySuccess * weights.strategy
    };
  }

  /**
   * 重み付け総合スコアを計算
   *
   * @returns 小数第2位で丸めた総合スコア（クランプしない）
   */
  calculateTotalScore(weights: WeightConfig): number {
    return roundTo(
      this.data.winPercentage * weights.win +
      this.data.closeMatchSuccess * weights.close +
      this.data.playerImpact * weights.player +
      this.data.strategySuccess * weights.strategy,
      SCORE_DECIMALS
    );
  }

  toPlainObject(weights: WeightConfig): ScoreComponentsData & { captaincyScore: number } {
    return {
      ...this.data,
      captaincyScore: this.calculateTotalScore(weights)
    };
  }
}
