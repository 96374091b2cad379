/**
 * スコア値オブジェクト
 */

import { SCORE_RANGES, STRENGTH_THRESHOLD, WEAKNESS_THRESHOLD } from '../../constants/ScoringConstants';

export type ScoreBand = keyof typeof SCORE_RANGES;

/** 上位から順の帯一覧 */
export const SCORE_BANDS: readonly ScoreBand[] = ['elite', 'solid', 'average', 'weak'];

export class Score {
  constructor(private readonly value: number) {
    if (!Number.isFinite(value) || value < 0 || value > 100) {
      throw new Error(`Score must be between 0 and 100, got: ${value}`);
    }
  }

  /**
   * スコアの帯を取得
   */
  getBand(): ScoreBand {
    if (this.value >= SCORE_RANGES.elite.min) return 'elite';
    if (this.value >= SCORE_RANGES.solid.min) return 'solid';
    if (this.value >= SCORE_RANGES.average.min) return 'average';
    return 'weak';
  }

  /**
   * 強みか（70点以上）
   */
  isStrength(): boolean {
    return this.value >= STRENGTH_THRESHOLD;
  }

  /**
   * 課題か（40点未満）
   */
  isWeakness(): boolean {
    return this.value < WEAKNESS_THRESHOLD;
  }

  /**
   * スコアバーを生成
   */
  toBar(length: number = 12): string {
    const filledLength = Math.floor((this.value / 100) * length);
    const filled = '█'.repeat(filledLength);
    const empty = '░'.repeat(length - filledLength);
    return `[${filled}${empty}]`;
  }

  /**
   * 数値から Score を生成（0-100 にクランプ）
   */
  static of(value: number): Score {
    const clamped = Math.max(0, Math.min(100, value));
    return new Score(clamped);
  }
}
