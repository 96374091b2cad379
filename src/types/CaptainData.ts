/**
 * キャプテン成績データの型定義
 */

import type { MissingFieldError, ProcessingError } from '../domain/errors/ScoringErrors';

/** キャプテン1名分のシーズン成績（生カウンタ） */
export interface CaptainRecord {
  name: string;
  matchesPlayed: number;            // 出場試合数
  matchesWon: number;               // 勝利数
  closeMatchesPlayed: number;       // 接戦試合数
  closeMatchesWon: number;          // 接戦勝利数
  playerImprovementScore: number;   // 選手育成スコア（0-100想定、範囲外あり）
  successfulStrategies: number;     // 成功した戦略数
  totalStrategies: number;          // 実行した戦略数
}

/** 4要素の重み（生の係数） */
export interface WeightConfig {
  win: number;
  close: number;
  player: number;
  strategy: number;
}

/** 成績から算出する4指標（すべて0-100） */
export interface CaptainMetrics {
  winPercentage: number;
  closeMatchSuccess: number;
  playerImpact: number;
  strategySuccess: number;
}

/** スコア算出済みレコード */
export interface ScoredRecord extends CaptainRecord, CaptainMetrics {
  captaincyScore: number;
}

/** 並び替え対象の数値項目 */
export type SortField = keyof CaptainMetrics | 'captaincyScore';

/**
 * 入力の1行（CSV/JSON の列名 → 値）
 *
 * @remarks
 * ファイルから読んだ直後の未検証データ。
 */
export type CaptainRow = Readonly<Record<string, unknown>>;

export type ScoringError = MissingFieldError | ProcessingError;

/** スコア算出結果 */
export type ScoringResult =
  | { success: true; records: ScoredRecord[] }
  | { success: false; records: []; error: ScoringError };

/** サマリー指標 */
export interface ScoreSummary {
  topScore: number;
  averageScore: number;
  bestCaptain: string;
  totalCaptains: number;
}

/** スコア内訳の1項目 */
export interface ScoreBreakdownItem {
  metric: keyof CaptainMetrics;
  label: string;
  value: number;
  weight: number;
  contribution: number;
}
