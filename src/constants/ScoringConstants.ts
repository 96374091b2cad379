/**
 * スコアリング関連の定数
 */

import type { CaptainRecord, SortField, WeightConfig } from '../types/CaptainData';

/**
 * 総合スコアの4要素のデフォルト重み
 *
 * @remarks
 * 重みは生の係数として掛け合わせる。合計を1に正規化はしない。
 */
export const DEFAULT_WEIGHTS: Readonly<WeightConfig> = {
  win: 0.4,         // 勝率 40%
  close: 0.2,       // 接戦勝率 20%
  player: 0.2,      // 選手育成 20%
  strategy: 0.2     // 戦略成功率 20%
} as const;

/** 重みの入力範囲（スライダー相当） */
export const WEIGHT_RANGE = {
  min: 0,
  max: 1
} as const;

/**
 * 入力データの列名（大文字小文字を区別）
 *
 * @remarks
 * 欠損チェックとエラーメッセージはこの並び順で行う。
 */
export const CAPTAIN_COLUMNS = {
  matchesPlayed: 'Matches_Played',
  matchesWon: 'Matches_Won',
  closeMatchesPlayed: 'Close_Matches_Played',
  closeMatchesWon: 'Close_Matches_Won',
  playerImprovementScore: 'Player_Improvement_Score',
  successfulStrategies: 'Successful_Strategies',
  totalStrategies: 'Total_Strategies',
  name: 'Captain'
} as const satisfies Record<keyof CaptainRecord, string>;

export type CaptainColumn = (typeof CAPTAIN_COLUMNS)[keyof CaptainRecord];

/** 必須列一覧 */
export const REQUIRED_COLUMNS: readonly CaptainColumn[] = Object.values(CAPTAIN_COLUMNS);

/** 並び替え可能な項目 */
export const SORT_FIELDS: readonly SortField[] = [
  'captaincyScore',
  'winPercentage',
  'closeMatchSuccess',
  'playerImpact',
  'strategySuccess'
] as const;

/** 表示用ラベル */
export const METRIC_LABELS: Record<SortField, string> = {
  captaincyScore: '総合スコア',
  winPercentage: '勝率',
  closeMatchSuccess: '接戦勝率',
  playerImpact: '選手育成',
  strategySuccess: '戦略成功率'
} as const;

/** 出場試合数フィルタのデフォルト閾値 */
export const DEFAULT_MIN_MATCHES = 50;

/** 選手育成スコアの有効範囲 */
export const PLAYER_IMPACT_RANGE = {
  min: 0,
  max: 100
} as const;

/** 総合スコアの丸め桁数 */
export const SCORE_DECIMALS = 2;

/** スコア分布の判定基準 */
export const SCORE_RANGES = {
  elite: { min: 70, label: '名主将 (70点以上)', emoji: '🌟🌟🌟' },
  solid: { min: 55, label: '有能   (55-70点)', emoji: '🌟🌟' },
  average: { min: 40, label: '平均的 (40-55点)', emoji: '🌟' },
  weak: { min: 0, label: '課題あり (40点未満)', emoji: '💧' }
} as const;

/** 強み・課題の判定閾値 */
export const STRENGTH_THRESHOLD = 70;
export const WEAKNESS_THRESHOLD = 40;
