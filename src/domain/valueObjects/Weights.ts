/**
 * 重み設定（CLIオプション → WeightConfig）
 */

import type { WeightConfig } from '../../types/CaptainData';
import { DEFAULT_WEIGHTS, WEIGHT_RANGE } from '../../constants/ScoringConstants';
import { ProcessingError } from '../errors/ScoringErrors';

export interface WeightOptions {
  win?: string;
  close?: string;
  player?: string;
  strategy?: string;
}

const WEIGHT_NAMES: readonly (keyof WeightConfig)[] = ['win', 'close', 'player', 'strategy'];

/**
 * 文字列オプションから重みを組み立てる
 *
 * @remarks
 * 未指定の重みはデフォルト値。範囲外・非数値は ProcessingError。
 */
export function parseWeights(options: WeightOptions = {}): WeightConfig {
  const weights: WeightConfig = { ...DEFAULT_WEIGHTS };

  for (const name of WEIGHT_NAMES) {
    const raw = options[name];
    if (raw === undefined) continue;

    const value = raw.trim() === '' ? NaN : Number(raw);
    if (!Number.isFinite(value) || value < WEIGHT_RANGE.min || value > WEIGHT_RANGE.max) {
      throw new ProcessingError(
        `Weight "${name}" must be a number between ${WEIGHT_RANGE.min} and ${WEIGHT_RANGE.max}, got: ${raw}`
      );
    }
    weights[name] = value;
  }

  return weights;
}

/**
 * エンジンに渡す前の重み検証（有限かつ0以上）
 */
export function assertValidWeights(weights: WeightConfig): void {
  for (const name of WEIGHT_NAMES) {
    const value = weights[name];
    if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
      throw new ProcessingError(`Weight "${name}" must be a non-negative number, got: ${String(value)}`);
    }
  }
}

/** 重みの合計（総合スコアの理論上の上限 / 100） */
export function totalWeight(weights: WeightConfig): number {
  return weights.win + weights.close + weights.player + weights.strategy;
}
