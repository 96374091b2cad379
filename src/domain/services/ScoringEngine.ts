/**
 * スコアリングエンジン
 *
 * @remarks
 * 入力行の検証 → エンティティ構築 → 総合スコア算出 → 降順ソートを行う純粋関数群。
 * 失敗時は部分的な結果を返さず、エラー種別付きの空結果を返す。
 * 同点の場合は入力順を維持する（安定ソート）。
 *
 * @example
 * ```typescript
 * const result = score(rows, { win: 0.4, close: 0.2, player: 0.2, strategy: 0.2 });
 * if (!result.success) {
 *   switch (result.error.kind) {
 *     case 'MissingField': ...
 *     case 'ProcessingError': ...
 *   }
 * }
 * ```
 */

import type { CaptainRecord, CaptainRow, ScoredRecord, ScoringError, ScoringResult, WeightConfig } from '../../types/CaptainData';
import { REQUIRED_COLUMNS } from '../../constants/ScoringConstants';
import { Captain } from '../entities/Captain';
import { MissingFieldError, ProcessingError } from '../errors/ScoringErrors';
import { assertValidWeights } from '../valueObjects/Weights';

/**
 * 入力行をスコアリングして総合スコア降順で返す
 *
 * @param rows - 列名付きの入力行（空配列可）
 * @param weights - 4要素の重み
 */
export function score(rows: readonly CaptainRow[], weights: WeightConfig): ScoringResult {
  try {
    const missing = findMissingColumns(rows);
    if (missing.length > 0) {
      return failure(new MissingFieldError(missing));
    }

    const captains = rows.map((row, index) => Captain.fromRow(row, index));
    assertUniqueNames(captains);

    return { success: true, records: rankCaptains(captains, weights) };
  } catch (error) {
    return failure(ProcessingError.from(error));
  }
}

/**
 * 検証済みレコードをスコアリング
 *
 * @remarks
 * 型が保証された呼び出し元向け。値の検証・算出式・並び順は score() と同じ。
 *
 * @throws {ProcessingError} レコードまたは重みが不正な場合
 */
export function scoreCaptains(records: readonly CaptainRecord[], weights: WeightConfig): ScoredRecord[] {
  const captains = records.map((record, index) => Captain.fromRecord(record, `Record ${index + 1}`));
  assertUniqueNames(captains);

  return rankCaptains(captains, weights);
}

/**
 * 全行を通して欠けている必須列を列挙
 */
export function findMissingColumns(rows: readonly CaptainRow[]): string[] {
  return REQUIRED_COLUMNS.filter(column =>
    rows.some(row => !Object.prototype.hasOwnProperty.call(row, column))
  );
}

function rankCaptains(captains: readonly Captain[], weights: WeightConfig): ScoredRecord[] {
  assertValidWeights(weights);

  const scored = captains.map(captain => captain.toScoredRecord(weights));

  // スコア順にソート（Array.prototype.sort は安定）
  return scored.sort((a, b) => b.captaincyScore - a.captaincyScore);
}

function assertUniqueNames(captains: readonly Captain[]): void {
  const seen = new Set<string>();
  for (const captain of captains) {
    if (seen.has(captain.name)) {
      throw new ProcessingError(`Duplicate captain name: ${captain.name}`);
    }
    seen.add(captain.name);
  }
}

function failure(error: ScoringError): ScoringResult {
  return { success: false, records: [], error };
}
