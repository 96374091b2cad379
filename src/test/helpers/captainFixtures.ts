/**
 * テストデータ生成ヘルパー
 */

import type { CaptainRecord, CaptainRow } from '../../types/CaptainData';
import { CAPTAIN_COLUMNS, type CaptainColumn } from '../../constants/ScoringConstants';

export function createCaptainRecord(overrides: Partial<CaptainRecord> = {}): CaptainRecord {
  return {
    name: overrides.name ?? 'テスト主将',
    matchesPlayed: overrides.matchesPlayed ?? 150,
    matchesWon: overrides.matchesWon ?? 90,
    closeMatchesPlayed: overrides.closeMatchesPlayed ?? 40,
    closeMatchesWon: overrides.closeMatchesWon ?? 25,
    playerImprovementScore: overrides.playerImprovementScore ?? 80,
    successfulStrategies: overrides.successfulStrategies ?? 100,
    totalStrategies: overrides.totalStrategies ?? 130
  };
}

/**
 * レコードを列名付きの入力行に変換
 */
export function toCaptainRow(record: CaptainRecord): Record<CaptainColumn, unknown> {
  return {
    [CAPTAIN_COLUMNS.name]: record.name,
    [CAPTAIN_COLUMNS.matchesPlayed]: record.matchesPlayed,
    [CAPTAIN_COLUMNS.matchesWon]: record.matchesWon,
    [CAPTAIN_COLUMNS.closeMatchesPlayed]: record.closeMatchesPlayed,
    [CAPTAIN_COLUMNS.closeMatchesWon]: record.closeMatchesWon,
    [CAPTAIN_COLUMNS.playerImprovementScore]: record.playerImprovementScore,
    [CAPTAIN_COLUMNS.successfulStrategies]: record.successfulStrategies,
    [CAPTAIN_COLUMNS.totalStrategies]: record.totalStrategies
  };
}

export function createCaptainRow(overrides: Partial<CaptainRecord> = {}): Record<CaptainColumn, unknown> {
  return toCaptainRow(createCaptainRecord(overrides));
}

/**
 * 指定列を取り除いた入力行
 */
export function withoutColumns(row: CaptainRow, ...columns: string[]): CaptainRow {
  const copy: Record<string, unknown> = { ...row };
  for (const column of columns) {
    delete copy[column];
  }
  return copy;
}
