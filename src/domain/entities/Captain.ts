/**
 * キャプテンエンティティ（リッチドメインモデル）
 *
 * @remarks
 * シーズン成績の生カウンタを保持し、4指標と総合スコアの計算を内包する。
 *
 * 指標:
 * - 勝率: 勝利数 / 出場試合数
 * - 接戦勝率: 接戦勝利数 / 接戦試合数
 * - 選手育成: 選手育成スコアを0-100にクランプ
 * - 戦略成功率: 成功戦略数 / 実行戦略数
 *
 * 分母が0の指標は0とする。
 *
 * @example
 * ```typescript
 * const captain = Captain.fromRow(row, 0);
 * const scored = captain.toScoredRecord({ win: 0.4, close: 0.2, player: 0.2, strategy: 0.2 });
 * ```
 */

import type { CaptainMetrics, CaptainRecord, CaptainRow, ScoredRecord, WeightConfig } from '../../types/CaptainData';
import { CAPTAIN_COLUMNS, PLAYER_IMPACT_RANGE } from '../../constants/ScoringConstants';
import { ProcessingError } from '../errors/ScoringErrors';
import { ScoreComponents } from '../valueObjects/ScoreComponents';

type CounterField = Exclude<keyof CaptainRecord, 'name' | 'playerImprovementScore'>;

const COUNTER_FIELDS: readonly CounterField[] = [
  'matchesPlayed',
  'matchesWon',
  'closeMatchesPlayed',
  'closeMatchesWon',
  'successfulStrategies',
  'totalStrategies'
];

/** 符号付きの10進数のみ（16進・指数表記は不可） */
const DECIMAL_PATTERN = /^[+-]?\d+(\.\d+)?$/;

/** 「分子 ≤ 分母」を満たすべき組み合わせ */
const ORDERED_PAIRS: readonly [CounterField, CounterField][] = [
  ['matchesWon', 'matchesPlayed'],
  ['closeMatchesPlayed', 'matchesPlayed'],
  ['closeMatchesWon', 'closeMatchesPlayed'],
  ['successfulStrategies', 'totalStrategies']
];

export class Captain {
  constructor(private readonly data: CaptainRecord) {}

  // ============================================================
  // プロパティアクセサ
  // ============================================================

  get name(): string {
    return this.data.name;
  }

  // ============================================================
  // 指標計算メソッド
  // ============================================================

  calculateWinPercentage(): number {
    return Captain.ratioPercentage(this.data.matchesWon, this.data.matchesPlayed);
  }

  calculateCloseMatchSuccess(): number {
    return Captain.ratioPercentage(this.data.closeMatchesWon, this.data.closeMatchesPlayed);
  }

  calculateStrategySuccess(): number {
    return Captain.ratioPercentage(this.data.successfulStrategies, this.data.totalStrategies);
  }

  /**
   * 選手育成スコアを0-100にクランプ
   */
  calculatePlayerImpact(): number {
    return Math.max(
      PLAYER_IMPACT_RANGE.min,
      Math.min(PLAYER_IMPACT_RANGE.max, this.data.playerImprovementScore)
    );
  }

  calculateMetrics(): CaptainMetrics {
    return {
      winPercentage: this.calculateWinPercentage(),
      closeMatchSuccess: this.calculateCloseMatchSuccess(),
      playerImpact: this.calculatePlayerImpact(),
      strategySuccess: this.calculateStrategySuccess()
    };
  }

  calculateScoreComponents(): ScoreComponents {
    return new ScoreComponents(this.calculateMetrics());
  }

  /**
   * 生成績 + 4指標 + 総合スコアのレコードに変換
   */
  toScoredRecord(weights: WeightConfig): ScoredRecord {
    return {
      ...this.data,
      ...this.calculateScoreComponents().toPlainObject(weights)
    };
  }

  private static ratioPercentage(numerator: number, denominator: number): number {
    return denominator > 0 ? (numerator / denominator) * 100 : 0;
  }

  // ============================================================
  // ファクトリ
  // ============================================================

  /**
   * 入力行からエンティティを構築
   *
   * @remarks
   * 列の存在チェックは呼び出し側（ScoringEngine）で済ませておく前提。
   * ここでは値の型変換のみ行い、整合性チェックは fromRecord に任せる。
   *
   * @param row - 列名 → 値の1行
   * @param rowIndex - 0始まりの行番号（エラーメッセージ用）
   * @throws {ProcessingError} 数値に変換できない、または成績の整合性が取れない場合
   */
  static fromRow(row: CaptainRow, rowIndex: number): Captain {
    const label = `Row ${rowIndex + 1}`;
    const numeric = (field: Exclude<keyof CaptainRecord, 'name'>): number => {
      const column = CAPTAIN_COLUMNS[field];
      return Captain.toNumber(row[column], label, column);
    };

    return Captain.fromRecord(
      {
        name: Captain.toName(row[CAPTAIN_COLUMNS.name]),
        matchesPlayed: numeric('matchesPlayed'),
        matchesWon: numeric('matchesWon'),
        closeMatchesPlayed: numeric('closeMatchesPlayed'),
        closeMatchesWon: numeric('closeMatchesWon'),
        playerImprovementScore: numeric('playerImprovementScore'),
        successfulStrategies: numeric('successfulStrategies'),
        totalStrategies: numeric('totalStrategies')
      },
      label
    );
  }

  /**
   * 型付きレコードを検証してエンティティを構築
   *
   * @param label - エラーメッセージの行表記（例: "Row 3"）
   * @throws {ProcessingError} 名前が空、カウンタが負・小数、または分子が分母を超える場合
   */
  static fromRecord(record: CaptainRecord, label: string): Captain {
    const name = record.name.trim();
    if (name === '') {
      throw new ProcessingError(`${label}: ${CAPTAIN_COLUMNS.name} must not be blank`);
    }

    for (const field of COUNTER_FIELDS) {
      const value = record[field];
      if (!Number.isInteger(value) || value < 0) {
        throw new ProcessingError(
          `${label} (${name}): ${CAPTAIN_COLUMNS[field]} must be a non-negative integer, got: ${value}`
        );
      }
    }

    if (!Number.isFinite(record.playerImprovementScore)) {
      throw new ProcessingError(
        `${label} (${name}): ${CAPTAIN_COLUMNS.playerImprovementScore} must be a finite number, got: ${record.playerImprovementScore}`
      );
    }

    for (const [part, whole] of ORDERED_PAIRS) {
      if (record[part] > record[whole]) {
        throw new ProcessingError(
          `${label} (${name}): ${CAPTAIN_COLUMNS[part]} (${record[part]}) exceeds ${CAPTAIN_COLUMNS[whole]} (${record[whole]})`
        );
      }
    }

    return new Captain({ ...record, name });
  }

  private static toNumber(value: unknown, label: string, column: string): number {
    let parsed = NaN;
    if (typeof value === 'number') {
      parsed = value;
    } else if (typeof value === 'string' && DECIMAL_PATTERN.test(value.trim())) {
      parsed = Number(value.trim());
    }

    if (!Number.isFinite(parsed)) {
      throw new ProcessingError(
        `${label}: ${column} is not numeric: ${JSON.stringify(value) ?? String(value)}`
      );
    }
    return parsed;
  }

  private static toName(value: unknown): string {
    return typeof value === 'string' || typeof value === 'number' ? String(value) : '';
  }
}
