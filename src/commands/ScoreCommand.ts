import type { ScoredRecord, SortField, WeightConfig } from '../types/CaptainData';
import { DEFAULT_MIN_MATCHES, METRIC_LABELS, SCORE_RANGES, SORT_FIELDS } from '../constants/ScoringConstants';
import { ProcessingError } from '../domain/errors/ScoringErrors';
import { filterAndSort, isSortField } from '../domain/services/RankingView';
import { score } from '../domain/services/ScoringEngine';
import { summarize } from '../domain/services/SummaryMetrics';
import { Score, SCORE_BANDS, type ScoreBand } from '../domain/valueObjects/Score';
import { parseWeights, totalWeight, type WeightOptions } from '../domain/valueObjects/Weights';
import { loadCaptainRows } from '../utils/CaptainDataLoader';
import { formatPercent, formatScore, formatWeight } from '../utils/Format';
import { reportError } from './reportError';

export interface ScoreOptions extends WeightOptions {
  minMatches?: string;
  sort?: string;
  encoding?: string;
  json?: boolean;
}

export class ScoreCommand {
  /**
   * @param file - CSV/JSONファイル（省略時はサンプルデータ）
   * @returns 終了コード
   */
  execute(file: string | undefined, options: ScoreOptions = {}): number {
    try {
      const weights = parseWeights(options);
      const minMatches = parseMinMatches(options.minMatches);
      const sortField = parseSortField(options.sort);

      const rows = loadCaptainRows(file, { encoding: options.encoding });
      const result = score(rows, weights);

      if (!result.success) {
        return reportError(result.error);
      }

      // JSON出力は丸め前の値をそのまま出す
      if (options.json) {
        console.log(JSON.stringify(result.records, null, 2));
        return 0;
      }

      console.log('🏏 キャプテンシー総合評価を算出中...\n');
      console.log(file ? `📥 データ: ${file}` : '📥 データ: サンプルデータ');
      this.displayWeights(weights);

      if (result.records.length === 0) {
        console.log('⚠️  キャプテンのデータがありません');
        return 0;
      }

      this.displaySummary(result.records);
      this.displayRanking(filterAndSort(result.records, minMatches, sortField), minMatches, sortField);
      this.displayScoreDistribution(result.records);

      return 0;
    } catch (error) {
      return reportError(error);
    }
  }

  private displayWeights(weights: WeightConfig): void {
    console.log('⚖️  重み設定:');
    console.log(
      `  勝率: ${formatWeight(weights.win)} | 接戦: ${formatWeight(weights.close)} | ` +
      `選手育成: ${formatWeight(weights.player)} | 戦略: ${formatWeight(weights.strategy)}`
    );
    console.log(`  満点: ${formatScore(totalWeight(weights) * 100)}点\n`);
  }

  private displaySummary(records: ScoredRecord[]): void {
    const summary = summarize(records);

    console.log('📊 パフォーマンス概要:');
    console.log('='.repeat(50));
    console.log(`  🏆 最高スコア:     ${summary.topScore}`);
    console.log(`  📊 平均スコア:     ${summary.averageScore}`);
    console.log(`  👑 ベストキャプテン: ${summary.bestCaptain}`);
    console.log(`  📈 キャプテン数:   ${summary.totalCaptains}`);
    console.log('');
  }

  private displayRanking(records: ScoredRecord[], minMatches: number, sortField: SortField): void {
    console.log(`🏆 ランキング（${METRIC_LABELS[sortField]}順・出場${minMatches}試合以上）:`);

    if (records.length === 0) {
      console.log(`⚠️  出場${minMatches}試合以上のキャプテンはいません\n`);
      return;
    }

    console.log('='.repeat(80));
    console.log('順位 キャプテン            試合   勝率    接戦   選手育成  戦略    総合');
    console.log('-'.repeat(80));

    records.forEach((record, index) => {
      const rank = index + 1;
      const medal = rank === 1 ? '🥇' : rank === 2 ? '🥈' : rank === 3 ? '🥉' : '  ';

      const num = rank.toString().padStart(2);
      const name = record.name.padEnd(20);
      const matches = record.matchesPlayed.toString().padStart(4);
      const win = formatPercent(record.winPercentage).padStart(6);
      const close = formatPercent(record.closeMatchSuccess).padStart(6);
      const player = formatPercent(record.playerImpact).padStart(6);
      const strategy = formatPercent(record.strategySuccess).padStart(6);
      const total = formatScore(record.captaincyScore).padStart(6);

      console.log(`${medal}${num} ${name} ${matches}  ${win}  ${close}  ${player}  ${strategy}  ${total}`);
    });

    console.log('');
  }

  private displayScoreDistribution(records: ScoredRecord[]): void {
    console.log('📊 スコア分布:');
    console.log('='.repeat(50));

    const counts = new Map<ScoreBand, number>();
    for (const record of records) {
      const band = Score.of(record.captaincyScore).getBand();
      counts.set(band, (counts.get(band) ?? 0) + 1);
    }

    for (const band of SCORE_BANDS) {
      const range = SCORE_RANGES[band];
      const count = counts.get(band) ?? 0;
      console.log(`${range.emoji} ${range.label}: ${count.toString().padStart(2)}名 ${'■'.repeat(count)}`);
    }
  }
}

function parseMinMatches(raw: string | undefined): number {
  if (raw === undefined) {
    return DEFAULT_MIN_MATCHES;
  }
  const value = Number(raw);
  if (raw.trim() === '' || !Number.isInteger(value) || value < 0) {
    throw new ProcessingError(`--min-matches must be a non-negative integer, got: ${raw}`);
  }
  return value;
}

function parseSortField(raw: string | undefined): SortField {
  if (raw === undefined) {
    return 'captaincyScore';
  }
  if (!isSortField(raw)) {
    throw new ProcessingError(`--sort must be one of ${SORT_FIELDS.join(', ')}, got: ${raw}`);
  }
  return raw;
}
