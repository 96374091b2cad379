import { breakdown, findCaptain } from '../domain/services/RankingView';
import { score } from '../domain/services/ScoringEngine';
import { Score } from '../domain/valueObjects/Score';
import { parseWeights, type WeightOptions } from '../domain/valueObjects/Weights';
import { loadCaptainRows } from '../utils/CaptainDataLoader';
import { formatPercent, formatScore, formatWeight } from '../utils/Format';
import { reportError } from './reportError';

export interface BreakdownOptions extends WeightOptions {
  encoding?: string;
}

/**
 * キャプテン1名のスコア内訳を表示
 */
export class BreakdownCommand {
  execute(captainName: string, file: string | undefined, options: BreakdownOptions = {}): number {
    try {
      const weights = parseWeights(options);
      const result = score(loadCaptainRows(file, { encoding: options.encoding }), weights);

      if (!result.success) {
        return reportError(result.error);
      }

      const record = findCaptain(result.records, captainName);
      if (!record) {
        console.log(`❌ キャプテン "${captainName}" が見つかりません`);
        console.log('\n📋 登録済みキャプテン:');
        result.records.forEach(r => console.log(`  - ${r.name}`));
        return 1;
      }

      const rank = result.records.indexOf(record) + 1;
      const items = breakdown(record, weights);

      console.log(`📈 ${record.name} のスコア内訳 (${rank}位 / ${result.records.length}名)`);
      console.log('='.repeat(60));

      items.forEach(item => {
        const bar = Score.of(item.value).toBar();
        console.log(
          `  ${item.label.padEnd(6)}: ${formatPercent(item.value).padStart(6)} ${bar} ` +
          `× ${formatWeight(item.weight)} (寄与: ${item.contribution.toFixed(2)}点)`
        );
      });

      console.log('-'.repeat(60));
      console.log(`  総合スコア: ${formatScore(record.captaincyScore)}点`);

      const strengths = items.filter(item => Score.of(item.value).isStrength());
      const weaknesses = items.filter(item => Score.of(item.value).isWeakness());

      if (strengths.length > 0) {
        console.log(`  💪 強み: ${strengths.map(s => s.label).join(', ')}`);
      }
      if (weaknesses.length > 0) {
        console.log(`  ⚠️  課題: ${weaknesses.map(w => w.label).join(', ')}`);
      }

      return 0;
    } catch (error) {
      return reportError(error);
    }
  }
}
