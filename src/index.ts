#!/usr/bin/env tsx

import { Command } from 'commander';
import { BreakdownCommand, type BreakdownOptions } from './commands/BreakdownCommand';
import { ScoreCommand, type ScoreOptions } from './commands/ScoreCommand';
import { DEFAULT_MIN_MATCHES, DEFAULT_WEIGHTS, REQUIRED_COLUMNS, SORT_FIELDS } from './constants/ScoringConstants';

const program = new Command();

program
  .name('captaincy')
  .description('キャプテンシー総合評価システム')
  .version('1.0.0');

/**
 * 重みと文字コードの共通オプション
 */
function withScoringOptions(command: Command): Command {
  return command
    .option('--win <weight>', '勝率の重み (0-1)', String(DEFAULT_WEIGHTS.win))
    .option('--close <weight>', '接戦勝率の重み (0-1)', String(DEFAULT_WEIGHTS.close))
    .option('--player <weight>', '選手育成の重み (0-1)', String(DEFAULT_WEIGHTS.player))
    .option('--strategy <weight>', '戦略成功率の重み (0-1)', String(DEFAULT_WEIGHTS.strategy))
    .option('-e, --encoding <encoding>', 'ファイルの文字コード', 'utf-8');
}

withScoringOptions(
  program
    .command('score')
    .description('総合スコアを算出してランキングを表示')
    .argument('[file]', 'CSV/JSONファイル（省略時はサンプルデータ）')
)
  .option('-m, --min-matches <n>', '出場試合数の下限', String(DEFAULT_MIN_MATCHES))
  .option('-s, --sort <field>', `並び替え項目 (${SORT_FIELDS.join('|')})`, 'captaincyScore')
  .option('--json', 'スコア算出結果をJSONで出力')
  .action((file: string | undefined, options: ScoreOptions) => {
    const command = new ScoreCommand();
    process.exitCode = command.execute(file, options);
  });

withScoringOptions(
  program
    .command('breakdown')
    .description('キャプテン1名のスコア内訳を表示')
    .argument('<captain>', 'キャプテン名')
    .argument('[file]', 'CSV/JSONファイル（省略時はサンプルデータ）')
).action((captain: string, file: string | undefined, options: BreakdownOptions) => {
  const command = new BreakdownCommand();
  process.exitCode = command.execute(captain, file, options);
});

program
  .command('columns')
  .description('入力データに必要な列を表示')
  .action(() => {
    console.log('📋 必須列（大文字小文字を区別）:');
    REQUIRED_COLUMNS.forEach(column => console.log(`  - ${column}`));
  });

program.parse(process.argv);
