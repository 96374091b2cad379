import { describe, it, expect } from 'vitest';
import { Captain } from '../Captain';
import { ProcessingError } from '../../errors/ScoringErrors';
import { DEFAULT_WEIGHTS } from '../../../constants/ScoringConstants';
import { createCaptainRecord, createCaptainRow } from '../../../test/helpers/captainFixtures';

// ============================================
// 指標計算
// ============================================

describe('Captain 指標計算', () => {
  it('勝率を算出する', () => {
    const captain = new Captain(createCaptainRecord({ matchesPlayed: 40, matchesWon: 30, closeMatchesPlayed: 10, closeMatchesWon: 5 }));

    expect(captain.calculateWinPercentage()).toBe(75);
  });

  it('接戦勝率を算出する', () => {
    const captain = new Captain(createCaptainRecord({ closeMatchesPlayed: 8, closeMatchesWon: 2 }));

    expect(captain.calculateCloseMatchSuccess()).toBe(25);
  });

  it('接戦試合数0の場合、接戦勝率は0', () => {
    const captain = new Captain(createCaptainRecord({ closeMatchesPlayed: 0, closeMatchesWon: 0 }));

    expect(captain.calculateCloseMatchSuccess()).toBe(0);
  });

  it('戦略成功率を算出する', () => {
    const captain = new Captain(createCaptainRecord({ successfulStrategies: 45, totalStrategies: 50 }));

    expect(captain.calculateStrategySuccess()).toBe(90);
  });

  it('選手育成スコアは範囲内ならそのまま、範囲外はクランプ', () => {
    expect(new Captain(createCaptainRecord({ playerImprovementScore: 63.5 })).calculatePlayerImpact()).toBe(63.5);
    expect(new Captain(createCaptainRecord({ playerImprovementScore: 150 })).calculatePlayerImpact()).toBe(100);
    expect(new Captain(createCaptainRecord({ playerImprovementScore: -10 })).calculatePlayerImpact()).toBe(0);
  });

  it('calculateMetrics は4指標をまとめて返す', () => {
    const captain = new Captain(createCaptainRecord({
      matchesPlayed: 100,
      matchesWon: 50,
      closeMatchesPlayed: 20,
      closeMatchesWon: 5,
      playerImprovementScore: 70,
      successfulStrategies: 30,
      totalStrategies: 40
    }));

    expect(captain.calculateMetrics()).toEqual({
      winPercentage: 50,
      closeMatchSuccess: 25,
      playerImpact: 70,
      strategySuccess: 75
    });
  });
});

// ============================================
// toScoredRecord
// ============================================

describe('Captain.toScoredRecord', () => {
  it('生成績に4指標と総合スコアを加える', () => {
    const captain = new Captain(createCaptainRecord({
      name: 'テスト',
      matchesPlayed: 100,
      matchesWon: 50,
      closeMatchesPlayed: 20,
      closeMatchesWon: 5,
      playerImprovementScore: 70,
      successfulStrategies: 30,
      totalStrategies: 40
    }));

    const scored = captain.toScoredRecord({ win: 0.5, close: 0.5, player: 0, strategy: 1 });

    // 50*0.5 + 25*0.5 + 70*0 + 75*1
    expect(scored).toEqual({
      name: 'テスト',
      matchesPlayed: 100,
      matchesWon: 50,
      closeMatchesPlayed: 20,
      closeMatchesWon: 5,
      playerImprovementScore: 70,
      successfulStrategies: 30,
      totalStrategies: 40,
      winPercentage: 50,
      closeMatchSuccess: 25,
      playerImpact: 70,
      strategySuccess: 75,
      captaincyScore: 112.5
    });
  });
});

// ============================================
// fromRow
// ============================================

describe('Captain.fromRow', () => {
  it('列名付きの行からエンティティを構築する', () => {
    const captain = Captain.fromRow(createCaptainRow({ name: '行から' }), 0);

    expect(captain.toScoredRecord(DEFAULT_WEIGHTS)).toMatchObject(createCaptainRecord({ name: '行から' }));
  });

  it('キャプテン名の前後の空白を除く', () => {
    const captain = Captain.fromRow({ ...createCaptainRow(), Captain: '  主将  ' }, 0);

    expect(captain.name).toBe('主将');
  });

  it('数値のキャプテン名は文字列として扱う', () => {
    const captain = Captain.fromRow({ ...createCaptainRow(), Captain: 7 }, 0);

    expect(captain.name).toBe('7');
  });

  it('空のキャプテン名は ProcessingError', () => {
    expect(() => Captain.fromRow({ ...createCaptainRow(), Captain: ' ' }, 2))
      .toThrow(new ProcessingError('Row 3: Captain must not be blank'));
  });

  it('小数のカウンタは ProcessingError', () => {
    expect(() => Captain.fromRow({ ...createCaptainRow({ name: 'X' }), Matches_Won: 1.5 }, 0))
      .toThrow('Row 1 (X): Matches_Won must be a non-negative integer, got: 1.5');
  });

  it('接戦試合数が出場試合数を超える場合は ProcessingError', () => {
    const row = createCaptainRow({ name: 'X', matchesPlayed: 10, matchesWon: 5, closeMatchesPlayed: 12, closeMatchesWon: 1 });

    expect(() => Captain.fromRow(row, 0))
      .toThrow('Row 1 (X): Close_Matches_Played (12) exceeds Matches_Played (10)');
  });

  it('成功戦略数が戦略数を超える場合は ProcessingError', () => {
    const row = createCaptainRow({ name: 'X', successfulStrategies: 11, totalStrategies: 10 });

    expect(() => Captain.fromRow(row, 0))
      .toThrow('Row 1 (X): Successful_Strategies (11) exceeds Total_Strategies (10)');
  });

  it('null 値は ProcessingError', () => {
    expect(() => Captain.fromRow({ ...createCaptainRow(), Total_Strategies: null }, 4))
      .toThrow('Row 5: Total_Strategies is not numeric: null');
  });

  it('小数点付きの数値文字列を受け付ける', () => {
    const captain = Captain.fromRow({ ...createCaptainRow(), Matches_Played: '150.0', Player_Improvement_Score: '+62.5' }, 0);

    expect(captain.calculateWinPercentage()).toBe(60);
    expect(captain.calculatePlayerImpact()).toBe(62.5);
  });

  it('16進表記の文字列は ProcessingError', () => {
    expect(() => Captain.fromRow({ ...createCaptainRow(), Matches_Played: '0x10' }, 0))
      .toThrow('Row 1: Matches_Played is not numeric: "0x10"');
  });

  it('指数表記の文字列は ProcessingError', () => {
    expect(() => Captain.fromRow({ ...createCaptainRow(), Total_Strategies: '1e2' }, 1))
      .toThrow('Row 2: Total_Strategies is not numeric: "1e2"');
  });
});

// ============================================
// fromRecord
// ============================================

describe('Captain.fromRecord', () => {
  it('妥当なレコードからエンティティを構築する', () => {
    const captain = Captain.fromRecord(createCaptainRecord({ name: ' 記録 ' }), 'Record 1');

    expect(captain.name).toBe('記録');
    expect(captain.calculateWinPercentage()).toBe(60);
  });

  it('勝利数が試合数を超える場合は ProcessingError', () => {
    const record = createCaptainRecord({ name: 'X', matchesPlayed: 10, matchesWon: 12, closeMatchesPlayed: 5, closeMatchesWon: 1 });

    expect(() => Captain.fromRecord(record, 'Record 2'))
      .toThrow(new ProcessingError('Record 2 (X): Matches_Won (12) exceeds Matches_Played (10)'));
  });

  it('負のカウンタは ProcessingError', () => {
    expect(() => Captain.fromRecord(createCaptainRecord({ name: 'X', closeMatchesWon: -2 }), 'Record 1'))
      .toThrow('Record 1 (X): Close_Matches_Won must be a non-negative integer, got: -2');
  });

  it('有限でない選手育成スコアは ProcessingError', () => {
    expect(() => Captain.fromRecord(createCaptainRecord({ name: 'X', playerImprovementScore: NaN }), 'Record 1'))
      .toThrow('Record 1 (X): Player_Improvement_Score must be a finite number, got: NaN');
  });

  it('空の名前は ProcessingError', () => {
    expect(() => Captain.fromRecord(createCaptainRecord({ name: '' }), 'Record 4'))
      .toThrow('Record 4: Captain must not be blank');
  });
});
