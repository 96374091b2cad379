/**
 * 数値の丸めと表示用フォーマット
 *
 * @remarks
 * 表示用の桁数はここだけで扱う。エンジンは丸め前の値（総合スコアのみ2桁丸め）を返す。
 */

/**
 * 指定桁で丸める（ちょうど半分は偶数側へ: 0.125 → 0.12, 0.135 → 0.14）
 */
export function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  const scaled = value * factor;
  let rounded = Math.round(scaled);
  if (Math.abs(scaled % 1) === 0.5 && rounded % 2 !== 0) {
    rounded -= 1;
  }
  return rounded / factor;
}

/** 割合（0-100）を "62.5%" 形式に */
export function formatPercent(value: number): string {
  return `${value.toFixed(1)}%`;
}

/** 総合スコアを小数第1位で表示 */
export function formatScore(value: number): string {
  return value.toFixed(1);
}

/** 重みを小数第2位で表示 */
export function formatWeight(value: number): string {
  return value.toFixed(2);
}
