/**
 * キャプテン成績データの読み込み
 *
 * @remarks
 * CSV（xlsxでパース）または JSON（行オブジェクトの配列）を読み込み、
 * 列名 → 値の行に変換する。列と値の検証はスコアリングエンジン側で行う。
 * ファイル未指定の場合は同梱のサンプルデータを使う。
 */

import { readFileSync } from 'node:fs';
import { extname, join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import iconv from 'iconv-lite';
import * as XLSX from 'xlsx';
import type { CaptainRow } from '../types/CaptainData';
import { ProcessingError } from '../domain/errors/ScoringErrors';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export const DEFAULT_DATASET_PATH = join(__dirname, '../data/defaultCaptains.json');

export interface LoadOptions {
  /** ファイルの文字コード（utf-8, shift_jis, euc-jp など） */
  encoding?: string;
}

export type DataFormat = 'csv' | 'json';

/**
 * ファイル（省略時はサンプルデータ）から入力行を読み込む
 *
 * @throws {ProcessingError} 読み込み・パースに失敗した場合
 */
export function loadCaptainRows(filePath?: string, options: LoadOptions = {}): CaptainRow[] {
  const path = filePath ?? DEFAULT_DATASET_PATH;
  const format = detectFormat(path);

  let buffer: Buffer;
  try {
    buffer = readFileSync(path);
  } catch (error) {
    throw new ProcessingError(`Failed to read file: ${path}`, { cause: error });
  }

  const text = decodeBuffer(buffer, options.encoding);
  return format === 'csv' ? parseCsv(text) : parseJson(text);
}

export function detectFormat(filePath: string): DataFormat {
  const ext = extname(filePath).toLowerCase();
  switch (ext) {
    case '.csv':
      return 'csv';
    case '.json':
      return 'json';
    default:
      throw new ProcessingError(`Unsupported file type "${ext || filePath}" (expected .csv or .json)`);
  }
}

/**
 * 文字コードを指定してデコード（BOMは除去される）
 */
export function decodeBuffer(buffer: Buffer, encoding: string = 'utf-8'): string {
  if (!iconv.encodingExists(encoding)) {
    throw new ProcessingError(`Unsupported encoding: ${encoding}`);
  }
  return iconv.decode(buffer, encoding);
}

/**
 * CSVテキストを行に変換
 *
 * @remarks
 * 先頭行を列名とし、セル値は文字列のまま渡す（数値変換はエンティティで行う）。
 * 空セルは空文字として残すため、列そのものの欠損とは区別される。
 */
export function parseCsv(text: string): CaptainRow[] {
  try {
    const workbook = XLSX.read(text, { type: 'string', raw: true });
    const sheetName = workbook.SheetNames[0];
    if (sheetName === undefined) {
      return [];
    }
    const worksheet = workbook.Sheets[sheetName];
    return XLSX.utils.sheet_to_json<Record<string, unknown>>(worksheet, { defval: '', raw: true });
  } catch (error) {
    throw new ProcessingError('Failed to parse CSV data', { cause: error });
  }
}

/**
 * JSONテキストを行に変換（行オブジェクトの配列のみ受け付ける）
 */
export function parseJson(text: string): CaptainRow[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new ProcessingError('Failed to parse JSON data', { cause: error });
  }

  if (!Array.isArray(parsed)) {
    throw new ProcessingError('JSON data must be an array of captain rows');
  }

  const rows: CaptainRow[] = [];
  parsed.forEach((item: unknown, index) => {
    if (!isRow(item)) {
      throw new ProcessingError(`JSON row ${index + 1} is not an object`);
    }
    rows.push(item);
  });
  return rows;
}

function isRow(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
