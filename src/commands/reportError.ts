import { MissingFieldError, ProcessingError } from '../domain/errors/ScoringErrors';

/**
 * エラーを種別ごとに表示して終了コードを返す
 */
export function reportError(error: unknown): number {
  if (error instanceof MissingFieldError) {
    console.error(`❌ 必須列がありません: ${error.fields.join(', ')}`);
    console.error('   `captaincy columns` で必要な列を確認してください');
  } else if (error instanceof ProcessingError) {
    console.error(`❌ データ処理に失敗: ${error.message}`);
  } else {
    console.error('❌ 予期しないエラー:', error);
  }
  return 1;
}
