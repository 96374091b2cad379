/**
 * スコアリングのエラー種別
 *
 * @remarks
 * 呼び出し側は `kind` で分岐する。どちらもホストを落とさず、
 * メッセージを表示して空の結果を扱う想定。
 */

/** 必須列の欠損（ユーザーが修正可能） */
export class MissingFieldError extends Error {
  readonly kind = 'MissingField' as const;

  constructor(readonly fields: readonly string[]) {
    super(`Missing required column(s): ${fields.join(', ')}`);
    this.name = 'MissingFieldError';
  }
}

/** 型変換失敗などその他の処理エラー */
export class ProcessingError extends Error {
  readonly kind = 'ProcessingError' as const;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ProcessingError';
  }

  /**
   * 任意の例外を ProcessingError に包む
   */
  static from(error: unknown): ProcessingError {
    if (error instanceof ProcessingError) {
      return error;
    }
    const detail = error instanceof Error ? error.message : String(error);
    return new ProcessingError(`Error processing data: ${detail}`, { cause: error });
  }
}
