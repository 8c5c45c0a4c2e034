export type ErrorCode =
  | 'CONFIG_INVALID'
  | 'CHANNEL_NOT_FOUND'
  | 'SLACK_API_ERROR'
  | 'HISTORY_READ_FAILED'
  | 'HISTORY_WRITE_FAILED'
  | 'INTERNAL_ERROR';

export type BaseError = Error & {
  code: ErrorCode;
  details?: Record<string, unknown>;
};

/**
 * ベースエラーを作成する
 */
export function createBaseError(
  message: string,
  code: ErrorCode = 'INTERNAL_ERROR',
  details?: Record<string, unknown>
): BaseError {
  return Object.assign(new Error(message), { name: 'BaseError', code, details });
}

/**
 * createBaseError で作られたエラーかどうかを判定する
 */
export function isBaseError(error: unknown): error is BaseError {
  return error instanceof Error && error.name === 'BaseError' && 'code' in error;
}
