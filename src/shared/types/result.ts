/**
 * 成功値か型付きエラーのどちらかを持つ値。
 * 設定の読み込み失敗は例外にせず、この型で呼び出し側へ返す。
 */
export type Result<T, E = Error> =
  | { readonly success: true; readonly data: T }
  | { readonly success: false; readonly error: E };

export const Ok = <T, E = never>(data: T): Result<T, E> => ({
  success: true,
  data
});

export const Err = <E, T = never>(error: E): Result<T, E> => ({
  success: false,
  error
});

/** 失敗はそのまま通し、成功値だけ差し替える */
export const map = <T, U, E>(
  result: Result<T, E>,
  fn: (data: T) => U
): Result<U, E> => (result.success ? Ok(fn(result.data)) : result);

/** 次の段も失敗しうる場合の連結 */
export const flatMap = <T, U, E>(
  result: Result<T, E>,
  fn: (data: T) => Result<U, E>
): Result<U, E> => (result.success ? fn(result.data) : result);

export const match = <T, E, U>(
  result: Result<T, E>,
  cases: { success: (data: T) => U; error: (error: E) => U }
): U => (result.success ? cases.success(result.data) : cases.error(result.error));
