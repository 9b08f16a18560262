/**
 * リトライ・バックオフ共通ユーティリティ
 *
 * サブタスク内リトライ（遅延なし）と例外ハンドラー（指数バックオフ）で共有
 */

export interface BackoffPolicy {
  baseDelayMs: number;
  maxDelayMs: number;
}

/**
 * 論理失敗のリトライは遅延なし
 */
export const NO_BACKOFF: BackoffPolicy = { baseDelayMs: 0, maxDelayMs: 0 };

/**
 * 指数バックオフの遅延（base * 2^step、上限あり）
 */
export function computeBackoffDelay(step: number, policy: BackoffPolicy): number {
  const delay = policy.baseDelayMs * Math.pow(2, Math.max(0, step));
  return Math.min(delay, policy.maxDelayMs);
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export type AttemptOutcome<T> = { ok: true; value: T } | { ok: false; error: Error };

export type RetryResult<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: Error; attempts: number };

export interface RetryOptions {
  maxAttempts: number;
  policy: BackoffPolicy;

  /** 失敗した試行ごとに呼ばれる */
  onFailure?: (error: Error, attempt: number) => void;

  /** false を返すとそれ以上リトライしない */
  shouldRetry?: (error: Error, attempt: number) => boolean;
}

/**
 * 最大 maxAttempts 回まで試行する
 */
export async function retryWithBackoff<T>(
  operation: (attempt: number) => Promise<AttemptOutcome<T>>,
  options: RetryOptions
): Promise<RetryResult<T>> {
  let lastError: Error = new Error('No attempts were made');

  for (let attempt = 1; attempt <= options.maxAttempts; attempt++) {
    const outcome = await operation(attempt);
    if (outcome.ok) {
      return { ok: true, value: outcome.value, attempts: attempt };
    }

    lastError = outcome.error;
    options.onFailure?.(outcome.error, attempt);

    if (options.shouldRetry && !options.shouldRetry(outcome.error, attempt)) {
      return { ok: false, error: lastError, attempts: attempt };
    }

    if (attempt < options.maxAttempts) {
      const delay = computeBackoffDelay(attempt - 1, options.policy);
      if (delay > 0) {
        await sleep(delay);
      }
    }
  }

  return { ok: false, error: lastError, attempts: options.maxAttempts };
}
