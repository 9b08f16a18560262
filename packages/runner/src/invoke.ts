import { validateCapabilityResult, type CapabilityContext, type CapabilityResult } from '@taskflow/workflow-spec';
import type { RegisteredCapability } from '@taskflow/capabilities';
import type { AttemptOutcome } from './backoff';
import { CapabilityFailedError, CapabilityTimeoutError } from './errors';

/**
 * タイムアウト付き実行
 *
 * タイムアウト後もハンドラー自体は動き続ける可能性がある（結果は破棄）
 */
export function executeWithTimeout<T>(operation: () => Promise<T>, timeoutSeconds: number): Promise<T> {
  return new Promise((resolve, reject) => {
    const timeout = setTimeout(() => {
      reject(new CapabilityTimeoutError(timeoutSeconds));
    }, timeoutSeconds * 1000);

    operation()
      .then((result) => {
        clearTimeout(timeout);
        resolve(result);
      })
      .catch((error: unknown) => {
        clearTimeout(timeout);
        reject(error);
      });
  });
}

/**
 * ケイパビリティを1回呼び出す
 *
 * 例外・タイムアウト・不正な戻り値・success=false はすべて失敗
 */
export async function invokeCapability(
  capability: RegisteredCapability,
  params: Record<string, unknown>,
  context: CapabilityContext,
  timeoutSeconds: number
): Promise<AttemptOutcome<CapabilityResult>> {
  let raw: unknown;
  try {
    raw = await executeWithTimeout(() => capability.execute(params, context), timeoutSeconds);
  } catch (error) {
    return { ok: false, error: error instanceof Error ? error : new Error(String(error)) };
  }

  const parsed = validateCapabilityResult(raw);
  if (!parsed.success) {
    return {
      ok: false,
      error: new CapabilityFailedError(`Capability returned a non-conforming result: ${capability.spec.name}`),
    };
  }

  if (!parsed.data.success) {
    return {
      ok: false,
      error: new CapabilityFailedError(parsed.data.error ?? parsed.data.message ?? 'Capability reported failure'),
    };
  }

  return { ok: true, value: parsed.data };
}
