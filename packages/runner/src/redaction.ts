/**
 * ログ・通知に出す前のサニタイズ
 *
 * エラーメッセージはチャット通知に載るため、個人情報を伏せる
 */

/**
 * 個人情報パターン
 */
export const PII_PATTERNS = {
  email: /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g,
  phone_jp: /\d{2,4}-\d{2,4}-\d{4}/g,
  credit_card: /\d{4}[- ]?\d{4}[- ]?\d{4}[- ]?\d{4}/g,
  postal_code_jp: /〒?\d{3}-\d{4}/g,
};

/**
 * センシティブなキー名パターン
 */
export const SENSITIVE_KEY_PATTERNS = [
  /password/i,
  /secret/i,
  /token/i,
  /api_?key/i,
  /credit/i,
  /card/i,
  /phone/i,
  /email/i,
];

/**
 * キー名がセンシティブかどうかチェック
 */
export function isSensitiveKey(key: string): boolean {
  return SENSITIVE_KEY_PATTERNS.some((p) => p.test(key));
}

const MAX_STRING_LENGTH = 1000;
const MAX_ERROR_MESSAGE_LENGTH = 500;

/**
 * 文字列のサニタイズ
 */
export function sanitizeString(str: string): string {
  let result = str
    .replace(PII_PATTERNS.email, '[EMAIL]')
    .replace(PII_PATTERNS.credit_card, '[CARD]')
    .replace(PII_PATTERNS.phone_jp, '[PHONE]')
    .replace(PII_PATTERNS.postal_code_jp, '[POSTAL]');

  if (result.length > MAX_STRING_LENGTH) {
    result = result.slice(0, MAX_STRING_LENGTH) + '...[TRUNCATED]';
  }

  return result;
}

/**
 * ログ記録前のサニタイズ（深い階層まで）
 */
export function sanitizeForLog(data: unknown): unknown {
  if (typeof data === 'string') {
    return sanitizeString(data);
  }

  if (Array.isArray(data)) {
    return data.map((item) => sanitizeForLog(item));
  }

  if (data && typeof data === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(data)) {
      result[key] = isSensitiveKey(key) ? '[REDACTED]' : sanitizeForLog(value);
    }
    return result;
  }

  return data;
}

/**
 * エラーメッセージのサニタイズ
 */
export function sanitizeErrorMessage(message: string): string {
  return sanitizeString(message).slice(0, MAX_ERROR_MESSAGE_LENGTH);
}

/**
 * unknown なエラーからサニタイズ済みメッセージを取得
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return sanitizeErrorMessage(error.message);
  }
  return sanitizeErrorMessage(String(error));
}
