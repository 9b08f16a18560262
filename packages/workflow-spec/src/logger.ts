import type { WorkflowLogger } from './types';

/**
 * コンソールロガー作成（[scope] プレフィックス付き）
 */
export function createConsoleLogger(scope: string): WorkflowLogger {
  const prefix = `[${scope}]`;
  return {
    debug: (msg, data) => console.debug(prefix, msg, data ?? ''),
    info: (msg, data) => console.info(prefix, msg, data ?? ''),
    warn: (msg, data) => console.warn(prefix, msg, data ?? ''),
    error: (msg, data) => console.error(prefix, msg, data ?? ''),
  };
}

/**
 * 子スコープのロガー作成
 */
export function createChildLogger(parent: WorkflowLogger, scope: string): WorkflowLogger {
  const prefix = `[${scope}] `;
  return {
    debug: (msg, data) => parent.debug(prefix + msg, data),
    info: (msg, data) => parent.info(prefix + msg, data),
    warn: (msg, data) => parent.warn(prefix + msg, data),
    error: (msg, data) => parent.error(prefix + msg, data),
  };
}
