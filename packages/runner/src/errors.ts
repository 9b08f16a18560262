/**
 * Runner カスタムエラー
 */

/**
 * ベースエラー
 */
export class WorkflowError extends Error {
  constructor(
    message: string,
    public readonly code: string
  ) {
    super(message);
    this.name = 'WorkflowError';
  }
}

/**
 * ケイパビリティが見つからない（設定不備）
 */
export class CapabilityNotFoundError extends WorkflowError {
  constructor(public readonly capability: string) {
    super(`Capability not found: ${capability}`, 'CAPABILITY_NOT_FOUND');
    this.name = 'CapabilityNotFoundError';
  }
}

/**
 * ケイパビリティのタイムアウト
 */
export class CapabilityTimeoutError extends WorkflowError {
  constructor(public readonly timeoutSeconds: number) {
    super(`Capability timed out after ${timeoutSeconds} seconds`, 'TIMEOUT');
    this.name = 'TimeoutError';
  }
}

/**
 * ケイパビリティの論理失敗
 */
export class CapabilityFailedError extends WorkflowError {
  constructor(message: string) {
    super(message, 'CAPABILITY_FAILED');
    this.name = 'CapabilityFailedError';
  }
}

/**
 * パラメータ検証エラー
 */
export class ParamValidationError extends WorkflowError {
  constructor(public readonly errors: unknown[]) {
    super(`Validation failed: ${JSON.stringify(errors)}`, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

/**
 * 循環依存
 */
export class CyclicDependencyError extends WorkflowError {
  constructor(public readonly subtaskIds: string[]) {
    super(`Cyclic dependency detected among: ${subtaskIds.join(', ')}`, 'CYCLIC_DEPENDENCY');
    this.name = 'CyclicDependencyError';
  }
}

/**
 * 存在しない依存先
 */
export class UnknownDependencyError extends WorkflowError {
  constructor(
    public readonly subtaskId: string,
    public readonly dependencyId: string
  ) {
    super(`Unknown dependency: ${subtaskId} -> ${dependencyId}`, 'UNKNOWN_DEPENDENCY');
    this.name = 'UnknownDependencyError';
  }
}

/**
 * サブタスクIDの重複
 */
export class DuplicateSubTaskError extends WorkflowError {
  constructor(public readonly subtaskId: string) {
    super(`Duplicate subtask id: ${subtaskId}`, 'DUPLICATE_SUBTASK');
    this.name = 'DuplicateSubTaskError';
  }
}

/**
 * デッドロック（実行可能なサブタスクがないのに未完了）
 */
export class DeadlockError extends WorkflowError {
  constructor(public readonly pendingIds: string[]) {
    super(`Deadlock: no runnable subtasks among ${pendingIds.join(', ')}`, 'DEADLOCK');
    this.name = 'DeadlockError';
  }
}

/**
 * 不正な状態遷移
 */
export class InvalidStateTransitionError extends WorkflowError {
  constructor(
    public readonly fromState: string,
    public readonly toState: string
  ) {
    super(`Invalid state transition: ${fromState} -> ${toState}`, 'INVALID_STATE_TRANSITION');
    this.name = 'InvalidStateTransitionError';
  }
}

/**
 * 設定エラー
 */
export class InvalidConfigurationError extends WorkflowError {
  constructor(message: string) {
    super(message, 'INVALID_CONFIGURATION');
    this.name = 'InvalidConfigurationError';
  }
}

/**
 * 通知配信エラー
 */
export class NotificationDeliveryError extends WorkflowError {
  constructor(
    message: string,
    public readonly status?: number
  ) {
    super(message, 'NOTIFICATION_DELIVERY_FAILED');
    this.name = 'NotificationDeliveryError';
  }
}

/**
 * 設定不備（リトライしない）エラーか
 */
export function isConfigurationError(error: unknown): boolean {
  return (
    error instanceof CapabilityNotFoundError ||
    error instanceof CyclicDependencyError ||
    error instanceof UnknownDependencyError ||
    error instanceof DuplicateSubTaskError ||
    error instanceof DeadlockError ||
    error instanceof InvalidStateTransitionError ||
    error instanceof InvalidConfigurationError
  );
}
