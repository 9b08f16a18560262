import {
  EscalationSeverity,
  RecoveryStrategy,
  createConsoleLogger,
  type ErrorCategory,
  type ExecutionPlan,
  type RecoveryResult,
  type WorkflowLogger,
} from '@taskflow/workflow-spec';
import { computeBackoffDelay, sleep, type BackoffPolicy } from './backoff';
import { isConfigurationError } from './errors';
import type { EscalationManager } from './escalation-manager';
import { describeError, sanitizeString } from './redaction';

const TRANSIENT_NAMES = new Set([
  'TimeoutError',
  'ConnectionError',
  'NetworkError',
  'RateLimitError',
  'HTTPError',
  'APIError',
  'APIConnectionError',
  'FetchError',
]);
const TRANSIENT_CODES = new Set(['TIMEOUT', 'ECONNRESET', 'ETIMEDOUT', 'ECONNREFUSED', 'EAI_AGAIN']);

const PERMISSION_NAMES = new Set([
  'PermissionError',
  'AuthenticationError',
  'AuthorizationError',
  'ForbiddenError',
  'PermissionDeniedError',
]);
const PERMISSION_CODES = new Set(['EACCES', 'EPERM']);
const PERMISSION_STATUSES = new Set([401, 403]);

const DATA_NAMES = new Set(['ValidationError', 'DataError', 'NotFoundError', 'ConflictError', 'ZodError']);
const DATA_STATUSES = new Set([400, 404, 409, 422]);

interface ErrorSignature {
  name: string;
  code: string | null;
  status: number | null;
}

/**
 * name / code / status を取り出す
 */
export function getErrorSignature(error: unknown): ErrorSignature {
  const name = error instanceof Error ? error.name : '';
  let code: string | null = null;
  let status: number | null = null;

  if (typeof error === 'object' && error !== null) {
    if ('code' in error && typeof error.code === 'string') {
      code = error.code;
    }
    if ('status' in error && typeof error.status === 'number') {
      status = error.status;
    } else if ('statusCode' in error && typeof error.statusCode === 'number') {
      status = error.statusCode;
    }
  }

  return { name, code, status };
}

/**
 * エラーを分類
 */
export function classifyError(error: unknown): ErrorCategory {
  if (isConfigurationError(error)) {
    return 'configuration';
  }

  const { name, code, status } = getErrorSignature(error);

  if (
    TRANSIENT_NAMES.has(name) ||
    (code !== null && TRANSIENT_CODES.has(code)) ||
    (status !== null && (status === 429 || status >= 500))
  ) {
    return 'transient';
  }

  if (
    PERMISSION_NAMES.has(name) ||
    (code !== null && PERMISSION_CODES.has(code)) ||
    (status !== null && PERMISSION_STATUSES.has(status))
  ) {
    return 'permission';
  }

  if (DATA_NAMES.has(name) || (status !== null && DATA_STATUSES.has(status))) {
    return 'data';
  }

  return 'unknown';
}

export interface ExceptionHandlerOptions {
  escalations: EscalationManager;
  backoff?: BackoffPolicy & { maxRetries: number };

  /** エラーの name / code → 代替手段 */
  alternatives?: Record<string, string[]>;

  sleep?: (ms: number) => Promise<void>;
  logger?: WorkflowLogger;
}

/**
 * 例外処理
 *
 * 分類ごとに回復方針を決め、必要なら人間にエスカレーションする
 */
export class ExceptionHandler {
  private readonly escalations: EscalationManager;
  private readonly policy: BackoffPolicy;
  private readonly maxRetries: number;
  private readonly alternatives: Map<string, string[]>;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly logger: WorkflowLogger;
  private readonly retrySteps = new Map<string, number>();

  constructor(options: ExceptionHandlerOptions) {
    this.escalations = options.escalations;
    const backoff = options.backoff ?? { baseDelayMs: 1000, maxDelayMs: 30000, maxRetries: 3 };
    this.policy = { baseDelayMs: backoff.baseDelayMs, maxDelayMs: backoff.maxDelayMs };
    this.maxRetries = backoff.maxRetries;
    this.alternatives = new Map(Object.entries(options.alternatives ?? {}));
    this.sleep = options.sleep ?? sleep;
    this.logger = options.logger ?? createConsoleLogger('ExceptionHandler');
  }

  /**
   * 例外を処理して回復結果を返す
   */
  async handle(error: unknown, plan: ExecutionPlan): Promise<RecoveryResult> {
    const category = classifyError(error);
    this.logger.warn('Handling workflow error', {
      plan_id: plan.id,
      category,
      error: describeError(error),
    });

    switch (category) {
      case 'configuration':
        return {
          strategy: RecoveryStrategy.ABORT,
          success: false,
          message: '設定エラーのため処理を中止しました',
          error_category: category,
          alternatives: [],
        };
      case 'transient':
        return this.handleTransient(error, plan);
      case 'permission':
        return this.escalate(error, plan, category, EscalationSeverity.DECISION, '権限エラーが発生しました');
      case 'data':
        return this.handleData(error, plan);
      case 'unknown':
        this.logger.error('Unexpected workflow error', {
          plan_id: plan.id,
          name: getErrorSignature(error).name,
          error: describeError(error),
          stack: error instanceof Error && error.stack ? sanitizeString(error.stack) : null,
        });
        return this.escalate(error, plan, category, EscalationSeverity.URGENT, '予期しないエラーが発生しました');
    }
  }

  /**
   * 計画ごとのリトライ回数をリセット
   */
  resetPlan(planId: string): void {
    this.retrySteps.delete(planId);
  }

  /**
   * 計画の現在のバックオフ段数
   */
  getRetryStep(planId: string): number {
    return this.retrySteps.get(planId) ?? 0;
  }

  private async handleTransient(error: unknown, plan: ExecutionPlan): Promise<RecoveryResult> {
    const step = this.retrySteps.get(plan.id) ?? 0;
    if (step >= this.maxRetries) {
      return this.escalate(error, plan, 'transient', EscalationSeverity.DECISION, 'リトライ上限に達しました');
    }

    const delay = computeBackoffDelay(step, this.policy);
    this.retrySteps.set(plan.id, step + 1);
    await this.sleep(delay);

    return {
      strategy: RecoveryStrategy.RETRY,
      success: true,
      message: '一時的なエラーのためリトライします',
      error_category: 'transient',
      alternatives: [],
      retry_after_ms: delay,
    };
  }

  private async handleData(error: unknown, plan: ExecutionPlan): Promise<RecoveryResult> {
    const { name, code } = getErrorSignature(error);
    const alternatives = this.alternatives.get(name) ?? (code !== null ? this.alternatives.get(code) : undefined);

    if (alternatives && alternatives.length > 0) {
      return {
        strategy: RecoveryStrategy.ALTERNATIVE,
        success: true,
        message: '代替手段があります',
        error_category: 'data',
        alternatives: [...alternatives],
      };
    }

    return this.escalate(error, plan, 'data', EscalationSeverity.CONFIRMATION, 'データエラーが発生しました');
  }

  private async escalate(
    error: unknown,
    plan: ExecutionPlan,
    category: ErrorCategory,
    severity: EscalationSeverity,
    summary: string
  ): Promise<RecoveryResult> {
    const escalation = await this.escalations.createErrorEscalation(plan, error, severity, summary);
    return {
      strategy: RecoveryStrategy.ESCALATE,
      success: false,
      message: summary,
      error_category: category,
      alternatives: [],
      escalation,
    };
  }
}
