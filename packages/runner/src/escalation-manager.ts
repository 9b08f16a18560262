import { v4 as uuidv4 } from 'uuid';
import {
  EscalationSeverity,
  EscalationStatus,
  createConsoleLogger,
  previewText,
  renderEscalationMessage,
  type EscalationKind,
  type EscalationNotifier,
  type EscalationOption,
  type EscalationRequest,
  type ExecutionPlan,
  type QualityReport,
  type SubTask,
  type WorkflowLogger,
} from '@taskflow/workflow-spec';
import { describeError } from './redaction';

export interface EscalationManagerOptions {
  notifier?: EscalationNotifier;

  /** room_id がない計画の通知先 */
  defaultTarget?: string | null;

  expiryMinutes?: number;
  now?: () => Date;
  logger?: WorkflowLogger;
}

const TASK_OPTIONS: EscalationOption[] = [
  { id: 'retry', label: 'リトライ', description: 'もう一度試します' },
  { id: 'skip', label: 'スキップ', description: 'このタスクを飛ばして続行' },
  { id: 'abort', label: '中止', description: '全体の処理を中止' },
];

const QUALITY_OPTIONS: EscalationOption[] = [
  { id: 'accept', label: 'そのまま完了', description: '問題を許容して完了' },
  { id: 'retry', label: 'やり直し', description: '最初からやり直し' },
  { id: 'manual', label: '手動対応', description: '自分で対応する' },
];

const ERROR_OPTIONS: EscalationOption[] = [
  { id: 'retry', label: '再実行', description: '原因を解消してから再実行' },
  { id: 'abort', label: '中止', description: 'この依頼を取り下げる' },
];

interface EscalationDraft {
  plan: ExecutionPlan;
  subtask_id: string | null;
  kind: EscalationKind;
  severity: EscalationSeverity;
  title: string;
  description: string;
  context: string | null;
  options: EscalationOption[];
  recommendation: string | null;
  recommendation_reason: string | null;
}

/**
 * エスカレーション管理
 *
 * 自動処理できない問題を人間に通知し、応答を受け付ける
 */
export class EscalationManager {
  private readonly requests = new Map<string, EscalationRequest>();
  private readonly notifier: EscalationNotifier | null;
  private readonly defaultTarget: string | null;
  private readonly expiryMs: number;
  private readonly now: () => Date;
  private readonly logger: WorkflowLogger;

  constructor(options: EscalationManagerOptions = {}) {
    this.notifier = options.notifier ?? null;
    this.defaultTarget = options.defaultTarget ?? null;
    this.expiryMs = (options.expiryMinutes ?? 30) * 60 * 1000;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? createConsoleLogger('Escalation');
  }

  /**
   * サブタスク失敗のエスカレーション
   */
  async createTaskEscalation(subtask: SubTask, plan: ExecutionPlan, error: unknown): Promise<EscalationRequest> {
    const fresh = subtask.retry_count < 2;
    return this.create({
      plan,
      subtask_id: subtask.id,
      kind: 'task',
      severity: EscalationSeverity.DECISION,
      title: `「${subtask.name}」の実行に失敗しました`,
      description: `エラー内容: ${describeError(error)}`,
      context: `「${previewText(plan.original_request, 50)}」の一部として実行中でした`,
      options: TASK_OPTIONS,
      recommendation: fresh ? 'retry' : 'skip',
      recommendation_reason: fresh ? '一時的なエラーの可能性があります' : '複数回失敗しているためスキップを推奨',
    });
  }

  /**
   * 品質問題のエスカレーション
   */
  async createQualityEscalation(plan: ExecutionPlan, report: QualityReport): Promise<EscalationRequest> {
    const acceptable = report.score > 0.7;
    return this.create({
      plan,
      subtask_id: null,
      kind: 'quality',
      severity: EscalationSeverity.CONFIRMATION,
      title: '品質チェックで問題が見つかりました',
      description: `問題点: ${report.issues.join(', ')}`,
      context: `「${previewText(plan.original_request, 50)}」の実行結果です`,
      options: QUALITY_OPTIONS,
      recommendation: acceptable ? 'accept' : 'manual',
      recommendation_reason: acceptable ? '軽微な問題のため許容できます' : '品質スコアが低いため確認を推奨',
    });
  }

  /**
   * 実行時エラーのエスカレーション
   */
  async createErrorEscalation(
    plan: ExecutionPlan,
    error: unknown,
    severity: EscalationSeverity,
    summary: string
  ): Promise<EscalationRequest> {
    return this.create({
      plan,
      subtask_id: null,
      kind: 'error',
      severity,
      title: summary,
      description: `エラー内容: ${describeError(error)}`,
      context: `「${previewText(plan.original_request, 50)}」の処理中に発生しました`,
      options: ERROR_OPTIONS,
      recommendation: null,
      recommendation_reason: null,
    });
  }

  /**
   * 人間の応答を処理
   */
  processResponse(escalationId: string, optionId: string, reason?: string): boolean {
    const request = this.requests.get(escalationId);
    if (!request || request.status !== EscalationStatus.PENDING) {
      return false;
    }

    const now = this.now();
    if (now.getTime() >= request.expires_at.getTime()) {
      this.expire(request);
      return false;
    }

    if (!request.options.some((opt) => opt.id === optionId)) {
      return false;
    }

    request.status = EscalationStatus.RESPONDED;
    request.response = optionId;
    request.response_reason = reason ?? null;
    request.responded_at = now;
    Object.freeze(request);

    this.logger.info('Escalation responded', { escalation_id: escalationId, response: optionId });
    return true;
  }

  get(escalationId: string): EscalationRequest | null {
    return this.requests.get(escalationId) ?? null;
  }

  /**
   * 未回答のエスカレーション
   */
  getPendingEscalations(planId?: string): EscalationRequest[] {
    return [...this.requests.values()].filter(
      (req) => req.status === EscalationStatus.PENDING && (planId === undefined || req.plan_id === planId)
    );
  }

  /**
   * 期限切れを expired にする（件数を返す）
   */
  expireStale(now: Date = this.now()): number {
    let expired = 0;
    for (const request of this.requests.values()) {
      if (request.status === EscalationStatus.PENDING && now.getTime() >= request.expires_at.getTime()) {
        this.expire(request);
        expired++;
      }
    }
    return expired;
  }

  private expire(request: EscalationRequest): void {
    request.status = EscalationStatus.EXPIRED;
    Object.freeze(request);
    this.logger.info('Escalation expired', { escalation_id: request.id });
  }

  private async create(draft: EscalationDraft): Promise<EscalationRequest> {
    const now = this.now();
    const { plan, ...fields } = draft;

    const request: EscalationRequest = {
      id: uuidv4(),
      plan_id: plan.id,
      ...fields,
      options: [...fields.options],
      status: EscalationStatus.PENDING,
      response: null,
      response_reason: null,
      created_at: now,
      expires_at: new Date(now.getTime() + this.expiryMs),
      responded_at: null,
      notification_sent: false,
      notification_target: null,
      notification_message_id: null,
      notification_error: null,
    };

    await this.deliver(request, plan.context.room_id ?? this.defaultTarget);

    this.requests.set(request.id, request);
    this.logger.info('Escalation created', {
      escalation_id: request.id,
      plan_id: plan.id,
      kind: request.kind,
      severity: request.severity,
      notification_sent: request.notification_sent,
    });
    return request;
  }

  private async deliver(request: EscalationRequest, target: string | null): Promise<void> {
    request.notification_target = target;

    if (!this.notifier) {
      request.notification_error = 'No notifier configured';
      return;
    }
    if (!target) {
      request.notification_error = 'No notification target';
      return;
    }

    try {
      request.notification_message_id = await this.notifier.send(target, renderEscalationMessage(request));
      request.notification_sent = true;
    } catch (error) {
      request.notification_error = describeError(error);
      this.logger.warn('Escalation delivery failed', {
        escalation_id: request.id,
        error: request.notification_error,
      });
    }
  }
}

/**
 * EscalationManager 作成
 */
export function createEscalationManager(options: EscalationManagerOptions = {}): EscalationManager {
  return new EscalationManager(options);
}
