import { isWorkflowOrchestrationEnabled } from '@taskflow/runner';
import { createConsoleLogger, type ExecutionResult } from '@taskflow/workflow-spec';
import {
  ErrorCode,
  EscalationRespondedSchema,
  WorkflowExecuteRequestedSchema,
  formatZodError,
} from '../validation/event-schemas';
import type { WorkflowRuntime } from './runtime';

const logger = createConsoleLogger('WorkflowHandler');

/**
 * イベント結果に載せる実行結果（JSON化できる形）
 */
export interface ExecutionSummary {
  plan_id: string | null;
  plan_name: string;
  success: boolean;
  requires_human_decision: boolean;
  message: string;
  error_code: string | null;
  completed_subtasks: string[];
  failed_subtasks: string[];
  escalation_ids: string[];
  quality_score: number | null;
  total_execution_time_ms: number;
}

export type WorkflowRequestOutcome =
  | { status: 'completed'; summary: ExecutionSummary }
  | { status: 'skipped'; error_code: ErrorCode; reason: string }
  | { status: 'rejected'; error_code: ErrorCode; reason: string };

export type EscalationResponseOutcome =
  | { status: 'accepted' | 'ignored'; escalation_id: string }
  | { status: 'rejected'; error_code: ErrorCode; reason: string };

export function summarizeResult(result: ExecutionResult): ExecutionSummary {
  return {
    plan_id: result.plan_id,
    plan_name: result.plan_name,
    success: result.success,
    requires_human_decision: result.requires_human_decision,
    message: result.message,
    error_code: result.error_code,
    completed_subtasks: [...result.completed_subtasks],
    failed_subtasks: [...result.failed_subtasks],
    escalation_ids: result.escalations.map((e) => e.id),
    quality_score: result.quality_score,
    total_execution_time_ms: result.total_execution_time_ms,
  };
}

/**
 * ワークフロー実行リクエストを処理
 */
export async function processWorkflowRequest(
  runtime: WorkflowRuntime,
  payload: unknown
): Promise<WorkflowRequestOutcome> {
  const parsed = WorkflowExecuteRequestedSchema.safeParse(payload);
  if (!parsed.success) {
    const reason = formatZodError(parsed.error);
    logger.warn('Invalid workflow request', { reason });
    return { status: 'rejected', error_code: ErrorCode.VALIDATION_ERROR, reason };
  }

  if (!isWorkflowOrchestrationEnabled(runtime.config)) {
    return { status: 'skipped', error_code: ErrorCode.DISABLED, reason: 'Workflow orchestration is disabled' };
  }

  const { request, context, request_id } = parsed.data;
  const result = await runtime.coordinator.executeRequest(request, {
    ...context,
    trace_id: context.trace_id ?? request_id,
  });

  logger.info('Workflow request processed', {
    plan_id: result.plan_id,
    success: result.success,
    requires_human_decision: result.requires_human_decision,
  });
  return { status: 'completed', summary: summarizeResult(result) };
}

/**
 * エスカレーション応答を処理
 */
export function processEscalationResponse(runtime: WorkflowRuntime, payload: unknown): EscalationResponseOutcome {
  const parsed = EscalationRespondedSchema.safeParse(payload);
  if (!parsed.success) {
    const reason = formatZodError(parsed.error);
    logger.warn('Invalid escalation response', { reason });
    return { status: 'rejected', error_code: ErrorCode.VALIDATION_ERROR, reason };
  }

  const { escalation_id, option_id, reason } = parsed.data;
  const accepted = runtime.coordinator.respondToEscalation(escalation_id, option_id, reason);
  return { status: accepted ? 'accepted' : 'ignored', escalation_id };
}
