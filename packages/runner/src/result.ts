import {
  PlanStatus,
  SubTaskStatus,
  previewText,
  type EscalationRequest,
  type ExecutionPlan,
  type ExecutionResult,
  type QualityReport,
  type SubTask,
} from '@taskflow/workflow-spec';

const REQUEST_PREVIEW_LENGTH = 30;

export interface RunOutcome {
  qualityReport: QualityReport | null;
  escalations: EscalationRequest[];
  waves: string[][];
  startedAt: Date;
  completedAt: Date;
}

export interface FailureOutcome {
  /** 計画作成前の失敗では null */
  plan: ExecutionPlan | null;
  planName: string;
  request: string;
  errorCode: string;
  escalations: EscalationRequest[];
  suggestions: string[];
  startedAt: Date;
  completedAt: Date;
}

function namesWith(subtasks: SubTask[], status: SubTaskStatus): string[] {
  return subtasks.filter((st) => st.status === status).map((st) => st.name);
}

function freezeResult(result: ExecutionResult): ExecutionResult {
  Object.freeze(result.completed_subtasks);
  Object.freeze(result.failed_subtasks);
  Object.freeze(result.skipped_subtasks);
  Object.freeze(result.escalated_subtasks);
  Object.freeze(result.escalations);
  Object.freeze(result.execution_waves);
  Object.freeze(result.suggestions);
  return Object.freeze(result);
}

/**
 * 実行結果を組み立てる（ユーザー向けメッセージはテンプレートのみ）
 */
export function buildExecutionResult(plan: ExecutionPlan, outcome: RunOutcome): ExecutionResult {
  const completed = namesWith(plan.subtasks, SubTaskStatus.COMPLETED);
  const failed = namesWith(plan.subtasks, SubTaskStatus.FAILED);
  const skipped = namesWith(plan.subtasks, SubTaskStatus.SKIPPED);
  const escalated = namesWith(plan.subtasks, SubTaskStatus.ESCALATED);
  const awaitingHuman = plan.status === PlanStatus.IN_PROGRESS;
  const request = previewText(plan.original_request, REQUEST_PREVIEW_LENGTH);

  const lines: string[] = [];
  if (plan.status === PlanStatus.COMPLETED) {
    lines.push(`「${request}」を完了しました`);
    if (completed.length > 0) {
      lines.push('', '完了したタスク:', ...completed.map((name) => `✅ ${name}`));
    }
  } else if (awaitingHuman) {
    lines.push(`「${request}」は確認待ちです`);
    if (completed.length > 0) {
      lines.push('', `完了: ${completed.join(', ')}`);
    }
    if (escalated.length > 0) {
      lines.push(`確認待ち: ${escalated.join(', ')}`);
    }
    if (outcome.qualityReport && escalated.length === 0) {
      lines.push('品質チェックの結果を確認してください');
    }
  } else {
    lines.push(`「${request}」の一部が失敗しました`);
    if (completed.length > 0) {
      lines.push('', `完了: ${completed.join(', ')}`);
    }
    if (failed.length > 0) {
      lines.push(`失敗: ${failed.join(', ')}`);
    }
  }

  const suggestions: string[] = [];
  if (failed.length > 0) {
    suggestions.push('失敗したタスクをリトライしますか？');
  }
  if (awaitingHuman) {
    suggestions.push('確認事項に回答すると続きを進められます');
  }
  if (completed.length > 0 && !awaitingHuman) {
    suggestions.push('他にやることはありますか？');
  }

  return freezeResult({
    plan_id: plan.id,
    plan_name: plan.name,
    success: plan.status === PlanStatus.COMPLETED,
    requires_human_decision: awaitingHuman,
    message: lines.join('\n'),
    completed_subtasks: completed,
    failed_subtasks: failed,
    skipped_subtasks: skipped,
    escalated_subtasks: escalated,
    quality_score: outcome.qualityReport?.score ?? null,
    quality_report: outcome.qualityReport,
    escalations: [...outcome.escalations],
    execution_waves: outcome.waves.map((wave) => [...wave]),
    total_execution_time_ms: outcome.completedAt.getTime() - outcome.startedAt.getTime(),
    retry_count: plan.subtasks.reduce((sum, st) => sum + st.retry_count, 0),
    suggestions,
    error_code: null,
    started_at: outcome.startedAt,
    completed_at: outcome.completedAt,
  });
}

/**
 * 実行できなかった場合の結果（汎用メッセージ）
 */
export function buildFailureResult(outcome: FailureOutcome): ExecutionResult {
  const subtasks = outcome.plan?.subtasks ?? [];
  return freezeResult({
    plan_id: outcome.plan?.id ?? null,
    plan_name: outcome.planName,
    success: false,
    requires_human_decision: outcome.escalations.length > 0,
    message: `「${previewText(outcome.request, REQUEST_PREVIEW_LENGTH)}」の処理中にエラーが発生しました`,
    completed_subtasks: namesWith(subtasks, SubTaskStatus.COMPLETED),
    failed_subtasks: namesWith(subtasks, SubTaskStatus.FAILED),
    skipped_subtasks: namesWith(subtasks, SubTaskStatus.SKIPPED),
    escalated_subtasks: namesWith(subtasks, SubTaskStatus.ESCALATED),
    quality_score: null,
    quality_report: null,
    escalations: [...outcome.escalations],
    execution_waves: [],
    total_execution_time_ms: outcome.completedAt.getTime() - outcome.startedAt.getTime(),
    retry_count: subtasks.reduce((sum, st) => sum + st.retry_count, 0),
    suggestions: outcome.suggestions,
    error_code: outcome.errorCode,
    started_at: outcome.startedAt,
    completed_at: outcome.completedAt,
  });
}

export interface FastPathOutcome {
  request: string;
  message: string | null;
  errorCode: string | null;
  startedAt: Date;
  completedAt: Date;
}

/**
 * 単一タスク（計画なし）の結果
 */
export function buildFastPathResult(subtask: SubTask, outcome: FastPathOutcome): ExecutionResult {
  const success = subtask.status === SubTaskStatus.COMPLETED;
  const request = previewText(outcome.request, REQUEST_PREVIEW_LENGTH);
  const fallback = success ? `「${request}」を完了しました` : `「${request}」を処理できませんでした`;

  return freezeResult({
    plan_id: null,
    plan_name: subtask.name,
    success,
    requires_human_decision: false,
    message: outcome.message ?? fallback,
    completed_subtasks: success ? [subtask.name] : [],
    failed_subtasks: success ? [] : [subtask.name],
    skipped_subtasks: [],
    escalated_subtasks: [],
    quality_score: null,
    quality_report: null,
    escalations: [],
    execution_waves: [[subtask.name]],
    total_execution_time_ms: outcome.completedAt.getTime() - outcome.startedAt.getTime(),
    retry_count: subtask.retry_count,
    suggestions: success ? [] : ['時間をおいてもう一度試しますか？'],
    error_code: outcome.errorCode,
    started_at: outcome.startedAt,
    completed_at: outcome.completedAt,
  });
}
