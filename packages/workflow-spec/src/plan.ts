import { v4 as uuidv4 } from 'uuid';
import {
  SubTaskStatus,
  ExecutionPriority,
  DEFAULT_SUBTASK_CONFIG,
  type SubTask,
  type SubTaskDescriptor,
  type ExecutionPlan,
} from './types';

const TERMINAL_STATUSES: ReadonlySet<SubTaskStatus> = new Set<SubTaskStatus>([
  SubTaskStatus.COMPLETED,
  SubTaskStatus.FAILED,
  SubTaskStatus.SKIPPED,
  SubTaskStatus.ESCALATED,
]);

/** 依存先がこの状態なら後続は実行可能 */
const SATISFYING_STATUSES: ReadonlySet<SubTaskStatus> = new Set<SubTaskStatus>([
  SubTaskStatus.COMPLETED,
  SubTaskStatus.SKIPPED,
]);

/** 後続をブロックする終端状態 */
const BLOCKING_STATUSES: ReadonlySet<SubTaskStatus> = new Set<SubTaskStatus>([
  SubTaskStatus.FAILED,
  SubTaskStatus.ESCALATED,
]);

/**
 * 終端状態かチェック
 */
export function isTerminalStatus(status: SubTaskStatus): boolean {
  return TERMINAL_STATUSES.has(status);
}

/**
 * 記述子からサブタスクを生成
 */
export function createSubTask(descriptor: SubTaskDescriptor, now: Date = new Date()): SubTask {
  return {
    id: descriptor.id ?? uuidv4(),
    name: descriptor.name,
    description: descriptor.description ?? descriptor.name,
    capability: descriptor.capability,
    params: { ...(descriptor.params ?? {}) },
    depends_on: [...(descriptor.depends_on ?? [])],
    status: SubTaskStatus.PENDING,
    priority: descriptor.priority ?? ExecutionPriority.NORMAL,
    config: { ...DEFAULT_SUBTASK_CONFIG, ...descriptor.config },
    result: null,
    error: null,
    error_code: null,
    retry_count: 0,
    alternative_capability: null,
    created_at: now,
    started_at: null,
    completed_at: null,
  };
}

/**
 * IDでサブタスクを検索
 */
export function findSubTask(plan: ExecutionPlan, subtaskId: string): SubTask | undefined {
  return plan.subtasks.find((st) => st.id === subtaskId);
}

/**
 * 実行可能なサブタスクを計画順で取得
 *
 * pending かつ全依存先が completed / skipped
 */
export function getReadySubTasks(plan: ExecutionPlan): SubTask[] {
  const statusById = new Map(plan.subtasks.map((st) => [st.id, st.status]));

  return plan.subtasks.filter((st) => {
    if (st.status !== SubTaskStatus.PENDING) {
      return false;
    }
    return st.depends_on.every((depId) => {
      const depStatus = statusById.get(depId);
      return depStatus !== undefined && SATISFYING_STATUSES.has(depStatus);
    });
  });
}

/**
 * 失敗・エスカレーション済みの依存先によって（推移的に）ブロックされた pending サブタスク
 */
export function getBlockedSubTasks(plan: ExecutionPlan): SubTask[] {
  const blocked = new Set(
    plan.subtasks.filter((st) => BLOCKING_STATUSES.has(st.status)).map((st) => st.id)
  );
  const result = new Set<string>();

  let changed = true;
  while (changed) {
    changed = false;
    for (const st of plan.subtasks) {
      if (st.status !== SubTaskStatus.PENDING || result.has(st.id)) {
        continue;
      }
      if (st.depends_on.some((depId) => blocked.has(depId))) {
        blocked.add(st.id);
        result.add(st.id);
        changed = true;
      }
    }
  }

  return plan.subtasks.filter((st) => result.has(st.id));
}

/**
 * 状態別件数
 */
export function countSubTasksByStatus(plan: ExecutionPlan): Record<SubTaskStatus, number> {
  const counts: Record<SubTaskStatus, number> = {
    pending: 0,
    in_progress: 0,
    completed: 0,
    failed: 0,
    skipped: 0,
    escalated: 0,
  };
  for (const st of plan.subtasks) {
    counts[st.status] += 1;
  }
  return counts;
}

/**
 * 進捗率（終端サブタスク / 全体、0.0 - 1.0）
 */
export function getPlanProgress(plan: ExecutionPlan): number {
  if (plan.subtasks.length === 0) {
    return 0;
  }
  const terminal = plan.subtasks.filter((st) => isTerminalStatus(st.status)).length;
  return terminal / plan.subtasks.length;
}

/**
 * 全サブタスクが終端状態か
 */
export function isPlanComplete(plan: ExecutionPlan): boolean {
  return plan.subtasks.every((st) => isTerminalStatus(st.status));
}
