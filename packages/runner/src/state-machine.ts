import {
  SubTaskStatus,
  PlanStatus,
  isTerminalStatus,
  type SubTask,
  type ExecutionPlan,
} from '@taskflow/workflow-spec';
import { InvalidStateTransitionError } from './errors';

/**
 * サブタスクの許可される状態遷移
 */
const SUBTASK_TRANSITIONS: Record<SubTaskStatus, SubTaskStatus[]> = {
  pending: ['in_progress'],
  in_progress: ['completed', 'failed', 'skipped', 'escalated'],
  completed: [],
  failed: [],
  skipped: [],
  escalated: [],
};

/**
 * 計画の許可される状態遷移
 */
const PLAN_TRANSITIONS: Record<PlanStatus, PlanStatus[]> = {
  pending: ['in_progress', 'failed'],
  in_progress: ['completed', 'failed'],
  completed: [],
  failed: [],
};

/**
 * サブタスクの状態遷移が許可されているかチェック
 */
export function isSubTaskTransitionAllowed(from: SubTaskStatus, to: SubTaskStatus): boolean {
  return SUBTASK_TRANSITIONS[from]?.includes(to) ?? false;
}

/**
 * 計画の状態遷移が許可されているかチェック
 */
export function isPlanTransitionAllowed(from: PlanStatus, to: PlanStatus): boolean {
  return PLAN_TRANSITIONS[from]?.includes(to) ?? false;
}

/**
 * サブタスクの状態遷移（タイムスタンプも更新）
 */
export function transitionSubTask(subtask: SubTask, to: SubTaskStatus, now: Date = new Date()): void {
  if (!isSubTaskTransitionAllowed(subtask.status, to)) {
    throw new InvalidStateTransitionError(subtask.status, to);
  }

  subtask.status = to;
  if (to === SubTaskStatus.IN_PROGRESS) {
    subtask.started_at = now;
  } else if (isTerminalStatus(to)) {
    subtask.completed_at = now;
  }
}

/**
 * 計画の状態遷移（タイムスタンプも更新）
 */
export function transitionPlan(plan: ExecutionPlan, to: PlanStatus, now: Date = new Date()): void {
  if (!isPlanTransitionAllowed(plan.status, to)) {
    throw new InvalidStateTransitionError(plan.status, to);
  }

  plan.status = to;
  if (to === PlanStatus.IN_PROGRESS) {
    plan.started_at = now;
  } else if (to === PlanStatus.COMPLETED || to === PlanStatus.FAILED) {
    plan.completed_at = now;
  }
}

/**
 * 計画が終端状態か
 */
export function isPlanTerminal(plan: ExecutionPlan): boolean {
  return plan.status === PlanStatus.COMPLETED || plan.status === PlanStatus.FAILED;
}
