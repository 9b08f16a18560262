import {
  SubTaskStatus,
  countSubTasksByStatus,
  getPlanProgress,
  type ExecutionPlan,
  type ProgressReport,
  type SubTask,
} from '@taskflow/workflow-spec';

function startedAtMs(subtask: SubTask): number {
  return subtask.started_at?.getTime() ?? 0;
}

export interface ProgressTrackerOptions {
  /** 前回通知からの進捗差（%） */
  thresholdPercent?: number;

  /** 前回通知から動きがないとみなす秒数 */
  staleSeconds?: number;

  now?: () => Date;
}

interface TrackingState {
  lastPercentage: number;
  lastNoticeAt: Date;
  completionNotified: boolean;
}

/**
 * 進捗追跡
 *
 * 通知すべきタイミングでのみレポートを返す
 */
export class ProgressTracker {
  private readonly thresholdPercent: number;
  private readonly staleMs: number;
  private readonly now: () => Date;
  private readonly states = new Map<string, TrackingState>();

  constructor(options: ProgressTrackerOptions = {}) {
    this.thresholdPercent = options.thresholdPercent ?? 25;
    this.staleMs = (options.staleSeconds ?? 60) * 1000;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * 進捗を更新し、通知が必要ならレポートを返す
   */
  update(plan: ExecutionPlan): ProgressReport | null {
    const now = this.now();
    const report = this.createReport(plan, now);

    let state = this.states.get(plan.id);
    if (!state) {
      state = { lastPercentage: 0, lastNoticeAt: now, completionNotified: false };
      this.states.set(plan.id, state);
    }

    const reachedThreshold = report.percentage - state.lastPercentage >= this.thresholdPercent;
    const stale = report.percentage < 100 && now.getTime() - state.lastNoticeAt.getTime() >= this.staleMs;
    const firstCompletion = report.percentage >= 100 && !state.completionNotified;
    const hasFailures = report.counts.failed > 0;

    if (!(reachedThreshold || stale || firstCompletion || hasFailures)) {
      return null;
    }

    state.lastPercentage = report.percentage;
    state.lastNoticeAt = now;
    if (report.percentage >= 100) {
      state.completionNotified = true;
    }
    return report;
  }

  /**
   * 追跡状態をリセット
   */
  reset(planId: string): void {
    this.states.delete(planId);
  }

  private createReport(plan: ExecutionPlan, now: Date): ProgressReport {
    const counts = countSubTasksByStatus(plan);

    // 最後に開始した実行中タスク
    let running: SubTask | null = null;
    for (const st of plan.subtasks) {
      if (st.status !== SubTaskStatus.IN_PROGRESS) {
        continue;
      }
      if (!running || startedAtMs(st) > startedAtMs(running)) {
        running = st;
      }
    }
    const currentActivity = running ? `「${running.name}」を実行中` : '処理中...';

    const issues: string[] = [];
    if (counts.failed > 0) {
      issues.push(`${counts.failed}個のタスクが失敗`);
    }
    if (counts.escalated > 0) {
      issues.push(`${counts.escalated}個のタスクが判断待ち`);
    }

    return {
      plan_id: plan.id,
      plan_name: plan.name,
      total: plan.subtasks.length,
      counts,
      percentage: Math.floor(getPlanProgress(plan) * 100),
      current_activity: currentActivity,
      issues,
      generated_at: now,
    };
  }
}
