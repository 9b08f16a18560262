import {
  PlanStatus,
  createSubTask,
  type EscalationNotifier,
  type ExecutionPlan,
  type SubTask,
  type SubTaskConfig,
  type WorkflowLogger,
} from '@taskflow/workflow-spec';

/**
 * テスト用ヘルパー
 */

export const silentLogger: WorkflowLogger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

/**
 * 送信内容を記録する通知先
 */
export class InMemoryNotifier implements EscalationNotifier {
  readonly sent: Array<{ target: string; message: string }> = [];
  failWith: Error | null = null;

  async send(target: string, message: string): Promise<string> {
    if (this.failWith) {
      throw this.failWith;
    }
    this.sent.push({ target, message });
    return `delivery-${this.sent.length}`;
  }
}

export function buildSubTask(
  id: string,
  capability: string,
  dependsOn: string[] = [],
  config: Partial<SubTaskConfig> = {}
): SubTask {
  return createSubTask({
    id,
    name: id,
    capability,
    depends_on: dependsOn,
    config,
  });
}

export function buildPlan(subtasks: SubTask[], overrides: Partial<ExecutionPlan> = {}): ExecutionPlan {
  return {
    id: 'plan-1',
    name: 'テスト計画',
    description: 'テスト',
    original_request: 'テストリクエスト',
    subtasks,
    parallel_execution: false,
    continue_on_failure: false,
    status: PlanStatus.PENDING,
    quality_checks_enabled: false,
    required_quality_score: 0.8,
    context: { tenant_id: 'tenant-1', room_id: 'room-1' },
    created_at: new Date(),
    started_at: null,
    completed_at: null,
    ...overrides,
  };
}
