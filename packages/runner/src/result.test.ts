import { describe, it, expect } from 'vitest';
import { PlanStatus, SubTaskStatus } from '@taskflow/workflow-spec';
import { buildExecutionResult, buildFailureResult } from './result';
import { buildPlan, buildSubTask } from './test-utils';

const timing = { startedAt: new Date(0), completedAt: new Date(1500) };

function planWith(statuses: SubTaskStatus[], planStatus: PlanStatus, request = 'テストリクエスト') {
  const subtasks = statuses.map((status, i) => {
    const st = buildSubTask(String.fromCharCode(97 + i), 'noop');
    st.status = status;
    return st;
  });
  return buildPlan(subtasks, { status: planStatus, original_request: request });
}

describe('buildExecutionResult', () => {
  it('should list completed and failed subtasks for a failed plan', () => {
    const plan = planWith([SubTaskStatus.COMPLETED, SubTaskStatus.FAILED], PlanStatus.FAILED);
    plan.subtasks[1].retry_count = 2;

    const result = buildExecutionResult(plan, { qualityReport: null, escalations: [], waves: [['a', 'b']], ...timing });

    expect(result.success).toBe(false);
    expect(result.requires_human_decision).toBe(false);
    expect(result.message).toBe('「テストリクエスト」の一部が失敗しました\n\n完了: a\n失敗: b');
    expect(result.suggestions).toEqual(['失敗したタスクをリトライしますか？', '他にやることはありますか？']);
    expect(result.total_execution_time_ms).toBe(1500);
    expect(result.retry_count).toBe(2);
    expect(Object.isFrozen(result.suggestions)).toBe(true);
  });

  it('should ask for a decision when a subtask is escalated', () => {
    const plan = planWith([SubTaskStatus.COMPLETED, SubTaskStatus.ESCALATED], PlanStatus.IN_PROGRESS);

    const result = buildExecutionResult(plan, { qualityReport: null, escalations: [], waves: [['a', 'b']], ...timing });

    expect(result.requires_human_decision).toBe(true);
    expect(result.message).toBe('「テストリクエスト」は確認待ちです\n\n完了: a\n確認待ち: b');
    expect(result.escalated_subtasks).toEqual(['b']);
    expect(result.suggestions).toEqual(['確認事項に回答すると続きを進められます']);
  });

  it('should truncate long requests in the message', () => {
    const request = 'あ'.repeat(35);
    const plan = planWith([SubTaskStatus.COMPLETED], PlanStatus.COMPLETED, request);

    const result = buildExecutionResult(plan, { qualityReport: null, escalations: [], waves: [['a']], ...timing });

    expect(result.message).toBe(`「${'あ'.repeat(30)}...」を完了しました\n\n完了したタスク:\n✅ a`);
  });
});

describe('buildFailureResult', () => {
  it('should build a generic failure without a plan', () => {
    const result = buildFailureResult({
      plan: null,
      planName: '複合タスク実行',
      request: 'テストリクエスト',
      errorCode: 'CYCLIC_DEPENDENCY',
      escalations: [],
      suggestions: [],
      ...timing,
    });

    expect(result).toMatchObject({
      plan_id: null,
      plan_name: '複合タスク実行',
      success: false,
      requires_human_decision: false,
      message: '「テストリクエスト」の処理中にエラーが発生しました',
      completed_subtasks: [],
      execution_waves: [],
      error_code: 'CYCLIC_DEPENDENCY',
      total_execution_time_ms: 1500,
    });
  });
});
