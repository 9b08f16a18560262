import { describe, it, expect } from 'vitest';
import type { EscalationNotifier, LLMClient } from '@taskflow/workflow-spec';
import { processEscalationResponse, processWorkflowRequest } from './handlers';
import { createWorkflowRuntime } from './runtime';

const silentLogger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

const notifier: EscalationNotifier = {
  async send() {
    return 'delivery-1';
  },
};

const fakeLLM: LLMClient = {
  async chat() {
    return { content: '晴れです', tokens_used: { input: 1, output: 1 }, model: 'test-model' };
  },
};

function runtime(enabled: boolean) {
  return createWorkflowRuntime({
    env: { WORKFLOW_ORCHESTRATION_ENABLED: enabled ? 'true' : 'false' },
    llm: fakeLLM,
    notifier,
    logger: silentLogger,
  });
}

describe('processWorkflowRequest', () => {
  it('should run the request and return a serializable summary', async () => {
    const outcome = await processWorkflowRequest(runtime(true), {
      request: '天気を教えて',
      context: { tenant_id: 'tenant-1', room_id: 'room-1' },
      request_id: 'req-1',
    });

    expect(outcome.status).toBe('completed');
    if (outcome.status !== 'completed') return;
    expect(outcome.summary).toMatchObject({
      plan_id: null,
      plan_name: 'リクエスト処理',
      success: true,
      requires_human_decision: false,
      message: '晴れです',
      error_code: null,
      completed_subtasks: ['リクエスト処理'],
      failed_subtasks: [],
      escalation_ids: [],
      quality_score: null,
    });
  });

  it('should skip when orchestration is disabled', async () => {
    const outcome = await processWorkflowRequest(runtime(false), {
      request: '天気を教えて',
      context: { tenant_id: 'tenant-1' },
    });

    expect(outcome).toEqual({
      status: 'skipped',
      error_code: 'DISABLED',
      reason: 'Workflow orchestration is disabled',
    });
  });

  it('should reject an invalid payload', async () => {
    const outcome = await processWorkflowRequest(runtime(true), { context: { tenant_id: 'tenant-1' } });

    expect(outcome).toEqual({ status: 'rejected', error_code: 'VALIDATION_ERROR', reason: 'request: Required' });
  });
});

describe('processEscalationResponse', () => {
  it('should ignore a response for an unknown escalation', () => {
    const outcome = processEscalationResponse(runtime(true), {
      escalation_id: 'missing',
      option_id: 'retry',
      tenant_id: 'tenant-1',
    });

    expect(outcome).toEqual({ status: 'ignored', escalation_id: 'missing' });
  });

  it('should reject a payload without an option', () => {
    const outcome = processEscalationResponse(runtime(true), { escalation_id: 'esc-1', tenant_id: 'tenant-1' });

    expect(outcome).toEqual({ status: 'rejected', error_code: 'VALIDATION_ERROR', reason: 'option_id: Required' });
  });
});
