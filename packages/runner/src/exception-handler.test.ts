import { describe, it, expect, vi, beforeEach } from 'vitest';
import { z } from 'zod';
import { EscalationSeverity, RecoveryStrategy } from '@taskflow/workflow-spec';
import { ExceptionHandler, classifyError } from './exception-handler';
import { EscalationManager } from './escalation-manager';
import { CapabilityTimeoutError, DeadlockError, ParamValidationError } from './errors';
import { InMemoryNotifier, buildPlan, silentLogger } from './test-utils';

class HttpError extends Error {
  constructor(
    message: string,
    public readonly status: number
  ) {
    super(message);
    this.name = 'HttpStatusError';
  }
}

function errorWithCode(code: string): Error {
  return Object.assign(new Error(`failed with ${code}`), { code });
}

function zodError(): unknown {
  const parsed = z.object({ id: z.string() }).safeParse({});
  return parsed.success ? null : parsed.error;
}

describe('classifyError', () => {
  it('should treat workflow configuration errors as configuration', () => {
    expect(classifyError(new DeadlockError(['a']))).toBe('configuration');
  });

  it('should detect transient errors by name, code and status', () => {
    expect(classifyError(new CapabilityTimeoutError(5))).toBe('transient');
    expect(classifyError(errorWithCode('ECONNRESET'))).toBe('transient');
    expect(classifyError(new HttpError('busy', 429))).toBe('transient');
    expect(classifyError(new HttpError('down', 503))).toBe('transient');
  });

  it('should detect permission errors', () => {
    expect(classifyError(new HttpError('nope', 403))).toBe('permission');
    expect(classifyError(errorWithCode('EACCES'))).toBe('permission');
  });

  it('should detect data errors', () => {
    expect(classifyError(new ParamValidationError([]))).toBe('data');
    expect(classifyError(zodError())).toBe('data');
    expect(classifyError(new HttpError('missing', 404))).toBe('data');
  });

  it('should fall back to unknown', () => {
    expect(classifyError(new Error('???'))).toBe('unknown');
    expect(classifyError('plain string')).toBe('unknown');
  });
});

describe('ExceptionHandler', () => {
  let notifier: InMemoryNotifier;
  let escalations: EscalationManager;
  const plan = buildPlan([]);

  beforeEach(() => {
    notifier = new InMemoryNotifier();
    escalations = new EscalationManager({ notifier, logger: silentLogger });
  });

  it('should abort on configuration errors', async () => {
    const handler = new ExceptionHandler({ escalations, logger: silentLogger });

    const result = await handler.handle(new DeadlockError(['a']), plan);

    expect(result.strategy).toBe(RecoveryStrategy.ABORT);
    expect(result.success).toBe(false);
    expect(notifier.sent).toHaveLength(0);
  });

  it('should back off exponentially and escalate after the retry limit', async () => {
    const sleep = vi.fn(async () => undefined);
    const handler = new ExceptionHandler({
      escalations,
      backoff: { baseDelayMs: 100, maxDelayMs: 250, maxRetries: 3 },
      sleep,
      logger: silentLogger,
    });
    const error = new CapabilityTimeoutError(1);

    const delays: Array<number | undefined> = [];
    for (let i = 0; i < 3; i++) {
      const result = await handler.handle(error, plan);
      expect(result.strategy).toBe(RecoveryStrategy.RETRY);
      delays.push(result.retry_after_ms);
    }
    expect(delays).toEqual([100, 200, 250]);
    expect(sleep).toHaveBeenCalledTimes(3);

    const exhausted = await handler.handle(error, plan);
    expect(exhausted.strategy).toBe(RecoveryStrategy.ESCALATE);
    expect(exhausted.escalation?.severity).toBe(EscalationSeverity.DECISION);
    expect(exhausted.escalation?.title).toBe('リトライ上限に達しました');

    handler.resetPlan(plan.id);
    expect((await handler.handle(error, plan)).retry_after_ms).toBe(100);
  });

  it('should escalate permission errors for a decision', async () => {
    const handler = new ExceptionHandler({ escalations, logger: silentLogger });

    const result = await handler.handle(new HttpError('forbidden', 401), plan);

    expect(result.strategy).toBe(RecoveryStrategy.ESCALATE);
    expect(result.escalation?.severity).toBe(EscalationSeverity.DECISION);
    expect(notifier.sent).toHaveLength(1);
  });

  it('should offer a registered alternative for data errors', async () => {
    const handler = new ExceptionHandler({
      escalations,
      alternatives: { ValidationError: ['入力内容を確認して再送信'] },
      logger: silentLogger,
    });

    const result = await handler.handle(new ParamValidationError([]), plan);

    expect(result).toEqual({
      strategy: RecoveryStrategy.ALTERNATIVE,
      success: true,
      message: '代替手段があります',
      error_category: 'data',
      alternatives: ['入力内容を確認して再送信'],
    });
  });

  it('should ask for confirmation on data errors without an alternative', async () => {
    const handler = new ExceptionHandler({ escalations, logger: silentLogger });

    const result = await handler.handle(new HttpError('conflict', 409), plan);

    expect(result.escalation?.severity).toBe(EscalationSeverity.CONFIRMATION);
  });

  it('should escalate unknown errors as urgent', async () => {
    const handler = new ExceptionHandler({ escalations, logger: silentLogger });

    const result = await handler.handle(new Error('mystery'), plan);

    expect(result.error_category).toBe('unknown');
    expect(result.escalation?.severity).toBe(EscalationSeverity.URGENT);
    expect(notifier.sent[0].message.split('\n')[0]).toBe('🚨 予期しないエラーが発生しました');
  });
});
