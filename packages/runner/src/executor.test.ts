import { describe, it, expect, vi } from 'vitest';
import { z } from 'zod';
import {
  EscalationSeverity,
  PlanStatus,
  RecoveryStrategy,
  SubTaskStatus,
  type CapabilityHandler,
  type ExecutionPlan,
  type ProgressReport,
} from '@taskflow/workflow-spec';
import { CapabilityRegistry } from '@taskflow/capabilities';
import { WorkflowExecutor, type WorkflowExecutorDependencies } from './executor';
import { EscalationManager } from './escalation-manager';
import { ExceptionHandler } from './exception-handler';
import { ExecutionPlanner } from './planner';
import { ProgressTracker } from './progress-tracker';
import { QualityChecker } from './quality-checker';
import { InMemoryNotifier, buildPlan, buildSubTask, silentLogger } from './test-utils';

const ok: CapabilityHandler = async () => ({ success: true, data: { done: true } });
const failing: CapabilityHandler = async () => ({ success: false, error: 'rejected' });

function setup(
  handlers: Record<string, CapabilityHandler>,
  extra: Partial<WorkflowExecutorDependencies> = {},
  schemas: Record<string, z.ZodTypeAny> = {}
) {
  const registry = new CapabilityRegistry();
  for (const [name, handler] of Object.entries(handlers)) {
    registry.register({ name, description: name }, handler, schemas[name]);
  }
  const notifier = new InMemoryNotifier();
  const escalations = new EscalationManager({ notifier, logger: silentLogger });
  const executor = new WorkflowExecutor({ registry, escalations, logger: silentLogger, ...extra });
  return { executor, notifier, escalations };
}

const planner = new ExecutionPlanner({ logger: silentLogger, qualityChecksEnabled: false });
const context = { tenant_id: 'tenant-1', room_id: 'room-1' };

function statusOf(plan: ExecutionPlan, id: string) {
  return plan.subtasks.find((st) => st.id === id)?.status;
}

describe('WorkflowExecutor', () => {
  describe('diamond workflow', () => {
    it('should run independent subtasks of a wave concurrently', async () => {
      let active = 0;
      let maxActive = 0;
      const tracked: CapabilityHandler = async () => {
        active += 1;
        maxActive = Math.max(maxActive, active);
        await new Promise((resolve) => setTimeout(resolve, 10));
        active -= 1;
        return { success: true };
      };
      const { executor } = setup({ single: ok, tracked });

      const plan = planner.createPlan(
        [
          buildSubTask('S1', 'single'),
          buildSubTask('S2', 'tracked', ['S1']),
          buildSubTask('S3', 'tracked', ['S1']),
          buildSubTask('S4', 'single', ['S2', 'S3']),
        ],
        'ダイヤモンド型の依頼',
        context
      );

      const result = await executor.execute(plan);

      expect(result.execution_waves).toEqual([['S1'], ['S2', 'S3'], ['S4']]);
      expect(maxActive).toBe(2);
      expect(result.success).toBe(true);
      expect(result.completed_subtasks).toEqual(['S1', 'S2', 'S3', 'S4']);
      expect(plan.status).toBe(PlanStatus.COMPLETED);
      expect(Object.isFrozen(result)).toBe(true);
    });

    it('should run a wave sequentially when parallel execution is off', async () => {
      let active = 0;
      let maxActive = 0;
      const tracked: CapabilityHandler = async () => {
        active += 1;
        maxActive = Math.max(maxActive, active);
        await new Promise((resolve) => setTimeout(resolve, 5));
        active -= 1;
        return { success: true };
      };
      const { executor } = setup({ tracked });

      const plan = planner.createPlan(
        [
          buildSubTask('S1', 'tracked'),
          buildSubTask('S2', 'tracked', ['S1']),
          buildSubTask('S3', 'tracked', ['S1']),
        ],
        '順番に実行',
        context,
        { parallel_execution: false }
      );

      await executor.execute(plan);

      expect(maxActive).toBe(1);
    });

    it('should forward progress reports after each wave', async () => {
      const reports: ProgressReport[] = [];
      const { executor } = setup(
        { single: ok },
        {
          progressTracker: new ProgressTracker({ thresholdPercent: 25 }),
          onProgress: (report) => {
            reports.push(report);
          },
        }
      );

      const plan = planner.createPlan(
        [
          buildSubTask('S1', 'single'),
          buildSubTask('S2', 'single', ['S1']),
          buildSubTask('S3', 'single', ['S1']),
          buildSubTask('S4', 'single', ['S2', 'S3']),
        ],
        '進捗つき',
        context
      );

      await executor.execute(plan);

      expect(reports.map((report) => report.percentage)).toEqual([25, 75, 100]);
    });
  });

  describe('escalate and block', () => {
    it('should escalate once and leave dependents pending', async () => {
      const s2 = vi.fn(failing);
      const { executor, notifier } = setup({ single: ok, broken: s2 });

      const plan = planner.createPlan(
        [
          buildSubTask('S1', 'single'),
          buildSubTask('S2', 'broken', ['S1'], { max_retries: 2, recovery_strategy: RecoveryStrategy.ESCALATE }),
          buildSubTask('S3', 'single', ['S2']),
        ],
        '会議室を予約して招待を送って',
        context
      );

      const result = await executor.execute(plan);

      expect(s2).toHaveBeenCalledTimes(2);
      expect(statusOf(plan, 'S1')).toBe(SubTaskStatus.COMPLETED);
      expect(statusOf(plan, 'S2')).toBe(SubTaskStatus.ESCALATED);
      expect(statusOf(plan, 'S3')).toBe(SubTaskStatus.PENDING);
      expect(plan.status).toBe(PlanStatus.IN_PROGRESS);

      expect(result.success).toBe(false);
      expect(result.requires_human_decision).toBe(true);
      expect(result.escalated_subtasks).toEqual(['S2']);
      expect(result.escalations).toHaveLength(1);
      expect(result.escalations[0].severity).toBe(EscalationSeverity.DECISION);
      expect(result.escalations[0].subtask_id).toBe('S2');
      expect(notifier.sent).toHaveLength(1);
      expect(result.message.split('\n')[0]).toBe('「会議室を予約して招待を送って」は確認待ちです');
    });
  });

  describe('timeouts', () => {
    it('should retry a hanging capability up to max_retries and then fail', async () => {
      const hanging = vi.fn(() => new Promise<never>(() => undefined));
      const { executor, notifier } = setup({ hanging });

      const plan = planner.createPlan(
        [buildSubTask('S1', 'hanging', [], { max_retries: 2, timeout_seconds: 0.02 })],
        'タイムアウトする依頼',
        context,
        { quality_checks_enabled: false }
      );

      const result = await executor.execute(plan);

      expect(hanging).toHaveBeenCalledTimes(2);
      expect(plan.subtasks[0].status).toBe(SubTaskStatus.FAILED);
      expect(plan.subtasks[0].error_code).toBe('TIMEOUT');
      expect(plan.subtasks[0].retry_count).toBe(2);
      expect(plan.status).toBe(PlanStatus.FAILED);
      expect(result.retry_count).toBe(2);
      expect(result.escalations).toEqual([]);
      expect(result.suggestions).toEqual(['失敗したタスクをリトライしますか？']);
      expect(notifier.sent).toHaveLength(0);
    });
  });

  describe('per-subtask failures', () => {
    it('should fail a subtask whose capability is missing without consulting the strategy', async () => {
      const { executor, notifier } = setup({});
      const plan = buildPlan([
        buildSubTask('S1', 'not_registered', [], { recovery_strategy: RecoveryStrategy.ESCALATE }),
      ]);

      const result = await executor.execute(plan);

      expect(plan.subtasks[0].status).toBe(SubTaskStatus.FAILED);
      expect(plan.subtasks[0].error_code).toBe('CAPABILITY_NOT_FOUND');
      expect(plan.subtasks[0].retry_count).toBe(0);
      expect(result.escalations).toEqual([]);
      expect(notifier.sent).toHaveLength(0);
    });

    it('should not retry params rejected by the schema', async () => {
      const handler = vi.fn(ok);
      const { executor } = setup(
        { reserve: handler },
        {},
        { reserve: z.object({ room_name: z.string() }) }
      );
      const plan = buildPlan([
        buildSubTask('S1', 'reserve', [], { recovery_strategy: RecoveryStrategy.ESCALATE }),
      ]);

      const result = await executor.execute(plan);

      expect(handler).not.toHaveBeenCalled();
      expect(plan.subtasks[0].status).toBe(SubTaskStatus.ESCALATED);
      expect(plan.subtasks[0].error_code).toBe('VALIDATION_ERROR');
      expect(result.escalations).toHaveLength(1);
    });

    it('should invoke a logically failing capability exactly max_retries times', async () => {
      const handler = vi.fn(failing);
      const { executor } = setup({ broken: handler });
      const plan = buildPlan([buildSubTask('S1', 'broken', [], { max_retries: 3 })]);

      const result = await executor.execute(plan);

      expect(handler).toHaveBeenCalledTimes(3);
      expect(plan.subtasks[0].status).toBe(SubTaskStatus.FAILED);
      expect(plan.subtasks[0].error_code).toBe('CAPABILITY_FAILED');
      expect(plan.status).toBe(PlanStatus.FAILED);
      expect(result.failed_subtasks).toEqual(['S1']);
      expect(result.escalations).toEqual([]);
    });

    it('should skip an optional subtask and keep going', async () => {
      const { executor } = setup({ single: ok, broken: failing });
      const plan = buildPlan([
        buildSubTask('S1', 'broken', [], { is_optional: true, max_retries: 1, recovery_strategy: RecoveryStrategy.SKIP }),
        buildSubTask('S2', 'single', ['S1']),
      ]);

      const result = await executor.execute(plan);

      expect(result.skipped_subtasks).toEqual(['S1']);
      expect(result.completed_subtasks).toEqual(['S2']);
      expect(plan.status).toBe(PlanStatus.COMPLETED);
    });

    it('should fail a required subtask configured to skip', async () => {
      const { executor } = setup({ broken: failing });
      const plan = buildPlan([
        buildSubTask('S1', 'broken', [], { max_retries: 1, recovery_strategy: RecoveryStrategy.SKIP }),
      ]);

      await executor.execute(plan);

      expect(plan.subtasks[0].status).toBe(SubTaskStatus.FAILED);
    });

    it('should stop the remaining subtasks on abort', async () => {
      const later = vi.fn(ok);
      const { executor } = setup({ broken: failing, later });
      const plan = buildPlan([
        buildSubTask('S1', 'broken', [], { max_retries: 1, recovery_strategy: RecoveryStrategy.ABORT }),
        buildSubTask('S2', 'later'),
      ]);

      const result = await executor.execute(plan);

      expect(later).not.toHaveBeenCalled();
      expect(statusOf(plan, 'S2')).toBe(SubTaskStatus.PENDING);
      expect(plan.status).toBe(PlanStatus.FAILED);
      expect(result.success).toBe(false);
      expect(result.execution_waves).toEqual([['S1']]);
    });

    it('should let in-flight members of a parallel wave finish on abort', async () => {
      const slow: CapabilityHandler = async () => {
        await new Promise((resolve) => setTimeout(resolve, 10));
        return { success: true };
      };
      const later = vi.fn(ok);
      const { executor } = setup({ broken: failing, slow, later });
      const plan = buildPlan(
        [
          buildSubTask('S1', 'broken', [], { max_retries: 1, recovery_strategy: RecoveryStrategy.ABORT }),
          buildSubTask('S2', 'slow'),
          buildSubTask('S3', 'later', ['S2']),
        ],
        { parallel_execution: true }
      );

      const result = await executor.execute(plan);

      expect(statusOf(plan, 'S1')).toBe(SubTaskStatus.FAILED);
      expect(statusOf(plan, 'S2')).toBe(SubTaskStatus.COMPLETED);
      expect(statusOf(plan, 'S3')).toBe(SubTaskStatus.PENDING);
      expect(later).not.toHaveBeenCalled();
      expect(result.execution_waves).toEqual([['S1', 'S2']]);
      expect(plan.status).toBe(PlanStatus.FAILED);
    });

    it('should complete with the first working alternative', async () => {
      const { executor } = setup(
        { primary: failing, backup: ok, broken_backup: failing },
        { alternatives: { primary: ['unregistered', 'broken_backup', 'backup'] } }
      );
      const plan = buildPlan([
        buildSubTask('S1', 'primary', [], { max_retries: 1, recovery_strategy: RecoveryStrategy.ALTERNATIVE }),
      ]);

      const result = await executor.execute(plan);

      expect(plan.subtasks[0].status).toBe(SubTaskStatus.COMPLETED);
      expect(plan.subtasks[0].alternative_capability).toBe('backup');
      expect(plan.subtasks[0].retry_count).toBe(2);
      expect(result.success).toBe(true);
    });

    it('should escalate when no alternative works', async () => {
      const { executor } = setup({ primary: failing });
      const plan = buildPlan([
        buildSubTask('S1', 'primary', [], { max_retries: 1, recovery_strategy: RecoveryStrategy.ALTERNATIVE }),
      ]);

      const result = await executor.execute(plan);

      expect(plan.subtasks[0].status).toBe(SubTaskStatus.ESCALATED);
      expect(result.requires_human_decision).toBe(true);
    });

    it('should treat a thrown handler error as a failed attempt', async () => {
      const flaky = vi
        .fn<Parameters<CapabilityHandler>, ReturnType<CapabilityHandler>>()
        .mockRejectedValueOnce(new Error('socket closed'))
        .mockResolvedValueOnce({ success: true, data: { id: 'r-1' } });
      const { executor } = setup({ flaky });
      const plan = buildPlan([buildSubTask('S1', 'flaky')]);

      const result = await executor.execute(plan);

      expect(plan.subtasks[0].result).toEqual({ id: 'r-1' });
      expect(plan.subtasks[0].retry_count).toBe(1);
      expect(result.retry_count).toBe(1);
    });
  });

  describe('continue_on_failure', () => {
    it('should stop after the failing wave by default', async () => {
      const { executor } = setup({ single: ok, broken: failing });
      const plan = buildPlan([
        buildSubTask('S1', 'broken', [], { max_retries: 1 }),
        buildSubTask('S2', 'single'),
        buildSubTask('S3', 'single', ['S2']),
      ]);

      await executor.execute(plan);

      expect(statusOf(plan, 'S2')).toBe(SubTaskStatus.COMPLETED);
      expect(statusOf(plan, 'S3')).toBe(SubTaskStatus.PENDING);
      expect(plan.status).toBe(PlanStatus.FAILED);
    });

    it('should run unaffected branches and fail when only failures block', async () => {
      const { executor } = setup({ single: ok, broken: failing });
      const plan = buildPlan(
        [
          buildSubTask('S1', 'broken', [], { max_retries: 1 }),
          buildSubTask('S2', 'single'),
          buildSubTask('S3', 'single', ['S2']),
          buildSubTask('S4', 'single', ['S1']),
        ],
        { continue_on_failure: true }
      );

      const result = await executor.execute(plan);

      expect(statusOf(plan, 'S3')).toBe(SubTaskStatus.COMPLETED);
      expect(statusOf(plan, 'S4')).toBe(SubTaskStatus.PENDING);
      expect(plan.status).toBe(PlanStatus.FAILED);
      expect(result.failed_subtasks).toEqual(['S1']);
      expect(result.requires_human_decision).toBe(false);
    });
  });

  describe('quality phase', () => {
    it('should raise one quality escalation on a failing verdict', async () => {
      const { executor, notifier } = setup(
        { single: ok, broken: failing },
        { qualityChecker: new QualityChecker() }
      );
      const plan = buildPlan([buildSubTask('S1', 'broken', [], { max_retries: 1 }), buildSubTask('S2', 'single')], {
        continue_on_failure: true,
        quality_checks_enabled: true,
      });

      const result = await executor.execute(plan);

      expect(result.quality_report?.verdict).toBe('fail');
      expect(result.escalations.map((e) => e.kind)).toEqual(['quality']);
      expect(result.requires_human_decision).toBe(true);
      expect(plan.status).toBe(PlanStatus.IN_PROGRESS);
      expect(notifier.sent).toHaveLength(1);
    });

    it('should report the score of a passing plan', async () => {
      const { executor } = setup({ single: ok }, { qualityChecker: new QualityChecker() });
      const plan = buildPlan([buildSubTask('S1', 'single')], { quality_checks_enabled: true });

      const result = await executor.execute(plan);

      expect(result.quality_score).toBe(1);
      expect(result.escalations).toEqual([]);
      expect(result.success).toBe(true);
    });
  });

  describe('fatal errors', () => {
    it('should turn a deadlock into a failed result', async () => {
      const { notifier, escalations } = setup({});
      const executor = new WorkflowExecutor({
        registry: new CapabilityRegistry(),
        escalations,
        exceptionHandler: new ExceptionHandler({ escalations, logger: silentLogger }),
        logger: silentLogger,
      });
      const plan = buildPlan([buildSubTask('S1', 'single', ['ghost'])]);

      const result = await executor.execute(plan);

      expect(result.success).toBe(false);
      expect(result.error_code).toBe('DEADLOCK');
      expect(result.message).toBe('「テストリクエスト」の処理中にエラーが発生しました');
      expect(result.escalations).toEqual([]);
      expect(plan.status).toBe(PlanStatus.FAILED);
      expect(notifier.sent).toHaveLength(0);
    });

    it('should release backoff state once a plan ends on a transient error', async () => {
      class NetworkError extends Error {
        name = 'NetworkError';
      }
      class UnreachableTracker extends ProgressTracker {
        update(): never {
          throw new NetworkError('connection dropped');
        }
      }
      const delays: number[] = [];
      const { escalations } = setup({});
      const exceptionHandler = new ExceptionHandler({
        escalations,
        sleep: async (ms) => {
          delays.push(ms);
        },
        logger: silentLogger,
      });
      const registry = new CapabilityRegistry().register({ name: 'single', description: 'single' }, ok);
      const executor = new WorkflowExecutor({
        registry,
        escalations,
        exceptionHandler,
        progressTracker: new UnreachableTracker(),
        logger: silentLogger,
      });

      const first = await executor.execute(buildPlan([buildSubTask('S1', 'single')], { id: 'plan-a' }));
      const second = await executor.execute(buildPlan([buildSubTask('S1', 'single')], { id: 'plan-b' }));

      expect(first.success).toBe(false);
      expect(first.suggestions).toEqual(['しばらくしてから再実行してください']);
      expect(second.suggestions).toEqual(['しばらくしてから再実行してください']);
      expect(delays).toEqual([1000, 1000]);
      expect(exceptionHandler.getRetryStep('plan-a')).toBe(0);
      expect(exceptionHandler.getRetryStep('plan-b')).toBe(0);
    });

    it('should refuse to run a plan twice', async () => {
      const { executor } = setup({ single: ok });
      const plan = buildPlan([buildSubTask('S1', 'single')]);

      await executor.execute(plan);
      const second = await executor.execute(plan);

      expect(second.success).toBe(false);
      expect(second.error_code).toBe('INVALID_STATE_TRANSITION');
      expect(plan.status).toBe(PlanStatus.COMPLETED);
    });
  });
});
