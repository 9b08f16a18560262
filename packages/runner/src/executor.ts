import {
  PlanStatus,
  QualityVerdict,
  RecoveryStrategy,
  SubTaskStatus,
  createChildLogger,
  createConsoleLogger,
  getBlockedSubTasks,
  getReadySubTasks,
  isPlanComplete,
  type CapabilityContext,
  type CapabilityResult,
  type EscalationRequest,
  type ExecutionPlan,
  type ExecutionResult,
  type ProgressReport,
  type QualityReport,
  type SubTask,
  type WorkflowLogger,
} from '@taskflow/workflow-spec';
import type { CapabilityRegistry, RegisteredCapability } from '@taskflow/capabilities';
import { NO_BACKOFF, retryWithBackoff, type AttemptOutcome } from './backoff';
import {
  CapabilityNotFoundError,
  DeadlockError,
  ParamValidationError,
  WorkflowError,
} from './errors';
import type { EscalationManager } from './escalation-manager';
import { getErrorSignature, type ExceptionHandler } from './exception-handler';
import { invokeCapability } from './invoke';
import type { ProgressTracker } from './progress-tracker';
import type { QualityChecker } from './quality-checker';
import { describeError } from './redaction';
import { buildExecutionResult, buildFailureResult } from './result';
import { isPlanTerminal, transitionPlan, transitionSubTask } from './state-machine';

/**
 * Executor 依存関係
 */
export interface WorkflowExecutorDependencies {
  registry: CapabilityRegistry;
  escalations: EscalationManager;
  progressTracker?: ProgressTracker;
  qualityChecker?: QualityChecker;
  exceptionHandler?: ExceptionHandler;

  /** ケイパビリティ名 → 代替ケイパビリティ（優先順） */
  alternatives?: Record<string, string[]>;

  onProgress?: (report: ProgressReport) => void | Promise<void>;
  now?: () => Date;
  logger?: WorkflowLogger;
}

/**
 * 1回の実行の可変状態
 */
interface RunState {
  aborted: boolean;
  haltedOnFailure: boolean;
  stalled: boolean;
  waves: string[][];
  escalations: EscalationRequest[];
}

/**
 * ワークフロー実行エンジン
 *
 * 1. 実行可能なサブタスクをウェーブ単位で実行（並列ならバリア同期）
 * 2. リトライ上限後は回復方針に従う
 * 3. 全サブタスク終端後に品質チェック
 * 4. ループ外に漏れたエラーは ExceptionHandler を通して失敗結果にする
 */
export class WorkflowExecutor {
  private readonly registry: CapabilityRegistry;
  private readonly escalations: EscalationManager;
  private readonly progressTracker: ProgressTracker | null;
  private readonly qualityChecker: QualityChecker | null;
  private readonly exceptionHandler: ExceptionHandler | null;
  private readonly alternatives: Map<string, string[]>;
  private readonly onProgress: ((report: ProgressReport) => void | Promise<void>) | null;
  private readonly now: () => Date;
  private readonly logger: WorkflowLogger;

  constructor(deps: WorkflowExecutorDependencies) {
    this.registry = deps.registry;
    this.escalations = deps.escalations;
    this.progressTracker = deps.progressTracker ?? null;
    this.qualityChecker = deps.qualityChecker ?? null;
    this.exceptionHandler = deps.exceptionHandler ?? null;
    this.alternatives = new Map(Object.entries(deps.alternatives ?? {}));
    this.onProgress = deps.onProgress ?? null;
    this.now = deps.now ?? (() => new Date());
    this.logger = deps.logger ?? createConsoleLogger('Executor');
  }

  /**
   * 計画を実行
   */
  async execute(plan: ExecutionPlan): Promise<ExecutionResult> {
    const startedAt = this.now();
    const state: RunState = {
      aborted: false,
      haltedOnFailure: false,
      stalled: false,
      waves: [],
      escalations: [],
    };

    try {
      transitionPlan(plan, PlanStatus.IN_PROGRESS, startedAt);
      this.logger.info('Plan started', {
        plan_id: plan.id,
        subtasks: plan.subtasks.length,
        parallel: plan.parallel_execution,
      });

      await this.runLoop(plan, state);
      const qualityReport = await this.runQualityPhase(plan, state);
      this.finalizePlan(plan, state, qualityReport);

      const completedAt = this.now();
      this.releasePlan(plan.id);
      this.logger.info('Plan finished', {
        plan_id: plan.id,
        status: plan.status,
        waves: state.waves.length,
        escalations: state.escalations.length,
      });

      return buildExecutionResult(plan, {
        qualityReport,
        escalations: state.escalations,
        waves: state.waves,
        startedAt,
        completedAt,
      });
    } catch (error) {
      return this.handleFatal(error, plan, state, startedAt);
    }
  }

  /**
   * メインループ
   */
  private async runLoop(plan: ExecutionPlan, state: RunState): Promise<void> {
    while (!isPlanComplete(plan)) {
      const ready = getReadySubTasks(plan);

      if (ready.length === 0) {
        const pending = plan.subtasks.filter((st) => st.status === SubTaskStatus.PENDING);
        const blocked = getBlockedSubTasks(plan);
        if (pending.length > 0 && blocked.length === pending.length) {
          state.stalled = true;
          this.logger.info('Remaining subtasks are blocked', {
            plan_id: plan.id,
            blocked: blocked.map((st) => st.id),
          });
          return;
        }
        throw new DeadlockError(pending.map((st) => st.id));
      }

      if (plan.parallel_execution && ready.length > 1) {
        await Promise.all(ready.map((subtask) => this.executeSubTask(subtask, plan, state)));
      } else {
        for (const subtask of ready) {
          if (state.aborted) {
            break;
          }
          await this.executeSubTask(subtask, plan, state);
        }
      }

      state.waves.push(ready.filter((st) => st.status !== SubTaskStatus.PENDING).map((st) => st.name));
      await this.reportProgress(plan);

      if (state.aborted) {
        return;
      }
      if (!plan.continue_on_failure && ready.some((st) => st.status === SubTaskStatus.FAILED)) {
        state.haltedOnFailure = true;
        return;
      }
    }
  }

  /**
   * サブタスクを実行（例外を投げない）
   */
  private async executeSubTask(subtask: SubTask, plan: ExecutionPlan, state: RunState): Promise<void> {
    try {
      await this.runSubTask(subtask, plan, state);
    } catch (error) {
      this.logger.error('Subtask execution crashed', {
        plan_id: plan.id,
        subtask_id: subtask.id,
        error: describeError(error),
      });
      if (subtask.status === SubTaskStatus.IN_PROGRESS) {
        this.fail(subtask, error);
      }
    }
  }

  private async runSubTask(subtask: SubTask, plan: ExecutionPlan, state: RunState): Promise<void> {
    transitionSubTask(subtask, SubTaskStatus.IN_PROGRESS, this.now());
    const logger = createChildLogger(this.logger, subtask.name);

    const capability = this.registry.get(subtask.capability);
    if (!capability) {
      logger.error('Capability not found', { capability: subtask.capability });
      this.fail(subtask, new CapabilityNotFoundError(subtask.capability));
      return;
    }

    const validation = capability.validateParams(subtask.params);
    if (!validation.success) {
      logger.warn('Params rejected', { capability: subtask.capability });
      await this.recover(subtask, plan, state, new ParamValidationError(validation.errors ?? []));
      return;
    }

    const outcome = await retryWithBackoff(
      (attempt) => this.attempt(capability, subtask, plan, attempt, logger),
      {
        maxAttempts: subtask.config.max_retries,
        policy: NO_BACKOFF,
        onFailure: (error, attempt) => {
          subtask.retry_count += 1;
          logger.warn('Attempt failed', { attempt, error: describeError(error) });
        },
      }
    );

    if (outcome.ok) {
      this.complete(subtask, outcome.value, null);
      return;
    }

    await this.recover(subtask, plan, state, outcome.error);
  }

  private attempt(
    capability: RegisteredCapability,
    subtask: SubTask,
    plan: ExecutionPlan,
    attempt: number,
    logger: WorkflowLogger
  ): Promise<AttemptOutcome<CapabilityResult>> {
    const context: CapabilityContext = {
      plan_id: plan.id,
      subtask_id: subtask.id,
      attempt,
      workflow: plan.context,
      logger,
    };
    return invokeCapability(capability, subtask.params, context, subtask.config.timeout_seconds);
  }

  /**
   * リトライ上限後の回復方針（in_progress から終端へ）
   */
  private async recover(subtask: SubTask, plan: ExecutionPlan, state: RunState, error: Error): Promise<void> {
    switch (subtask.config.recovery_strategy) {
      case RecoveryStrategy.SKIP:
        if (subtask.config.is_optional) {
          this.recordError(subtask, error);
          transitionSubTask(subtask, SubTaskStatus.SKIPPED, this.now());
        } else {
          this.fail(subtask, error);
        }
        return;

      case RecoveryStrategy.ESCALATE:
        await this.escalate(subtask, plan, state, error);
        return;

      case RecoveryStrategy.ABORT:
        this.fail(subtask, error);
        state.aborted = true;
        if (!isPlanTerminal(plan)) {
          transitionPlan(plan, PlanStatus.FAILED, this.now());
        }
        this.logger.warn('Plan aborted', { plan_id: plan.id, subtask_id: subtask.id });
        return;

      case RecoveryStrategy.ALTERNATIVE:
        if (await this.tryAlternatives(subtask, plan)) {
          return;
        }
        await this.escalate(subtask, plan, state, error);
        return;

      case RecoveryStrategy.RETRY:
        this.fail(subtask, error);
        return;
    }
  }

  /**
   * 代替ケイパビリティを順に1回ずつ試す
   */
  private async tryAlternatives(subtask: SubTask, plan: ExecutionPlan): Promise<boolean> {
    const logger = createChildLogger(this.logger, subtask.name);

    for (const name of this.alternatives.get(subtask.capability) ?? []) {
      const capability = this.registry.get(name);
      if (!capability || !capability.validateParams(subtask.params).success) {
        continue;
      }

      const outcome = await this.attempt(capability, subtask, plan, subtask.retry_count + 1, logger);
      if (outcome.ok) {
        this.complete(subtask, outcome.value, name);
        logger.info('Completed with alternative', { alternative: name });
        return true;
      }
      subtask.retry_count += 1;
      logger.warn('Alternative failed', { alternative: name, error: describeError(outcome.error) });
    }

    return false;
  }

  private async escalate(subtask: SubTask, plan: ExecutionPlan, state: RunState, error: Error): Promise<void> {
    this.recordError(subtask, error);
    transitionSubTask(subtask, SubTaskStatus.ESCALATED, this.now());
    state.escalations.push(await this.escalations.createTaskEscalation(subtask, plan, error));
  }

  private complete(subtask: SubTask, result: CapabilityResult, alternative: string | null): void {
    subtask.result = result.data ?? {};
    subtask.alternative_capability = alternative;
    transitionSubTask(subtask, SubTaskStatus.COMPLETED, this.now());
  }

  private fail(subtask: SubTask, error: unknown): void {
    this.recordError(subtask, error);
    transitionSubTask(subtask, SubTaskStatus.FAILED, this.now());
  }

  private recordError(subtask: SubTask, error: unknown): void {
    subtask.error = describeError(error);
    subtask.error_code =
      error instanceof WorkflowError ? error.code : getErrorSignature(error).code ?? 'CAPABILITY_FAILED';
  }

  private async reportProgress(plan: ExecutionPlan): Promise<void> {
    const report = this.progressTracker?.update(plan);
    if (!report || !this.onProgress) {
      return;
    }
    try {
      await this.onProgress(report);
    } catch (error) {
      this.logger.warn('Progress hook failed', { plan_id: plan.id, error: describeError(error) });
    }
  }

  /**
   * 品質チェック（全サブタスク終端時のみ）
   */
  private async runQualityPhase(plan: ExecutionPlan, state: RunState): Promise<QualityReport | null> {
    if (!plan.quality_checks_enabled || !this.qualityChecker || !isPlanComplete(plan) || isPlanTerminal(plan)) {
      return null;
    }

    const report = this.qualityChecker.checkPlan(plan);
    this.logger.info('Quality checked', { plan_id: plan.id, verdict: report.verdict, score: report.score });

    if (report.verdict === QualityVerdict.FAIL) {
      state.escalations.push(await this.escalations.createQualityEscalation(plan, report));
    }
    return report;
  }

  /**
   * 計画の最終状態を決める（人間の判断待ちは in_progress のまま）
   */
  private finalizePlan(plan: ExecutionPlan, state: RunState, qualityReport: QualityReport | null): void {
    if (isPlanTerminal(plan)) {
      return;
    }

    const hasFailures = plan.subtasks.some((st) => st.status === SubTaskStatus.FAILED);
    const hasEscalations = plan.subtasks.some((st) => st.status === SubTaskStatus.ESCALATED);
    const qualityFailed = qualityReport?.verdict === QualityVerdict.FAIL;

    if (state.haltedOnFailure) {
      transitionPlan(plan, PlanStatus.FAILED, this.now());
    } else if (hasEscalations || qualityFailed) {
      return;
    } else if (state.stalled || hasFailures) {
      transitionPlan(plan, PlanStatus.FAILED, this.now());
    } else {
      transitionPlan(plan, PlanStatus.COMPLETED, this.now());
    }
  }

  /**
   * 終了した計画の追跡状態を破棄
   */
  private releasePlan(planId: string): void {
    this.progressTracker?.reset(planId);
    this.exceptionHandler?.resetPlan(planId);
  }

  /**
   * ループ外に漏れたエラー
   */
  private async handleFatal(
    error: unknown,
    plan: ExecutionPlan,
    state: RunState,
    startedAt: Date
  ): Promise<ExecutionResult> {
    this.logger.error('Plan execution failed', { plan_id: plan.id, error: describeError(error) });

    const recovery = this.exceptionHandler ? await this.exceptionHandler.handle(error, plan) : null;
    if (!isPlanTerminal(plan)) {
      transitionPlan(plan, PlanStatus.FAILED, this.now());
    }
    this.releasePlan(plan.id);

    const escalations = [...state.escalations];
    if (recovery?.escalation) {
      escalations.push(recovery.escalation);
    }

    const suggestions: string[] = [];
    if (recovery?.strategy === RecoveryStrategy.RETRY) {
      suggestions.push('しばらくしてから再実行してください');
    }
    if (recovery && recovery.alternatives.length > 0) {
      suggestions.push(...recovery.alternatives);
    }

    return buildFailureResult({
      plan,
      planName: plan.name,
      request: plan.original_request,
      errorCode: error instanceof WorkflowError ? error.code : getErrorSignature(error).code ?? 'WORKFLOW_ERROR',
      escalations,
      suggestions,
      startedAt,
      completedAt: this.now(),
    });
  }
}

/**
 * WorkflowExecutor 作成
 */
export function createWorkflowExecutor(deps: WorkflowExecutorDependencies): WorkflowExecutor {
  return new WorkflowExecutor(deps);
}
