import {
  SubTaskStatus,
  createConsoleLogger,
  type CapabilityContext,
  type DecompositionOracle,
  type EscalationNotifier,
  type EscalationRequest,
  type ExecutionPlan,
  type ExecutionResult,
  type ProgressReport,
  type SubTask,
  type WorkflowContext,
  type WorkflowLogger,
} from '@taskflow/workflow-spec';
import type { CapabilityRegistry } from '@taskflow/capabilities';
import {
  TaskDecomposer,
  detectMultiActionRequest,
  type DecompositionPattern,
} from '@taskflow/decomposer';
import { DEFAULT_WORKFLOW_CONFIG, type WorkflowConfig } from './config';
import { CapabilityNotFoundError, WorkflowError, isConfigurationError } from './errors';
import { EscalationManager } from './escalation-manager';
import { ExceptionHandler, getErrorSignature } from './exception-handler';
import { WorkflowExecutor } from './executor';
import { invokeCapability } from './invoke';
import { DEFAULT_PLAN_NAME, ExecutionPlanner } from './planner';
import { ProgressTracker } from './progress-tracker';
import { QualityChecker } from './quality-checker';
import { describeError } from './redaction';
import { buildFailureResult, buildFastPathResult } from './result';
import { transitionSubTask } from './state-machine';

/**
 * Coordinator 依存関係
 */
export interface WorkflowCoordinatorDependencies {
  registry: CapabilityRegistry;
  decomposer: TaskDecomposer;
  planner: ExecutionPlanner;
  executor: WorkflowExecutor;
  escalations: EscalationManager;
  now?: () => Date;
  logger?: WorkflowLogger;
}

/**
 * ワークフロー統括
 *
 * 分解 → 計画 → 実行。単一アクションは計画を作らずに直接実行する
 */
export class WorkflowCoordinator {
  private readonly registry: CapabilityRegistry;
  private readonly decomposer: TaskDecomposer;
  private readonly planner: ExecutionPlanner;
  private readonly executor: WorkflowExecutor;
  private readonly escalations: EscalationManager;
  private readonly now: () => Date;
  private readonly logger: WorkflowLogger;

  constructor(deps: WorkflowCoordinatorDependencies) {
    this.registry = deps.registry;
    this.decomposer = deps.decomposer;
    this.planner = deps.planner;
    this.executor = deps.executor;
    this.escalations = deps.escalations;
    this.now = deps.now ?? (() => new Date());
    this.logger = deps.logger ?? createConsoleLogger('Coordinator');
  }

  /**
   * 複合リクエストか
   */
  shouldUseWorkflow(request: string): boolean {
    return detectMultiActionRequest(request);
  }

  /**
   * リクエストを実行
   */
  async executeRequest(request: string, context: WorkflowContext): Promise<ExecutionResult> {
    const startedAt = this.now();
    const subtasks = await this.decomposer.decompose(request, context);

    if (!this.shouldUseWorkflow(request) && subtasks.length === 1) {
      return this.executeFastPath(subtasks[0], request, context, startedAt);
    }

    let plan: ExecutionPlan;
    try {
      plan = this.planner.createPlan(subtasks, request, context);
    } catch (error) {
      if (!isConfigurationError(error)) {
        throw error;
      }
      this.logger.warn('Plan rejected', { error: describeError(error) });
      return buildFailureResult({
        plan: null,
        planName: DEFAULT_PLAN_NAME,
        request,
        errorCode: error instanceof WorkflowError ? error.code : 'INVALID_CONFIGURATION',
        escalations: [],
        suggestions: [],
        startedAt,
        completedAt: this.now(),
      });
    }

    return this.executor.execute(plan);
  }

  /**
   * エスカレーションへの応答
   */
  respondToEscalation(escalationId: string, optionId: string, reason?: string): boolean {
    return this.escalations.processResponse(escalationId, optionId, reason);
  }

  getPendingEscalations(planId?: string): EscalationRequest[] {
    return this.escalations.getPendingEscalations(planId);
  }

  /**
   * 単一タスクを1回だけ実行（品質チェック・エスカレーションなし）
   */
  private async executeFastPath(
    subtask: SubTask,
    request: string,
    context: WorkflowContext,
    startedAt: Date
  ): Promise<ExecutionResult> {
    transitionSubTask(subtask, SubTaskStatus.IN_PROGRESS, startedAt);

    const capability = this.registry.get(subtask.capability);
    if (!capability) {
      const error = new CapabilityNotFoundError(subtask.capability);
      this.logger.warn('Fast path capability missing', { capability: subtask.capability });
      return this.finishFastPath(subtask, request, startedAt, error);
    }

    const capabilityContext: CapabilityContext = {
      plan_id: null,
      subtask_id: subtask.id,
      attempt: 1,
      workflow: context,
      logger: this.logger,
    };
    const outcome = await invokeCapability(
      capability,
      subtask.params,
      capabilityContext,
      subtask.config.timeout_seconds
    );

    if (!outcome.ok) {
      subtask.retry_count += 1;
      return this.finishFastPath(subtask, request, startedAt, outcome.error);
    }

    subtask.result = outcome.value.data ?? {};
    transitionSubTask(subtask, SubTaskStatus.COMPLETED, this.now());
    return buildFastPathResult(subtask, {
      request,
      message: outcome.value.message ?? null,
      errorCode: null,
      startedAt,
      completedAt: this.now(),
    });
  }

  private finishFastPath(subtask: SubTask, request: string, startedAt: Date, error: Error): ExecutionResult {
    const errorCode =
      error instanceof WorkflowError ? error.code : getErrorSignature(error).code ?? 'CAPABILITY_FAILED';
    subtask.error = describeError(error);
    subtask.error_code = errorCode;
    transitionSubTask(subtask, SubTaskStatus.FAILED, this.now());

    return buildFastPathResult(subtask, {
      request,
      message: null,
      errorCode,
      startedAt,
      completedAt: this.now(),
    });
  }
}

/**
 * createWorkflowCoordinator の外部依存
 */
export interface WorkflowRuntimeDependencies {
  registry: CapabilityRegistry;
  notifier?: EscalationNotifier;
  oracle?: DecompositionOracle | null;
  patterns?: DecompositionPattern[];

  /** ケイパビリティ名 → 代替ケイパビリティ */
  alternatives?: Record<string, string[]>;

  /** データエラーの name / code → 代替手段 */
  errorAlternatives?: Record<string, string[]>;

  onProgress?: (report: ProgressReport) => void | Promise<void>;
  logger?: WorkflowLogger;
}

/**
 * 設定から WorkflowCoordinator を組み立てる
 */
export function createWorkflowCoordinator(
  deps: WorkflowRuntimeDependencies,
  config: WorkflowConfig = DEFAULT_WORKFLOW_CONFIG
): WorkflowCoordinator {
  const logger = deps.logger ?? createConsoleLogger('Workflow');

  const escalations = new EscalationManager({
    notifier: deps.notifier,
    defaultTarget: config.escalation.defaultTarget,
    expiryMinutes: config.escalation.expiryMinutes,
    logger,
  });

  const executor = new WorkflowExecutor({
    registry: deps.registry,
    escalations,
    progressTracker: new ProgressTracker({
      thresholdPercent: config.progress.thresholdPercent,
      staleSeconds: config.progress.staleSeconds,
    }),
    qualityChecker: new QualityChecker(),
    exceptionHandler: new ExceptionHandler({
      escalations,
      backoff: config.backoff,
      alternatives: deps.errorAlternatives,
      logger,
    }),
    alternatives: deps.alternatives,
    onProgress: deps.onProgress,
    logger,
  });

  return new WorkflowCoordinator({
    registry: deps.registry,
    decomposer: new TaskDecomposer({
      patterns: deps.patterns,
      oracle: config.llmDecompositionEnabled ? deps.oracle : null,
      logger,
    }),
    planner: new ExecutionPlanner({
      parallelExecution: config.parallelExecution,
      continueOnFailure: config.continueOnFailure,
      qualityChecksEnabled: config.qualityChecksEnabled,
      requiredQualityScore: config.requiredQualityScore,
      logger,
    }),
    executor,
    escalations,
    logger,
  });
}
