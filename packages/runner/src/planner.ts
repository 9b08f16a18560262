import { v4 as uuidv4 } from 'uuid';
import {
  PlanStatus,
  createConsoleLogger,
  type SubTask,
  type ExecutionPlan,
  type WorkflowContext,
  type WorkflowLogger,
} from '@taskflow/workflow-spec';
import {
  CyclicDependencyError,
  DuplicateSubTaskError,
  InvalidConfigurationError,
  UnknownDependencyError,
  WorkflowError,
} from './errors';

/**
 * ケイパビリティ名に含まれるキーワード → 計画名
 */
export const PLAN_NAME_KEYWORDS: Record<string, string> = {
  chatwork_task: 'タスク管理',
  meeting_room: '会議室予約',
  announcement: 'アナウンス',
  knowledge: 'ナレッジ',
  goal: '目標',
  calendar: 'カレンダー',
};

export const DEFAULT_PLAN_NAME = '複合タスク実行';

export interface PlannerOptions {
  parallelExecution?: boolean;
  continueOnFailure?: boolean;
  qualityChecksEnabled?: boolean;
  requiredQualityScore?: number;
  logger?: WorkflowLogger;
}

/**
 * 計画単位の上書き設定
 */
export interface PlanOverrides {
  name?: string;
  description?: string;
  parallel_execution?: boolean;
  continue_on_failure?: boolean;
  quality_checks_enabled?: boolean;
  required_quality_score?: number;
}

export interface PlanValidation {
  valid: boolean;
  errors: string[];
}

/**
 * 依存グラフ（ID → インデックスのアリーナ）
 */
interface DependencyArena {
  subtasks: SubTask[];
  dependencies: number[][];
  dependents: number[][];
}

/**
 * 実行計画作成
 *
 * 1. 重複ID・未知の依存先を検出
 * 2. Kahn のアルゴリズムでトポロジカルソート（同順位は元の順序）
 * 3. ウェーブ分割で並列実行の要否を判断
 */
export class ExecutionPlanner {
  private readonly options: Required<Omit<PlannerOptions, 'logger'>>;
  private readonly logger: WorkflowLogger;

  constructor(options: PlannerOptions = {}) {
    this.options = {
      parallelExecution: options.parallelExecution ?? true,
      continueOnFailure: options.continueOnFailure ?? false,
      qualityChecksEnabled: options.qualityChecksEnabled ?? true,
      requiredQualityScore: options.requiredQualityScore ?? 0.8,
    };
    this.logger = options.logger ?? createConsoleLogger('Planner');
  }

  /**
   * 実行計画を作成
   */
  createPlan(
    subtasks: SubTask[],
    request: string,
    context: WorkflowContext,
    overrides: PlanOverrides = {}
  ): ExecutionPlan {
    if (subtasks.length === 0) {
      throw new InvalidConfigurationError('Plan requires at least one subtask');
    }

    const ordered = this.topologicalSort(subtasks);
    const waves = this.identifyWaves(ordered);

    const worthParallel = waves.length > 1 && waves.some((wave) => wave.length > 1);
    const parallel = (overrides.parallel_execution ?? this.options.parallelExecution) && worthParallel;

    const preview = request.length > 30 ? `${request.slice(0, 30)}...` : request;
    const plan: ExecutionPlan = {
      id: uuidv4(),
      name: overrides.name ?? this.generatePlanName(ordered, request),
      description: overrides.description ?? `${ordered.length}個のサブタスクで「${preview}」を実行`,
      original_request: request,
      subtasks: ordered,
      parallel_execution: parallel,
      continue_on_failure: overrides.continue_on_failure ?? this.options.continueOnFailure,
      status: PlanStatus.PENDING,
      quality_checks_enabled: overrides.quality_checks_enabled ?? this.options.qualityChecksEnabled,
      required_quality_score: overrides.required_quality_score ?? this.options.requiredQualityScore,
      context,
      created_at: new Date(),
      started_at: null,
      completed_at: null,
    };

    this.logger.info('Plan created', {
      plan_id: plan.id,
      subtasks: ordered.length,
      waves: waves.length,
      parallel,
    });

    return plan;
  }

  /**
   * トポロジカルソート（FIFO キュー、同順位は挿入順）
   */
  topologicalSort(subtasks: SubTask[]): SubTask[] {
    const arena = this.buildArena(subtasks);
    const n = arena.subtasks.length;

    const inDegree = arena.dependencies.map((deps) => deps.length);
    const queue: number[] = [];
    for (let i = 0; i < n; i++) {
      if (inDegree[i] === 0) {
        queue.push(i);
      }
    }

    const order: number[] = [];
    let head = 0;
    while (head < queue.length) {
      const current = queue[head++];
      order.push(current);
      for (const dependent of arena.dependents[current]) {
        inDegree[dependent] -= 1;
        if (inDegree[dependent] === 0) {
          queue.push(dependent);
        }
      }
    }

    if (order.length < n) {
      const ordered = new Set(order);
      const remaining = arena.subtasks.filter((_, i) => !ordered.has(i)).map((st) => st.id);
      throw new CyclicDependencyError(remaining);
    }

    return order.map((i) => arena.subtasks[i]);
  }

  /**
   * ウェーブ分割（依存の最大深さで層にまとめる）
   */
  identifyWaves(subtasks: SubTask[]): SubTask[][] {
    const ordered = this.topologicalSort(subtasks);
    const level = new Map<string, number>();
    const waves: SubTask[][] = [];

    for (const st of ordered) {
      const depth = st.depends_on.reduce((max, depId) => Math.max(max, (level.get(depId) ?? -1) + 1), 0);
      level.set(st.id, depth);
      if (!waves[depth]) {
        waves[depth] = [];
      }
      waves[depth].push(st);
    }

    return waves;
  }

  /**
   * 計画を検証
   */
  validatePlan(plan: ExecutionPlan): PlanValidation {
    const errors: string[] = [];

    if (plan.subtasks.length === 0) {
      errors.push('サブタスクがありません');
    }

    const ids = new Set(plan.subtasks.map((st) => st.id));
    for (const st of plan.subtasks) {
      for (const depId of st.depends_on) {
        if (!ids.has(depId)) {
          errors.push(`サブタスク「${st.name}」の依存先が見つかりません`);
        }
      }
    }

    if (errors.length === 0) {
      try {
        this.topologicalSort(plan.subtasks);
      } catch (error) {
        if (error instanceof CyclicDependencyError) {
          errors.push('循環依存が検出されました');
        } else if (error instanceof WorkflowError) {
          errors.push(`依存関係の検証に失敗: ${error.code}`);
        } else {
          throw error;
        }
      }
    }

    return { valid: errors.length === 0, errors };
  }

  /**
   * クリティカルパス（タイムアウト合計が最大の依存チェーン）
   */
  getCriticalPath(plan: ExecutionPlan): SubTask[] {
    const ordered = this.topologicalSort(plan.subtasks);
    const byId = new Map(ordered.map((st) => [st.id, st]));
    const cost = new Map<string, number>();
    const previous = new Map<string, string | null>();

    for (const st of ordered) {
      let bestDep: string | null = null;
      let bestCost = 0;
      for (const depId of st.depends_on) {
        const depCost = cost.get(depId) ?? 0;
        if (depCost > bestCost) {
          bestCost = depCost;
          bestDep = depId;
        }
      }
      cost.set(st.id, bestCost + st.config.timeout_seconds);
      previous.set(st.id, bestDep);
    }

    let tail: SubTask | undefined;
    for (const st of ordered) {
      if (!tail || (cost.get(st.id) ?? 0) > (cost.get(tail.id) ?? 0)) {
        tail = st;
      }
    }

    const path: SubTask[] = [];
    let cursor: SubTask | undefined = tail;
    while (cursor) {
      path.unshift(cursor);
      const prevId = previous.get(cursor.id);
      cursor = prevId ? byId.get(prevId) : undefined;
    }
    return path;
  }

  /**
   * 実行時間の見積もり（秒）
   */
  estimateExecutionSeconds(plan: ExecutionPlan): number {
    if (plan.subtasks.length === 0) {
      return 0;
    }
    const subtasks = plan.parallel_execution ? this.getCriticalPath(plan) : plan.subtasks;
    return subtasks.reduce((sum, st) => sum + st.config.timeout_seconds, 0);
  }

  private buildArena(subtasks: SubTask[]): DependencyArena {
    const indexById = new Map<string, number>();
    subtasks.forEach((st, i) => {
      if (indexById.has(st.id)) {
        throw new DuplicateSubTaskError(st.id);
      }
      indexById.set(st.id, i);
    });

    const dependencies: number[][] = subtasks.map(() => []);
    const dependents: number[][] = subtasks.map(() => []);

    subtasks.forEach((st, i) => {
      for (const depId of new Set(st.depends_on)) {
        const j = indexById.get(depId);
        if (j === undefined) {
          throw new UnknownDependencyError(st.id, depId);
        }
        dependencies[i].push(j);
        dependents[j].push(i);
      }
    });

    return { subtasks, dependencies, dependents };
  }

  private generatePlanName(subtasks: SubTask[], request: string): string {
    for (const st of subtasks) {
      for (const [keyword, name] of Object.entries(PLAN_NAME_KEYWORDS)) {
        if (st.capability.includes(keyword)) {
          return `${name}ワークフロー`;
        }
      }
    }

    const normalized = request.toLowerCase();
    for (const [keyword, name] of Object.entries(PLAN_NAME_KEYWORDS)) {
      if (normalized.includes(keyword.replace('_', ''))) {
        return `${name}ワークフロー`;
      }
    }

    return DEFAULT_PLAN_NAME;
  }
}

/**
 * ExecutionPlanner 作成
 */
export function createExecutionPlanner(options: PlannerOptions = {}): ExecutionPlanner {
  return new ExecutionPlanner(options);
}
