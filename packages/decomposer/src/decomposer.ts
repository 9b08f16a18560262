import { v4 as uuidv4 } from 'uuid';
import {
  createSubTask,
  createConsoleLogger,
  type SubTask,
  type WorkflowContext,
  type WorkflowLogger,
  type DecompositionOracle,
  type OracleSubTask,
} from '@taskflow/workflow-spec';
import { detectMultiActionRequest } from './multi-action';
import { ParameterExtractor, type ExtractedParams } from './parameter-extractor';
import {
  DEFAULT_PATTERNS,
  matchesPattern,
  instantiatePattern,
  type DecompositionPattern,
} from './patterns';

/**
 * 分解不要時のケイパビリティ
 */
export const PASS_THROUGH_CAPABILITY = 'general_response';
export const PASS_THROUGH_NAME = 'リクエスト処理';

export interface TaskDecomposerOptions {
  patterns?: DecompositionPattern[];
  oracle?: DecompositionOracle | null;
  extractor?: ParameterExtractor;
  logger?: WorkflowLogger;
}

/**
 * タスク分解器
 *
 * 1. 複合リクエストでなければ単一タスク
 * 2. ルールベース（優先度順）
 * 3. 外部オラクル（設定時のみ）
 * 4. 単一タスクにフォールバック
 */
export class TaskDecomposer {
  private patterns: DecompositionPattern[];
  private readonly oracle: DecompositionOracle | null;
  private readonly extractor: ParameterExtractor;
  private readonly logger: WorkflowLogger;

  constructor(options: TaskDecomposerOptions = {}) {
    this.patterns = sortByPriority(options.patterns ?? DEFAULT_PATTERNS);
    this.oracle = options.oracle ?? null;
    this.extractor = options.extractor ?? new ParameterExtractor();
    this.logger = options.logger ?? createConsoleLogger('Decomposer');
  }

  /**
   * リクエストをサブタスクに分解（空にはならない）
   */
  async decompose(request: string, context: WorkflowContext): Promise<SubTask[]> {
    if (!detectMultiActionRequest(request)) {
      this.logger.debug('Single action request detected');
      return [this.createPassThrough(request)];
    }

    const params = this.extractor.extract(request, context);

    const ruleBased = this.decomposeByRules(request, params);
    if (ruleBased) {
      return ruleBased;
    }

    if (this.oracle) {
      const delegated = await this.decomposeByOracle(this.oracle, request, context, params);
      if (delegated) {
        return delegated;
      }
    }

    this.logger.debug('Could not decompose, returning single task');
    return [this.createPassThrough(request)];
  }

  /**
   * 分解すべきリクエストか
   */
  shouldDecompose(request: string): boolean {
    return detectMultiActionRequest(request);
  }

  /**
   * パターン追加（優先度順を維持）
   */
  addPattern(pattern: DecompositionPattern): void {
    this.patterns = sortByPriority([...this.patterns, pattern]);
    this.logger.debug(`Pattern added: ${pattern.name}`);
  }

  getPatterns(): readonly DecompositionPattern[] {
    return this.patterns;
  }

  private decomposeByRules(request: string, params: ExtractedParams): SubTask[] | null {
    const pattern = this.patterns.find((p) => matchesPattern(p, request, params));
    if (!pattern) {
      return null;
    }
    this.logger.info(`Matched pattern: ${pattern.name}`, { subtasks: pattern.templates.length });
    return instantiatePattern(pattern, params);
  }

  private async decomposeByOracle(
    oracle: DecompositionOracle,
    request: string,
    context: WorkflowContext,
    params: ExtractedParams
  ): Promise<SubTask[] | null> {
    let items: OracleSubTask[] | null;
    try {
      items = await oracle.decompose(request, context, params);
    } catch (error) {
      this.logger.warn('Oracle decomposition failed', {
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }

    if (!items || items.length === 0) {
      return null;
    }

    const idByName = new Map<string, string>();
    for (const item of items) {
      if (!idByName.has(item.name)) {
        idByName.set(item.name, uuidv4());
      }
    }

    const seen = new Set<string>();
    const subtasks: SubTask[] = [];
    for (const item of items) {
      if (seen.has(item.name)) {
        this.logger.warn(`Duplicate oracle subtask dropped: ${item.name}`);
        continue;
      }
      seen.add(item.name);

      const dependsOn: string[] = [];
      for (const depName of item.depends_on) {
        const depId = idByName.get(depName);
        if (!depId || depName === item.name) {
          this.logger.warn(`Unknown dependency dropped: ${item.name} -> ${depName}`);
          continue;
        }
        dependsOn.push(depId);
      }

      subtasks.push(
        createSubTask({
          id: idByName.get(item.name),
          name: item.name,
          description: item.description,
          capability: item.action,
          params: item.params,
          depends_on: dependsOn,
        })
      );
    }

    this.logger.info('Oracle decomposition', { subtasks: subtasks.length });
    return subtasks;
  }

  private createPassThrough(request: string): SubTask {
    const preview = request.length > 50 ? `${request.slice(0, 50)}...` : request;
    return createSubTask({
      name: PASS_THROUGH_NAME,
      description: `「${preview}」を処理`,
      capability: PASS_THROUGH_CAPABILITY,
      params: { original_request: request },
    });
  }
}

function sortByPriority(patterns: DecompositionPattern[]): DecompositionPattern[] {
  return [...patterns].sort((a, b) => b.priority - a.priority);
}

/**
 * TaskDecomposer 作成
 */
export function createTaskDecomposer(options: TaskDecomposerOptions = {}): TaskDecomposer {
  return new TaskDecomposer(options);
}
