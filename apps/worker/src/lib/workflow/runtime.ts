import { CapabilityRegistry } from '@taskflow/capabilities';
import { createLLMDecompositionOracle } from '@taskflow/decomposer';
import {
  createWorkflowCoordinator,
  loadWorkflowConfig,
  type WorkflowConfig,
  type WorkflowCoordinator,
} from '@taskflow/runner';
import {
  createConsoleLogger,
  type EscalationNotifier,
  type LLMClient,
  type ProgressReport,
  type WorkflowLogger,
} from '@taskflow/workflow-spec';
import {
  createGeneralResponseHandler,
  inputSchema as generalResponseInput,
  spec as generalResponseSpec,
} from '../capabilities/general-response';
import { createLLMClient } from '../llm/client';
import { SlackEscalationNotifier } from '../notifications/slack';

/**
 * ワーカー実行環境
 */
export interface WorkflowRuntime {
  config: WorkflowConfig;
  registry: CapabilityRegistry;
  coordinator: WorkflowCoordinator;
}

export interface WorkflowRuntimeOptions {
  env?: Record<string, string | undefined>;

  /** 事前登録済みのケイパビリティ */
  registry?: CapabilityRegistry;

  llm?: LLMClient | null;
  notifier?: EscalationNotifier;
  onProgress?: (report: ProgressReport) => void | Promise<void>;
  logger?: WorkflowLogger;
}

/**
 * 環境変数から実行環境を組み立てる
 */
export function createWorkflowRuntime(options: WorkflowRuntimeOptions = {}): WorkflowRuntime {
  const env = options.env ?? process.env;
  const logger = options.logger ?? createConsoleLogger('Worker');
  const config = loadWorkflowConfig(env);
  const registry = options.registry ?? new CapabilityRegistry();

  const llm =
    options.llm !== undefined
      ? options.llm
      : env.ANTHROPIC_API_KEY
        ? createLLMClient({ apiKey: env.ANTHROPIC_API_KEY })
        : null;

  if (llm && !registry.has(generalResponseSpec.name)) {
    registry.register(generalResponseSpec, createGeneralResponseHandler(llm), generalResponseInput);
  }

  const notifier =
    options.notifier ??
    (env.SLACK_WEBHOOK_URL ? new SlackEscalationNotifier({ webhookUrl: env.SLACK_WEBHOOK_URL }) : undefined);
  if (!notifier) {
    logger.warn('SLACK_WEBHOOK_URL is not configured');
  }

  const oracle = llm ? createLLMDecompositionOracle(llm, { capabilities: () => registry.list(), logger }) : null;

  const coordinator = createWorkflowCoordinator(
    {
      registry,
      notifier,
      oracle,
      onProgress: options.onProgress,
      logger,
    },
    config
  );

  logger.info('Workflow runtime ready', {
    enabled: config.enabled,
    capabilities: registry.size,
    llm: llm !== null,
  });

  return { config, registry, coordinator };
}

let sharedRuntime: WorkflowRuntime | null = null;

/**
 * プロセス内で共有する実行環境（エスカレーション応答を同じ Coordinator に届ける）
 */
export function getWorkflowRuntime(): WorkflowRuntime {
  if (!sharedRuntime) {
    sharedRuntime = createWorkflowRuntime();
  }
  return sharedRuntime;
}
