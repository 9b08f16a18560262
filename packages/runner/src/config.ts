import { z } from 'zod';
import { InvalidConfigurationError } from './errors';

const booleanFlag = (defaultValue: 'true' | 'false') =>
  z
    .string()
    .optional()
    .default(defaultValue)
    .transform((val) => ['true', '1', 'yes', 'on'].includes(val.trim().toLowerCase()));

const integer = (defaultValue: string, min: number) =>
  z
    .string()
    .optional()
    .default(defaultValue)
    .transform((val) => parseInt(val, 10))
    .pipe(z.number().int().min(min));

const ratio = (defaultValue: string) =>
  z
    .string()
    .optional()
    .default(defaultValue)
    .transform((val) => parseFloat(val))
    .pipe(z.number().min(0).max(1));

/**
 * 環境変数スキーマ
 */
export const WorkflowEnvSchema = z.object({
  WORKFLOW_ORCHESTRATION_ENABLED: booleanFlag('false'),
  WORKFLOW_PARALLEL_EXECUTION: booleanFlag('true'),
  WORKFLOW_CONTINUE_ON_FAILURE: booleanFlag('false'),
  WORKFLOW_QUALITY_CHECKS_ENABLED: booleanFlag('true'),
  WORKFLOW_REQUIRED_QUALITY_SCORE: ratio('0.8'),
  WORKFLOW_PROGRESS_THRESHOLD_PERCENT: integer('25', 1),
  WORKFLOW_PROGRESS_STALE_SECONDS: integer('60', 1),
  WORKFLOW_BACKOFF_BASE_MS: integer('1000', 0),
  WORKFLOW_BACKOFF_MAX_MS: integer('30000', 0),
  WORKFLOW_EXCEPTION_MAX_RETRIES: integer('3', 0),
  WORKFLOW_ESCALATION_EXPIRY_MINUTES: integer('30', 1),
  WORKFLOW_ESCALATION_DEFAULT_TARGET: z.string().optional(),
  WORKFLOW_LLM_DECOMPOSITION_ENABLED: booleanFlag('false'),
});

/**
 * ワークフロー設定
 */
export interface WorkflowConfig {
  /** 機能フラグ */
  enabled: boolean;

  parallelExecution: boolean;
  continueOnFailure: boolean;
  qualityChecksEnabled: boolean;
  requiredQualityScore: number;

  progress: {
    thresholdPercent: number;
    staleSeconds: number;
  };

  backoff: {
    baseDelayMs: number;
    maxDelayMs: number;
    maxRetries: number;
  };

  escalation: {
    expiryMinutes: number;
    defaultTarget: string | null;
  };

  llmDecompositionEnabled: boolean;
}

/**
 * 環境変数から設定を読み込む
 */
export function loadWorkflowConfig(env: Record<string, string | undefined> = process.env): WorkflowConfig {
  const parsed = WorkflowEnvSchema.safeParse(env);
  if (!parsed.success) {
    const detail = parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join('; ');
    throw new InvalidConfigurationError(`Invalid workflow configuration: ${detail}`);
  }

  const e = parsed.data;
  return {
    enabled: e.WORKFLOW_ORCHESTRATION_ENABLED,
    parallelExecution: e.WORKFLOW_PARALLEL_EXECUTION,
    continueOnFailure: e.WORKFLOW_CONTINUE_ON_FAILURE,
    qualityChecksEnabled: e.WORKFLOW_QUALITY_CHECKS_ENABLED,
    requiredQualityScore: e.WORKFLOW_REQUIRED_QUALITY_SCORE,
    progress: {
      thresholdPercent: e.WORKFLOW_PROGRESS_THRESHOLD_PERCENT,
      staleSeconds: e.WORKFLOW_PROGRESS_STALE_SECONDS,
    },
    backoff: {
      baseDelayMs: e.WORKFLOW_BACKOFF_BASE_MS,
      maxDelayMs: e.WORKFLOW_BACKOFF_MAX_MS,
      maxRetries: e.WORKFLOW_EXCEPTION_MAX_RETRIES,
    },
    escalation: {
      expiryMinutes: e.WORKFLOW_ESCALATION_EXPIRY_MINUTES,
      defaultTarget: e.WORKFLOW_ESCALATION_DEFAULT_TARGET ?? null,
    },
    llmDecompositionEnabled: e.WORKFLOW_LLM_DECOMPOSITION_ENABLED,
  };
}

/**
 * デフォルト設定
 */
export const DEFAULT_WORKFLOW_CONFIG: WorkflowConfig = loadWorkflowConfig({});

/**
 * ワークフロー機能が有効か
 */
export function isWorkflowOrchestrationEnabled(config: WorkflowConfig): boolean {
  return config.enabled;
}
