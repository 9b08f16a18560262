/**
 * Workflow Type Definitions
 *
 * 1つのリクエスト → 依存関係のあるサブタスク群 → 実行計画 → 実行結果
 * 人間は判断が必要な場面でのみエスカレーションを受け取る
 */

// =============================================================================
// Status / Strategy (状態と方針)
// =============================================================================

export const SubTaskStatus = {
  PENDING: 'pending',
  IN_PROGRESS: 'in_progress',
  COMPLETED: 'completed',
  FAILED: 'failed',
  SKIPPED: 'skipped',
  ESCALATED: 'escalated',
} as const;

export type SubTaskStatus = typeof SubTaskStatus[keyof typeof SubTaskStatus];

export const PlanStatus = {
  PENDING: 'pending',
  IN_PROGRESS: 'in_progress',
  COMPLETED: 'completed',
  FAILED: 'failed',
} as const;

export type PlanStatus = typeof PlanStatus[keyof typeof PlanStatus];

export const ExecutionPriority = {
  CRITICAL: 'critical',
  HIGH: 'high',
  NORMAL: 'normal',
  LOW: 'low',
} as const;

export type ExecutionPriority = typeof ExecutionPriority[keyof typeof ExecutionPriority];

/**
 * リトライ上限到達後の回復方針
 */
export const RecoveryStrategy = {
  RETRY: 'retry',             // 失敗のまま（後続は continue_on_failure 次第）
  ALTERNATIVE: 'alternative', // 代替ケイパビリティを試行、なければエスカレーション
  SKIP: 'skip',               // 任意タスクならスキップ
  ESCALATE: 'escalate',       // 人間に判断を仰ぐ
  ABORT: 'abort',             // 計画全体を中止
} as const;

export type RecoveryStrategy = typeof RecoveryStrategy[keyof typeof RecoveryStrategy];

export const QualityVerdict = {
  PASS: 'pass',
  WARNING: 'warning',
  FAIL: 'fail',
  SKIPPED: 'skipped',
} as const;

export type QualityVerdict = typeof QualityVerdict[keyof typeof QualityVerdict];

export const EscalationSeverity = {
  INFO: 'info',                 // 情報共有のみ
  CONFIRMATION: 'confirmation', // 確認してほしい
  DECISION: 'decision',         // 判断が必要
  URGENT: 'urgent',             // 至急対応
} as const;

export type EscalationSeverity = typeof EscalationSeverity[keyof typeof EscalationSeverity];

export const EscalationStatus = {
  PENDING: 'pending',
  RESPONDED: 'responded',
  EXPIRED: 'expired',
} as const;

export type EscalationStatus = typeof EscalationStatus[keyof typeof EscalationStatus];

export type EscalationKind = 'task' | 'quality' | 'error';

// =============================================================================
// Context (テナント・ルーティング情報)
// =============================================================================

/**
 * ワークフロー実行コンテキスト
 */
export interface WorkflowContext {
  /** テナントID */
  tenant_id: string;

  /** 通知先ルームID */
  room_id?: string;

  /** リクエスト送信者のアカウントID */
  account_id?: string;

  /** リクエスト送信者名 */
  sender_name?: string;

  /** 既知の人物名（パラメータ抽出用） */
  known_person_names?: string[];

  /** トレースID */
  trace_id?: string;
}

// =============================================================================
// SubTask
// =============================================================================

/**
 * サブタスク実行設定
 */
export interface SubTaskConfig {
  /** 任意タスク（スキップ可能） */
  is_optional: boolean;

  /** 最大試行回数（1以上） */
  max_retries: number;

  /** 1回あたりのタイムアウト（秒） */
  timeout_seconds: number;

  /** 回復方針 */
  recovery_strategy: RecoveryStrategy;
}

export const DEFAULT_SUBTASK_CONFIG: SubTaskConfig = {
  is_optional: false,
  max_retries: 3,
  timeout_seconds: 60,
  recovery_strategy: RecoveryStrategy.RETRY,
};

/**
 * サブタスク（スケジュール可能な最小単位）
 */
export interface SubTask {
  id: string;
  name: string;
  description: string;

  /** 実行するケイパビリティ名 */
  capability: string;

  params: Record<string, unknown>;

  /** 依存するサブタスクID */
  depends_on: string[];

  status: SubTaskStatus;
  priority: ExecutionPriority;
  config: SubTaskConfig;

  result: Record<string, unknown> | null;
  error: string | null;
  error_code: string | null;
  retry_count: number;

  /** 代替ケイパビリティで完了した場合の名前 */
  alternative_capability: string | null;

  created_at: Date;
  started_at: Date | null;
  completed_at: Date | null;
}

/**
 * サブタスク記述子（分解結果・計画入力）
 */
export interface SubTaskDescriptor {
  id?: string;
  name: string;
  description?: string;
  capability: string;
  params?: Record<string, unknown>;
  depends_on?: string[];
  priority?: ExecutionPriority;
  config?: Partial<SubTaskConfig>;
}

// =============================================================================
// ExecutionPlan
// =============================================================================

/**
 * 実行計画
 */
export interface ExecutionPlan {
  id: string;
  name: string;
  description: string;
  original_request: string;

  /** トポロジカル順のサブタスク */
  subtasks: SubTask[];

  parallel_execution: boolean;
  continue_on_failure: boolean;
  status: PlanStatus;

  quality_checks_enabled: boolean;
  required_quality_score: number;

  context: WorkflowContext;

  created_at: Date;
  started_at: Date | null;
  completed_at: Date | null;
}

// =============================================================================
// Reports
// =============================================================================

/**
 * 進捗レポート（派生スナップショット）
 */
export interface ProgressReport {
  plan_id: string;
  plan_name: string;
  total: number;
  counts: Record<SubTaskStatus, number>;

  /** 進捗率（0-100） */
  percentage: number;

  current_activity: string;
  issues: string[];
  generated_at: Date;
}

/**
 * 個別品質チェック結果
 */
export interface QualityCheckOutcome {
  name: string;
  verdict: QualityVerdict;

  /** 0.0 - 1.0 */
  score: number;

  message: string;
}

/**
 * 品質レポート
 */
export interface QualityReport {
  plan_id: string;
  verdict: QualityVerdict;
  score: number;
  checks: QualityCheckOutcome[];
  issues: string[];
  warnings: string[];
  recommended_actions: string[];
  meets_required_score: boolean;
  checked_at: Date;
}

// =============================================================================
// Escalation
// =============================================================================

export interface EscalationOption {
  id: string;
  label: string;
  description?: string;
}

/**
 * エスカレーション要求
 */
export interface EscalationRequest {
  id: string;
  plan_id: string;
  subtask_id: string | null;
  kind: EscalationKind;
  severity: EscalationSeverity;

  title: string;
  description: string;
  context: string | null;

  options: EscalationOption[];
  recommendation: string | null;
  recommendation_reason: string | null;

  status: EscalationStatus;
  response: string | null;
  response_reason: string | null;

  created_at: Date;
  expires_at: Date;
  responded_at: Date | null;

  /** 配信記録 */
  notification_sent: boolean;
  notification_target: string | null;
  notification_message_id: string | null;
  notification_error: string | null;
}

// =============================================================================
// Recovery / Result
// =============================================================================

export type ErrorCategory = 'configuration' | 'transient' | 'permission' | 'data' | 'unknown';

/**
 * 例外からの回復結果
 */
export interface RecoveryResult {
  strategy: RecoveryStrategy;
  success: boolean;
  message: string;
  error_category: ErrorCategory;
  alternatives: string[];
  escalation?: EscalationRequest;
  retry_after_ms?: number;
}

/**
 * 実行結果（不変）
 */
export interface ExecutionResult {
  plan_id: string | null;
  plan_name: string;
  success: boolean;

  /** 人間の判断待ち */
  requires_human_decision: boolean;

  /** ユーザー向けメッセージ（内部IDやスタックトレースを含まない） */
  message: string;

  completed_subtasks: string[];
  failed_subtasks: string[];
  skipped_subtasks: string[];
  escalated_subtasks: string[];

  quality_score: number | null;
  quality_report: QualityReport | null;
  escalations: EscalationRequest[];

  /** 実行されたウェーブ（サブタスク名） */
  execution_waves: string[][];

  total_execution_time_ms: number;
  retry_count: number;
  suggestions: string[];

  error_code: string | null;
  started_at: Date;
  completed_at: Date;
}

// =============================================================================
// Collaborator interfaces
// =============================================================================

/**
 * ワークフローロガー
 */
export interface WorkflowLogger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

/**
 * ケイパビリティ実行結果
 */
export interface CapabilityResult {
  success: boolean;
  data?: Record<string, unknown>;
  message?: string;
  error?: string;
}

/**
 * ケイパビリティ実行時のコンテキスト
 */
export interface CapabilityContext {
  plan_id: string | null;
  subtask_id: string;
  attempt: number;
  workflow: WorkflowContext;
  logger: WorkflowLogger;
}

/**
 * ケイパビリティハンドラー関数の型
 */
export type CapabilityHandler = (
  params: Record<string, unknown>,
  context: CapabilityContext
) => Promise<CapabilityResult>;

/**
 * 分解オラクルが返すサブタスク
 */
export interface OracleSubTask {
  name: string;
  description?: string;
  action: string;
  params: Record<string, unknown>;

  /** 依存するサブタスク名 */
  depends_on: string[];
}

/**
 * 外部分解オラクル（LLMなど）
 */
export interface DecompositionOracle {
  decompose(
    request: string,
    context: WorkflowContext,
    extractedParams: Record<string, unknown>
  ): Promise<OracleSubTask[] | null>;
}

/**
 * エスカレーション通知チャネル
 */
export interface EscalationNotifier {
  /** 配信IDを返す。失敗時は throw */
  send(target: string, message: string): Promise<string>;
}

/**
 * LLMクライアントインターフェース
 */
export interface LLMClient {
  chat(params: LLMChatParams): Promise<LLMChatResponse>;
}

export interface LLMChatParams {
  model?: string;
  system?: string;
  messages: LLMMessage[];
  max_tokens?: number;
  temperature?: number;
}

export interface LLMMessage {
  role: 'user' | 'assistant';
  content: string;
}

export interface LLMChatResponse {
  content: string;
  tokens_used: {
    input: number;
    output: number;
  };
  model: string;
}
