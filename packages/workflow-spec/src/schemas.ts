import { z } from 'zod';
import {
  SubTaskStatus,
  ExecutionPriority,
  RecoveryStrategy,
  EscalationSeverity,
} from './types';

/**
 * サブタスク状態スキーマ
 */
export const SubTaskStatusSchema = z.nativeEnum(SubTaskStatus);

/**
 * 優先度スキーマ
 */
export const ExecutionPrioritySchema = z.nativeEnum(ExecutionPriority);

/**
 * 回復方針スキーマ
 */
export const RecoveryStrategySchema = z.nativeEnum(RecoveryStrategy);

/**
 * エスカレーション重要度スキーマ
 */
export const EscalationSeveritySchema = z.nativeEnum(EscalationSeverity);

/**
 * サブタスク実行設定スキーマ
 */
export const SubTaskConfigSchema = z.object({
  is_optional: z.boolean().default(false),
  max_retries: z.number().int().min(1).default(3),
  timeout_seconds: z.number().positive().default(60),
  recovery_strategy: RecoveryStrategySchema.default(RecoveryStrategy.RETRY),
});

/**
 * サブタスク記述子スキーマ
 */
export const SubTaskDescriptorSchema = z.object({
  id: z.string().min(1).optional(),
  name: z.string().min(1).max(100),
  description: z.string().max(1000).optional(),
  capability: z.string().min(1),
  params: z.record(z.unknown()).optional(),
  depends_on: z.array(z.string()).optional(),
  priority: ExecutionPrioritySchema.optional(),
  config: SubTaskConfigSchema.partial().optional(),
});

/**
 * ワークフローコンテキストスキーマ
 */
export const WorkflowContextSchema = z.object({
  tenant_id: z.string().min(1),
  room_id: z.string().optional(),
  account_id: z.string().optional(),
  sender_name: z.string().optional(),
  known_person_names: z.array(z.string()).optional(),
  trace_id: z.string().optional(),
});

/**
 * ケイパビリティ実行結果スキーマ
 */
export const CapabilityResultSchema = z.object({
  success: z.boolean(),
  data: z.record(z.unknown()).optional(),
  message: z.string().optional(),
  error: z.string().optional(),
});

/**
 * オラクル分解結果スキーマ
 */
export const OracleSubTaskSchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  action: z.string().min(1),
  params: z.record(z.unknown()).default({}),
  depends_on: z.array(z.string()).default([]),
});

export const OracleResponseSchema = z.object({
  subtasks: z.array(OracleSubTaskSchema),
});

/**
 * サブタスク記述子の検証
 */
export function validateSubTaskDescriptor(descriptor: unknown) {
  return SubTaskDescriptorSchema.safeParse(descriptor);
}

/**
 * ケイパビリティ実行結果の検証
 */
export function validateCapabilityResult(result: unknown) {
  return CapabilityResultSchema.safeParse(result);
}

/**
 * ワークフローコンテキストの検証
 */
export function validateWorkflowContext(context: unknown) {
  return WorkflowContextSchema.safeParse(context);
}
