import { z } from 'zod';
import { WorkflowContextSchema } from '@taskflow/workflow-spec';

/**
 * workflow/execute.requested のペイロード
 */
export const WorkflowExecuteRequestedSchema = z.object({
  request: z.string().trim().min(1).max(2000),
  context: WorkflowContextSchema,
  request_id: z.string().min(1).optional(),
});

export type WorkflowExecuteRequestedData = z.infer<typeof WorkflowExecuteRequestedSchema>;

/**
 * escalation/responded のペイロード
 */
export const EscalationRespondedSchema = z.object({
  escalation_id: z.string().min(1),
  option_id: z.string().min(1),
  reason: z.string().max(500).optional(),
  tenant_id: z.string().min(1),
});

export type EscalationRespondedData = z.infer<typeof EscalationRespondedSchema>;

/**
 * 標準エラーコード
 */
export const ErrorCode = {
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  DISABLED: 'DISABLED',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * zod エラーを1行にまとめる
 */
export function formatZodError(error: z.ZodError): string {
  return error.errors.map((e) => `${e.path.join('.') || '(root)'}: ${e.message}`).join('; ');
}
