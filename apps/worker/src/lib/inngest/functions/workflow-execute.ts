import { inngest, WORKFLOW_EXECUTE_COMPLETED, WORKFLOW_EXECUTE_REQUESTED } from '../client';
import { processWorkflowRequest } from '../../workflow/handlers';
import { getWorkflowRuntime } from '../../workflow/runtime';

/**
 * ワークフロー実行ハンドラー（Inngest Function）
 */
export const handleWorkflowExecute = inngest.createFunction(
  {
    id: 'workflow-execute',
    retries: 0, // リトライは Executor / ExceptionHandler で管理
    concurrency: {
      limit: 5,
      key: 'event.data.context.tenant_id',
    },
  },
  { event: WORKFLOW_EXECUTE_REQUESTED },
  async ({ event, step }) => {
    // 1. 実行（ステップ内で1回だけ）
    const outcome = await step.run('execute-workflow', () => processWorkflowRequest(getWorkflowRuntime(), event.data));

    // 2. 完了イベント発火
    if (outcome.status === 'completed') {
      await step.sendEvent('notify-completion', {
        name: WORKFLOW_EXECUTE_COMPLETED,
        data: {
          plan_id: outcome.summary.plan_id,
          success: outcome.summary.success,
          requires_human_decision: outcome.summary.requires_human_decision,
          escalation_ids: outcome.summary.escalation_ids,
        },
      });
    }

    return outcome;
  }
);
