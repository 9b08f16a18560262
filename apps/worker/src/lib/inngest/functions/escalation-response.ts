import { inngest, ESCALATION_RESPONDED } from '../client';
import { processEscalationResponse } from '../../workflow/handlers';
import { getWorkflowRuntime } from '../../workflow/runtime';

/**
 * エスカレーション応答ハンドラー（Inngest Function）
 */
export const handleEscalationResponse = inngest.createFunction(
  {
    id: 'escalation-responded',
    name: 'Escalation: Human Response',
  },
  { event: ESCALATION_RESPONDED },
  async ({ event }) => {
    const outcome = processEscalationResponse(getWorkflowRuntime(), event.data);

    console.log('[Escalation] Response processed', { status: outcome.status });
    return outcome;
  }
);
