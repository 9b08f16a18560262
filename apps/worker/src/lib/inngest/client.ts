import { Inngest } from 'inngest';

/**
 * Inngest クライアント
 */
export const inngest = new Inngest({
  id: 'taskflow',
  eventKey: process.env.INNGEST_EVENT_KEY,
});

export const WORKFLOW_EXECUTE_REQUESTED = 'workflow/execute.requested';
export const WORKFLOW_EXECUTE_COMPLETED = 'workflow/execute.completed';
export const ESCALATION_RESPONDED = 'escalation/responded';
