// @taskflow/worker
// Inngest host: workflow requests and escalation responses

export * from './lib/inngest/client';
export { functions, handleWorkflowExecute, handleEscalationResponse } from './lib/inngest/functions';
export * from './lib/workflow/runtime';
export * from './lib/workflow/handlers';
export * from './lib/validation/event-schemas';
export { createLLMClient, DEFAULT_LLM_MODEL } from './lib/llm/client';
export { SlackEscalationNotifier, buildSlackPayload } from './lib/notifications/slack';
export { createGeneralResponseHandler } from './lib/capabilities/general-response';
