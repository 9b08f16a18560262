import { handleWorkflowExecute } from './workflow-execute';
import { handleEscalationResponse } from './escalation-response';

export { handleWorkflowExecute, handleEscalationResponse };

/**
 * 登録する全関数
 */
export const functions = [handleWorkflowExecute, handleEscalationResponse];
