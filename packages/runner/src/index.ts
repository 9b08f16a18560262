// @taskflow/runner
// Workflow planning, execution and escalation

export * from './errors';
export * from './state-machine';
export * from './redaction';
export * from './config';
export * from './backoff';
export * from './invoke';
export * from './planner';
export * from './progress-tracker';
export * from './quality-checker';
export * from './exception-handler';
export * from './escalation-manager';
export * from './result';
export * from './executor';
export * from './coordinator';
