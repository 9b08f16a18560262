import { describe, it, expect } from 'vitest';
import { loadWorkflowConfig, isWorkflowOrchestrationEnabled, DEFAULT_WORKFLOW_CONFIG } from './config';
import { InvalidConfigurationError } from './errors';

describe('loadWorkflowConfig', () => {
  it('should apply defaults', () => {
    expect(DEFAULT_WORKFLOW_CONFIG).toEqual({
      enabled: false,
      parallelExecution: true,
      continueOnFailure: false,
      qualityChecksEnabled: true,
      requiredQualityScore: 0.8,
      progress: { thresholdPercent: 25, staleSeconds: 60 },
      backoff: { baseDelayMs: 1000, maxDelayMs: 30000, maxRetries: 3 },
      escalation: { expiryMinutes: 30, defaultTarget: null },
      llmDecompositionEnabled: false,
    });
    expect(isWorkflowOrchestrationEnabled(DEFAULT_WORKFLOW_CONFIG)).toBe(false);
  });

  it('should coerce env strings', () => {
    const config = loadWorkflowConfig({
      WORKFLOW_ORCHESTRATION_ENABLED: 'TRUE',
      WORKFLOW_PARALLEL_EXECUTION: '0',
      WORKFLOW_PROGRESS_THRESHOLD_PERCENT: '10',
      WORKFLOW_REQUIRED_QUALITY_SCORE: '0.5',
      WORKFLOW_ESCALATION_DEFAULT_TARGET: 'ops-room',
    });

    expect(config.enabled).toBe(true);
    expect(config.parallelExecution).toBe(false);
    expect(config.progress.thresholdPercent).toBe(10);
    expect(config.requiredQualityScore).toBe(0.5);
    expect(config.escalation.defaultTarget).toBe('ops-room');
  });

  it('should reject invalid numbers', () => {
    expect(() => loadWorkflowConfig({ WORKFLOW_PROGRESS_STALE_SECONDS: 'soon' })).toThrow(
      InvalidConfigurationError
    );
    expect(() => loadWorkflowConfig({ WORKFLOW_REQUIRED_QUALITY_SCORE: '1.5' })).toThrow(
      InvalidConfigurationError
    );
  });
});
