import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { CapabilityRegistry } from './registry';
import type { CapabilityContext } from '@taskflow/workflow-spec';

const noopLogger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

const context: CapabilityContext = {
  plan_id: 'plan-1',
  subtask_id: 'st-1',
  attempt: 1,
  workflow: { tenant_id: 'tenant-1' },
  logger: noopLogger,
};

describe('CapabilityRegistry', () => {
  it('should register and resolve handlers by name', async () => {
    const registry = new CapabilityRegistry().register(
      { name: 'chatwork_task_create', description: 'タスク作成' },
      async (params) => ({ success: true, data: { body: params.body } })
    );

    const capability = registry.get('chatwork_task_create');
    expect(capability).not.toBeNull();
    expect(await capability?.execute({ body: '資料作成' }, context)).toEqual({
      success: true,
      data: { body: '資料作成' },
    });
  });

  it('should return null for unknown names', () => {
    const registry = new CapabilityRegistry();

    expect(registry.get('missing')).toBeNull();
    expect(registry.has('missing')).toBe(false);
  });

  it('should list specs and keys', () => {
    const registry = new CapabilityRegistry()
      .register({ name: 'a', description: 'A' }, async () => ({ success: true }))
      .register({ name: 'b', description: 'B', is_primary: false }, async () => ({ success: true }));

    expect(registry.keys()).toEqual(['a', 'b']);
    expect(registry.list().map((s) => s.description)).toEqual(['A', 'B']);
    expect(registry.size).toBe(2);
    expect(registry.unregister('a')).toBe(true);
    expect(registry.size).toBe(1);
  });

  it('should validate params with the registered schema', () => {
    const registry = new CapabilityRegistry().register(
      { name: 'reserve_meeting_room', description: '会議室を予約' },
      async () => ({ success: true }),
      z.object({ room: z.string() })
    );

    const capability = registry.get('reserve_meeting_room');
    expect(capability?.validateParams({ room: 'A' }).success).toBe(true);
    expect(capability?.validateParams({}).success).toBe(false);
  });
});
