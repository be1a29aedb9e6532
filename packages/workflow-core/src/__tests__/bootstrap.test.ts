import { describe, it, expect, vi, afterEach } from 'vitest';
import { createAccessContext } from '@stagegate/policy-core';
import { getLoggerConfig } from '@stagegate/lib-core';
import { createStagegateCore } from '../bootstrap';

describe('createStagegateCore', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should seed the default roles and share one policy engine', () => {
    const core = createStagegateCore({ LOG_LEVEL: 'error' });

    expect(core.policyEngine.describeRoles().map((role) => role.name)).toEqual([
      'global_admin',
      'manager',
      'okr_expert',
      'workspace_owner',
    ]);

    core.policyEngine.assignRole('admin', 'global_admin');
    const instance = core.workflowEngine.createInstance({
      objectiveId: 'objective-1',
      ownerId: 'owner',
      tenantId: 't1',
      workspaceIds: [],
    });
    const advanced = core.workflowEngine.advance({
      workflowId: instance.id,
      action: 'workflow:submit',
      actor: createAccessContext({ userId: 'admin', tenantId: 't1' }),
    });

    expect(advanced.state).toBe('expert_review');
  });

  it('should skip seeding when disabled', () => {
    const core = createStagegateCore({ LOG_LEVEL: 'error', SEED_DEFAULT_ROLES: 'false' });

    expect(core.policyEngine.describeRoles()).toEqual([]);
    expect(core.config.seedDefaultRoles).toBe(false);
  });

  it('should apply the logging configuration', () => {
    createStagegateCore({ LOG_LEVEL: 'warn', LOG_FORMAT: 'pretty', LOG_HASH_USER_ID: '1' });

    expect(getLoggerConfig()).toEqual({ level: 'warn', format: 'pretty', hashUserId: true });
  });

  it('should log policy decisions when policy logging is enabled', () => {
    const debugSpy = vi.spyOn(console, 'debug').mockImplementation(() => {});
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const core = createStagegateCore({ LOG_LEVEL: 'debug', ENABLE_POLICY_LOGGING: 'true' });

    core.policyEngine.evaluate({
      userId: 'u1',
      action: 'workflow:view',
      context: createAccessContext({ userId: 'u1', tenantId: 't1' }),
    });

    expect(debugSpy).toHaveBeenCalledTimes(1);
    const entry = JSON.parse(String(debugSpy.mock.calls[0][0]));
    expect(entry).toMatchObject({
      level: 'debug',
      module: 'POLICY',
      message: 'Policy decision',
      decision: 'deny',
    });
  });

  it('should pass workflow options through', () => {
    const core = createStagegateCore({ LOG_LEVEL: 'error' }, { generateId: () => 'wf-fixed' });

    expect(
      core.workflowEngine.createInstance({
        objectiveId: 'objective-1',
        ownerId: 'owner',
        tenantId: 't1',
        workspaceIds: [],
      }).id
    ).toBe('wf-fixed');
  });
});
