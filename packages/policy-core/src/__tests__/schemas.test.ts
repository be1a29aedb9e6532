/**
 * Payload Schema Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { ValidationError } from '@stagegate/lib-core';
import { PolicyEngine } from '../engine';
import { createDefaultPolicyEngine, defineRole } from '../roles';
import {
  accessContextSchema,
  createDecisionExample,
  evaluatePayload,
  objectRoleAssignmentSchema,
  parsePayload,
  roleDefinitionSchema,
  toAccessContext,
  toAssignmentResponse,
  toResourceAttributes,
  toRoleCatalogueEntry,
  toRoleDefinition,
} from '../schemas';

describe('Payload schemas', () => {
  describe('parsePayload', () => {
    it('should apply defaults to an access context', () => {
      const payload = parsePayload(accessContextSchema, { user_id: 'u1', tenant_id: 't1' });

      expect(payload).toEqual({
        user_id: 'u1',
        tenant_id: 't1',
        workspace_ids: [],
        manager_of: [],
        labels: [],
        ad_groups: [],
        attributes: {},
      });
    });

    it('should throw ValidationError with issue paths', () => {
      let caught: unknown;
      try {
        parsePayload(accessContextSchema, { tenant_id: 't1', labels: 'okr-expert' });
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(ValidationError);
      if (caught instanceof ValidationError) {
        expect(caught.issues.map((issue) => issue.path).sort()).toEqual(['labels', 'user_id']);
      }
    });

    it('should reject unknown object roles', () => {
      expect(() =>
        parsePayload(objectRoleAssignmentSchema, {
          user_id: 'u1',
          object_id: 'objective-1',
          role: 'owner',
        })
      ).toThrow(ValidationError);
    });
  });

  describe('mappers', () => {
    it('should map a context payload to sets', () => {
      const context = toAccessContext(
        parsePayload(accessContextSchema, {
          user_id: 'u1',
          tenant_id: 't1',
          manager_of: ['u2', 'u2'],
          level: null,
          attributes: { department: 'sales' },
        })
      );

      expect(context.userId).toBe('u1');
      expect([...context.managerOf]).toEqual(['u2']);
      expect(context.level).toBeUndefined();
      expect(context.attributes).toEqual({ department: 'sales' });
    });

    it('should let named resource fields win over extension attributes', () => {
      const attributes = toResourceAttributes({
        id: 'objective-1',
        owner_id: 'u2',
        workspace_ids: ['ws-1'],
        attributes: { id: 'other', workspace_ids: ['ws-9'], region: 'eu' },
      });

      expect(attributes).toEqual({
        id: 'objective-1',
        owner_id: 'u2',
        workspace_ids: ['ws-1'],
        region: 'eu',
      });
    });

    it('should omit absent id and owner', () => {
      expect(
        toResourceAttributes({ id: null, owner_id: undefined, workspace_ids: [], attributes: {} })
      ).toEqual({ workspace_ids: [] });
    });

    it('should build a role definition from a payload', () => {
      const role = toRoleDefinition(
        parsePayload(roleDefinitionSchema, {
          name: 'manager',
          permissions: ['workflow:approve'],
          conditions: [
            {
              attribute: 'manager_of',
              operator: 'match_resource',
              resource_attribute: 'owner_id',
            },
          ],
          implied_roles: ['viewer'],
        })
      );

      expect(role.name).toBe('manager');
      expect(role.conditions).toHaveLength(1);
      expect(role.conditions[0].resourceAttribute).toBe('owner_id');
      expect(role.conditions[0].values.size).toBe(0);
      expect([...role.impliedRoles]).toEqual(['viewer']);
    });

    it('should sort catalogue entries', () => {
      const entry = toRoleCatalogueEntry(
        defineRole({ name: 'lead', permissions: ['b', 'a'], impliedRoles: ['z', 'y'] })
      );

      expect(entry).toEqual({ name: 'lead', permissions: ['a', 'b'], implied_roles: ['y', 'z'] });
    });

    it('should report a user assignment', () => {
      const engine = createDefaultPolicyEngine();
      engine.assignRole('u1', 'manager');
      engine.assignRole('u1', 'global_admin');

      expect(toAssignmentResponse(engine, 'u1')).toEqual({
        user_id: 'u1',
        roles: ['global_admin', 'manager'],
      });
    });
  });

  describe('evaluatePayload', () => {
    let engine: PolicyEngine;

    beforeEach(() => {
      engine = createDefaultPolicyEngine();
    });

    it('should evaluate with the caller taken from the context', () => {
      engine.assignRole('u1', 'manager');

      const response = evaluatePayload(engine, {
        action: 'workflow:approve',
        context: { user_id: 'u1', tenant_id: 't1', manager_of: ['u2'] },
        resource: { id: 'objective-1', owner_id: 'u2' },
      });

      expect(response).toEqual({
        decision: 'allow',
        permissions: ['workflow:approve', 'workflow:return', 'workflow:view'],
      });
    });

    it('should fall back to stored object roles when object_roles is null', () => {
      engine.grantObjectRole('u1', 'objective-1', 'viewer');

      const response = evaluatePayload(engine, {
        action: 'okr:view',
        context: { user_id: 'u1', tenant_id: 't1' },
        resource: { id: 'objective-1' },
        object_roles: null,
      });

      expect(response.decision).toBe('allow');
    });

    it('should honour an explicit empty object_roles list', () => {
      engine.grantObjectRole('u1', 'objective-1', 'viewer');

      const response = evaluatePayload(engine, {
        action: 'okr:view',
        context: { user_id: 'u1', tenant_id: 't1' },
        resource: { id: 'objective-1' },
        object_roles: [],
      });

      expect(response).toEqual({ decision: 'deny', permissions: [] });
    });

    it('should reject an invalid payload', () => {
      expect(() => evaluatePayload(engine, { context: { user_id: 'u1' } })).toThrow(
        ValidationError
      );
    });
  });

  describe('createDecisionExample', () => {
    it('should allow through the approver object role alone', () => {
      expect(createDecisionExample(createDefaultPolicyEngine())).toEqual({
        decision: 'allow',
        permissions: ['workflow:approve', 'workflow:view'],
      });
    });

    it('should union role and object-role permissions', () => {
      const engine = createDefaultPolicyEngine();
      engine.assignRole('user-1', 'okr_expert');

      expect(createDecisionExample(engine).permissions).toEqual([
        'workflow:approve',
        'workflow:return',
        'workflow:review',
        'workflow:view',
      ]);
    });

    it('should deny on an engine without the object role permissions', () => {
      const engine = new PolicyEngine();
      engine.configureObjectRolePermissions('approver', []);

      expect(createDecisionExample(engine)).toEqual({ decision: 'deny', permissions: [] });
    });
  });
});
