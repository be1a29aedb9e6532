/**
 * Role definitions and the built-in role catalogue.
 */

import { defineCondition } from './conditions';
import { PolicyEngine, type PolicyEngineConfig } from './engine';
import { ConditionOperator, type AttributeCondition, type RoleDefinition } from './types';

/**
 * Build an immutable role definition from plain data.
 *
 * @example
 * ```typescript
 * engine.registerRole(
 *   defineRole({
 *     name: 'manager',
 *     permissions: ['workflow:approve'],
 *     conditions: [
 *       defineCondition({
 *         attribute: 'manager_of',
 *         operator: ConditionOperator.MATCH_RESOURCE,
 *         resourceAttribute: 'owner_id',
 *       }),
 *     ],
 *   })
 * );
 * ```
 */
export function defineRole(input: {
  name: string;
  permissions?: Iterable<string>;
  conditions?: readonly AttributeCondition[];
  impliedRoles?: Iterable<string>;
}): RoleDefinition {
  return Object.freeze({
    name: input.name,
    permissions: new Set(input.permissions ?? []),
    conditions: Object.freeze([...(input.conditions ?? [])]),
    impliedRoles: new Set(input.impliedRoles ?? []),
  });
}

/** Every action the approval workflow knows about */
export const WORKFLOW_PERMISSIONS = [
  'workflow:create',
  'workflow:edit',
  'workflow:approve',
  'workflow:view',
  'workflow:submit',
  'workflow:return',
  'workflow:review',
  'workflow:reopen',
] as const;

/**
 * Built-in role catalogue
 *
 * - global_admin: every workflow action plus directory and role administration
 * - workspace_owner: drafts and submits objectives in workspaces they belong to
 * - okr_expert: reviews or returns objectives (label 'okr-expert')
 * - manager: approves or returns objectives owned by people they manage
 */
export const DEFAULT_ROLE_DEFINITIONS: readonly RoleDefinition[] = [
  defineRole({
    name: 'global_admin',
    permissions: [...WORKFLOW_PERMISSIONS, 'scim:manage', 'roles:assign'],
  }),
  defineRole({
    name: 'workspace_owner',
    permissions: ['workflow:view', 'workflow:edit', 'workflow:submit'],
    conditions: [
      defineCondition({
        attribute: 'workspace_ids',
        operator: ConditionOperator.MATCH_RESOURCE,
        resourceAttribute: 'workspace_ids',
      }),
    ],
  }),
  defineRole({
    name: 'okr_expert',
    permissions: ['workflow:view', 'workflow:review', 'workflow:return'],
    conditions: [
      defineCondition({
        attribute: 'labels',
        operator: ConditionOperator.CONTAINS,
        values: ['okr-expert'],
      }),
    ],
  }),
  defineRole({
    name: 'manager',
    permissions: ['workflow:view', 'workflow:approve', 'workflow:return'],
    conditions: [
      defineCondition({
        attribute: 'manager_of',
        operator: ConditionOperator.MATCH_RESOURCE,
        resourceAttribute: 'owner_id',
      }),
    ],
  }),
];

/**
 * Create a policy engine with the built-in role catalogue registered
 */
export function createDefaultPolicyEngine(config: Partial<PolicyEngineConfig> = {}): PolicyEngine {
  const engine = new PolicyEngine(config);
  for (const role of DEFAULT_ROLE_DEFINITIONS) {
    engine.registerRole(role);
  }
  return engine;
}
