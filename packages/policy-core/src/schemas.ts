/**
 * Payload Schemas
 *
 * Zod schemas for the plain-data payloads exchanged with the request layer,
 * and mappers between those payloads and the engine's domain values.
 * Wire keys are snake_case; domain values are camelCase with sets.
 */

import { z } from 'zod';
import { ValidationError } from '@stagegate/lib-core';
import { defineCondition } from './conditions';
import { createAccessContext } from './context';
import type { PolicyEngine } from './engine';
import { defineRole } from './roles';
import type {
  AccessContext,
  AttributeValue,
  ObjectRole,
  PolicyDecision,
  ResourceAttributes,
  RoleDefinition,
} from './types';

export const attributeValueSchema = z.union([z.string(), z.array(z.string())]);

export const objectRoleSchema = z.enum(['viewer', 'editor', 'approver']);

export const conditionOperatorSchema = z.enum(['any', 'equals', 'contains', 'match_resource']);

export const accessContextSchema = z.object({
  user_id: z.string().min(1),
  tenant_id: z.string().min(1),
  workspace_ids: z.array(z.string()).default([]),
  manager_of: z.array(z.string()).default([]),
  labels: z.array(z.string()).default([]),
  ad_groups: z.array(z.string()).default([]),
  level: z.string().nullish(),
  attributes: z.record(attributeValueSchema).default({}),
});

export const accessResourceSchema = z.object({
  id: z.string().nullish(),
  workspace_ids: z.array(z.string()).default([]),
  owner_id: z.string().nullish(),
  attributes: z.record(attributeValueSchema).default({}),
});

export const evaluationRequestSchema = z.object({
  action: z.string().min(1),
  context: accessContextSchema,
  resource: accessResourceSchema.nullish(),
  object_roles: z.array(objectRoleSchema).nullish(),
});

export const roleAssignmentSchema = z.object({
  user_id: z.string().min(1),
  role: z.string().min(1),
});

export const objectRoleAssignmentSchema = z.object({
  user_id: z.string().min(1),
  object_id: z.string().min(1),
  role: objectRoleSchema,
});

export const attributeConditionSchema = z.object({
  attribute: z.string().min(1),
  operator: conditionOperatorSchema,
  values: z.array(z.string()).default([]),
  resource_attribute: z.string().nullish(),
});

export const roleDefinitionSchema = z.object({
  name: z.string().min(1),
  permissions: z.array(z.string()).default([]),
  conditions: z.array(attributeConditionSchema).default([]),
  implied_roles: z.array(z.string()).default([]),
});

export type AccessContextPayload = z.infer<typeof accessContextSchema>;
export type AccessResourcePayload = z.infer<typeof accessResourceSchema>;
export type EvaluationRequestPayload = z.infer<typeof evaluationRequestSchema>;
export type RoleDefinitionPayload = z.infer<typeof roleDefinitionSchema>;

/**
 * Parse a payload, converting zod issues into a ValidationError.
 */
export function parsePayload<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    throw new ValidationError('Invalid request payload', issues);
  }
  return result.data;
}

export function toAccessContext(payload: AccessContextPayload): AccessContext {
  return createAccessContext({
    userId: payload.user_id,
    tenantId: payload.tenant_id,
    workspaceIds: payload.workspace_ids,
    managerOf: payload.manager_of,
    labels: payload.labels,
    adGroups: payload.ad_groups,
    level: payload.level,
    attributes: payload.attributes,
  });
}

/**
 * Named resource fields win over same-named keys in `attributes`.
 */
export function toResourceAttributes(payload: AccessResourcePayload): ResourceAttributes {
  const attributes: Record<string, AttributeValue> = {
    ...payload.attributes,
    workspace_ids: payload.workspace_ids,
  };
  if (payload.id) attributes.id = payload.id;
  if (payload.owner_id) attributes.owner_id = payload.owner_id;
  return attributes;
}

export function toRoleDefinition(payload: RoleDefinitionPayload): RoleDefinition {
  return defineRole({
    name: payload.name,
    permissions: payload.permissions,
    conditions: payload.conditions.map((condition) =>
      defineCondition({
        attribute: condition.attribute,
        operator: condition.operator,
        values: condition.values,
        resourceAttribute: condition.resource_attribute ?? undefined,
      })
    ),
    impliedRoles: payload.implied_roles,
  });
}

// =============================================================================
// Response shapes
// =============================================================================

export interface RoleCatalogueEntry {
  name: string;
  permissions: string[];
  implied_roles: string[];
}

export interface EvaluationResponse {
  decision: PolicyDecision['decision'];
  permissions: string[];
}

export interface AssignmentResponse {
  user_id: string;
  roles: string[];
}

export function toRoleCatalogueEntry(role: RoleDefinition): RoleCatalogueEntry {
  return {
    name: role.name,
    permissions: [...role.permissions].sort(),
    implied_roles: [...role.impliedRoles].sort(),
  };
}

export function toEvaluationResponse(decision: PolicyDecision): EvaluationResponse {
  return { decision: decision.decision, permissions: [...decision.permissions] };
}

export function toAssignmentResponse(engine: PolicyEngine, userId: string): AssignmentResponse {
  return { user_id: userId, roles: engine.getAssignments(userId) };
}

/**
 * Validate an evaluation payload and run it against the engine.
 * The caller id is taken from the context.
 */
export function evaluatePayload(engine: PolicyEngine, input: unknown): EvaluationResponse {
  const payload = parsePayload(evaluationRequestSchema, input);
  const context = toAccessContext(payload.context);
  const objectRoles: ObjectRole[] | undefined = payload.object_roles ?? undefined;
  const decision = engine.evaluate({
    userId: context.userId,
    action: payload.action,
    context,
    resource: payload.resource ? toResourceAttributes(payload.resource) : {},
    objectRoles,
  });
  return toEvaluationResponse(decision);
}

/**
 * Canned evaluation showing RBAC, ABAC and object roles together:
 * a manager of the objective owner, labelled okr-expert, holding the approver
 * object role, asks to approve.
 */
export function createDecisionExample(engine: PolicyEngine): EvaluationResponse {
  return evaluatePayload(engine, {
    action: 'workflow:approve',
    context: {
      user_id: 'user-1',
      tenant_id: 'tenant-1',
      workspace_ids: ['workspace-1'],
      manager_of: ['user-2'],
      labels: ['okr-expert'],
    },
    resource: {
      id: 'objective-1',
      workspace_ids: ['workspace-1'],
      owner_id: 'user-2',
    },
    object_roles: ['approver'],
  });
}
