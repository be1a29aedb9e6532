/**
 * @stagegate/policy-core
 *
 * Access policy engine combining RBAC, ABAC conditions and object roles.
 *
 * @example
 * ```typescript
 * import { createAccessContext, createDefaultPolicyEngine } from '@stagegate/policy-core';
 *
 * const engine = createDefaultPolicyEngine();
 * engine.assignRole('u1', 'manager');
 *
 * const decision = engine.evaluate({
 *   userId: 'u1',
 *   action: 'workflow:approve',
 *   context: createAccessContext({ userId: 'u1', tenantId: 't1', managerOf: ['u2'] }),
 *   resource: { id: 'objective-1', owner_id: 'u2' },
 * });
 *
 * if (decision.allowed) {
 *   // proceed
 * }
 * ```
 */

// Types
export { AccessDecision, ConditionOperator, ObjectRole, OBJECT_ROLES } from './types';
export type {
  AccessContext,
  AccessContextInput,
  AttributeCondition,
  AttributeMap,
  AttributeValue,
  EvaluationRequest,
  PolicyDecision,
  ResourceAttributes,
  RoleDefinition,
} from './types';

// Policy Engine
export { PolicyEngine, DEFAULT_OBJECT_ROLE_PERMISSIONS } from './engine';
export type { PolicyEngineConfig } from './engine';

// Context and conditions
export { createAccessContext, getContextAttribute, coerceToSet } from './context';
export { evaluateCondition, evaluateConditions, defineCondition } from './conditions';

// Role catalogue
export {
  defineRole,
  createDefaultPolicyEngine,
  DEFAULT_ROLE_DEFINITIONS,
  WORKFLOW_PERMISSIONS,
} from './roles';

// Object access helpers
export { canViewObject, canEditObject } from './object-access';

// Payload schemas
export {
  accessContextSchema,
  accessResourceSchema,
  attributeConditionSchema,
  evaluationRequestSchema,
  objectRoleAssignmentSchema,
  objectRoleSchema,
  roleAssignmentSchema,
  roleDefinitionSchema,
  parsePayload,
  toAccessContext,
  toResourceAttributes,
  toRoleDefinition,
  toRoleCatalogueEntry,
  toEvaluationResponse,
  toAssignmentResponse,
  evaluatePayload,
  createDecisionExample,
} from './schemas';
export type {
  AccessContextPayload,
  AccessResourcePayload,
  EvaluationRequestPayload,
  RoleDefinitionPayload,
  RoleCatalogueEntry,
  EvaluationResponse,
  AssignmentResponse,
} from './schemas';
