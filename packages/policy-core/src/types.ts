/**
 * Policy Core Types
 *
 * Type definitions for the access policy engine:
 * RBAC role definitions, ABAC attribute conditions and object-scoped roles.
 */

/**
 * Attribute value as supplied by callers: a single string or a list of strings.
 * Conditions always compare the value coerced to a set.
 */
export type AttributeValue = string | readonly string[];

/**
 * Open-ended attribute map (extension attributes, resource attributes)
 */
export type AttributeMap = Readonly<Record<string, AttributeValue>>;

/**
 * Runtime attributes about the caller, built by the authentication layer.
 * Trusted verbatim; this package performs no identity verification.
 */
export interface AccessContext {
  readonly userId: string;
  readonly tenantId: string;
  readonly workspaceIds: ReadonlySet<string>;
  /** User ids this caller manages */
  readonly managerOf: ReadonlySet<string>;
  readonly labels: ReadonlySet<string>;
  /** Directory group memberships */
  readonly adGroups: ReadonlySet<string>;
  readonly level?: string;
  /** Extension attributes not promoted to named fields */
  readonly attributes: AttributeMap;
}

/**
 * Plain-data form of AccessContext (arrays instead of sets, everything optional
 * except the identifiers).
 */
export interface AccessContextInput {
  userId: string;
  tenantId: string;
  workspaceIds?: Iterable<string>;
  managerOf?: Iterable<string>;
  labels?: Iterable<string>;
  adGroups?: Iterable<string>;
  level?: string | null;
  attributes?: Record<string, AttributeValue>;
}

/**
 * Resource metadata supplied by the domain layer (owner, workspaces, id, ...)
 *
 * The `id` key identifies the resource for object-role lookup.
 */
export type ResourceAttributes = AttributeMap;

/**
 * Supported operators for attribute conditions
 */
export const ConditionOperator = {
  /** Context attribute is non-empty */
  ANY: 'any',
  /** Context attribute is non-empty and exactly equals the value set */
  EQUALS: 'equals',
  /** Context attribute intersects the value set */
  CONTAINS: 'contains',
  /** Context attribute intersects the named resource attribute */
  MATCH_RESOURCE: 'match_resource',
} as const;

export type ConditionOperator = (typeof ConditionOperator)[keyof typeof ConditionOperator];

/**
 * Declarative ABAC rule bound to a role definition
 */
export interface AttributeCondition {
  /** Context attribute name (snake_case named field or extension key) */
  readonly attribute: string;
  readonly operator: ConditionOperator;
  readonly values: ReadonlySet<string>;
  /** Resource attribute compared by match_resource */
  readonly resourceAttribute?: string;
}

/**
 * RBAC role with optional ABAC conditions and implied roles
 */
export interface RoleDefinition {
  readonly name: string;
  readonly permissions: ReadonlySet<string>;
  /** All must hold for the role to grant anything */
  readonly conditions: readonly AttributeCondition[];
  readonly impliedRoles: ReadonlySet<string>;
}

/**
 * Object-level roles, scoped to one resource and one user
 */
export const ObjectRole = {
  VIEWER: 'viewer',
  EDITOR: 'editor',
  APPROVER: 'approver',
} as const;

export type ObjectRole = (typeof ObjectRole)[keyof typeof ObjectRole];

export const OBJECT_ROLES: readonly ObjectRole[] = [
  ObjectRole.VIEWER,
  ObjectRole.EDITOR,
  ObjectRole.APPROVER,
];

/**
 * Decision outcomes returned by the policy engine
 */
export const AccessDecision = {
  ALLOW: 'allow',
  DENY: 'deny',
} as const;

export type AccessDecision = (typeof AccessDecision)[keyof typeof AccessDecision];

/**
 * Input to PolicyEngine.evaluate()
 */
export interface EvaluationRequest {
  userId: string;
  action: string;
  context: AccessContext;
  resource?: ResourceAttributes;
  /**
   * Object roles to use instead of the stored overlay.
   * Any iterable (including an empty one) replaces the lookup entirely;
   * undefined or null means "look up the overlay for (resource.id, userId)".
   */
  objectRoles?: Iterable<ObjectRole> | null;
}

/**
 * Result of policy evaluation
 */
export interface PolicyDecision {
  decision: AccessDecision;
  allowed: boolean;
  /** Full resolved permission set, sorted */
  permissions: string[];
  /** Reason for the decision */
  reason: string;
}
