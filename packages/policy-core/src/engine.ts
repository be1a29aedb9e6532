/**
 * Policy Engine
 *
 * Combines three sources of permissions:
 * - RBAC: named roles assigned to users, with implied roles resolved recursively
 * - ABAC: attribute conditions gating each role against caller and resource context
 * - Object roles: per-resource grants layered on top of RBAC
 *
 * Evaluation is synchronous and never throws for a denial; the decision and
 * the full resolved permission set are returned together.
 */

import { ConfigurationError, createLogger, type Logger } from '@stagegate/lib-core';
import { evaluateConditions } from './conditions';
import {
  AccessDecision,
  OBJECT_ROLES,
  ObjectRole,
  type AccessContext,
  type EvaluationRequest,
  type PolicyDecision,
  type ResourceAttributes,
  type RoleDefinition,
} from './types';

/**
 * Policy Engine configuration
 */
export interface PolicyEngineConfig {
  /** Log every decision at debug level */
  verbose: boolean;

  /** Logger to write to (default: module logger 'POLICY') */
  logger?: Logger;
}

/**
 * Default permission sets granted by object roles
 */
export const DEFAULT_OBJECT_ROLE_PERMISSIONS: Readonly<Record<ObjectRole, readonly string[]>> = {
  [ObjectRole.VIEWER]: ['workflow:view', 'okr:view'],
  [ObjectRole.EDITOR]: ['workflow:view', 'workflow:edit', 'okr:edit'],
  [ObjectRole.APPROVER]: ['workflow:view', 'workflow:approve'],
};

function objectRoleKey(objectId: string, userId: string): string {
  return JSON.stringify([objectId, userId]);
}

/**
 * Access Policy Engine
 *
 * Holds the role catalogue, user assignments and the object-role overlay.
 * Construct one per process and pass it to whatever needs decisions.
 */
export class PolicyEngine {
  private readonly roles = new Map<string, RoleDefinition>();
  private readonly assignments = new Map<string, Set<string>>();
  private readonly objectRoles = new Map<string, Set<ObjectRole>>();
  private readonly objectRolePermissions = new Map<ObjectRole, ReadonlySet<string>>();
  private readonly config: PolicyEngineConfig;
  private readonly log: Logger;

  constructor(config: Partial<PolicyEngineConfig> = {}) {
    this.config = {
      verbose: false,
      ...config,
    };
    this.log = this.config.logger ?? createLogger().module('POLICY');

    for (const role of OBJECT_ROLES) {
      this.objectRolePermissions.set(role, new Set(DEFAULT_OBJECT_ROLE_PERMISSIONS[role]));
    }
  }

  // ==========================================================================
  // Role catalogue
  // ==========================================================================

  /**
   * Register or overwrite a role definition (last write wins)
   */
  registerRole(role: RoleDefinition): void {
    this.roles.set(role.name, role);
  }

  /**
   * Look up a registered role
   */
  getRole(name: string): RoleDefinition | undefined {
    return this.roles.get(name);
  }

  /**
   * Snapshot of all registered roles, sorted by name
   */
  describeRoles(): RoleDefinition[] {
    return [...this.roles.values()].sort((a, b) =>
      a.name < b.name ? -1 : a.name > b.name ? 1 : 0
    );
  }

  // ==========================================================================
  // Role assignments
  // ==========================================================================

  /**
   * Assign a role to a user. Idempotent.
   *
   * @throws ConfigurationError if the role is not registered
   */
  assignRole(userId: string, roleName: string): void {
    if (!this.roles.has(roleName)) {
      throw new ConfigurationError(`Unknown role '${roleName}'`, roleName);
    }
    let assigned = this.assignments.get(userId);
    if (!assigned) {
      assigned = new Set();
      this.assignments.set(userId, assigned);
    }
    assigned.add(roleName);
  }

  /**
   * Remove a role from a user. No-op if it was never assigned.
   */
  revokeRole(userId: string, roleName: string): void {
    const assigned = this.assignments.get(userId);
    if (!assigned) return;
    assigned.delete(roleName);
    if (assigned.size === 0) {
      this.assignments.delete(userId);
    }
  }

  /**
   * Role names assigned to a user, sorted
   */
  getAssignments(userId: string): string[] {
    return [...(this.assignments.get(userId) ?? [])].sort();
  }

  // ==========================================================================
  // Object roles
  // ==========================================================================

  /**
   * Grant an object-level role to a user for one resource
   */
  grantObjectRole(userId: string, objectId: string, role: ObjectRole): void {
    const key = objectRoleKey(objectId, userId);
    let granted = this.objectRoles.get(key);
    if (!granted) {
      granted = new Set();
      this.objectRoles.set(key, granted);
    }
    granted.add(role);
  }

  /**
   * Revoke an object-level role. No-op if it was never granted.
   */
  revokeObjectRole(userId: string, objectId: string, role: ObjectRole): void {
    const key = objectRoleKey(objectId, userId);
    const granted = this.objectRoles.get(key);
    if (!granted) return;
    granted.delete(role);
    if (granted.size === 0) {
      this.objectRoles.delete(key);
    }
  }

  /**
   * Object roles stored for (objectId, userId), sorted
   */
  getObjectRoles(userId: string, objectId: string): ObjectRole[] {
    return [...(this.objectRoles.get(objectRoleKey(objectId, userId)) ?? [])].sort();
  }

  /**
   * Replace the permission set granted by an object role
   */
  configureObjectRolePermissions(role: ObjectRole, permissions: Iterable<string>): void {
    this.objectRolePermissions.set(role, new Set(permissions));
  }

  /**
   * Permissions currently granted by an object role, sorted
   */
  getObjectRolePermissions(role: ObjectRole): string[] {
    return [...(this.objectRolePermissions.get(role) ?? [])].sort();
  }

  // ==========================================================================
  // Evaluation
  // ==========================================================================

  /**
   * Evaluate whether `action` is allowed.
   *
   * The RBAC permissions of every assigned role (whose conditions hold) are
   * unioned with the object-role permissions; the action is allowed iff it is
   * in that union.
   */
  evaluate(request: EvaluationRequest): PolicyDecision {
    const resource = request.resource ?? {};
    const permissions = this.collectRolePermissions(request.userId, request.context, resource);

    const objectRoles = request.objectRoles ?? this.storedObjectRoles(resource, request.userId);
    for (const role of objectRoles) {
      for (const permission of this.objectRolePermissions.get(role) ?? []) {
        permissions.add(permission);
      }
    }

    const allowed = permissions.has(request.action);
    const decision: PolicyDecision = {
      decision: allowed ? AccessDecision.ALLOW : AccessDecision.DENY,
      allowed,
      permissions: [...permissions].sort(),
      reason: allowed
        ? `Permission '${request.action}' granted`
        : `Permission '${request.action}' not in resolved permissions`,
    };

    if (this.config.verbose) {
      this.log.debug('Policy decision', {
        tenantId: request.context.tenantId,
        userId: request.userId,
        action: request.action,
        decision: decision.decision,
        permissions: decision.permissions,
      });
    }

    return decision;
  }

  /**
   * Shorthand for evaluate(request).allowed
   */
  isAllowed(request: EvaluationRequest): boolean {
    return this.evaluate(request).allowed;
  }

  private storedObjectRoles(resource: ResourceAttributes, userId: string): Iterable<ObjectRole> {
    const id = resource.id;
    const objectId = typeof id === 'string' ? id : '';
    return this.objectRoles.get(objectRoleKey(objectId, userId)) ?? [];
  }

  /**
   * Resolve permissions of all roles assigned to a user.
   *
   * One visited set is shared across the whole resolution so each role is
   * expanded at most once, which also terminates implication cycles.
   */
  private collectRolePermissions(
    userId: string,
    context: AccessContext,
    resource: ResourceAttributes
  ): Set<string> {
    const permissions = new Set<string>();
    const visited = new Set<string>();
    for (const roleName of this.assignments.get(userId) ?? []) {
      this.resolveRole(roleName, visited, context, resource, permissions);
    }
    return permissions;
  }

  private resolveRole(
    roleName: string,
    visited: Set<string>,
    context: AccessContext,
    resource: ResourceAttributes,
    into: Set<string>
  ): void {
    if (visited.has(roleName)) return;
    visited.add(roleName);

    const role = this.roles.get(roleName);
    if (!role) return;

    // A failing role contributes nothing, including roles reached only through it.
    if (!evaluateConditions(role.conditions, context, resource)) return;

    for (const permission of role.permissions) {
      into.add(permission);
    }
    for (const implied of role.impliedRoles) {
      this.resolveRole(implied, visited, context, resource, into);
    }
  }
}
