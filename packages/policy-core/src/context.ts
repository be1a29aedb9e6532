/**
 * Access context construction and attribute lookup.
 */

import type { AccessContext, AccessContextInput, AttributeMap, AttributeValue } from './types';

/**
 * Build an immutable AccessContext from plain data.
 */
export function createAccessContext(input: AccessContextInput): AccessContext {
  return Object.freeze({
    userId: input.userId,
    tenantId: input.tenantId,
    workspaceIds: new Set(input.workspaceIds ?? []),
    managerOf: new Set(input.managerOf ?? []),
    labels: new Set(input.labels ?? []),
    adGroups: new Set(input.adGroups ?? []),
    ...(input.level != null && { level: input.level }),
    attributes: Object.freeze({ ...input.attributes }),
  });
}

type ContextValue = AttributeValue | ReadonlySet<string> | undefined;

/**
 * Attribute names that resolve to named context fields.
 * Any other name falls back to the extension attribute map.
 */
const NAMED_ATTRIBUTES: Readonly<Record<string, (context: AccessContext) => ContextValue>> = {
  user_id: (context) => context.userId,
  tenant_id: (context) => context.tenantId,
  workspace_ids: (context) => context.workspaceIds,
  manager_of: (context) => context.managerOf,
  labels: (context) => context.labels,
  ad_groups: (context) => context.adGroups,
  level: (context) => context.level,
};

/**
 * Resolve a context attribute by name: named field first, then the attribute map.
 */
export function getContextAttribute(context: AccessContext, name: string): ContextValue {
  if (Object.hasOwn(NAMED_ATTRIBUTES, name)) {
    return NAMED_ATTRIBUTES[name](context);
  }
  return Object.hasOwn(context.attributes, name) ? context.attributes[name] : undefined;
}

/**
 * Resolve a resource attribute by name.
 */
export function getResourceAttribute(
  resource: AttributeMap | undefined,
  name: string
): AttributeValue | undefined {
  if (!resource || !Object.hasOwn(resource, name)) {
    return undefined;
  }
  return resource[name];
}

/**
 * Coerce an attribute value to a set: undefined → ∅, string → {string}.
 */
export function coerceToSet(value: ContextValue): ReadonlySet<string> {
  if (value === undefined) {
    return new Set();
  }
  if (typeof value === 'string') {
    return new Set([value]);
  }
  return new Set(value);
}
