/**
 * Attribute condition evaluation.
 *
 * Conditions never mutate their inputs. A missing attribute is the empty set,
 * so every operator except the set-based ones simply evaluates to false.
 */

import { coerceToSet, getContextAttribute, getResourceAttribute } from './context';
import {
  ConditionOperator,
  type AccessContext,
  type AttributeCondition,
  type ResourceAttributes,
} from './types';

function intersects(a: ReadonlySet<string>, b: ReadonlySet<string>): boolean {
  for (const value of a) {
    if (b.has(value)) return true;
  }
  return false;
}

function setEquals(a: ReadonlySet<string>, b: ReadonlySet<string>): boolean {
  if (a.size !== b.size) return false;
  for (const value of a) {
    if (!b.has(value)) return false;
  }
  return true;
}

/**
 * Evaluate one condition against the caller context and resource attributes.
 */
export function evaluateCondition(
  condition: AttributeCondition,
  context: AccessContext,
  resource: ResourceAttributes = {}
): boolean {
  const contextValue = coerceToSet(getContextAttribute(context, condition.attribute));

  switch (condition.operator) {
    case ConditionOperator.ANY:
      return contextValue.size > 0;

    // The whole set must match, not just intersect.
    case ConditionOperator.EQUALS:
      return contextValue.size > 0 && setEquals(contextValue, condition.values);

    case ConditionOperator.CONTAINS:
      return intersects(contextValue, condition.values);

    case ConditionOperator.MATCH_RESOURCE: {
      if (!condition.resourceAttribute) {
        return false;
      }
      const resourceValue = coerceToSet(
        getResourceAttribute(resource, condition.resourceAttribute)
      );
      return intersects(contextValue, resourceValue);
    }

    default:
      return false;
  }
}

/**
 * All conditions must hold (AND). An empty list always holds.
 */
export function evaluateConditions(
  conditions: readonly AttributeCondition[],
  context: AccessContext,
  resource?: ResourceAttributes
): boolean {
  return conditions.every((condition) => evaluateCondition(condition, context, resource));
}

/**
 * Build a condition from plain data.
 */
export function defineCondition(input: {
  attribute: string;
  operator: ConditionOperator;
  values?: Iterable<string>;
  resourceAttribute?: string;
}): AttributeCondition {
  return Object.freeze({
    attribute: input.attribute,
    operator: input.operator,
    values: new Set(input.values ?? []),
    ...(input.resourceAttribute !== undefined && { resourceAttribute: input.resourceAttribute }),
  });
}
