/**
 * Error classes thrown by the Stagegate cores.
 *
 * A denied policy evaluation is not an error. Only the workflow engine turns a
 * deny into PermissionDeniedError, because at that call site it aborts a transition.
 */

import { ERROR_CODES, type ErrorCode } from './codes';

/**
 * Base class for every error raised by this repository
 */
export class StagegateError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'StagegateError';
  }
}

/**
 * An operation referenced a role name that was never registered
 */
export class ConfigurationError extends StagegateError {
  constructor(
    message: string,
    public readonly roleName?: string
  ) {
    super(ERROR_CODES.CONFIGURATION_ERROR, message, roleName ? { role: roleName } : undefined);
    this.name = 'ConfigurationError';
  }
}

/**
 * An operation referenced an unknown entity (e.g. workflow id)
 */
export class NotFoundError extends StagegateError {
  constructor(
    public readonly entity: string,
    public readonly id: string
  ) {
    super(ERROR_CODES.NOT_FOUND, `${entity} '${id}' not found`, { entity, id });
    this.name = 'NotFoundError';
  }
}

/**
 * A transition was refused by the policy engine
 */
export class PermissionDeniedError extends StagegateError {
  public readonly permissions: string[];

  constructor(
    public readonly action: string,
    permissions: Iterable<string>,
    public readonly userId?: string
  ) {
    const sorted = [...permissions].sort();
    super(
      ERROR_CODES.PERMISSION_DENIED,
      `Action '${action}' not permitted${userId ? ` for user ${userId}` : ''}. ` +
        `Permissions: [${sorted.join(', ')}]`,
      { action, permissions: sorted }
    );
    this.name = 'PermissionDeniedError';
    this.permissions = sorted;
  }
}

/**
 * The action is not defined for the instance's current state
 */
export class InvalidTransitionError extends StagegateError {
  constructor(
    public readonly state: string,
    public readonly action: string
  ) {
    super(
      ERROR_CODES.INVALID_TRANSITION,
      `Action '${action}' is not valid from state '${state}'`,
      { state, action }
    );
    this.name = 'InvalidTransitionError';
  }
}

/**
 * An inbound payload did not match its schema
 */
export class ValidationError extends StagegateError {
  constructor(
    message: string,
    public readonly issues: Array<{ path: string; message: string }>
  ) {
    super(ERROR_CODES.VALIDATION_ERROR, message, { issues });
    this.name = 'ValidationError';
  }
}
