/**
 * Error Factory
 *
 * Produces ErrorDescriptor instances from thrown values.
 * The factory does NOT produce HTTP responses - serialization happens in the request layer.
 */

import { ERROR_CODES, getErrorDefinition } from './codes';
import { StagegateError } from './errors';
import type { ErrorDescriptor } from './types';

/**
 * Describe any thrown value.
 *
 * Stagegate errors keep their message and details. Anything else is masked as
 * internal_error.
 */
export function describeError(error: unknown): ErrorDescriptor {
  if (error instanceof StagegateError) {
    const definition = getErrorDefinition(error.code);
    return {
      code: definition.code,
      status: definition.status,
      title: definition.title,
      detail: error.message,
      severity: definition.severity,
      ...(error.details && { details: error.details }),
    };
  }

  const definition = getErrorDefinition(ERROR_CODES.INTERNAL_ERROR);
  return {
    code: definition.code,
    status: definition.status,
    title: definition.title,
    detail: 'An unexpected error occurred',
    severity: definition.severity,
  };
}

/**
 * Type guard for errors raised by this repository
 */
export function isStagegateError(error: unknown): error is StagegateError {
  return error instanceof StagegateError;
}
