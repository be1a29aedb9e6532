/**
 * Stagegate Error Codes Definition
 *
 * Centralized registry for the errors raised by the policy and workflow cores.
 *
 * @packageDocumentation
 */

import type { ErrorCodeDefinition } from './types';

export const ERROR_CODES = {
  CONFIGURATION_ERROR: 'configuration_error',
  NOT_FOUND: 'not_found',
  PERMISSION_DENIED: 'permission_denied',
  INVALID_TRANSITION: 'invalid_transition',
  VALIDATION_ERROR: 'validation_error',
  INTERNAL_ERROR: 'internal_error',
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

const DEFINITIONS: Record<ErrorCode, ErrorCodeDefinition> = {
  configuration_error: {
    code: ERROR_CODES.CONFIGURATION_ERROR,
    status: 404,
    title: 'Unknown role',
    severity: 'warn',
    securityLevel: 'public',
  },
  not_found: {
    code: ERROR_CODES.NOT_FOUND,
    status: 404,
    title: 'Resource not found',
    severity: 'info',
    securityLevel: 'public',
  },
  permission_denied: {
    code: ERROR_CODES.PERMISSION_DENIED,
    status: 403,
    title: 'Permission denied',
    severity: 'warn',
    securityLevel: 'public',
  },
  invalid_transition: {
    code: ERROR_CODES.INVALID_TRANSITION,
    status: 409,
    title: 'Invalid workflow transition',
    severity: 'info',
    securityLevel: 'public',
  },
  validation_error: {
    code: ERROR_CODES.VALIDATION_ERROR,
    status: 400,
    title: 'Invalid request payload',
    severity: 'info',
    securityLevel: 'public',
  },
  internal_error: {
    code: ERROR_CODES.INTERNAL_ERROR,
    status: 500,
    title: 'Internal error',
    severity: 'error',
    securityLevel: 'internal',
  },
};

/**
 * Look up the definition for a code
 */
export function getErrorDefinition(code: ErrorCode): ErrorCodeDefinition {
  return DEFINITIONS[code];
}
