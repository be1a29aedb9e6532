/**
 * Stagegate Error System - Type Definitions
 *
 * Descriptor types handed to the surrounding request layer. Nothing in this
 * module knows about HTTP frameworks; callers serialize descriptors themselves.
 *
 * @packageDocumentation
 */

/**
 * Error security classification
 * Determines how much detail is exposed to clients
 */
export type ErrorSecurityLevel =
  | 'public' // Full details returned
  | 'internal'; // Log only, generic error to client

/**
 * Error severity levels for logging and alerting
 */
export type Severity = 'info' | 'warn' | 'error';

/**
 * Error code definition structure
 */
export interface ErrorCodeDefinition {
  /** Machine-readable code (snake_case) */
  code: string;

  /** HTTP status the request layer should answer with */
  status: number;

  /** Short summary */
  title: string;

  /** Logging severity */
  severity: Severity;

  /** Security classification */
  securityLevel: ErrorSecurityLevel;
}

/**
 * Normalized error descriptor
 *
 * HTTP response format independent. The request layer turns this into
 * whatever body shape it serves.
 */
export interface ErrorDescriptor {
  code: string;
  status: number;
  title: string;
  detail: string;
  severity: Severity;
  /** Structured diagnostics (only for 'public' codes) */
  details?: Record<string, unknown>;
}
