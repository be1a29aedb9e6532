export { ERROR_CODES, getErrorDefinition } from './codes';
export type { ErrorCode } from './codes';
export {
  StagegateError,
  ConfigurationError,
  NotFoundError,
  PermissionDeniedError,
  InvalidTransitionError,
  ValidationError,
} from './errors';
export { describeError, isStagegateError } from './factory';
export type { ErrorDescriptor, ErrorCodeDefinition, ErrorSecurityLevel, Severity } from './types';
