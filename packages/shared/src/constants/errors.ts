/**
 * Error codes raised by stack generation and its collaborators.
 */
export const ErrorCodes = {
  // Blueprint and schema problems
  SCHEMA_ERROR: 'SCHEMA_ERROR',
  BLUEPRINT_INVALID: 'BLUEPRINT_INVALID',
  BLUEPRINT_NOT_FOUND: 'BLUEPRINT_NOT_FOUND',
  PRESET_INVALID: 'PRESET_INVALID',
  PRESET_NOT_FOUND: 'PRESET_NOT_FOUND',

  // Input problems
  INPUT_VALIDATION_ERROR: 'INPUT_VALIDATION_ERROR',

  // Transform lookups (non-fatal)
  TRANSFORM_ERROR: 'TRANSFORM_ERROR',

  // Assembled stack failed structural validation
  STACK_VALIDATION_ERROR: 'STACK_VALIDATION_ERROR',

  // Runtime side effects
  NETWORK_CREATE_FAILED: 'NETWORK_CREATE_FAILED',

  // Install planning
  DEPENDENCY_MISSING: 'DEPENDENCY_MISSING',
  CIRCULAR_DEPENDENCY: 'CIRCULAR_DEPENDENCY',
} as const;

export type ErrorCode = typeof ErrorCodes[keyof typeof ErrorCodes];

/**
 * Codes whose messages are meant to be shown to the user verbatim.
 */
export const OPERATIONAL_ERROR_CODES: ReadonlySet<ErrorCode> = new Set<ErrorCode>([
  ErrorCodes.SCHEMA_ERROR,
  ErrorCodes.BLUEPRINT_INVALID,
  ErrorCodes.BLUEPRINT_NOT_FOUND,
  ErrorCodes.PRESET_INVALID,
  ErrorCodes.PRESET_NOT_FOUND,
  ErrorCodes.INPUT_VALIDATION_ERROR,
  ErrorCodes.STACK_VALIDATION_ERROR,
  ErrorCodes.DEPENDENCY_MISSING,
  ErrorCodes.CIRCULAR_DEPENDENCY,
]);
