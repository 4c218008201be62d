import { ErrorCodes, OPERATIONAL_ERROR_CODES, type ErrorCode } from '@dockyard/shared';

/**
 * Base class for errors raised while turning a blueprint into a stack.
 */
export class StackError extends Error {
  public readonly isOperational: boolean;

  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = 'StackError';
    this.isOperational = OPERATIONAL_ERROR_CODES.has(code);
  }
}

/**
 * A field's routing path cannot be interpreted. Aborts generation.
 */
export class SchemaError extends StackError {
  constructor(
    public readonly fieldName: string,
    message: string
  ) {
    super(ErrorCodes.SCHEMA_ERROR, `Field "${fieldName}": ${message}`);
    this.name = 'SchemaError';
  }
}

/**
 * A field references a transform that does not exist. Logged, never thrown by the registry.
 */
export class TransformError extends StackError {
  constructor(
    public readonly transform: string,
    public readonly fieldName: string
  ) {
    super(ErrorCodes.TRANSFORM_ERROR, `Unknown transform "${transform}" on field "${fieldName}"`);
    this.name = 'TransformError';
  }
}

export interface ValidationIssue {
  path: string;
  message: string;
}

/**
 * The assembled stack or the user inputs are structurally invalid.
 */
export class ValidationError extends StackError {
  constructor(
    message: string,
    public readonly issues: ValidationIssue[],
    code: ErrorCode = ErrorCodes.STACK_VALIDATION_ERROR
  ) {
    super(code, formatIssues(message, issues), issues);
    this.name = 'ValidationError';
  }
}

/**
 * A request to the container runtime failed (for example, network creation).
 */
export class ExternalSideEffectError extends StackError {
  constructor(
    public readonly resource: string,
    message: string,
    output?: string
  ) {
    super(ErrorCodes.NETWORK_CREATE_FAILED, message, output);
    this.name = 'ExternalSideEffectError';
  }
}

/**
 * Missing prerequisites or a dependency cycle between blueprints.
 */
export class DependencyError extends StackError {
  constructor(
    code: typeof ErrorCodes.DEPENDENCY_MISSING | typeof ErrorCodes.CIRCULAR_DEPENDENCY,
    message: string,
    public readonly blueprints: string[]
  ) {
    super(code, message, blueprints);
    this.name = 'DependencyError';
  }
}

/**
 * A blueprint file could not be read or does not match the blueprint schema.
 */
export class BlueprintLoadError extends StackError {
  constructor(
    public readonly file: string,
    message: string,
    issues?: ValidationIssue[]
  ) {
    super(ErrorCodes.BLUEPRINT_INVALID, `${file}: ${message}`, issues);
    this.name = 'BlueprintLoadError';
  }
}

/**
 * A preset file could not be read or does not match the preset schema.
 */
export class PresetLoadError extends StackError {
  constructor(
    public readonly file: string,
    message: string,
    issues?: ValidationIssue[]
  ) {
    super(ErrorCodes.PRESET_INVALID, `${file}: ${message}`, issues);
    this.name = 'PresetLoadError';
  }
}

export function getErrorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function formatIssues(message: string, issues: ValidationIssue[]): string {
  if (issues.length === 0) {
    return message;
  }
  const lines = issues.map(issue => issue.path ? `${issue.path}: ${issue.message}` : issue.message);
  return `${message}:\n  - ${lines.join('\n  - ')}`;
}
