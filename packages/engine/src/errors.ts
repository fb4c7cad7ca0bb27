/**
 * Error taxonomy of the evaluation engine.
 *
 * Declaration-time and graph-time errors are thrown before any provider is called.
 * Evaluation-time errors are collected into the evaluation result instead of being thrown.
 */

export type ErrorDetails = Record<string, unknown>;

/**
 * Base error class for Strata
 */
export class StrataError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details: ErrorDetails = {},
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'StrataError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class DuplicateIdentifierError extends StrataError {
  constructor(public readonly id: string) {
    super(`Identifier "${id}" is already declared`, 'DUPLICATE_IDENTIFIER', { id });
    this.name = 'DuplicateIdentifierError';
  }
}

export class TypeMismatchError extends StrataError {
  constructor(
    public readonly id: string,
    public readonly expected: string,
    public readonly actual: string
  ) {
    super(`Value for "${id}" must be of type ${expected}, got ${actual}`, 'TYPE_MISMATCH', { id, expected, actual });
    this.name = 'TypeMismatchError';
  }
}

export class UndeclaredReferenceError extends StrataError {
  constructor(
    public readonly target: string,
    public readonly referrer: string
  ) {
    super(`Reference to undeclared "${target}" in "${referrer}"`, 'UNDECLARED_REFERENCE', { target, referrer });
    this.name = 'UndeclaredReferenceError';
  }
}

export class CycleDetectedError extends StrataError {
  constructor(public readonly cycle: readonly string[]) {
    super(`Dependency cycle detected: ${cycle.join(' -> ')}`, 'CYCLE_DETECTED', { cycle });
    this.name = 'CycleDetectedError';
  }
}

export class MissingRequiredVariableError extends StrataError {
  constructor(public readonly variable: string) {
    super(`No value for required variable "${variable}"`, 'MISSING_REQUIRED_VARIABLE', { variable });
    this.name = 'MissingRequiredVariableError';
  }
}

export class ProvisioningError extends StrataError {
  constructor(
    public readonly resource: string,
    public readonly kind: string,
    cause: unknown
  ) {
    super(`Provisioning "${resource}" (${kind}) failed: ${cause instanceof Error ? cause.message : String(cause)}`, 'PROVISIONING_FAILED', { resource, kind }, { cause });
    this.name = 'ProvisioningError';
  }
}

export class BlockedByDependencyError extends StrataError {
  constructor(
    public readonly node: string,
    public readonly dependency: string
  ) {
    super(`"${node}" was not evaluated because its dependency "${dependency}" failed`, 'BLOCKED_BY_DEPENDENCY', { node, dependency });
    this.name = 'BlockedByDependencyError';
  }
}

export class UnresolvedReferenceError extends StrataError {
  constructor(
    public readonly target: string,
    public readonly path: readonly string[] = []
  ) {
    super(`Reference "${[target, ...path].join('.')}" is not resolved yet`, 'UNRESOLVED_REFERENCE', { target, path });
    this.name = 'UnresolvedReferenceError';
  }
}

export class MissingAttributeError extends StrataError {
  constructor(
    public readonly target: string,
    public readonly path: readonly string[]
  ) {
    super(`"${target}" has no attribute "${path.join('.')}"`, 'MISSING_ATTRIBUTE', { target, path });
    this.name = 'MissingAttributeError';
  }
}

/** Configuration text that parses but cannot be turned into declarations */
export class ConfigurationError extends StrataError {
  constructor(message: string, details: ErrorDetails = {}) {
    super(message, 'INVALID_CONFIGURATION', details);
    this.name = 'ConfigurationError';
  }
}

export function toStrataError(error: unknown): StrataError {
  if (error instanceof StrataError) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new StrataError(message, 'INTERNAL', {}, { cause: error });
}
