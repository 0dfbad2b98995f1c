/**
 * Error Taxonomy
 *
 * Every failure here is scoped to a single turn. Adapter outcomes
 * (`not_found`, `adapter_error`) are result values, not errors.
 */

export type ErrorCode =
  | 'AMBIGUOUS_OUTPUT'
  | 'MALFORMED_INVOCATION'
  | 'UNKNOWN_TOOL'
  | 'ARGUMENT_TYPE'
  | 'MISSING_ARGUMENT'
  | 'DUPLICATE_TOOL'
  | 'NO_PRIOR_REFERENCE'
  | 'UNRECOGNIZED_REFERENCE'
  | 'MODEL_UNAVAILABLE'
  | 'CANCELLED'
  | 'CONFIG_ERROR';

export class SwitchboardError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'SwitchboardError';
  }
}

// ============================================================================
// Parser stage
// ============================================================================

export class AmbiguousOutputError extends SwitchboardError {
  constructor(public readonly objectCount: number, detail?: string) {
    super(
      detail ?? `Model output contains ${objectCount} JSON objects; expected exactly one`,
      'AMBIGUOUS_OUTPUT'
    );
    this.name = 'AmbiguousOutputError';
  }
}

export class MalformedInvocationError extends SwitchboardError {
  constructor(message: string) {
    super(message, 'MALFORMED_INVOCATION');
    this.name = 'MalformedInvocationError';
  }
}

export class UnknownToolError extends SwitchboardError {
  constructor(public readonly toolName: string, available: readonly string[] = []) {
    super(
      available.length > 0
        ? `Unknown tool "${toolName}". Available tools: ${available.join(', ')}`
        : `Unknown tool "${toolName}"`,
      'UNKNOWN_TOOL'
    );
    this.name = 'UnknownToolError';
  }
}

export class ArgumentTypeError extends SwitchboardError {
  constructor(
    public readonly toolName: string,
    public readonly key: string,
    public readonly expected: string,
    public readonly received: string
  ) {
    super(
      `Argument "${key}" of tool "${toolName}" must be ${expected}, got ${received}`,
      'ARGUMENT_TYPE'
    );
    this.name = 'ArgumentTypeError';
  }
}

export class MissingArgumentError extends SwitchboardError {
  constructor(public readonly toolName: string, public readonly key: string) {
    super(`Tool "${toolName}" requires argument "${key}"`, 'MISSING_ARGUMENT');
    this.name = 'MissingArgumentError';
  }
}

// ============================================================================
// Registry
// ============================================================================

export class DuplicateToolError extends SwitchboardError {
  constructor(public readonly toolName: string) {
    super(`Tool "${toolName}" is already registered`, 'DUPLICATE_TOOL');
    this.name = 'DuplicateToolError';
  }
}

// ============================================================================
// Context stage
// ============================================================================

export class NoPriorReferenceError extends SwitchboardError {
  constructor(public readonly entity: string, public readonly surface: string) {
    super(`"${surface}" refers to a previous ${entity}, but none has been looked up yet`, 'NO_PRIOR_REFERENCE');
    this.name = 'NoPriorReferenceError';
  }
}

export class UnrecognizedReferenceError extends SwitchboardError {
  constructor(public readonly entity: string, public readonly surface: string) {
    super(`"${surface}" is neither a ${entity} id nor a reference to one`, 'UNRECOGNIZED_REFERENCE');
    this.name = 'UnrecognizedReferenceError';
  }
}

// ============================================================================
// Infrastructure
// ============================================================================

export class ModelUnavailableError extends SwitchboardError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'MODEL_UNAVAILABLE', options);
    this.name = 'ModelUnavailableError';
  }
}

export class TurnCancelledError extends SwitchboardError {
  constructor() {
    super('Turn cancelled by the caller', 'CANCELLED');
    this.name = 'TurnCancelledError';
  }
}

export class ConfigError extends SwitchboardError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'CONFIG_ERROR', options);
    this.name = 'ConfigError';
  }
}

export function isSwitchboardError(error: unknown): error is SwitchboardError {
  return error instanceof SwitchboardError;
}
