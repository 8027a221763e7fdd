/**
 * Common error types for all domains
 * Following Discriminated Union pattern for type safety
 */

// Base validation errors
export type ValidationError =
  | { kind: 'EmptyInput'; field: string }
  | { kind: 'InvalidFormat'; field: string; expected: string; actual: string }
  | { kind: 'OutOfRange'; field: string; min?: number; max?: number; value: number }
  | { kind: 'PatternMismatch'; field: string; pattern: string; value: string };

// Domain-specific errors
export type DomainError =
  | {
    domain: 'application';
    kind: 'ConfigInvalid' | 'ConfigNotFound' | 'StateTransitionInvalid';
    details: unknown;
  }
  | {
    domain: 'discovery';
    kind: 'ListFailed' | 'ParseFailed';
    details: unknown;
  }
  | {
    domain: 'resource';
    kind: 'RemoveFailed';
    details: unknown;
  }
  | {
    domain: 'reporting';
    kind: 'FileWriteFailed' | 'ParseFailed';
    details: unknown;
  }
  | {
    domain: 'environment';
    kind: 'WorkDirCreationFailed' | 'CleanupFailed' | 'GoCleanFailed';
    details: unknown;
  }
  | {
    domain: 'registry';
    kind: 'TestNotFound' | 'ProjectNotFound' | 'DependencyCycle' | 'InvalidPart';
    details: unknown;
  }
  | {
    domain: 'polling';
    kind: 'FetchFailed' | 'RevisionLookupFailed';
    details: unknown;
  }
  | {
    domain: 'orchestrator';
    kind: 'UnknownCommand' | 'MissingArgument';
    details: unknown;
  };

export type AppError = ValidationError | DomainError;

/**
 * Error creation helpers
 */
export const createValidationError = (error: ValidationError): ValidationError => error;

export const createDomainError = (error: DomainError): DomainError => error;

/**
 * Error message formatting
 */
export const formatError = (error: AppError): string => {
  if ('domain' in error) {
    return `[${error.domain}] ${error.kind}: ${JSON.stringify(error.details)}`;
  }

  switch (error.kind) {
    case 'EmptyInput':
      return `Field '${error.field}' cannot be empty`;
    case 'InvalidFormat':
      return `Field '${error.field}' has invalid format. Expected: ${error.expected}, Actual: ${error.actual}`;
    case 'OutOfRange':
      return `Field '${error.field}' value ${error.value} is out of range ${
        error.min ?? '-∞'
      } to ${error.max ?? '+∞'}`;
    case 'PatternMismatch':
      return `Field '${error.field}' value '${error.value}' does not match pattern ${error.pattern}`;
  }
};
