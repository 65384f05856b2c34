export type ErrorCode =
  | 'SCOPE_RESOLUTION'
  | 'INSUFFICIENT_IDENTIFIERS'
  | 'UNSUPPORTED_PREDICATE'
  | 'SCHEMA_VIOLATION'
  | 'PLAN_FORMAT'
  | 'EXECUTION_ERROR'
  | 'EMPTY_RESULT'
  | 'BACKEND_TIMEOUT'
  | 'REQUEST_CANCELLED'
  | 'STATE_OVERWRITE'
  | 'VALIDATION_ERROR';

export class ShipmentQnAError extends Error {
  constructor(
    message: string,
    public code: ErrorCode,
    public statusCode: number = 500,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ShipmentQnAError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ScopeResolutionError extends ShipmentQnAError {
  constructor(message: string = 'No valid consignee scope for principal', details?: Record<string, unknown>) {
    super(message, 'SCOPE_RESOLUTION', 403, details);
    this.name = 'ScopeResolutionError';
  }
}

export class InsufficientIdentifiersError extends ShipmentQnAError {
  constructor(message: string = 'No shipment identifiers in question', details?: Record<string, unknown>) {
    super(message, 'INSUFFICIENT_IDENTIFIERS', 200, details);
    this.name = 'InsufficientIdentifiersError';
  }
}

export class UnsupportedPredicateError extends ShipmentQnAError {
  constructor(message: string = 'Predicate has no backend representation', details?: Record<string, unknown>) {
    super(message, 'UNSUPPORTED_PREDICATE', 422, details);
    this.name = 'UnsupportedPredicateError';
  }
}

export class SchemaViolationError extends ShipmentQnAError {
  constructor(message: string = 'Plan references unavailable column', details?: Record<string, unknown>) {
    super(message, 'SCHEMA_VIOLATION', 422, details);
    this.name = 'SchemaViolationError';
  }
}

/** Drafted plan did not have the shape of an analytics plan. Treated like a compilation failure. */
export class PlanFormatError extends ShipmentQnAError {
  constructor(message: string = 'Drafted plan is malformed', details?: Record<string, unknown>) {
    super(message, 'PLAN_FORMAT', 422, details);
    this.name = 'PlanFormatError';
  }
}

export class ExecutionError extends ShipmentQnAError {
  constructor(message: string = 'Analytics execution failed', details?: Record<string, unknown>) {
    super(message, 'EXECUTION_ERROR', 500, details);
    this.name = 'ExecutionError';
  }
}

export class EmptyResultError extends ShipmentQnAError {
  constructor(message: string = 'Computation matched no rows', details?: Record<string, unknown>) {
    super(message, 'EMPTY_RESULT', 200, details);
    this.name = 'EmptyResultError';
  }
}

export class BackendTimeoutError extends ShipmentQnAError {
  constructor(message: string = 'Backend call timed out', details?: Record<string, unknown>) {
    super(message, 'BACKEND_TIMEOUT', 504, details);
    this.name = 'BackendTimeoutError';
  }
}

export class RequestCancelledError extends ShipmentQnAError {
  constructor(message: string = 'Request was cancelled', details?: Record<string, unknown>) {
    super(message, 'REQUEST_CANCELLED', 499, details);
    this.name = 'RequestCancelledError';
  }
}

export class StateOverwriteError extends ShipmentQnAError {
  constructor(field: string) {
    super(`Stage attempted to overwrite "${field}"`, 'STATE_OVERWRITE', 500, { field });
    this.name = 'StateOverwriteError';
  }
}

export class ValidationError extends ShipmentQnAError {
  constructor(message: string = 'Validation failed', details?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', 400, details);
    this.name = 'ValidationError';
  }
}

export function isShipmentQnAError(error: unknown): error is ShipmentQnAError {
  return error instanceof ShipmentQnAError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
