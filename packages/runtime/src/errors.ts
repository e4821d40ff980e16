// Runtime error types

/**
 * Base class for all runtime errors.
 * Provides structured error information for debugging and logging.
 */
export class RuntimeError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = 'RuntimeError';
    this.code = code;
  }
}

/**
 * Validation error for malformed or invalid input.
 */
export class ValidationError extends RuntimeError {
  readonly field?: string;
  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    options?: { field?: string; details?: Record<string, unknown> }
  ) {
    super('VALIDATION_ERROR', message);
    this.name = 'ValidationError';
    this.field = options?.field;
    this.details = options?.details;
  }
}

/**
 * A command parameter is missing or outside the signal's legal range.
 */
export class InvalidParameterError extends ValidationError {
  readonly parameter: string;

  constructor(parameter: string, reason: string, details?: Record<string, unknown>) {
    super(`Invalid parameter "${parameter}": ${reason}`, { field: parameter, details });
    this.name = 'InvalidParameterError';
    this.parameter = parameter;
  }
}

/**
 * The entity cannot perform the requested action.
 */
export class UnsupportedCapabilityError extends RuntimeError {
  readonly entityId: string;
  readonly action: string;

  constructor(entityId: string, action: string, reason: string) {
    super('UNSUPPORTED_CAPABILITY', `Entity ${entityId} does not support "${action}": ${reason}`);
    this.name = 'UnsupportedCapabilityError';
    this.entityId = entityId;
    this.action = action;
  }
}

/**
 * Error when a referenced entity does not exist.
 */
export class EntityNotFoundError extends RuntimeError {
  readonly entityId: string;

  constructor(entityId: string) {
    super('ENTITY_NOT_FOUND', `Entity not found: ${entityId}`);
    this.name = 'EntityNotFoundError';
    this.entityId = entityId;
  }
}

/**
 * Specification or mapping tables are malformed or inconsistent.
 * Raised at startup only.
 */
export class ConfigurationError extends RuntimeError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(
      'CONFIGURATION_ERROR',
      issues.length > 0 ? `${message}:\n  - ${issues.join('\n  - ')}` : message
    );
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

/**
 * A frame could not be decoded. Recorded as a diagnostic, never thrown
 * across the ingestion loop.
 */
export class DecodeFailure extends RuntimeError {
  readonly arbitrationId: number;

  constructor(arbitrationId: number, reason: string) {
    super('DECODE_FAILURE', `Cannot decode frame ${arbitrationId.toString(16).toUpperCase()}: ${reason}`);
    this.name = 'DecodeFailure';
    this.arbitrationId = arbitrationId;
  }
}

/**
 * A decodable frame maps to no entity.
 */
export class ResolutionMiss extends RuntimeError {
  readonly dgn: number;
  readonly instance: number | null;

  constructor(dgn: number, instance: number | null) {
    super(
      'RESOLUTION_MISS',
      `No entity mapped to DGN ${dgn.toString(16).toUpperCase()} instance ${instance ?? 'none'}`
    );
    this.name = 'ResolutionMiss';
    this.dgn = dgn;
    this.instance = instance;
  }
}

/**
 * Check if an error is a runtime error.
 */
export function isRuntimeError(error: unknown): error is RuntimeError {
  return error instanceof RuntimeError;
}
