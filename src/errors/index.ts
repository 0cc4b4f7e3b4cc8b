import type { FailureCode } from '../types/index.js';

export type ConductorErrorCode =
  | FailureCode
  | 'DependencyUnhealthy'
  | 'OptimizationFailure'
  | 'ConfigError';

interface ConductorErrorOptions {
  cause?: unknown;
  details?: Record<string, unknown>;
}

export class ConductorError extends Error {
  readonly code: ConductorErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(message: string, code: ConductorErrorCode, options: ConductorErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = new.target.name;
    this.code = code;
    if (options.details !== undefined) {
      this.details = options.details;
    }
  }
}

// The generator threw or produced something that is not a design.
export class GenerationFailure extends ConductorError {
  constructor(message: string, options: ConductorErrorOptions = {}) {
    super(message, 'GenerationFailure', options);
  }
}

/**
 * A dependency could not give a usable answer. Clients turn this into a
 * fallback outcome; it never reaches the caller.
 */
export class DependencyUnhealthy extends ConductorError {
  readonly dependency: string;
  readonly reason: string;

  constructor(dependency: string, reason: string, options: ConductorErrorOptions = {}) {
    super(`${dependency} unavailable: ${reason}`, 'DependencyUnhealthy', options);
    this.dependency = dependency;
    this.reason = reason;
  }
}

// A component produced a value outside its declared shape.
export class ContractViolation extends ConductorError {
  constructor(message: string, options: ConductorErrorOptions = {}) {
    super(message, 'ContractViolation', options);
  }
}

export class OptimizationFailure extends ConductorError {
  constructor(message: string, options: ConductorErrorOptions = {}) {
    super(message, 'OptimizationFailure', options);
  }
}

export class RequestCancelled extends ConductorError {
  constructor(message = 'Request cancelled', options: ConductorErrorOptions = {}) {
    super(message, 'RequestCancelled', options);
  }
}

export class ConfigError extends ConductorError {
  constructor(message: string, options: ConductorErrorOptions = {}) {
    super(message, 'ConfigError', options);
  }
}

export function isCancellation(error: unknown): error is RequestCancelled {
  return error instanceof RequestCancelled;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
