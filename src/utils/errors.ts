/**
 * Error types surfaced by the toolkit
 */

export const VALIDATION_ERROR = 'VALIDATION_ERROR';
export const NOT_FOUND = 'NOT_FOUND';
export const CONFLICT = 'CONFLICT';
export const UPSTREAM_ERROR = 'UPSTREAM_ERROR';

export class ToolkitError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Input rejected before any external call is made
 */
export class ValidationError extends ToolkitError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(VALIDATION_ERROR, message, details);
  }
}

export class NotFoundError extends ToolkitError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(NOT_FOUND, message, details);
  }
}

/**
 * Existing state blocks the operation unless the caller opted into the override
 */
export class ConflictError extends ToolkitError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(CONFLICT, message, details);
  }
}

/**
 * A Graph, Exchange Online or MSAL call failed
 */
export class UpstreamError extends ToolkitError {
  public readonly statusCode?: number;

  constructor(message: string, statusCode?: number, details?: Record<string, unknown>) {
    super(UPSTREAM_ERROR, message, details);
    this.statusCode = statusCode;
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Read the HTTP status a Graph SDK error carries, if any
 */
export function statusCodeOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'statusCode' in error) {
    const { statusCode } = error;
    return typeof statusCode === 'number' ? statusCode : undefined;
  }
  return undefined;
}
