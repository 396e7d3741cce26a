/**
 * PCB Toolbench - Custom Error Classes
 *
 * Structured error handling with full context for debugging
 */

export interface ErrorContext {
  operation: string;
  input?: unknown;
  timestamp: Date;
  requestId?: string;
  suggestion?: string;
  [key: string]: unknown;
}

export type FieldErrors = Record<string, string>;

export class ToolbenchError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly context: ErrorContext;
  public readonly isOperational: boolean;

  constructor(
    message: string,
    code: string,
    statusCode: number,
    context?: Partial<ErrorContext>,
    isOperational = true
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.context = {
      operation: context?.operation || 'unknown',
      timestamp: new Date(),
      ...(context || {}),
    };
    this.isOperational = isOperational;
    Error.captureStackTrace(this, this.constructor);
  }
}

// Validation Errors (400)
export class ValidationError extends ToolbenchError {
  public readonly fieldErrors: FieldErrors;

  constructor(message: string, context?: Partial<ErrorContext>, fieldErrors: FieldErrors = {}) {
    super(message, 'VALIDATION_ERROR', 400, { ...context, fieldErrors });
    this.fieldErrors = fieldErrors;
  }
}

/**
 * Collects per-field problems and throws them as one ValidationError.
 */
export class FieldErrorCollector {
  private readonly errors: FieldErrors = {};

  add(field: string, message: string): void {
    if (!(field in this.errors)) {
      this.errors[field] = message;
    }
  }

  throwIfAny(operation: string): void {
    const fields = Object.keys(this.errors);
    if (fields.length === 0) return;
    throw new ValidationError(
      fields.length === 1 ? this.errors[fields[0]] : `${fields.length} fields need attention`,
      { operation },
      { ...this.errors }
    );
  }
}

// Forbidden (403)
export class OriginNotAllowedError extends ToolbenchError {
  constructor(origin: string, context: Partial<ErrorContext>) {
    super(`Origin not allowed: ${origin}`, 'ORIGIN_NOT_ALLOWED', 403, { ...context, origin });
  }
}

// Not Found Errors (404)
export class NotFoundError extends ToolbenchError {
  constructor(resource: string, identifier: string, context: Partial<ErrorContext>) {
    super(
      `${resource} not found: ${identifier}`,
      'NOT_FOUND',
      404,
      { ...context, resource, identifier }
    );
  }
}

// Conflict Errors (409)
export class RunInProgressError extends ToolbenchError {
  constructor(panel: string, context: Partial<ErrorContext>) {
    super(
      `A ${panel} run is already in progress`,
      'RUN_IN_PROGRESS',
      409,
      { ...context, panel }
    );
  }
}

/**
 * A collaborator process that never started (missing executable, permission denied).
 * Carried inside a run result; never thrown past the task controller.
 */
export class LaunchError extends ToolbenchError {
  public readonly command: string;
  public readonly errno?: string;

  constructor(command: string, message: string, errno: string | undefined, context: Partial<ErrorContext>) {
    super(message, 'LAUNCH_ERROR', 500, { ...context, command, errno });
    this.command = command;
    this.errno = errno;
  }
}

// Internal Server Errors (500)
export class InternalError extends ToolbenchError {
  constructor(message: string, context: Partial<ErrorContext>) {
    super(message, 'INTERNAL_ERROR', 500, context, false);
  }
}

// Error type guard
export function isToolbenchError(error: unknown): error is ToolbenchError {
  return error instanceof ToolbenchError;
}

// Error handler helper
export function handleError(error: unknown): ToolbenchError {
  if (isToolbenchError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new InternalError(error.message, {
      operation: 'unknown',
      originalError: error.name,
      stack: error.stack,
    });
  }

  return new InternalError('An unexpected error occurred', {
    operation: 'unknown',
    originalError: String(error),
  });
}

/**
 * Node system errors carry a string `code` such as ENOENT.
 */
export function errnoOf(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
