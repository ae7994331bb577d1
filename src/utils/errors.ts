// Error types for the assistant
// HTTP-facing AppError plus the domain failures raised by tools, the model gateway and the orchestrator

import { ZodError } from 'zod';

export enum ErrorCode {
  NOT_FOUND = 'not_found',
  BAD_REQUEST = 'bad_request',
  VALIDATION_ERROR = 'validation_error',
  MODEL_GATEWAY_ERROR = 'model_gateway_error',
  SERVICE_UNAVAILABLE = 'service_unavailable',
  CANCELLED = 'cancelled',
  INTERNAL_ERROR = 'internal_error',
}

export class AppError extends Error {
  constructor(
    public code: ErrorCode,
    message: string,
    public statusCode: number = 500,
    public details?: unknown
  ) {
    super(message);
    this.name = 'AppError';
  }

  static notFound(message: string = 'Resource not found', details?: unknown): AppError {
    return new AppError(ErrorCode.NOT_FOUND, message, 404, details);
  }

  static badRequest(message: string = 'Bad request', details?: unknown): AppError {
    return new AppError(ErrorCode.BAD_REQUEST, message, 400, details);
  }

  static validationError(message: string, details?: unknown): AppError {
    return new AppError(ErrorCode.VALIDATION_ERROR, message, 400, details);
  }

  static modelGateway(message: string, details?: unknown): AppError {
    return new AppError(ErrorCode.MODEL_GATEWAY_ERROR, message, 502, details);
  }

  static serviceUnavailable(message: string = 'Service unavailable', details?: unknown): AppError {
    return new AppError(ErrorCode.SERVICE_UNAVAILABLE, message, 503, details);
  }

  static cancelled(message: string = 'Request cancelled'): AppError {
    return new AppError(ErrorCode.CANCELLED, message, 503);
  }

  static internal(message: string = 'Internal server error', details?: unknown): AppError {
    return new AppError(ErrorCode.INTERNAL_ERROR, message, 500, details);
  }
}

export interface ErrorResponse {
  error: ErrorCode;
  message: string;
  statusCode: number;
  details?: unknown;
}

export function formatErrorResponse(error: AppError, includeDetails: boolean = false): ErrorResponse {
  const response: ErrorResponse = {
    error: error.code,
    message: error.message,
    statusCode: error.statusCode,
  };

  if (includeDetails && error.details) {
    response.details = error.details;
  }

  return response;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ---------------------------------------------------------------------------
// Capability registry misuse (programmer errors)
// ---------------------------------------------------------------------------

export class UnknownCapabilityError extends Error {
  readonly kind = 'UnknownCapability' as const;

  constructor(public readonly capability: string) {
    super(`Unknown capability "${capability}"`);
    this.name = 'UnknownCapabilityError';
  }
}

export class DuplicateCapabilityError extends Error {
  readonly kind = 'DuplicateCapability' as const;

  constructor(public readonly capability: string) {
    super(`Capability "${capability}" is already registered`);
    this.name = 'DuplicateCapabilityError';
  }
}

// ---------------------------------------------------------------------------
// Tool-level failures: absorbed by the executor, never fatal
// ---------------------------------------------------------------------------

export type ToolFailureKind =
  | 'ToolInvocationFailure'
  | 'NotConfigured'
  | 'Timeout'
  | 'UnknownCapability'
  | 'InvalidArguments';

export class ToolInvocationError extends Error {
  constructor(
    public readonly toolName: string,
    message: string,
    public readonly kind: ToolFailureKind = 'ToolInvocationFailure',
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ToolInvocationError';
  }

  static notConfigured(toolName: string, message: string): ToolInvocationError {
    return new ToolInvocationError(toolName, message, 'NotConfigured');
  }

  static timeout(toolName: string, timeoutMs: number): ToolInvocationError {
    return new ToolInvocationError(toolName, `Tool "${toolName}" timed out after ${timeoutMs}ms`, 'Timeout');
  }

  static invalidArguments(toolName: string, message: string): ToolInvocationError {
    return new ToolInvocationError(toolName, message, 'InvalidArguments');
  }
}

// ---------------------------------------------------------------------------
// Cycle-level failures: surfaced to the caller, nothing committed
// ---------------------------------------------------------------------------

export class ModelGatewayError extends Error {
  readonly kind = 'ModelGatewayFailure' as const;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ModelGatewayError';
  }
}

export class SessionStoreError extends Error {
  readonly kind = 'SessionStoreFailure' as const;

  constructor(public readonly sessionId: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SessionStoreError';
  }
}

export class OrchestrationCancelledError extends Error {
  readonly kind = 'Cancelled' as const;

  constructor(public readonly sessionId: string) {
    super(`Orchestration cycle for session "${sessionId}" was cancelled before commit`);
    this.name = 'OrchestrationCancelledError';
  }
}

/**
 * Wraps the failure that aborted an orchestration cycle.
 * `cause` is the original error, untouched.
 */
export class OrchestrationError extends Error {
  readonly kind = 'OrchestrationFailure' as const;

  constructor(
    public readonly sessionId: string,
    public readonly cycleId: string,
    public readonly phase: string,
    cause: unknown
  ) {
    super(`Orchestration cycle ${cycleId} for session "${sessionId}" failed during ${phase}: ${errorMessage(cause)}`, {
      cause,
    });
    this.name = 'OrchestrationError';
  }

  get isGatewayFailure(): boolean {
    return this.cause instanceof ModelGatewayError;
  }

  get isCancelled(): boolean {
    return this.cause instanceof OrchestrationCancelledError;
  }
}

// ---------------------------------------------------------------------------
// HTTP mapping
// ---------------------------------------------------------------------------

function hasStatusCode(error: unknown): error is Error & { statusCode: number } {
  return error instanceof Error && 'statusCode' in error && typeof error.statusCode === 'number';
}

export function toAppError(error: unknown): AppError {
  if (error instanceof AppError) {
    return error;
  }

  if (error instanceof ZodError) {
    return AppError.validationError('Invalid request body', error.errors);
  }

  if (error instanceof OrchestrationError) {
    const details = { cycleId: error.cycleId, phase: error.phase, cause: errorMessage(error.cause) };
    if (error.isCancelled) {
      return AppError.cancelled(error.message);
    }
    if (error.isGatewayFailure) {
      return AppError.modelGateway(error.message, details);
    }
    return AppError.internal(error.message, details);
  }

  // Errors raised by Fastify itself (malformed JSON, payload too large) carry their own status
  if (hasStatusCode(error) && error.statusCode >= 400 && error.statusCode < 500) {
    return AppError.badRequest(error.message);
  }

  return AppError.internal(errorMessage(error));
}
