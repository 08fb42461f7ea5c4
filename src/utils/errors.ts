// Error taxonomy for interpose

/**
 * Error codes for interpose errors
 */
export const InterposeErrorCodes = {
  INVALID_ARGUMENT: "INVALID_ARGUMENT",
  ARGUMENT_OUT_OF_RANGE: "ARGUMENT_OUT_OF_RANGE",
  HOOK_FAILED: "HOOK_FAILED",
  HOOK_RETURNED_PROMISE: "HOOK_RETURNED_PROMISE",
  CANCELLED: "CANCELLED",
  INVALID_STATE: "INVALID_STATE",
  UNKNOWN_ADAPTER: "UNKNOWN_ADAPTER",
} as const;

export type InterposeErrorCode =
  (typeof InterposeErrorCodes)[keyof typeof InterposeErrorCodes];

/**
 * Interceptor hook phases, as reported on hook errors and events
 */
export type HookPhase = "before" | "transform" | "after" | "exception";

/**
 * Context information for interpose errors
 */
export interface InterposeErrorContext {
  /**
   * Error code for programmatic handling
   */
  code: InterposeErrorCode;

  /**
   * Capability the failing call belongs to
   */
  capability?: string;

  /**
   * Operation the failing call belongs to
   */
  operation?: string;

  /**
   * Additional context data
   */
  metadata?: Record<string, unknown>;
}

/**
 * Base class of every error raised by the engine itself.
 *
 * Errors thrown by an intercepted operation are never wrapped in one of these.
 */
export class InterposeError extends Error {
  readonly code: InterposeErrorCode;
  readonly context: InterposeErrorContext;

  /**
   * Timestamp when error occurred
   */
  readonly timestamp: number;

  constructor(
    message: string,
    context: InterposeErrorContext,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "InterposeError";
    this.code = context.code;
    this.context = context;
    this.timestamp = Date.now();

    Object.setPrototypeOf(this, InterposeError.prototype);
  }

  /**
   * Get detailed error string for logging
   */
  toDetailedString(): string {
    const parts = [this.message];
    if (this.context.capability) {
      parts.push(`capability=${this.context.capability}`);
    }
    if (this.context.operation) {
      parts.push(`operation=${this.context.operation}`);
    }
    return parts.join(" | ");
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      timestamp: this.timestamp,
      capability: this.context.capability,
      operation: this.context.operation,
      metadata: this.context.metadata,
    };
  }
}

/**
 * Missing or malformed input to a public entry point
 * (proxy construction, argument access, adapter config).
 */
export class ArgumentError extends InterposeError {
  constructor(
    message: string,
    code:
      | typeof InterposeErrorCodes.INVALID_ARGUMENT
      | typeof InterposeErrorCodes.ARGUMENT_OUT_OF_RANGE
      | typeof InterposeErrorCodes.UNKNOWN_ADAPTER = InterposeErrorCodes.INVALID_ARGUMENT,
    metadata?: Record<string, unknown>,
  ) {
    super(message, { code, metadata });
    this.name = "ArgumentError";
    Object.setPrototypeOf(this, ArgumentError.prototype);
  }
}

/**
 * An interceptor hook itself failed.
 */
export class InterceptorHookError extends InterposeError {
  readonly interceptorName: string;
  readonly phase: HookPhase;

  constructor(
    interceptorName: string,
    phase: HookPhase,
    cause: unknown,
    context: Omit<InterposeErrorContext, "code"> & {
      code?:
        | typeof InterposeErrorCodes.HOOK_FAILED
        | typeof InterposeErrorCodes.HOOK_RETURNED_PROMISE;
    } = {},
  ) {
    super(
      `Interceptor "${interceptorName}" ${phase} hook failed: ${errorMessage(cause)}`,
      { ...context, code: context.code ?? InterposeErrorCodes.HOOK_FAILED },
      { cause },
    );
    this.name = "InterceptorHookError";
    this.interceptorName = interceptorName;
    this.phase = phase;
    Object.setPrototypeOf(this, InterceptorHookError.prototype);
  }
}

/**
 * The caller's AbortSignal fired before the intercepted call settled.
 */
export class CancellationError extends InterposeError {
  readonly reason: unknown;

  constructor(reason: unknown, context: Omit<InterposeErrorContext, "code"> = {}) {
    super(
      reason === undefined
        ? "Operation was cancelled"
        : `Operation was cancelled: ${errorMessage(reason)}`,
      { ...context, code: InterposeErrorCodes.CANCELLED },
    );
    this.name = "CancellationError";
    this.reason = reason;
    Object.setPrototypeOf(this, CancellationError.prototype);
  }
}

/**
 * A call context was driven through an illegal state transition.
 */
export class InvalidStateError extends InterposeError {
  constructor(message: string) {
    super(message, { code: InterposeErrorCodes.INVALID_STATE });
    this.name = "InvalidStateError";
    Object.setPrototypeOf(this, InvalidStateError.prototype);
  }
}

/**
 * Type guard for InterposeError
 */
export function isInterposeError(error: unknown): error is InterposeError {
  return error instanceof InterposeError;
}

/**
 * True for engine cancellations and for AbortErrors raised by the operation
 * itself (fetch, timers/promises, AbortSignal.throwIfAborted).
 */
export function isCancellation(error: unknown): boolean {
  if (error instanceof CancellationError) return true;
  return error instanceof Error && error.name === "AbortError";
}

/**
 * Best-effort message extraction for logs and wrapped errors
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
