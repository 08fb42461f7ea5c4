// Chain executor - runs interceptors around a real call

import type {
  Logger,
  MethodInterceptor,
  OperationDescriptor,
} from "../types/interceptor";
import type { InterceptionEventHandler } from "../types/observability";
import { InterceptionEvents } from "../types/observability";
import { MethodCallContext } from "./context";
import { CallStates } from "./state-machine";
import { EventDispatcher } from "./event-dispatcher";
import { Metrics } from "./metrics";
import { resolveInterceptors } from "./registration";
import type {
  InterceptorRegistration,
  RegistrationSnapshot,
} from "./registration";
import {
  CancellationError,
  InterceptorHookError,
  InterposeErrorCodes,
  errorMessage,
  isCancellation,
} from "../utils/errors";
import type { HookPhase } from "../utils/errors";

/**
 * Chain executor configuration
 */
export interface ChainExecutorOptions {
  /**
   * Receives hook failures that are collected instead of thrown
   * @default console
   */
  logger?: Logger;

  /**
   * Counter sink. A fresh Metrics instance is used when omitted.
   */
  metrics?: Metrics;

  /**
   * Lifecycle event handler (fire-and-forget, via microtasks)
   */
  onEvent?: InterceptionEventHandler;

  /**
   * Attached, frozen, to every emitted event
   */
  eventContext?: Record<string, unknown>;
}

/**
 * A call as seen by the executor, before a context exists for it
 */
export interface Invocation<TTarget extends object = object> {
  target: TTarget;
  operation: OperationDescriptor;
  args: readonly unknown[];
}

/**
 * The real, un-intercepted operation. Receives the arguments as left by the
 * before hooks.
 */
export type Proceed<R> = (args: readonly unknown[]) => R;

/**
 * Find the AbortSignal of a call: either an argument that is an AbortSignal,
 * or an object argument carrying one as `signal`.
 */
export function findAbortSignal(
  args: readonly unknown[],
): AbortSignal | undefined {
  for (const arg of args) {
    if (arg instanceof AbortSignal) return arg;
    if (
      typeof arg === "object" &&
      arg !== null &&
      "signal" in arg &&
      arg.signal instanceof AbortSignal
    ) {
      return arg.signal;
    }
  }
  return undefined;
}

export function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    (typeof value === "object" || typeof value === "function") &&
    value !== null &&
    "then" in value &&
    typeof value.then === "function"
  );
}

function interceptorName(interceptor: MethodInterceptor): string {
  return interceptor.name || "anonymous";
}

/**
 * Chain executor
 *
 * Resolves the interceptors that apply to an operation and sequences them
 * around the real call:
 *
 * 1. `beforeInvoke` ascending by order
 * 2. the real call
 * 3. on success: `transformResult` folded ascending, then `afterInvoke`
 *    descending, then the transformed value is returned
 * 4. on failure or cancellation: `onException` ascending on every
 *    interceptor, then the original failure is re-raised
 *
 * Registrations are snapshotted at construction.
 *
 * @example
 * ```typescript
 * const executor = new ChainExecutor([
 *   new InterceptorRegistration([auditInterceptor]),
 *   new InterceptorRegistration([historyInterceptor], methodNamed("remove")),
 * ]);
 * ```
 */
export class ChainExecutor {
  readonly metrics: Metrics;
  private readonly registrations: readonly RegistrationSnapshot[];
  private readonly logger: Logger;
  private readonly dispatcher: EventDispatcher;

  constructor(
    registrations: readonly InterceptorRegistration[] = [],
    options: ChainExecutorOptions = {},
  ) {
    this.registrations = Object.freeze(registrations.map((r) => r.snapshot()));
    this.logger = options.logger ?? console;
    this.metrics = options.metrics ?? new Metrics();
    this.dispatcher = new EventDispatcher(options.eventContext);
    if (options.onEvent) {
      this.dispatcher.onEvent(options.onEvent);
    }
  }

  /**
   * Interceptors that would run for an operation, in before-phase order
   */
  getInterceptors(operation: OperationDescriptor): MethodInterceptor[] {
    return resolveInterceptors(this.registrations, operation);
  }

  /**
   * Run a synchronous operation through the chain. Every hook must complete
   * synchronously.
   */
  executeSync(invocation: Invocation, proceed: Proceed<unknown>): unknown {
    const interceptors = this.getInterceptors(invocation.operation);
    if (interceptors.length === 0) {
      this.metrics.passthroughCalls++;
      return proceed(invocation.args);
    }

    const ctx = this.begin(invocation, interceptors);

    let raw: unknown;
    try {
      this.throwIfAborted(ctx);
      ctx.enter(CallStates.BEFORE);
      for (const interceptor of interceptors) {
        this.runBeforeSync(ctx, interceptor);
      }
      ctx.enter(CallStates.PROCEEDING);
      raw = proceed(ctx.arguments);
    } catch (error) {
      this.handleFailureSync(ctx, interceptors, error);
      throw error;
    }

    let value: unknown;
    try {
      ctx.setResult(raw);
      value = this.transformSync(ctx, interceptors, raw);
      ctx.setResult(value);
    } catch (error) {
      this.handleFailureSync(ctx, interceptors, error);
      throw error;
    }

    ctx.enter(CallStates.AFTER);
    for (const interceptor of [...interceptors].reverse()) {
      this.notifySync(ctx, interceptor, "after");
    }
    this.finishSuccess(ctx);
    return value;
  }

  /**
   * Run an asynchronous operation through the chain. Hooks may be sync or
   * async; each is awaited before the next one runs.
   */
  async executeAsync(
    invocation: Invocation,
    proceed: Proceed<unknown>,
  ): Promise<unknown> {
    const interceptors = this.getInterceptors(invocation.operation);
    if (interceptors.length === 0) {
      this.metrics.passthroughCalls++;
      return proceed(invocation.args);
    }

    const ctx = this.begin(invocation, interceptors);

    let raw: unknown;
    try {
      this.throwIfAborted(ctx);
      ctx.enter(CallStates.BEFORE);
      for (const interceptor of interceptors) {
        await this.runBeforeAsync(ctx, interceptor);
      }
      this.throwIfAborted(ctx);
      ctx.enter(CallStates.PROCEEDING);
      raw = await this.settle(ctx, proceed);
    } catch (error) {
      await this.handleFailureAsync(ctx, interceptors, error);
      throw error;
    }

    let value: unknown;
    try {
      ctx.setResult(raw);
      value = raw;
      for (const interceptor of interceptors) {
        value = await this.transformAsync(ctx, interceptor, value);
      }
      ctx.setResult(value);
    } catch (error) {
      await this.handleFailureAsync(ctx, interceptors, error);
      throw error;
    }

    ctx.enter(CallStates.AFTER);
    for (const interceptor of [...interceptors].reverse()) {
      await this.notifyAsync(ctx, interceptor, "after");
    }
    this.finishSuccess(ctx);
    return value;
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  private begin(
    invocation: Invocation,
    interceptors: MethodInterceptor[],
  ): MethodCallContext {
    const ctx = new MethodCallContext({
      target: invocation.target,
      operation: invocation.operation,
      args: invocation.args,
      signal: findAbortSignal(invocation.args),
    });
    this.metrics.calls++;
    this.dispatcher.emit({
      type: InterceptionEvents.CALL_START,
      callId: ctx.callId,
      capability: ctx.operation.capability,
      operation: ctx.operation.name,
      interceptors: interceptors.map(interceptorName),
    });
    return ctx;
  }

  private finishSuccess(ctx: MethodCallContext): void {
    ctx.complete();
    this.metrics.successes++;
    this.dispatcher.emit({
      type: InterceptionEvents.CALL_SUCCESS,
      callId: ctx.callId,
      capability: ctx.operation.capability,
      operation: ctx.operation.name,
      durationMs: ctx.elapsed(),
    });
  }

  private finishFailure(ctx: MethodCallContext): void {
    ctx.complete();
    const base = {
      callId: ctx.callId,
      capability: ctx.operation.capability,
      operation: ctx.operation.name,
      durationMs: ctx.elapsed(),
    };
    if (ctx.isCancelled) {
      this.metrics.cancellations++;
      this.dispatcher.emit({ type: InterceptionEvents.CALL_CANCELLED, ...base });
    } else {
      this.metrics.failures++;
      this.dispatcher.emit({
        type: InterceptionEvents.CALL_FAILURE,
        ...base,
        error: errorMessage(ctx.exception),
      });
    }
  }

  private handleFailureSync(
    ctx: MethodCallContext,
    interceptors: MethodInterceptor[],
    error: unknown,
  ): void {
    ctx.setException(error, isCancellation(error));
    for (const interceptor of interceptors) {
      this.notifySync(ctx, interceptor, "exception");
    }
    this.finishFailure(ctx);
  }

  private async handleFailureAsync(
    ctx: MethodCallContext,
    interceptors: MethodInterceptor[],
    error: unknown,
  ): Promise<void> {
    ctx.setException(error, isCancellation(error));
    for (const interceptor of interceptors) {
      await this.notifyAsync(ctx, interceptor, "exception");
    }
    this.finishFailure(ctx);
  }

  // ---------------------------------------------------------------------------
  // Cancellation
  // ---------------------------------------------------------------------------

  private throwIfAborted(ctx: MethodCallContext): void {
    if (ctx.signal?.aborted) {
      throw this.cancellation(ctx, ctx.signal);
    }
  }

  private cancellation(
    ctx: MethodCallContext,
    signal: AbortSignal,
  ): CancellationError {
    return new CancellationError(signal.reason, {
      capability: ctx.operation.capability,
      operation: ctx.operation.name,
    });
  }

  /**
   * Await the real call, racing it against the call's AbortSignal. Settles
   * exactly once; a late settlement of the operation is ignored.
   */
  private settle(
    ctx: MethodCallContext,
    proceed: Proceed<unknown>,
  ): Promise<unknown> {
    const pending = Promise.resolve(proceed(ctx.arguments));
    const signal = ctx.signal;
    if (!signal) return pending;

    return new Promise<unknown>((resolve, reject) => {
      const onAbort = () => reject(this.cancellation(ctx, signal));
      if (signal.aborted) {
        onAbort();
      } else {
        signal.addEventListener("abort", onAbort, { once: true });
      }
      pending.then(
        (value) => {
          signal.removeEventListener("abort", onAbort);
          resolve(value);
        },
        (error: unknown) => {
          signal.removeEventListener("abort", onAbort);
          reject(error);
        },
      );
    });
  }

  // ---------------------------------------------------------------------------
  // Hooks
  // ---------------------------------------------------------------------------

  private hookError(
    ctx: MethodCallContext,
    interceptor: MethodInterceptor,
    phase: HookPhase,
    cause: unknown,
    code:
      | typeof InterposeErrorCodes.HOOK_FAILED
      | typeof InterposeErrorCodes.HOOK_RETURNED_PROMISE = InterposeErrorCodes.HOOK_FAILED,
  ): InterceptorHookError {
    const error = new InterceptorHookError(interceptorName(interceptor), phase, cause, {
      code,
      capability: ctx.operation.capability,
      operation: ctx.operation.name,
    });
    this.dispatcher.emit({
      type: InterceptionEvents.HOOK_ERROR,
      callId: ctx.callId,
      capability: ctx.operation.capability,
      operation: ctx.operation.name,
      interceptor: error.interceptorName,
      phase,
      error: errorMessage(cause),
    });
    return error;
  }

  /**
   * A sync operation's hook returned a promise. The promise is left to run;
   * its rejection is logged.
   */
  private rejectPromise(
    ctx: MethodCallContext,
    interceptor: MethodInterceptor,
    phase: HookPhase,
    returned: PromiseLike<unknown>,
  ): InterceptorHookError {
    Promise.resolve(returned).catch((error: unknown) => {
      this.logger.error(
        `Interceptor "${interceptorName(interceptor)}" ${phase} hook rejected after a synchronous call`,
        { callId: ctx.callId, error: errorMessage(error) },
      );
    });
    return this.hookError(
      ctx,
      interceptor,
      phase,
      new Error("hook returned a promise for a synchronous operation"),
      InterposeErrorCodes.HOOK_RETURNED_PROMISE,
    );
  }

  /**
   * Log and collect an after/exception hook failure
   */
  private collect(ctx: MethodCallContext, error: InterceptorHookError): void {
    ctx.hookErrors.push(error);
    this.metrics.hookErrors++;
    this.logger.error(error.message, {
      callId: ctx.callId,
      capability: ctx.operation.capability,
      operation: ctx.operation.name,
    });
  }

  private runBeforeSync(
    ctx: MethodCallContext,
    interceptor: MethodInterceptor,
  ): void {
    if (!interceptor.beforeInvoke) return;
    let returned: unknown;
    try {
      returned = interceptor.beforeInvoke(ctx);
    } catch (error) {
      throw this.hookError(ctx, interceptor, "before", error);
    }
    if (isPromiseLike(returned)) {
      throw this.rejectPromise(ctx, interceptor, "before", returned);
    }
  }

  private async runBeforeAsync(
    ctx: MethodCallContext,
    interceptor: MethodInterceptor,
  ): Promise<void> {
    if (!interceptor.beforeInvoke) return;
    try {
      await interceptor.beforeInvoke(ctx);
    } catch (error) {
      throw this.hookError(ctx, interceptor, "before", error);
    }
  }

  private transformSync(
    ctx: MethodCallContext,
    interceptors: MethodInterceptor[],
    raw: unknown,
  ): unknown {
    let value = raw;
    for (const interceptor of interceptors) {
      if (!interceptor.transformResult) continue;
      let next: unknown;
      try {
        next = interceptor.transformResult(ctx, value);
      } catch (error) {
        throw this.hookError(ctx, interceptor, "transform", error);
      }
      if (isPromiseLike(next)) {
        throw this.rejectPromise(ctx, interceptor, "transform", next);
      }
      value = next;
    }
    return value;
  }

  private async transformAsync(
    ctx: MethodCallContext,
    interceptor: MethodInterceptor,
    value: unknown,
  ): Promise<unknown> {
    if (!interceptor.transformResult) return value;
    try {
      return await interceptor.transformResult(ctx, value);
    } catch (error) {
      throw this.hookError(ctx, interceptor, "transform", error);
    }
  }

  private notifySync(
    ctx: MethodCallContext,
    interceptor: MethodInterceptor,
    phase: "after" | "exception",
  ): void {
    const hook = phase === "after" ? interceptor.afterInvoke : interceptor.onException;
    if (!hook) return;
    let returned: unknown;
    try {
      returned = hook.call(interceptor, ctx);
    } catch (error) {
      this.collect(ctx, this.hookError(ctx, interceptor, phase, error));
      return;
    }
    if (isPromiseLike(returned)) {
      this.collect(ctx, this.rejectPromise(ctx, interceptor, phase, returned));
    }
  }

  private async notifyAsync(
    ctx: MethodCallContext,
    interceptor: MethodInterceptor,
    phase: "after" | "exception",
  ): Promise<void> {
    const hook = phase === "after" ? interceptor.afterInvoke : interceptor.onException;
    if (!hook) return;
    try {
      await hook.call(interceptor, ctx);
    } catch (error) {
      this.collect(ctx, this.hookError(ctx, interceptor, phase, error));
    }
  }
}

/**
 * Create a chain executor
 */
export function createChainExecutor(
  registrations: readonly InterceptorRegistration[] = [],
  options: ChainExecutorOptions = {},
): ChainExecutor {
  return new ChainExecutor(registrations, options);
}
