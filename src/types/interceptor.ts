// Core contracts for interpose: operations, capabilities, interceptors

import type { MethodCallContext } from "../runtime/context";

/**
 * Whether an operation completes immediately or returns a promise.
 */
export type OperationKind = "sync" | "async";

/**
 * Names of the invocable members of T. Data fields are never intercepted.
 */
export type OperationKeys<T> = {
  [K in keyof T]-?: T[K] extends (...args: never[]) => unknown ? K : never;
}[keyof T] &
  string;

/**
 * The kind a method of T must be declared with: anything returning a
 * PromiseLike is "async", everything else is "sync".
 */
export type KindOf<F> = F extends (...args: never[]) => infer R
  ? R extends PromiseLike<unknown>
    ? "async"
    : "sync"
  : never;

/**
 * Operation table of a capability. One entry per method, typed so that a
 * wrong or missing kind is a compile error.
 */
export type OperationTable<T> = {
  readonly [K in OperationKeys<T>]: KindOf<T[K]>;
};

/**
 * Runtime description of an interface. TypeScript erases interfaces, so the
 * proxy factory needs this to know which members to intercept and how.
 */
export interface CapabilityDescriptor<T> {
  /**
   * Interface name, reported as OperationDescriptor.capability
   */
  readonly name: string;

  readonly operations: OperationTable<T>;
}

/**
 * Identifies the operation an intercepted call targets.
 */
export interface OperationDescriptor {
  readonly capability: string;
  readonly name: string;
  readonly kind: OperationKind;
}

/**
 * Method filter used by registrations to scope interceptors.
 */
export type MethodFilter = (operation: OperationDescriptor) => boolean;

/**
 * Hook return type: hooks of async operations may return a promise.
 */
export type HookResult = void | Promise<void>;

/**
 * Interceptor - a unit of cross-cutting behavior plugged into the call chain.
 *
 * All hooks are optional. For synchronous operations hooks must complete
 * synchronously; returning a promise there is reported as a hook failure.
 */
export interface MethodInterceptor {
  /**
   * Optional name, used in logs, events and hook errors
   */
  name?: string;

  /**
   * Priority. Lower runs earlier in the before phase and later in the
   * after phase.
   */
  order: number;

  /**
   * Runs before the real call. May observe or replace arguments in
   * `ctx.arguments`. Throwing fails the call without invoking it.
   */
  beforeInvoke?: (ctx: MethodCallContext) => HookResult;

  /**
   * Runs after a successful call, once results have been transformed.
   */
  afterInvoke?: (ctx: MethodCallContext) => HookResult;

  /**
   * Runs when the call failed or was cancelled. Cannot suppress the failure.
   */
  onException?: (ctx: MethodCallContext) => HookResult;

  /**
   * Pipeline stage over the result: receives the previous interceptor's
   * output and returns the next one.
   */
  transformResult?: (
    ctx: MethodCallContext,
    previous: unknown,
  ) => unknown | Promise<unknown>;
}

/**
 * Minimal logger shape. `console` satisfies it.
 */
export interface Logger {
  debug?: (message: string, data?: Record<string, unknown>) => void;
  info: (message: string, data?: Record<string, unknown>) => void;
  warn: (message: string, data?: Record<string, unknown>) => void;
  error: (message: string, data?: Record<string, unknown>) => void;
}
