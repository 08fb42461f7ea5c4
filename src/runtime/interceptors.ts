// Built-in interceptors - logging, timing, validation and result hooks

import type { ZodTypeAny } from "zod";
import type { MethodCallContext } from "./context";
import type { Logger, MethodInterceptor } from "../types/interceptor";
import { errorMessage } from "../utils/errors";

function qualifiedName(ctx: MethodCallContext): string {
  return `${ctx.operation.capability}.${ctx.operation.name}`;
}

/**
 * Logging interceptor - logs every call, its completion and its failure
 */
export function loggingInterceptor(
  logger: Logger = console,
  order = 0,
): MethodInterceptor {
  return {
    name: "logging",
    order,
    beforeInvoke: (ctx) => {
      logger.info(`${qualifiedName(ctx)} called`, {
        callId: ctx.callId,
        arguments: ctx.argumentCount,
      });
    },
    afterInvoke: (ctx) => {
      logger.info(`${qualifiedName(ctx)} completed`, {
        callId: ctx.callId,
        durationMs: ctx.elapsed(),
      });
    },
    onException: (ctx) => {
      if (ctx.isCancelled) {
        logger.warn(`${qualifiedName(ctx)} cancelled`, {
          callId: ctx.callId,
          durationMs: ctx.elapsed(),
        });
        return;
      }
      logger.error(`${qualifiedName(ctx)} failed`, {
        callId: ctx.callId,
        durationMs: ctx.elapsed(),
        error: errorMessage(ctx.exception),
      });
    },
  };
}

export const TIMING_START_KEY = "timing:start";

export interface CallTiming {
  callId: string;
  capability: string;
  operation: string;
  durationMs: number;
  outcome: "success" | "failure" | "cancelled";
}

/**
 * Timing interceptor - reports the duration of each call as measured from
 * its own before hook
 */
export function timingInterceptor(
  onTiming: (timing: CallTiming) => void,
  order = 0,
): MethodInterceptor {
  const report = (ctx: MethodCallContext, outcome: CallTiming["outcome"]) => {
    const start = ctx.items.get(TIMING_START_KEY);
    onTiming({
      callId: ctx.callId,
      capability: ctx.operation.capability,
      operation: ctx.operation.name,
      durationMs:
        typeof start === "number" ? performance.now() - start : ctx.elapsed(),
      outcome,
    });
  };

  return {
    name: "timing",
    order,
    beforeInvoke: (ctx) => {
      ctx.items.set(TIMING_START_KEY, performance.now());
    },
    afterInvoke: (ctx) => report(ctx, "success"),
    onException: (ctx) => report(ctx, ctx.isCancelled ? "cancelled" : "failure"),
  };
}

/**
 * Validation interceptor - parses arguments with zod before the call.
 *
 * `schemas` maps operation names to one schema per leading argument. Parsed
 * values replace the originals, so defaults and transforms apply. A
 * mismatch fails the call without invoking it. An argument the caller
 * omitted must accept `undefined`.
 *
 * @example
 * ```typescript
 * validationInterceptor({
 *   add: [UserSchema],
 *   remove: [z.string().uuid()],
 * });
 * ```
 */
export function validationInterceptor(
  schemas: Record<string, readonly ZodTypeAny[]>,
  order = 0,
): MethodInterceptor {
  return {
    name: "validation",
    order,
    beforeInvoke: (ctx) => {
      const expected = schemas[ctx.operation.name];
      if (!expected) return;
      expected.forEach((schema, index) => {
        if (index >= ctx.argumentCount) {
          // Omitted trailing argument: checked as undefined, never appended
          schema.parse(undefined);
          return;
        }
        ctx.arguments[index] = ctx.getArgument(index, schema);
      });
    },
  };
}

/**
 * Transform interceptor - post-processes results.
 *
 * For synchronous operations `transform` must return a plain value.
 */
export function transformInterceptor(
  transform: (value: unknown, ctx: MethodCallContext) => unknown,
  order = 0,
): MethodInterceptor {
  return {
    name: "transform",
    order,
    transformResult: (ctx, previous) => transform(previous, ctx),
  };
}
