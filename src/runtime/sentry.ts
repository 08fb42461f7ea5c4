// Sentry integration - error capture and breadcrumbs for intercepted calls

import type * as Sentry from "@sentry/node";
import type { MethodCallContext } from "./context";
import type { MethodInterceptor } from "../types/interceptor";
import type {
  InterceptionEvent,
  InterceptionEventHandler,
} from "../types/observability";
import { InterceptionEvents } from "../types/observability";

/**
 * Sentry client interface (compatible with @sentry/node)
 */
export interface SentryClient {
  captureException: typeof Sentry.captureException;
  captureMessage: typeof Sentry.captureMessage;
  addBreadcrumb: typeof Sentry.addBreadcrumb;
  setTag: typeof Sentry.setTag;
}

/**
 * Sentry integration configuration
 */
export interface SentryConfig {
  /**
   * Sentry client instance
   * Pass the Sentry namespace: `import * as Sentry from '@sentry/node'`
   */
  sentry: SentryClient;

  /**
   * Whether to capture cancelled calls as exceptions
   * @default false
   */
  captureCancellations?: boolean;

  /**
   * Whether to add a breadcrumb for every call
   * @default true
   */
  breadcrumbs?: boolean;

  /**
   * Custom tags set once, at construction
   */
  tags?: Record<string, string>;

  /**
   * Interceptor order
   * @default -50
   */
  order?: number;
}

/**
 * Sentry bookkeeping for intercepted calls
 */
export class InterposeSentry {
  private readonly sentry: SentryClient;
  private readonly captureCancellations: boolean;
  private readonly breadcrumbs: boolean;

  constructor(config: SentryConfig) {
    this.sentry = config.sentry;
    this.captureCancellations = config.captureCancellations ?? false;
    this.breadcrumbs = config.breadcrumbs ?? true;

    if (config.tags) {
      for (const [key, value] of Object.entries(config.tags)) {
        this.sentry.setTag(key, value);
      }
    }
  }

  recordCallStart(ctx: MethodCallContext): void {
    if (!this.breadcrumbs) return;
    this.sentry.addBreadcrumb({
      type: "info",
      category: "interpose",
      message: `${ctx.operation.capability}.${ctx.operation.name} called`,
      data: { callId: ctx.callId, arguments: ctx.argumentCount },
      level: "info",
    });
  }

  recordCallSuccess(ctx: MethodCallContext): void {
    if (!this.breadcrumbs) return;
    this.sentry.addBreadcrumb({
      type: "info",
      category: "interpose",
      message: `${ctx.operation.capability}.${ctx.operation.name} completed`,
      data: { callId: ctx.callId, durationMs: ctx.elapsed() },
      level: "info",
    });
  }

  /**
   * Capture the exception of a failed call
   */
  recordCallFailure(ctx: MethodCallContext): void {
    if (ctx.isCancelled && !this.captureCancellations) {
      if (this.breadcrumbs) {
        this.sentry.addBreadcrumb({
          type: "info",
          category: "interpose",
          message: `${ctx.operation.capability}.${ctx.operation.name} cancelled`,
          data: { callId: ctx.callId },
          level: "warning",
        });
      }
      return;
    }

    this.sentry.captureException(ctx.exception, {
      tags: {
        component: "interpose",
        capability: ctx.operation.capability,
        operation: ctx.operation.name,
      },
      extra: {
        callId: ctx.callId,
        targetType: ctx.targetType,
        durationMs: ctx.elapsed(),
        cancelled: ctx.isCancelled,
      },
    });
  }
}

export function createSentryIntegration(config: SentryConfig): InterposeSentry {
  return new InterposeSentry(config);
}

/**
 * Interceptor reporting failed calls to Sentry
 *
 * @example
 * ```typescript
 * import * as Sentry from '@sentry/node';
 *
 * builder.addInterceptor(sentryInterceptor({ sentry: Sentry }));
 * ```
 */
export function sentryInterceptor(config: SentryConfig): MethodInterceptor {
  const integration = new InterposeSentry(config);

  return {
    name: "sentry",
    order: config.order ?? -50,
    beforeInvoke: (ctx) => integration.recordCallStart(ctx),
    afterInvoke: (ctx) => integration.recordCallSuccess(ctx),
    onException: (ctx) => integration.recordCallFailure(ctx),
  };
}

/**
 * Event handler reporting interceptor hook failures to Sentry as warnings.
 * Pass it as `onEvent` to a chain executor or builder.
 */
export function createSentryHandler(
  config: Pick<SentryConfig, "sentry">,
): InterceptionEventHandler {
  return (event: InterceptionEvent) => {
    if (event.type !== InterceptionEvents.HOOK_ERROR) return;
    config.sentry.captureMessage(
      `Interceptor "${event.interceptor}" ${event.phase} hook failed: ${event.error}`,
      {
        level: "warning",
        tags: {
          component: "interpose",
          capability: event.capability,
          operation: event.operation,
        },
        extra: { callId: event.callId },
      },
    );
  };
}
