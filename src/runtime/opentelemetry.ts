// OpenTelemetry integration - spans and metrics for intercepted calls

import type {
  Attributes,
  Counter,
  Histogram,
  Meter,
  Span,
  Tracer,
} from "@opentelemetry/api";
import { SpanKind, SpanStatusCode } from "@opentelemetry/api";
import type { MethodCallContext } from "./context";
import type { MethodInterceptor } from "../types/interceptor";
import { errorMessage } from "../utils/errors";

export { SpanKind, SpanStatusCode };
export type { Attributes, Span as OTelSpan };

/**
 * OpenTelemetry configuration
 */
export interface OpenTelemetryConfig {
  /**
   * Tracer used for one span per call
   * Get from: `trace.getTracer('my-service')`
   */
  tracer?: Pick<Tracer, "startSpan">;

  /**
   * Meter used for call counters and durations
   * Get from: `metrics.getMeter('my-service')`
   */
  meter?: Pick<Meter, "createCounter" | "createHistogram">;

  /**
   * Span and metric name prefix
   * @default 'interpose'
   */
  serviceName?: string;

  /**
   * Custom attributes added to every span
   */
  defaultAttributes?: Attributes;

  /**
   * Interceptor order. Lowest runs first, so a low order makes the span
   * cover the other interceptors.
   * @default -100
   */
  order?: number;
}

export const SemanticAttributes = {
  CAPABILITY: "interpose.capability",
  OPERATION: "interpose.operation",
  OPERATION_KIND: "interpose.operation.kind",
  TARGET_TYPE: "interpose.target_type",
  CALL_ID: "interpose.call_id",
  ARGUMENT_COUNT: "interpose.argument_count",
  OUTCOME: "interpose.outcome",
  HOOK_ERROR_COUNT: "interpose.hook_error_count",
} as const;

export type CallOutcome = "success" | "failure" | "cancelled";

function outcomeOf(ctx: MethodCallContext): CallOutcome {
  if (!ctx.hasException) return "success";
  return ctx.isCancelled ? "cancelled" : "failure";
}

/**
 * Span and metric bookkeeping for intercepted calls
 *
 * @example
 * ```typescript
 * import { trace, metrics } from '@opentelemetry/api';
 *
 * const repository = new InterceptorBuilder(UserRepositoryCapability)
 *   .addInterceptor(
 *     openTelemetryInterceptor({
 *       tracer: trace.getTracer('users'),
 *       meter: metrics.getMeter('users'),
 *     }),
 *   )
 *   .build(new UserRepository());
 * ```
 */
export class InterposeOpenTelemetry {
  private readonly tracer?: Pick<Tracer, "startSpan">;
  private readonly serviceName: string;
  private readonly defaultAttributes?: Attributes;
  private readonly spans = new WeakMap<MethodCallContext, Span>();

  private readonly callCounter?: Counter;
  private readonly errorCounter?: Counter;
  private readonly durationHistogram?: Histogram;

  constructor(config: OpenTelemetryConfig = {}) {
    this.tracer = config.tracer;
    this.serviceName = config.serviceName ?? "interpose";
    this.defaultAttributes = config.defaultAttributes;

    if (config.meter) {
      this.callCounter = config.meter.createCounter(`${this.serviceName}.calls`, {
        description: "Total number of intercepted calls",
        unit: "1",
      });
      this.errorCounter = config.meter.createCounter(`${this.serviceName}.errors`, {
        description: "Intercepted calls that failed or were cancelled",
        unit: "1",
      });
      this.durationHistogram = config.meter.createHistogram(
        `${this.serviceName}.duration`,
        {
          description: "Intercepted call duration in milliseconds",
          unit: "ms",
        },
      );
    }
  }

  /**
   * Open the span of a call
   */
  startCall(ctx: MethodCallContext): void {
    if (!this.tracer) return;
    const span = this.tracer.startSpan(
      `${this.serviceName}.${ctx.operation.capability}.${ctx.operation.name}`,
      {
        kind: SpanKind.INTERNAL,
        attributes: {
          ...this.defaultAttributes,
          [SemanticAttributes.CAPABILITY]: ctx.operation.capability,
          [SemanticAttributes.OPERATION]: ctx.operation.name,
          [SemanticAttributes.OPERATION_KIND]: ctx.operation.kind,
          [SemanticAttributes.TARGET_TYPE]: ctx.targetType,
          [SemanticAttributes.CALL_ID]: ctx.callId,
          [SemanticAttributes.ARGUMENT_COUNT]: ctx.argumentCount,
        },
      },
    );
    this.spans.set(ctx, span);
  }

  /**
   * Record metrics for a settled call and close its span, if one was opened
   */
  endCall(ctx: MethodCallContext): void {
    const outcome = outcomeOf(ctx);
    const attributes: Attributes = {
      [SemanticAttributes.CAPABILITY]: ctx.operation.capability,
      [SemanticAttributes.OPERATION]: ctx.operation.name,
      [SemanticAttributes.OUTCOME]: outcome,
    };

    this.callCounter?.add(1, attributes);
    this.durationHistogram?.record(ctx.elapsed(), attributes);
    if (outcome !== "success") {
      this.errorCounter?.add(1, attributes);
    }

    const span = this.spans.get(ctx);
    if (!span) return;
    this.spans.delete(ctx);

    span.setAttribute(SemanticAttributes.OUTCOME, outcome);
    if (ctx.hookErrors.length > 0) {
      span.setAttribute(SemanticAttributes.HOOK_ERROR_COUNT, ctx.hookErrors.length);
    }

    if (outcome === "success") {
      span.setStatus({ code: SpanStatusCode.OK });
    } else {
      span.setStatus({
        code: SpanStatusCode.ERROR,
        message: errorMessage(ctx.exception),
      });
      if (ctx.exception instanceof Error) {
        span.recordException(ctx.exception);
      }
    }
    span.end();
  }
}

export function createOpenTelemetry(
  config: OpenTelemetryConfig = {},
): InterposeOpenTelemetry {
  return new InterposeOpenTelemetry(config);
}

/**
 * Interceptor opening one span per call and recording call metrics
 */
export function openTelemetryInterceptor(
  config: OpenTelemetryConfig,
): MethodInterceptor {
  const otel = new InterposeOpenTelemetry(config);

  return {
    name: "opentelemetry",
    order: config.order ?? -100,
    beforeInvoke: (ctx) => otel.startCall(ctx),
    afterInvoke: (ctx) => otel.endCall(ctx),
    onException: (ctx) => otel.endCall(ctx),
  };
}
