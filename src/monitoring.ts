/**
 * interpose monitoring - OpenTelemetry and Sentry integrations
 *
 * @example
 * ```typescript
 * import { openTelemetryInterceptor, sentryInterceptor } from "interpose/monitoring";
 *
 * const repository = new InterceptorBuilder(UserRepositoryCapability, {
 *   onEvent: createSentryHandler({ sentry: Sentry }),
 * })
 *   .addInterceptor(openTelemetryInterceptor({ tracer, meter }))
 *   .addInterceptor(sentryInterceptor({ sentry: Sentry }))
 *   .build(new UserRepository());
 * ```
 */

// Event handler utilities
export {
  combineEvents,
  filterEvents,
  excludeEvents,
} from "./runtime/event-handlers";

// OpenTelemetry
export {
  InterposeOpenTelemetry,
  createOpenTelemetry,
  openTelemetryInterceptor,
  SemanticAttributes,
  SpanKind,
  SpanStatusCode,
} from "./runtime/opentelemetry";
export type {
  OpenTelemetryConfig,
  CallOutcome,
  Attributes,
  OTelSpan,
} from "./runtime/opentelemetry";

// Sentry
export {
  InterposeSentry,
  createSentryIntegration,
  sentryInterceptor,
  createSentryHandler,
} from "./runtime/sentry";
export type { SentryClient, SentryConfig } from "./runtime/sentry";
