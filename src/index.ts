// interpose - method interception for TypeScript services
// Main entry point
//
// This is the "full" entry point that re-exports everything.
// Subpath imports:
//   - "interpose/history" - History interceptor and recorders
//   - "interpose/monitoring" - OpenTelemetry, Sentry
//   - "interpose/zod" - Zod schemas

// Proxy factory and registration API
export { defineCapability, createProxy, intercept } from "./runtime/proxy";
export { InterceptorBuilder, InterceptorGroup } from "./runtime/builder";
export {
  ChainExecutor,
  createChainExecutor,
  findAbortSignal,
} from "./runtime/chain";
export type {
  ChainExecutorOptions,
  Invocation,
  Proceed,
} from "./runtime/chain";
export {
  InterceptorRegistration,
  resolveInterceptors,
  matchAll,
  methodNamed,
  methodKind,
} from "./runtime/registration";
export type { RegistrationSnapshot } from "./runtime/registration";

// Call context
export { MethodCallContext } from "./runtime/context";
export type { MethodCallContextInit } from "./runtime/context";
export { CallStateMachine, CallStates } from "./runtime/state-machine";
export type { CallState } from "./runtime/state-machine";

// Built-in interceptors
export {
  loggingInterceptor,
  timingInterceptor,
  validationInterceptor,
  transformInterceptor,
  TIMING_START_KEY,
} from "./runtime/interceptors";
export type { CallTiming } from "./runtime/interceptors";

// Observability
export {
  EventDispatcher,
  createEventDispatcher,
} from "./runtime/event-dispatcher";
export { Metrics, createMetrics } from "./runtime/metrics";
export type { MetricsSnapshot } from "./runtime/metrics";
export { InterceptionEvents } from "./types/observability";
export type {
  InterceptionEvent,
  InterceptionEventType,
  InterceptionEventPayload,
  InterceptionEventHandler,
  BaseInterceptionEvent,
  CallStartEvent,
  CallSuccessEvent,
  CallFailureEvent,
  CallCancelledEvent,
  HookErrorEvent,
} from "./types/observability";

// Contracts
export type {
  OperationKind,
  OperationKeys,
  KindOf,
  OperationTable,
  CapabilityDescriptor,
  OperationDescriptor,
  MethodFilter,
  HookResult,
  MethodInterceptor,
  Logger,
} from "./types/interceptor";
export { HistoryActions } from "./types/history";
export type {
  BaseEntity,
  HistoryAction,
  HistoryRecord,
  NewHistoryRecord,
  HistoryRecorder,
  UserContextAccessor,
  EntityRepository,
} from "./types/history";

// Errors
export {
  InterposeError,
  InterposeErrorCodes,
  ArgumentError,
  InterceptorHookError,
  CancellationError,
  InvalidStateError,
  isInterposeError,
  isCancellation,
  errorMessage,
} from "./utils/errors";
export type {
  InterposeErrorCode,
  InterposeErrorContext,
  HookPhase,
} from "./utils/errors";

// Utilities
export { uuidv7, isUuidv7 } from "./utils/uuid";

// History tracking
export * from "./history";

// Monitoring integrations
export * from "./monitoring";
