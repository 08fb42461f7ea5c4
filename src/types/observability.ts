/**
 * Interception lifecycle events
 *
 * All events include: type, ts (Unix ms), callId (UUID v7), capability,
 * operation and the dispatcher's context.
 */

import type { HookPhase } from "../utils/errors";

export const InterceptionEvents = {
  CALL_START: "CALL_START",
  CALL_SUCCESS: "CALL_SUCCESS",
  CALL_FAILURE: "CALL_FAILURE",
  CALL_CANCELLED: "CALL_CANCELLED",
  HOOK_ERROR: "HOOK_ERROR",
} as const;

export type InterceptionEventType =
  (typeof InterceptionEvents)[keyof typeof InterceptionEvents];

/**
 * Fields present on every event
 */
export interface BaseInterceptionEvent {
  type: InterceptionEventType;
  ts: number;
  callId: string;
  capability: string;
  operation: string;
  context: Readonly<Record<string, unknown>>;
}

export interface CallStartEvent extends BaseInterceptionEvent {
  type: typeof InterceptionEvents.CALL_START;
  /** Names of the interceptors that will run, in before-phase order */
  interceptors: string[];
}

export interface CallSuccessEvent extends BaseInterceptionEvent {
  type: typeof InterceptionEvents.CALL_SUCCESS;
  durationMs: number;
}

export interface CallFailureEvent extends BaseInterceptionEvent {
  type: typeof InterceptionEvents.CALL_FAILURE;
  durationMs: number;
  error: string;
}

export interface CallCancelledEvent extends BaseInterceptionEvent {
  type: typeof InterceptionEvents.CALL_CANCELLED;
  durationMs: number;
}

export interface HookErrorEvent extends BaseInterceptionEvent {
  type: typeof InterceptionEvents.HOOK_ERROR;
  interceptor: string;
  phase: HookPhase;
  error: string;
}

export type InterceptionEvent =
  | CallStartEvent
  | CallSuccessEvent
  | CallFailureEvent
  | CallCancelledEvent
  | HookErrorEvent;

/**
 * Payload accepted by the dispatcher: everything the dispatcher does not
 * fill in itself, per event type.
 */
export type InterceptionEventPayload = InterceptionEvent extends infer E
  ? E extends InterceptionEvent
    ? Omit<E, "ts" | "context">
    : never
  : never;

export type InterceptionEventHandler = (
  event: InterceptionEvent,
) => void | Promise<void>;
