/**
 * Event Handler Utilities
 *
 * Helpers for composing lifecycle event handlers, since a chain executor
 * takes a single `onEvent`.
 */

import type {
  InterceptionEvent,
  InterceptionEventHandler,
  InterceptionEventType,
} from "../types/observability";

/**
 * Combine several handlers into one. A throwing or rejecting handler is
 * logged and does not stop the others.
 *
 * @example
 * ```typescript
 * const builder = new InterceptorBuilder(UserRepositoryCapability, {
 *   onEvent: combineEvents(
 *     createSentryHandler({ sentry: Sentry }),
 *     (event) => console.log(event.type),
 *   ),
 * });
 * ```
 */
export function combineEvents(
  ...handlers: InterceptionEventHandler[]
): InterceptionEventHandler {
  if (handlers.length === 0) {
    return () => {};
  }

  const [only] = handlers;
  if (handlers.length === 1 && only) {
    return only;
  }

  const report = (event: InterceptionEvent, error: unknown) => {
    console.error(
      `Event handler error for ${event.type}:`,
      error instanceof Error ? error.message : error,
    );
  };

  return (event) => {
    for (const handler of handlers) {
      try {
        const returned = handler(event);
        if (returned instanceof Promise) {
          returned.catch((error: unknown) => report(event, error));
        }
      } catch (error) {
        report(event, error);
      }
    }
  };
}

/**
 * Handler that only receives the given event types
 */
export function filterEvents(
  types: readonly InterceptionEventType[],
  handler: InterceptionEventHandler,
): InterceptionEventHandler {
  const typeSet = new Set(types);
  return (event) => {
    if (typeSet.has(event.type)) {
      return handler(event);
    }
  };
}

/**
 * Handler that receives every event type except the given ones
 */
export function excludeEvents(
  types: readonly InterceptionEventType[],
  handler: InterceptionEventHandler,
): InterceptionEventHandler {
  const typeSet = new Set(types);
  return (event) => {
    if (!typeSet.has(event.type)) {
      return handler(event);
    }
  };
}
