/**
 * Interception Event Dispatcher
 *
 * Centralized event emission for call lifecycle events.
 * - Adds ts and context automatically to all events
 * - Calls handlers via microtasks (fire-and-forget)
 * - Never throws from handler failures
 */

import type {
  InterceptionEvent,
  InterceptionEventHandler,
  InterceptionEventPayload,
} from "../types/observability";

/**
 * Deep clone and freeze an object to ensure complete immutability.
 * Handles nested objects and arrays.
 */
function deepCloneAndFreeze(value: unknown): unknown {
  if (value === null || typeof value !== "object") {
    return value;
  }

  if (Array.isArray(value)) {
    return Object.freeze(value.map((item) => deepCloneAndFreeze(item)));
  }

  const cloned: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    cloned[key] = deepCloneAndFreeze(entry);
  }
  return Object.freeze(cloned);
}

function freezeContext(
  context: Record<string, unknown>,
): Readonly<Record<string, unknown>> {
  const cloned: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(context)) {
    cloned[key] = deepCloneAndFreeze(entry);
  }
  return Object.freeze(cloned);
}

export class EventDispatcher {
  private handlers: InterceptionEventHandler[] = [];
  private readonly _context: Readonly<Record<string, unknown>>;

  constructor(context: Record<string, unknown> = {}) {
    this._context = freezeContext(context);
  }

  /**
   * Register an event handler
   */
  onEvent(handler: InterceptionEventHandler): void {
    this.handlers.push(handler);
  }

  /**
   * Remove an event handler
   */
  offEvent(handler: InterceptionEventHandler): void {
    const index = this.handlers.indexOf(handler);
    if (index !== -1) {
      this.handlers.splice(index, 1);
    }
  }

  /**
   * Emit an event to all handlers
   * - Adds ts and context automatically
   * - Calls handlers via microtasks (fire-and-forget)
   * - Never throws from handler failures
   */
  emit(payload: InterceptionEventPayload): void {
    // Skip event creation if no handlers registered
    if (this.handlers.length === 0) return;

    const event: InterceptionEvent = {
      ...payload,
      ts: Date.now(),
      context: this._context,
    };

    // Snapshot handlers so handlers may unsubscribe during dispatch
    for (const handler of [...this.handlers]) {
      queueMicrotask(() => {
        try {
          const result = handler(event);
          if (result instanceof Promise) {
            result.catch(() => {
              // Handler errors are fire and forget
            });
          }
        } catch {
          // Handler errors are fire and forget
        }
      });
    }
  }

  getContext(): Readonly<Record<string, unknown>> {
    return this._context;
  }

  getHandlerCount(): number {
    return this.handlers.length;
  }
}

/**
 * Create an event dispatcher with the given context
 */
export function createEventDispatcher(
  context: Record<string, unknown> = {},
): EventDispatcher {
  return new EventDispatcher(context);
}
