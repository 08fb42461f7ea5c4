// Actor lookup for history records

import type { UserContextAccessor } from "../types/history";

/**
 * Reports a fixed username, "System" unless told otherwise.
 */
export class DefaultUserContextAccessor implements UserContextAccessor {
  constructor(private readonly username = "System") {}

  getCurrentUsername(): string {
    return this.username;
  }
}

/**
 * Adapt a function (reading a request scope, a session, ...) to a
 * UserContextAccessor. Empty names fall back to `fallback`.
 */
export function userContextFrom(
  lookup: () => string | undefined,
  fallback = "System",
): UserContextAccessor {
  return {
    getCurrentUsername: () => lookup() || fallback,
  };
}
