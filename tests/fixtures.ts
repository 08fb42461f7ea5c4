/**
 * Shared test fixtures: a calculator with sync and async operations, an
 * in-memory user repository, and interceptors that record what ran.
 */

import { vi } from "vitest";
import { z } from "zod";
import { defineCapability } from "../src/runtime/proxy";
import type { EntityRepository } from "../src/types/history";
import type { Logger, MethodInterceptor } from "../src/types/interceptor";

export interface Calculator {
  readonly label: string;
  add(a: number, b: number): number;
  divide(a: number, b: number): number;
  addLater(a: number, b: number, signal?: AbortSignal): Promise<number>;
  failLater(message: string): Promise<number>;
  failAborted(): Promise<number>;
  hang(signal: AbortSignal): Promise<string>;
}

export const CalculatorCapability = defineCapability<Calculator>("Calculator", {
  add: "sync",
  divide: "sync",
  addLater: "async",
  failLater: "async",
  failAborted: "async",
  hang: "async",
});

export class BasicCalculator implements Calculator {
  readonly label = "basic";
  lastError: Error | undefined;
  onHang: (() => void) | undefined;

  constructor(private readonly log: string[] = []) {}

  add(a: number, b: number): number {
    this.log.push("real:add");
    return a + b;
  }

  divide(a: number, b: number): number {
    this.log.push("real:divide");
    if (b === 0) {
      this.lastError = new RangeError("Division by zero");
      throw this.lastError;
    }
    return a / b;
  }

  async addLater(a: number, b: number): Promise<number> {
    this.log.push("real:addLater");
    return a + b;
  }

  async failLater(message: string): Promise<number> {
    this.log.push("real:failLater");
    this.lastError = new Error(message);
    throw this.lastError;
  }

  async failAborted(): Promise<number> {
    this.log.push("real:failAborted");
    const error = new Error("aborted by operation");
    error.name = "AbortError";
    this.lastError = error;
    throw error;
  }

  hang(): Promise<string> {
    this.log.push("real:hang");
    this.onHang?.();
    return new Promise<string>(() => {});
  }
}

/**
 * Interceptor pushing `<name>.<phase>` to `log` from every hook
 */
export function recordingInterceptor(
  name: string,
  order: number,
  log: string[],
  overrides: Partial<MethodInterceptor> = {},
): MethodInterceptor {
  return {
    name,
    order,
    beforeInvoke: () => {
      log.push(`${name}.before`);
    },
    afterInvoke: () => {
      log.push(`${name}.after`);
    },
    onException: () => {
      log.push(`${name}.exception`);
    },
    ...overrides,
  };
}

export function createTestLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } satisfies Logger;
}

/**
 * Resolve once queued microtasks (event dispatch) have run
 */
export function flushEvents(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}

/**
 * Run `fn` and return what it threw
 */
export function captureSync(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("expected the call to throw");
}

export interface User {
  id: string;
  name: string;
  email?: string;
}

export const UserSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  email: z.string().optional(),
});

export const UserRepositoryCapability = defineCapability<EntityRepository<User>>(
  "UserRepository",
  {
    getById: "async",
    getAll: "async",
    add: "async",
    update: "async",
    remove: "async",
  },
);

export class InMemoryUserRepository implements EntityRepository<User> {
  private readonly users = new Map<string, User>();
  lookups = 0;

  async getById(id: string): Promise<User | undefined> {
    this.lookups++;
    return this.users.get(id);
  }

  async getAll(): Promise<User[]> {
    return [...this.users.values()];
  }

  async add(user: User): Promise<User> {
    if (this.users.has(user.id)) {
      throw new Error(`User ${user.id} already exists`);
    }
    this.users.set(user.id, user);
    return user;
  }

  async update(user: User): Promise<User> {
    const existing = this.users.get(user.id);
    if (!existing) {
      throw new Error(`User ${user.id} not found`);
    }
    // Mutates in place, like an ORM-managed entity
    Object.assign(existing, user);
    return existing;
  }

  async remove(id: string): Promise<void> {
    if (!this.users.delete(id)) {
      throw new Error(`User ${id} not found`);
    }
  }
}

/**
 * Clock returning `start`, `start + step`, ... on successive calls
 */
export function steppingClock(start = 1000, step = 1000): () => number {
  let next = start;
  return () => {
    const now = next;
    next += step;
    return now;
  };
}
