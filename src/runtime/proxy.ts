// Dynamic proxy factory - routes every declared operation through a chain

import type {
  CapabilityDescriptor,
  OperationDescriptor,
  OperationTable,
} from "../types/interceptor";
import { ChainExecutor } from "./chain";
import type { ChainExecutorOptions, Invocation, Proceed } from "./chain";
import type { InterceptorRegistration } from "./registration";
import { ArgumentError, InvalidStateError } from "../utils/errors";
import { OperationKindSchema } from "../zod/interceptor";

/**
 * Describe an interface for the proxy factory.
 * Returns its input unchanged - the mapped type does the checking.
 *
 * @example
 * ```typescript
 * interface Greeter {
 *   greet(name: string): string;
 *   greetLater(name: string): Promise<string>;
 * }
 *
 * const GreeterCapability = defineCapability<Greeter>("Greeter", {
 *   greet: "sync",
 *   greetLater: "async",
 * });
 * ```
 */
export function defineCapability<T>(
  name: string,
  operations: OperationTable<T>,
): CapabilityDescriptor<T> {
  return { name, operations };
}

/**
 * Read the operation table of a capability and check each entry against the
 * target.
 */
function describeOperations<T extends object>(
  capability: CapabilityDescriptor<T>,
  target: T,
): OperationDescriptor[] {
  const descriptors: OperationDescriptor[] = [];
  for (const name of Object.keys(capability.operations)) {
    const declared: unknown = Reflect.get(capability.operations, name);
    const kind = OperationKindSchema.safeParse(declared);
    if (!kind.success) {
      throw new ArgumentError(
        `Operation "${name}" of ${capability.name} has invalid kind ${String(declared)}`,
      );
    }
    const member: unknown = Reflect.get(target, name);
    if (typeof member !== "function") {
      throw new ArgumentError(
        `Target does not implement operation "${name}" of ${capability.name}`,
      );
    }
    descriptors.push(
      Object.freeze({ capability: capability.name, name, kind: kind.data }),
    );
  }
  return descriptors;
}

/**
 * Create a proxy of `target` that runs every operation declared by
 * `capability` through `executor`.
 *
 * - sync operations return synchronously, async ones return a promise
 * - members not declared as operations are read straight from the target
 * - the target is never modified
 *
 * @throws ArgumentError if capability, target or executor is missing, or if
 *   the target lacks a declared operation
 */
export function createProxy<T extends object>(
  capability: CapabilityDescriptor<T> | null | undefined,
  target: T | null | undefined,
  executor: ChainExecutor | null | undefined,
): T {
  if (!capability) {
    throw new ArgumentError("A capability descriptor is required");
  }
  if (!target) {
    throw new ArgumentError(`A target instance is required for ${capability.name}`);
  }
  if (!executor) {
    throw new ArgumentError(`A chain executor is required for ${capability.name}`);
  }

  const wrappers = new Map<string, (...args: unknown[]) => unknown>();

  for (const operation of describeOperations(capability, target)) {
    const proceed: Proceed<unknown> = (args) => {
      const method: unknown = Reflect.get(target, operation.name);
      if (typeof method !== "function") {
        throw new InvalidStateError(
          `Operation "${operation.name}" is no longer a function on the target`,
        );
      }
      return Reflect.apply(method, target, args);
    };

    wrappers.set(operation.name, (...args: unknown[]) => {
      const invocation: Invocation = { target, operation, args };
      return operation.kind === "async"
        ? executor.executeAsync(invocation, proceed)
        : executor.executeSync(invocation, proceed);
    });
  }

  // The proxy sits over an empty object inheriting from the target, so the
  // target's non-configurable members place no invariants on the traps.
  const shell: T = Object.create(target);
  return new Proxy(shell, {
    get(_shell, property) {
      if (typeof property === "string") {
        const wrapper = wrappers.get(property);
        if (wrapper) return wrapper;
      }
      return Reflect.get(target, property);
    },
    set(_shell, property, value) {
      return Reflect.set(target, property, value);
    },
    has(_shell, property) {
      return Reflect.has(target, property);
    },
    getPrototypeOf() {
      return Reflect.getPrototypeOf(target);
    },
  });
}

/**
 * Registration API: build an executor from registrations and proxy the
 * target with it.
 */
export function intercept<T extends object>(
  capability: CapabilityDescriptor<T>,
  target: T,
  registrations: readonly InterceptorRegistration[],
  options: ChainExecutorOptions = {},
): T {
  return createProxy(capability, target, new ChainExecutor(registrations, options));
}
