// Interceptor registrations: which interceptors apply to which operations

import type {
  MethodFilter,
  MethodInterceptor,
  OperationDescriptor,
  OperationKind,
} from "../types/interceptor";

/**
 * Filter that matches every operation
 */
export const matchAll: MethodFilter = () => true;

/**
 * Filter matching operations by name
 *
 * @example
 * ```typescript
 * registration.withMethodFilter(methodNamed("remove"));
 * ```
 */
export function methodNamed(...names: string[]): MethodFilter {
  const set = new Set(names);
  return (operation) => set.has(operation.name);
}

/**
 * Filter matching only sync or only async operations
 */
export function methodKind(kind: OperationKind): MethodFilter {
  return (operation) => operation.kind === kind;
}

/**
 * Immutable view of a registration, taken when an executor is built
 */
export interface RegistrationSnapshot {
  readonly interceptors: readonly MethodInterceptor[];
  readonly methodFilter: MethodFilter;
}

/**
 * A set of interceptors sharing one method filter.
 */
export class InterceptorRegistration {
  private readonly interceptors: MethodInterceptor[] = [];
  private methodFilter: MethodFilter = matchAll;

  constructor(interceptors: MethodInterceptor[] = [], methodFilter?: MethodFilter) {
    this.interceptors.push(...interceptors);
    if (methodFilter) this.methodFilter = methodFilter;
  }

  addInterceptor(interceptor: MethodInterceptor): this {
    this.interceptors.push(interceptor);
    return this;
  }

  withMethodFilter(filter: MethodFilter): this {
    this.methodFilter = filter;
    return this;
  }

  matches(operation: OperationDescriptor): boolean {
    return this.methodFilter(operation);
  }

  getInterceptors(): readonly MethodInterceptor[] {
    return [...this.interceptors];
  }

  /**
   * Freeze the current interceptor list and filter. Later changes to this
   * registration do not affect the snapshot.
   */
  snapshot(): RegistrationSnapshot {
    return Object.freeze({
      interceptors: Object.freeze([...this.interceptors]),
      methodFilter: this.methodFilter,
    });
  }
}

/**
 * Applicable interceptors for an operation: the union of the interceptors of
 * every matching registration, stable-sorted ascending by order. An
 * interceptor registered twice runs once, at its first position.
 */
export function resolveInterceptors(
  registrations: readonly RegistrationSnapshot[],
  operation: OperationDescriptor,
): MethodInterceptor[] {
  const seen = new Set<MethodInterceptor>();
  const applicable: MethodInterceptor[] = [];

  for (const registration of registrations) {
    if (!registration.methodFilter(operation)) continue;
    for (const interceptor of registration.interceptors) {
      if (seen.has(interceptor)) continue;
      seen.add(interceptor);
      applicable.push(interceptor);
    }
  }

  // Array.prototype.sort is stable
  return applicable.sort((a, b) => a.order - b.order);
}
