// Fluent builder for intercepted services

import type {
  CapabilityDescriptor,
  MethodFilter,
  MethodInterceptor,
} from "../types/interceptor";
import { ChainExecutor } from "./chain";
import type { ChainExecutorOptions } from "./chain";
import { createProxy } from "./proxy";
import { InterceptorRegistration } from "./registration";

/**
 * Collects registrations for one capability, then builds proxies.
 *
 * @example
 * ```typescript
 * const repository = new InterceptorBuilder(UserRepositoryCapability)
 *   .addInterceptor(loggingInterceptor())
 *   .createGroup()
 *     .withMethodFilter(methodNamed("add", "update", "remove"))
 *     .addInterceptor(historyInterceptor)
 *   .endGroup()
 *   .build(new UserRepository());
 * ```
 */
export class InterceptorBuilder<T extends object> {
  private readonly registrations: InterceptorRegistration[] = [];

  constructor(
    private readonly capability: CapabilityDescriptor<T>,
    private readonly options: ChainExecutorOptions = {},
  ) {}

  /**
   * Register an interceptor for every operation, or for the operations
   * matching `methodFilter`
   */
  addInterceptor(
    interceptor: MethodInterceptor,
    methodFilter?: MethodFilter,
  ): this {
    this.registrations.push(new InterceptorRegistration([interceptor], methodFilter));
    return this;
  }

  /**
   * Start a group of interceptors sharing one method filter
   */
  createGroup(): InterceptorGroup<T> {
    const registration = new InterceptorRegistration();
    this.registrations.push(registration);
    return new InterceptorGroup(this, registration);
  }

  getRegistrations(): readonly InterceptorRegistration[] {
    return [...this.registrations];
  }

  /**
   * Snapshot the registrations into an executor. Later builder calls do not
   * affect it.
   */
  buildExecutor(): ChainExecutor {
    return new ChainExecutor(this.registrations, this.options);
  }

  build(target: T): T {
    return createProxy(this.capability, target, this.buildExecutor());
  }
}

export class InterceptorGroup<T extends object> {
  constructor(
    private readonly builder: InterceptorBuilder<T>,
    private readonly registration: InterceptorRegistration,
  ) {}

  addInterceptor(interceptor: MethodInterceptor): this {
    this.registration.addInterceptor(interceptor);
    return this;
  }

  withMethodFilter(filter: MethodFilter): this {
    this.registration.withMethodFilter(filter);
    return this;
  }

  endGroup(): InterceptorBuilder<T> {
    return this.builder;
  }
}
