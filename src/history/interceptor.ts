// History interceptor - records Create/Update/Delete history for repositories

import { z } from "zod";
import type { ZodType, ZodTypeDef } from "zod";
import type { MethodCallContext } from "../runtime/context";
import type {
  BaseEntity,
  HistoryAction,
  HistoryRecorder,
  UserContextAccessor,
} from "../types/history";
import { HistoryActions } from "../types/history";
import type { HookResult, Logger, MethodInterceptor } from "../types/interceptor";
import { isPromiseLike } from "../runtime/chain";
import { errorMessage } from "../utils/errors";
import { DefaultUserContextAccessor } from "./user-context";

/**
 * `ctx.items` key under which the pre-call state of an updated or removed
 * entity is kept between the before and after hooks
 */
export const HISTORY_SNAPSHOT_KEY = "history:snapshot";

/**
 * Operation names the interceptor maps to history actions
 */
export interface HistoryOperationNames {
  add: string;
  update: string;
  remove: string;
  /** Lookup used to capture the state before update/remove */
  getById: string;
}

export interface HistoryInterceptorOptions<T extends BaseEntity> {
  /** Stored on every record, e.g. "User" */
  entityType: string;

  /**
   * Validates (and copies) entities read from arguments, results and lookups
   */
  entitySchema: ZodType<T, ZodTypeDef, unknown>;

  /**
   * @default new DefaultUserContextAccessor() ("System")
   */
  userContext?: UserContextAccessor;

  /**
   * @default console
   */
  logger?: Logger;

  /**
   * @default 10
   */
  order?: number;

  /**
   * @default { add: "add", update: "update", remove: "remove", getById: "getById" }
   */
  operations?: Partial<HistoryOperationNames>;
}

/**
 * State captured before an update or remove
 */
class PriorState {
  constructor(
    readonly entity: unknown,
    readonly action: HistoryAction,
  ) {}
}

const EntityIdSchema = z.string().min(1);

/**
 * Records one history entry per successful add/update/remove on a
 * repository-shaped target (one exposing `getById`).
 *
 * - add: the returned entity, as Create
 * - update: the entity as it was before the update, as Update
 * - remove: the entity as it was before removal, as Delete
 *
 * Lookup and recorder failures are logged; the intercepted call is never
 * failed by history tracking. On synchronous operations the lookup runs
 * synchronously and the record is written in the background. Other
 * operations pass through untouched.
 *
 * @example
 * ```typescript
 * const users = new InterceptorBuilder(UserRepositoryCapability)
 *   .addInterceptor(
 *     new HistoryInterceptor(recorder, { entityType: "User", entitySchema: UserSchema }),
 *   )
 *   .build(new UserRepository());
 * ```
 */
export class HistoryInterceptor<T extends BaseEntity> implements MethodInterceptor {
  readonly name = "history";
  readonly order: number;

  private readonly entityType: string;
  private readonly entitySchema: ZodType<T, ZodTypeDef, unknown>;
  private readonly userContext: UserContextAccessor;
  private readonly logger: Logger;
  private readonly operations: HistoryOperationNames;

  constructor(
    private readonly recorder: HistoryRecorder<T>,
    options: HistoryInterceptorOptions<T>,
  ) {
    this.entityType = options.entityType;
    this.entitySchema = options.entitySchema;
    this.userContext = options.userContext ?? new DefaultUserContextAccessor();
    this.logger = options.logger ?? console;
    this.order = options.order ?? 10;
    this.operations = {
      add: "add",
      update: "update",
      remove: "remove",
      getById: "getById",
      ...options.operations,
    };
  }

  beforeInvoke(ctx: MethodCallContext): HookResult {
    const action = this.actionFor(ctx);
    if (action === undefined || action === HistoryActions.CREATE) return;
    if (!this.isRepository(ctx.target)) return;
    if (ctx.operation.kind === "sync") {
      this.capturePriorStateNow(ctx, action);
      return;
    }
    return this.capturePriorState(ctx, action);
  }

  afterInvoke(ctx: MethodCallContext): HookResult {
    const action = this.actionFor(ctx);
    if (action === undefined) return;
    if (!this.isRepository(ctx.target)) return;

    let entity: T;
    let recorded: HistoryAction;
    if (action === HistoryActions.CREATE) {
      const created = this.entitySchema.safeParse(ctx.result);
      if (!created.success) {
        this.logger.warn("History: add returned no recognisable entity", {
          callId: ctx.callId,
          entityType: this.entityType,
        });
        return;
      }
      entity = created.data;
      recorded = action;
    } else {
      const prior = ctx.items.get(HISTORY_SNAPSHOT_KEY);
      if (!(prior instanceof PriorState)) return;
      const previous = this.entitySchema.safeParse(prior.entity);
      if (!previous.success) return;
      entity = previous.data;
      recorded = prior.action;
    }

    const pending = this.record(ctx, entity, recorded);
    // Synchronous operations do not wait for the recorder
    return ctx.operation.kind === "async" ? pending : undefined;
  }

  private actionFor(ctx: MethodCallContext): HistoryAction | undefined {
    switch (ctx.operation.name) {
      case this.operations.add:
        return HistoryActions.CREATE;
      case this.operations.update:
        return HistoryActions.UPDATE;
      case this.operations.remove:
        return HistoryActions.DELETE;
      default:
        return undefined;
    }
  }

  private isRepository(target: object): boolean {
    return typeof Reflect.get(target, this.operations.getById) === "function";
  }

  /**
   * Id of the entity an update or remove call is about
   */
  private entityIdOf(ctx: MethodCallContext, action: HistoryAction): string {
    if (action === HistoryActions.UPDATE) {
      return ctx.getArgument(0, this.entitySchema).id;
    }
    return ctx.getArgument(0, EntityIdSchema);
  }

  /**
   * Calls the target's own lookup, so the lookup is not intercepted
   */
  private lookUp(ctx: MethodCallContext, action: HistoryAction): { id: string; current: unknown } {
    const id = this.entityIdOf(ctx, action);
    const getById: unknown = Reflect.get(ctx.target, this.operations.getById);
    if (typeof getById !== "function") return { id, current: undefined };
    return { id, current: Reflect.apply(getById, ctx.target, [id]) };
  }

  private capturePriorStateNow(ctx: MethodCallContext, action: HistoryAction): void {
    try {
      const { id, current } = this.lookUp(ctx, action);
      if (isPromiseLike(current)) {
        Promise.resolve(current).catch((error: unknown) => this.warnCaptureFailed(ctx, error));
        this.logger.warn("History: lookup is asynchronous, prior state skipped", {
          callId: ctx.callId,
          entityType: this.entityType,
          operation: ctx.operation.name,
        });
        return;
      }
      this.keepPriorState(ctx, action, id, current);
    } catch (error) {
      this.warnCaptureFailed(ctx, error);
    }
  }

  private async capturePriorState(
    ctx: MethodCallContext,
    action: HistoryAction,
  ): Promise<void> {
    try {
      const { id, current } = this.lookUp(ctx, action);
      this.keepPriorState(ctx, action, id, await current);
    } catch (error) {
      this.warnCaptureFailed(ctx, error);
    }
  }

  private keepPriorState(
    ctx: MethodCallContext,
    action: HistoryAction,
    id: string,
    current: unknown,
  ): void {
    if (current === undefined || current === null) {
      this.logger.warn("History: no current state found", {
        callId: ctx.callId,
        entityType: this.entityType,
        entityId: id,
      });
      return;
    }
    ctx.items.set(HISTORY_SNAPSHOT_KEY, new PriorState(this.entitySchema.parse(current), action));
  }

  private warnCaptureFailed(ctx: MethodCallContext, error: unknown): void {
    this.logger.warn("History: failed to capture state before call", {
      callId: ctx.callId,
      entityType: this.entityType,
      operation: ctx.operation.name,
      error: errorMessage(error),
    });
  }

  /**
   * Hands the change to the recorder. The returned promise never rejects.
   */
  private record(ctx: MethodCallContext, entity: T, action: HistoryAction): Promise<void> {
    const failed = (error: unknown): void => {
      this.logger.error("History: failed to record change", {
        callId: ctx.callId,
        entityType: this.entityType,
        entityId: entity.id,
        action,
        error: errorMessage(error),
      });
    };
    try {
      return this.recorder
        .add({
          entityId: entity.id,
          entityType: this.entityType,
          action,
          actor: this.userContext.getCurrentUsername(),
          snapshot: entity,
        })
        .then(() => undefined, failed);
    } catch (error) {
      failed(error);
      return Promise.resolve();
    }
  }
}

export function historyInterceptor<T extends BaseEntity>(
  recorder: HistoryRecorder<T>,
  options: HistoryInterceptorOptions<T>,
): HistoryInterceptor<T> {
  return new HistoryInterceptor(recorder, options);
}
