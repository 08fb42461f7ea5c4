// Per-invocation record shared by all interceptors of one call

import type { ZodType, ZodTypeDef } from "zod";
import type { OperationDescriptor } from "../types/interceptor";
import { CallStateMachine, CallStates } from "./state-machine";
import type { CallState } from "./state-machine";
import {
  ArgumentError,
  InterposeErrorCodes,
  InvalidStateError,
} from "../utils/errors";
import type { InterceptorHookError } from "../utils/errors";
import { uuidv7 } from "../utils/uuid";

export interface MethodCallContextInit<TTarget extends object> {
  /**
   * The concrete instance the call is made on. Owned by the caller.
   */
  target: TTarget;
  operation: OperationDescriptor;
  args: readonly unknown[];
  signal?: AbortSignal;
}

type Outcome =
  | { kind: "pending" }
  | { kind: "result"; value: unknown }
  | { kind: "exception"; error: unknown; cancelled: boolean };

/**
 * Method call context
 *
 * Created once per intercepted call and discarded when the call settles.
 * `arguments` is sealed: interceptors may replace elements but the length is
 * fixed. `items` is scratch space for interceptors that need to carry state
 * from one hook to another within the same call.
 */
export class MethodCallContext<TTarget extends object = object> {
  readonly callId: string;
  readonly target: TTarget;
  readonly targetType: string;
  readonly operation: OperationDescriptor;
  readonly arguments: unknown[];
  readonly items = new Map<string, unknown>();
  readonly signal?: AbortSignal;

  /**
   * Failures of after/exception hooks, in the order they happened
   */
  readonly hookErrors: InterceptorHookError[] = [];

  readonly startedAt: number;

  private readonly machine = new CallStateMachine();
  private outcome: Outcome = { kind: "pending" };

  constructor(init: MethodCallContextInit<TTarget>) {
    this.callId = uuidv7();
    this.target = init.target;
    this.targetType = init.target.constructor?.name || "Object";
    this.operation = init.operation;
    this.arguments = Object.seal([...init.args]);
    this.signal = init.signal;
    this.startedAt = Date.now();
  }

  get state(): CallState {
    return this.machine.get();
  }

  get argumentCount(): number {
    return this.arguments.length;
  }

  /**
   * Result of the call. After transformation this is the transformed value.
   */
  get result(): unknown {
    return this.outcome.kind === "result" ? this.outcome.value : undefined;
  }

  get hasResult(): boolean {
    return this.outcome.kind === "result";
  }

  get exception(): unknown {
    return this.outcome.kind === "exception" ? this.outcome.error : undefined;
  }

  get hasException(): boolean {
    return this.outcome.kind === "exception";
  }

  get isCancelled(): boolean {
    return this.outcome.kind === "exception" && this.outcome.cancelled;
  }

  /**
   * Get an argument by position.
   *
   * With a schema the argument is validated and returned typed; a mismatch
   * throws the schema's ZodError.
   */
  getArgument(index: number): unknown;
  getArgument<T>(index: number, schema: ZodType<T, ZodTypeDef, unknown>): T;
  getArgument<T>(
    index: number,
    schema?: ZodType<T, ZodTypeDef, unknown>,
  ): unknown {
    if (!Number.isInteger(index) || index < 0 || index >= this.arguments.length) {
      throw new ArgumentError(
        `Argument index ${index} is out of range for ${this.operation.name} (${this.arguments.length} arguments)`,
        InterposeErrorCodes.ARGUMENT_OUT_OF_RANGE,
        { index, count: this.arguments.length },
      );
    }
    const value = this.arguments[index];
    return schema ? schema.parse(value) : value;
  }

  /**
   * Enter a non-terminal phase. Used by the chain executor.
   */
  enter(phase: CallState): void {
    if (!this.machine.transition(phase)) {
      throw new InvalidStateError(
        `Illegal call transition ${this.machine.get()} -> ${phase} for ${this.operation.name}`,
      );
    }
  }

  /**
   * Record the (raw or transformed) result. Only legal while proceeding or
   * transforming.
   */
  setResult(value: unknown): void {
    if (this.machine.is(CallStates.PROCEEDING)) {
      this.enter(CallStates.TRANSFORMING);
    } else if (!this.machine.is(CallStates.TRANSFORMING)) {
      throw new InvalidStateError(
        `Cannot set a result in state ${this.machine.get()}`,
      );
    }
    this.outcome = { kind: "result", value };
  }

  /**
   * Record a failure. Any result recorded so far is discarded.
   */
  setException(error: unknown, cancelled = false): void {
    if (this.machine.isTerminal()) {
      throw new InvalidStateError(
        `Cannot set an exception in terminal state ${this.machine.get()}`,
      );
    }
    this.enter(CallStates.EXCEPTION);
    this.outcome = { kind: "exception", error, cancelled };
  }

  /**
   * Move to the terminal state matching the recorded outcome.
   */
  complete(): void {
    switch (this.outcome.kind) {
      case "result":
        this.enter(CallStates.SUCCEEDED);
        return;
      case "exception":
        this.enter(
          this.outcome.cancelled ? CallStates.CANCELLED : CallStates.FAILED,
        );
        return;
      default:
        throw new InvalidStateError(
          `Cannot complete ${this.operation.name} without an outcome`,
        );
    }
  }

  /**
   * Milliseconds since the context was created
   */
  elapsed(): number {
    return Date.now() - this.startedAt;
  }
}
