/**
 * Handles for deferred (long-running) calls.
 *
 * A call made with `returnOp: true` returns an operation handle right away;
 * the caller obtains the final value later through `execute()`.
 */

export interface Operation<T = unknown> {
  execute(): Promise<T>;
}

export type OperationState<T> =
  | { kind: "pending"; operation: Operation<T> }
  | { kind: "resolved"; value: T };

export function isOperation(value: unknown): value is Operation {
  return (
    typeof value === "object" &&
    value !== null &&
    "execute" in value &&
    typeof value.execute === "function"
  );
}

/**
 * Operation handle that is either still backed by the transport's own handle
 * or already holds its value.
 */
export class DeferredOperation<T = unknown> implements Operation<T> {
  private constructor(
    private readonly state: OperationState<T>,
    readonly original: Operation<T> | null
  ) {}

  static pending<T>(operation: Operation<T>): DeferredOperation<T> {
    return new DeferredOperation({ kind: "pending", operation }, operation);
  }

  /**
   * A handle whose `execute()` yields `value`. `original` is the transport
   * handle it stands in for, when there is one.
   */
  static resolved<T>(value: T, original: Operation<T> | null = null): DeferredOperation<T> {
    return new DeferredOperation<T>({ kind: "resolved", value }, original);
  }

  get kind(): OperationState<T>["kind"] {
    return this.state.kind;
  }

  execute(): Promise<T> {
    switch (this.state.kind) {
      case "pending":
        return this.state.operation.execute();
      case "resolved":
        return Promise.resolve(this.state.value);
    }
  }
}
