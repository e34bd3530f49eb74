/**
 * Producer side of a promise.
 *
 * A `Completion` owns a promise and the only two functions able to settle it.
 * Whoever holds the completion decides the outcome; whoever holds
 * `completion.promise` awaits it. Exactly one of `fulfill()` / `reject()` may
 * be called, exactly once. A second call is a programming error and throws
 * `CompletionSettledError` instead of being silently ignored.
 *
 * @example
 * ```ts
 * const completion = new Completion<number>();
 * queue.push({ completion });
 * // ...later, from the worker
 * completion.fulfill(42);
 * ```
 */

/**
 * Thrown when a completion is settled twice.
 */
export class CompletionSettledError extends Error {
  readonly state: CompletionState;

  constructor(state: CompletionState) {
    super(`Completion has already been ${state}`);
    this.name = "CompletionSettledError";
    this.state = state;
  }
}

export type CompletionState = "pending" | "fulfilled" | "rejected";

export class Completion<T> {
  readonly promise: Promise<T>;
  private readonly resolvePromise: (value: T) => void;
  private readonly rejectPromise: (error: unknown) => void;
  private _state: CompletionState = "pending";

  constructor() {
    let resolve: (value: T) => void = () => {};
    let reject: (error: unknown) => void = () => {};
    // The executor runs synchronously, so both functions are bound below.
    this.promise = new Promise<T>((res, rej) => {
      resolve = res;
      reject = rej;
    });
    this.resolvePromise = resolve;
    this.rejectPromise = reject;
  }

  get state(): CompletionState {
    return this._state;
  }

  get settled(): boolean {
    return this._state !== "pending";
  }

  fulfill(value: T): void {
    this.assertPending();
    this._state = "fulfilled";
    this.resolvePromise(value);
  }

  reject(error: unknown): void {
    this.assertPending();
    this._state = "rejected";
    this.rejectPromise(error);
  }

  private assertPending(): void {
    if (this._state !== "pending") {
      throw new CompletionSettledError(this._state);
    }
  }
}
