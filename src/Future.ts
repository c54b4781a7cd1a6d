import { asError } from "./Error";
import type { Executor } from "./Executor";
import { verifyOptions, type ExecutorOrOptions } from "./OptionsVerifier";
import {
  isRaisedViolation,
  SettlementState,
  SharedState,
  settledState,
} from "./SharedState";

/**
 * Settles a future with a value. When `T` is `void` it is called with no
 * argument.
 */
export type Resolve<T> = (value: T) => void;

/**
 * Settles a future with an error. Anything can be an error: the payload is
 * carried down the chain as-is.
 */
export type Reject = (error: unknown) => void;

/**
 * The body of a future. It must call exactly one of `resolve` or `reject`,
 * exactly once, now or later. Throwing synchronously is the same as calling
 * `reject` with the thrown value.
 */
export type FutureTask<T> = (resolve: Resolve<T>, reject: Reject) => void;

export type OnFulfilled<T, U> = (value: T) => U;
export type OnRejected<U> = (error: unknown) => U;

/**
 * A value (or error) that will be available later, with continuations that
 * run on a pluggable {@link Executor}.
 *
 * This follows the shape of a JavaScript `Promise`, with three differences:
 *
 * - the executor decides where the task and every continuation runs (inline
 *   by default: see {@link FutureOptions.executor}),
 *
 * - a handler's return value is never unwrapped: `then(() => otherFuture)`
 *   produces a `Future<Future<U>>`, and
 *
 * - both handlers given to `then` must produce the same type, which the
 *   compiler checks.
 *
 * A `Future` is a thin handle over a {@link SharedState}. Every future made
 * by chaining shares the executor and options of the future it came from.
 */
export class Future<T> {
  readonly #state: SharedState<T>;

  /**
   * Creates a pending future and hands the executor a work item that runs
   * `task(resolve, reject)`. Whether `task` has run by the time the
   * constructor returns is up to the executor.
   */
  constructor(task: FutureTask<T>, executorOrOptions?: ExecutorOrOptions);
  /** @internal used by chaining and the static factories */
  constructor(state: SharedState<T>);
  constructor(
    taskOrState: FutureTask<T> | SharedState<T>,
    executorOrOptions?: ExecutorOrOptions,
  ) {
    if (taskOrState instanceof SharedState) {
      this.#state = taskOrState;
    } else {
      this.#state = new SharedState<T>(verifyOptions(executorOrOptions));
      run(this.#state, taskOrState);
    }
  }

  /**
   * @return a future that has already fulfilled with `value`. Nothing is
   * scheduled.
   */
  static resolve<T>(
    value: T,
    executorOrOptions?: ExecutorOrOptions,
  ): Future<T> {
    return new Future(
      settledState<T>(verifyOptions(executorOrOptions), {
        state: SettlementState.fulfilled,
        value,
      }),
    );
  }

  /**
   * @return a future that has already rejected with `error`. Nothing is
   * scheduled.
   */
  static reject<T = never>(
    error: unknown,
    executorOrOptions?: ExecutorOrOptions,
  ): Future<T> {
    return new Future(
      settledState<T>(verifyOptions(executorOrOptions), {
        state: SettlementState.rejected,
        error,
      }),
    );
  }

  get id(): number {
    return this.#state.id;
  }

  get executor(): Executor {
    return this.#state.executor;
  }

  get state(): SettlementState {
    return this.#state.state;
  }

  get pending(): boolean {
    return this.#state.pending;
  }

  get fulfilled(): boolean {
    return this.#state.fulfilled;
  }

  get rejected(): boolean {
    return this.#state.rejected;
  }

  get settled(): boolean {
    return this.#state.settled;
  }

  /**
   * Chains a continuation. Exactly one of the handlers runs (through the
   * executor) once this future settles, whether that already happened or
   * not:
   *
   * - if the handler returns, the returned future fulfills with its result
   *   (so a rejection handler that returns recovers the chain),
   *
   * - if the handler throws, the returned future rejects with what was
   *   thrown.
   *
   * Without `onRejected`, a rejection passes through to the returned future
   * with the same error.
   *
   * A {@link SettlementError} raised by a `resolve` or `reject` call inside a
   * handler is not converted: it escapes to the executor, as it does from a
   * task. A `SettlementError` that is merely the rejection payload travels
   * down the chain like any other error.
   */
  then<U>(
    onFulfilled: OnFulfilled<T, U>,
    onRejected?: OnRejected<U>,
  ): Future<U> {
    const prev = this.#state;
    const next = prev.derive<U>();
    prev.register(() => {
      const outcome = prev.outcome;
      if (outcome == null) {
        // register() only fires callbacks after settlement
        throw new Error(`${prev.toString()}: continuation ran while pending`);
      }
      let result: U;
      if (outcome.state === SettlementState.fulfilled) {
        try {
          result = onFulfilled(outcome.value);
        } catch (err) {
          onHandlerError(prev, next, err, undefined);
          return;
        }
      } else if (onRejected == null) {
        next.reject(outcome.error);
        return;
      } else {
        try {
          result = onRejected(outcome.error);
        } catch (err) {
          onHandlerError(prev, next, err, outcome);
          return;
        }
      }
      next.resolve(result);
    });
    return new Future(next);
  }

  /**
   * Handles a rejection. A fulfilled value passes through unchanged.
   */
  catch(onRejected: OnRejected<T>): Future<T> {
    return this.then((value) => value, onRejected);
  }

  /**
   * Runs `onFinally` exactly once, however this future settles, then passes
   * the original value or error through. If `onFinally` throws, the returned
   * future rejects with that instead.
   */
  finally(onFinally: () => void): Future<T> {
    return this.then(
      (value) => {
        onFinally();
        return value;
      },
      (error) => {
        onFinally();
        throw error;
      },
    );
  }

  /**
   * @return a native Promise that settles the same way as this future. The
   * bridge is an ordinary continuation, so it runs through this future's
   * executor.
   */
  toPromise(): Promise<T> {
    const state = this.#state;
    return new Promise<T>((resolve, reject) =>
      state.register(() => {
        const outcome = state.outcome;
        if (outcome == null) {
          reject(new Error(`${state.toString()}: bridged while pending`));
        } else if (outcome.state === SettlementState.fulfilled) {
          resolve(outcome.value);
        } else {
          reject(outcome.error);
        }
      }),
    );
  }

  toString(): string {
    return this.#state.toString();
  }
}

/**
 * Hands the executor a work item that runs `task` against `state`, turning a
 * synchronous throw into a rejection.
 */
function run<T>(state: SharedState<T>, task: FutureTask<T>): void {
  const resolve: Resolve<T> = (value) => void state.resolve(value);
  const reject: Reject = (error) => void state.reject(error);
  state.executor(() => {
    try {
      task(resolve, reject);
    } catch (err) {
      // A task that settles twice under "strict" settlement is broken, and
      // must not be reported as an ordinary rejection.
      if (isRaisedViolation(err)) throw err;
      state.options
        .logger()
        .debug(`${state.toString()}: task threw`, asError(err).message);
      state.reject(err);
    }
  });
}

/**
 * Rejects `next` with what a handler threw, unless it is a raised settlement
 * violation, which escapes. Rethrowing the error being handled is a plain
 * pass-through and is not logged.
 */
function onHandlerError<U>(
  prev: SharedState<unknown>,
  next: SharedState<U>,
  err: unknown,
  handling: { readonly error: unknown } | undefined,
): void {
  const forwarded = handling != null && err === handling.error;
  if (!forwarded && isRaisedViolation(err)) throw err;
  if (!forwarded) {
    prev.options
      .logger()
      .debug(
        `${prev.toString()} -> ${next.toString()}: handler threw`,
        asError(err).message,
      );
  }
  next.reject(err);
}
