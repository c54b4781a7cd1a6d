import { asError, SettlementError } from "./Error";
import type { Executor, Work } from "./Executor";
import type { FutureOptions } from "./FutureOptions";
import type { Logger } from "./Logger";

/**
 * Monotonic: a state leaves `pending` at most once, and never moves between
 * `fulfilled` and `rejected`.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/JavaScript/Reference/Global_Objects/Promise
 */
export enum SettlementState {
  pending,
  fulfilled,
  rejected,
}

export type Outcome<T> =
  | { readonly state: SettlementState.fulfilled; readonly value: T }
  | { readonly state: SettlementState.rejected; readonly error: unknown };

let _stateId = 1;

/**
 * Violations thrown by {@link SharedState}, as opposed to `SettlementError`
 * values that merely travel down a chain as rejection payloads.
 */
const raised = new WeakSet<SettlementError>();

/**
 * @return `true` iff `err` was thrown by a `resolve` or `reject` call on a
 * strict future that had already settled.
 */
export function isRaisedViolation(err: unknown): err is SettlementError {
  return err instanceof SettlementError && raised.has(err);
}

/**
 * The mutable half of a future: its outcome, and the continuations waiting
 * for it.
 *
 * Every mutation happens inside one synchronous method body, which is the
 * critical section: nothing in here calls user code or the executor while the
 * outcome and callback list are inconsistent. Callbacks drained at settlement
 * are handed to the executor only after the list has been swapped out.
 */
export class SharedState<T> {
  readonly id = _stateId++;
  #outcome: Outcome<T> | undefined;
  #callbacks: Work[] = [];

  constructor(readonly options: FutureOptions) {}

  get executor(): Executor {
    return this.options.executor;
  }

  get #logger(): Logger {
    return this.options.logger();
  }

  get state(): SettlementState {
    return this.#outcome?.state ?? SettlementState.pending;
  }

  /**
   * @return `true` iff neither `resolve` nor `reject` have been invoked
   */
  get pending(): boolean {
    return this.#outcome == null;
  }

  get fulfilled(): boolean {
    return this.state === SettlementState.fulfilled;
  }

  get rejected(): boolean {
    return this.state === SettlementState.rejected;
  }

  get settled(): boolean {
    return this.#outcome != null;
  }

  /**
   * @return the terminal outcome, or `undefined` while pending. Once defined,
   * it never changes.
   */
  get outcome(): Outcome<T> | undefined {
    return this.#outcome;
  }

  /**
   * The number of continuations waiting for settlement. Always 0 once
   * settled.
   */
  get callbackCount(): number {
    return this.#callbacks.length;
  }

  resolve(value: T): boolean {
    return this.#settle("resolve", {
      state: SettlementState.fulfilled,
      value,
    });
  }

  reject(error: unknown): boolean {
    return this.#settle("reject", { state: SettlementState.rejected, error });
  }

  /**
   * Run `callback` (through the executor) once this state has settled. If it
   * already has, the callback is handed to the executor right away.
   *
   * Callbacks registered against the same state are handed to the executor
   * in registration order.
   */
  register(callback: Work): void {
    if (this.#outcome == null) {
      this.#callbacks.push(callback);
    } else {
      this.executor(callback);
    }
  }

  /**
   * @return a new pending state with the same executor and options.
   */
  derive<U>(): SharedState<U> {
    return new SharedState<U>(this.options);
  }

  toString(): string {
    return `Future#${this.id}(${SettlementState[this.state]})`;
  }

  #settle(attempted: "resolve" | "reject", outcome: Outcome<T>): boolean {
    const prior = this.#outcome;
    if (prior != null) {
      const current =
        prior.state === SettlementState.fulfilled ? "fulfilled" : "rejected";
      if (this.options.settlement === "strict") {
        const err = new SettlementError(this.id, attempted, current);
        raised.add(err);
        throw err;
      }
      this.#logger.warn(
        `Future#${this.id}: ignoring ${attempted}(), already ${current}`,
      );
      return false;
    }

    this.#outcome = outcome;
    const callbacks = this.#callbacks;
    this.#callbacks = [];

    if (outcome.state === SettlementState.rejected) {
      this.#logger.trace(
        `Future#${this.id}: rejected, firing ${callbacks.length} callback(s)`,
        asError(outcome.error).message,
      );
    } else {
      this.#logger.trace(
        `Future#${this.id}: fulfilled, firing ${callbacks.length} callback(s)`,
      );
    }

    // Every drained callback gets dispatched, even if an earlier one escapes
    // (only a raised violation can): the first such error is rethrown after.
    let escaped: { error: unknown } | undefined;
    for (const ea of callbacks) {
      try {
        this.executor(ea);
      } catch (error) {
        escaped ??= { error };
      }
    }
    if (escaped != null) throw escaped.error;
    return true;
  }
}

/**
 * @return a state that has already settled with `outcome`. Nothing can have
 * been registered against it yet, so nothing is scheduled.
 */
export function settledState<T>(
  options: FutureOptions,
  outcome: Outcome<T>,
): SharedState<T> {
  const state = new SharedState<T>(options);
  if (outcome.state === SettlementState.fulfilled) {
    state.resolve(outcome.value);
  } else {
    state.reject(outcome.error);
  }
  return state;
}
