import { inlineExecutor, type Executor } from "./Executor";
import { logger, type Logger } from "./Logger";

export type SettlementPolicy = "strict" | "lenient";

export const SettlementPolicies: SettlementPolicy[] = ["strict", "lenient"];

/**
 * These values have sensible defaults, but can be overridden per future (or
 * per {@link FutureFactory}). Futures created by `then`, `catch` and
 * `finally` inherit the options of the future they were chained from.
 */
export class FutureOptions {
  /**
   * Runs the task given to the `Future` constructor and every continuation
   * registered against the future.
   *
   * Defaults to {@link inlineExecutor}, which runs everything synchronously.
   */
  executor: Executor = inlineExecutor;

  /**
   * What happens when a task calls `resolve` or `reject` after the future has
   * already settled:
   *
   * - `"strict"` throws a {@link SettlementError}. The error is not turned
   *   into a rejection: it escapes the task and the executor.
   *
   * - `"lenient"` ignores the call (the setter returns `false`) and logs a
   *   warning.
   *
   * The first outcome is kept either way. Defaults to `"strict"`.
   */
  settlement: SettlementPolicy = "strict";

  logger: () => Logger = logger;
}
