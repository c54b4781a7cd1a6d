import { isExecutor, type Executor } from "./Executor";
import { FutureOptions, SettlementPolicies } from "./FutureOptions";

/**
 * What the `Future` constructor, its static factories and {@link futures}
 * accept: an executor, some options, or nothing at all.
 */
export type ExecutorOrOptions = Executor | Partial<FutureOptions>;

/**
 * Merges the given executor or partial options over the defaults of
 * {@link FutureOptions} and validates the result.
 *
 * @throws Error if any option is invalid.
 */
export function verifyOptions(opts?: ExecutorOrOptions): FutureOptions {
  const result: FutureOptions =
    typeof opts === "function"
      ? { ...new FutureOptions(), executor: opts }
      : { ...new FutureOptions(), ...opts };

  const errors: string[] = [];

  if (!isExecutor(result.executor)) {
    errors.push("executor must be a function that accepts a work item");
  }

  if (!SettlementPolicies.includes(result.settlement)) {
    errors.push(
      "settlement must be one of " +
        SettlementPolicies.join(", ") +
        ", got " +
        String(result.settlement),
    );
  }

  if (typeof result.logger !== "function") {
    errors.push("logger must be a function that returns a Logger");
  }

  if (errors.length > 0) {
    throw new Error("Future was given invalid options: " + errors.join("; "));
  }

  return result;
}
