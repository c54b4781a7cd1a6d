import { Future, type FutureTask } from "./Future";
import type { FutureOptions } from "./FutureOptions";
import { verifyOptions, type ExecutorOrOptions } from "./OptionsVerifier";

/**
 * Builds futures that all share one set of options, so call sites don't have
 * to pass an executor every time.
 */
export interface FutureFactory {
  readonly options: FutureOptions;
  future<T>(task: FutureTask<T>): Future<T>;
  resolve<T>(value: T): Future<T>;
  reject<T = never>(error: unknown): Future<T>;
}

/**
 * @param executorOrOptions verified once, here, rather than per future.
 *
 * @example
 * ```ts
 * const { future, resolve } = futures(immediateExecutor)
 * resolve(21).then((n) => n * 2)
 * ```
 */
export function futures(executorOrOptions?: ExecutorOrOptions): FutureFactory {
  const options = verifyOptions(executorOrOptions);
  return {
    options,
    future: <T>(task: FutureTask<T>) => new Future<T>(task, options),
    resolve: <T>(value: T) => Future.resolve<T>(value, options),
    reject: <T = never>(error: unknown) => Future.reject<T>(error, options),
  };
}
