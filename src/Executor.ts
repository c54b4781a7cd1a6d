/**
 * A unit of work handed to an {@link Executor}.
 */
export type Work = () => void;

/**
 * Schedules work. The executor decides when (now, on a later microtask, on a
 * later macrotask, or whenever a custom scheduler gets to it) but must run
 * each work item exactly once.
 *
 * Work submitted by futures never throws for task or handler failures: those
 * are turned into rejections first. The only thing that escapes is a
 * {@link SettlementError} raised by a second `resolve` or `reject` on a
 * future configured with `settlement: "strict"`, which is meant to be fatal.
 */
export type Executor = (work: Work) => void;

export function isExecutor(obj: unknown): obj is Executor {
  return typeof obj === "function";
}

/**
 * Runs work synchronously, on the caller's stack.
 */
export const inlineExecutor: Executor = (work) => work();

/**
 * Runs work on the microtask queue, which is where native promises run their
 * reactions.
 */
export const microtaskExecutor: Executor = (work) => queueMicrotask(work);

/**
 * Runs work on a later turn of the event loop, after pending I/O callbacks.
 */
export const immediateExecutor: Executor = (work) => {
  setImmediate(work);
};

/**
 * @return an executor that runs each work item `millis` after it was
 * submitted.
 */
export function delayedExecutor(millis: number): Executor {
  if (!Number.isFinite(millis) || millis < 0) {
    throw new Error("delayedExecutor: millis must be >= 0, got " + millis);
  }
  return (work) => {
    setTimeout(work, millis);
  };
}

/**
 * @return an executor that runs work inline unless it is already running a
 * work item, in which case the new item is queued and run (FIFO) once the
 * current one returns. Chains of any length settle without growing the call
 * stack.
 *
 * Each call returns an independent trampoline. Share one instance across the
 * futures whose continuations should be flattened.
 */
export function trampolineExecutor(): Executor {
  const queue: Work[] = [];
  let running = false;
  return (work) => {
    queue.push(work);
    if (running) return;
    running = true;
    try {
      for (let next = queue.shift(); next != null; next = queue.shift()) {
        next();
      }
    } finally {
      running = false;
    }
  };
}
