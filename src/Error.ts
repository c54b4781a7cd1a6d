/**
 * Thrown when a future that has already settled is resolved or rejected
 * again, and the future was built with `settlement: "strict"`.
 *
 * This is a programming error in the task (or handler) that settled the
 * future, so it is never converted into a rejection: it escapes the task's
 * failure boundary and the executor.
 */
export class SettlementError extends Error {
  override readonly name = "SettlementError";

  constructor(
    readonly futureId: number,
    readonly attempted: "resolve" | "reject",
    readonly current: "fulfilled" | "rejected",
  ) {
    super(
      `Future#${futureId}: cannot ${attempted}, already ${current}`,
    );
  }
}

function toNotBlank(s: unknown): string | undefined {
  const str = s == null ? "" : String(s).trim();
  return str.length === 0 ? undefined : str;
}

/**
 * Error strings are prefixed with "Error: " when stringified. Strip that so
 * log lines don't stutter.
 */
export function cleanError(s: unknown): string {
  return String(s)
    .trim()
    .replace(/^error: /i, "");
}

/**
 * Rejection payloads are opaque: anything can be thrown. This renders one as
 * an `Error` for logging. The payload that travels down a chain is never
 * replaced with this value.
 */
export function asError(err: unknown): Error {
  return err instanceof Error
    ? err
    : new Error(
        toNotBlank(
          err != null && typeof err === "object" && "message" in err
            ? err.message
            : undefined,
        ) ??
          toNotBlank(err) ??
          "(unknown)",
      );
}
