export { asError, cleanError, SettlementError } from "./Error";
export {
  delayedExecutor,
  immediateExecutor,
  inlineExecutor,
  isExecutor,
  microtaskExecutor,
  trampolineExecutor,
} from "./Executor";
export { Future } from "./Future";
export { futures } from "./FutureFactory";
export { FutureOptions, SettlementPolicies } from "./FutureOptions";
export * from "./Logger";
export { verifyOptions } from "./OptionsVerifier";
export { SettlementState, SharedState, settledState } from "./SharedState";
export type { Executor, Work } from "./Executor";
export type {
  FutureTask,
  OnFulfilled,
  OnRejected,
  Reject,
  Resolve,
} from "./Future";
export type { FutureFactory } from "./FutureFactory";
export type { SettlementPolicy } from "./FutureOptions";
export type { ExecutorOrOptions } from "./OptionsVerifier";
export type { Outcome } from "./SharedState";
