/**
 * Where a resource is in its current (or most recent) operation.
 * `Idle` only ever shows up before the first operation has been started.
 */
export enum OperationState {
  Idle = "IDLE",
  AwaitingIO = "AWAITING_IO",
  Completed = "COMPLETED",
  Failed = "FAILED",
}

export type CompleteCallback = () => void;

/**
 * The subset of `console` the loaders write to. Pass your own to route the
 * messages somewhere else, or to keep tests quiet.
 */
export type Logger = Pick<Console, "debug" | "warn" | "error">;
