import { OperationState } from "../models";
import type { Logger, Result } from "../models";
import { ResourceError } from "../utils/resource-error";
import { tryCatch, tryCatchSync } from "../utils/try-catch";

export interface OperationCallbacks {
  onSuccess?: () => void;
  onFailure?: (error: ResourceError) => void;
}

export type OperationBody = () => Promise<Result<void, ResourceError>>;

/**
 * Q: What does every load/save have in common?
 * A: The same shape. Wait for our turn, do the I/O, mutate the resource,
 *    then fire exactly one callback. This class is that shape, so the loaders
 *    only have to write the "do the I/O, mutate the resource" part.
 *
 * Operations started on the same runner run one after another, in call order.
 * The returned promise never rejects: failures come back as a `Result` and,
 * when the caller asked for it, through `onFailure`.
 */
export class OperationRunner {
  private readonly component: string;
  private readonly location: string;
  private readonly logger: Logger;
  private tail: Promise<unknown> = Promise.resolve();
  private currentState: OperationState = OperationState.Idle;

  constructor(component: string, location: string, logger: Logger) {
    this.component = component;
    this.location = location;
    this.logger = logger;
  }

  public get state(): OperationState {
    return this.currentState;
  }

  public run(
    name: string,
    body: OperationBody,
    callbacks: OperationCallbacks,
  ): Promise<Result<void, ResourceError>> {
    const operation = this.tail.then(() =>
      this.execute(name, body, callbacks),
    );
    this.tail = operation.catch(() => undefined);
    return operation;
  }

  private async execute(
    name: string,
    body: OperationBody,
    callbacks: OperationCallbacks,
  ): Promise<Result<void, ResourceError>> {
    this.currentState = OperationState.AwaitingIO;
    this.log("debug", `[${this.component}] ${name}: ${this.location}`);

    const outcome = await tryCatch(body);
    const result: Result<void, ResourceError> = outcome.success
      ? outcome.data
      : {
          success: false,
          data: null,
          error: new ResourceError("io-fault", this.location, outcome.error.message),
        };

    if (result.success) {
      this.currentState = OperationState.Completed;
      this.invoke(name, callbacks.onSuccess);
      return result;
    }

    this.currentState = OperationState.Failed;
    const { onFailure } = callbacks;
    if (onFailure) {
      this.invoke(name, () => onFailure(result.error));
    } else {
      this.log(
        "warn",
        `[${this.component}] ${name} failed with no error callback: ${result.error.message}`,
      );
    }
    return result;
  }

  // The resource is already in its final state here, so a throwing callback
  // can't undo the operation. It gets logged and nothing else fires.
  private invoke(name: string, callback: (() => void) | undefined): void {
    if (!callback) return;
    const outcome = tryCatchSync(callback);
    if (!outcome.success) {
      this.log(
        "error",
        `[${this.component}] ${name} callback threw:`,
        outcome.error,
      );
    }
  }

  // A throwing logger loses its line; the operation still settles.
  private log(level: keyof Logger, ...args: unknown[]): void {
    tryCatchSync(() => this.logger[level](...args));
  }
}
