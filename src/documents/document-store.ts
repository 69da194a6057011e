import * as path from "path";
import type {
  CompleteCallback,
  DocumentCodec,
  DocumentErrorCallback,
  DocumentFileSystem,
  DocumentStoreConfig,
  Logger,
  OperationState,
  ReadableFile,
  Result,
  WritableFile,
} from "../models";
import type { OperationCallbacks } from "../operations/operation-runner";
import { OperationRunner } from "../operations/operation-runner";
import { ResourceCell } from "../operations/resource-cell";
import { getGroundedError, isIndeterminate } from "../utils/error-parser";
import { ResourceError } from "../utils/resource-error";
import type { ResourceErrorKind } from "../utils/resource-error";
import { settle, tryCatchSync } from "../utils/try-catch";
import { createJsonCodec } from "./json-codec";
import { createNodeFileSystem } from "./node-file-system";

const OK: Result<void, ResourceError> = { success: true, data: undefined, error: null };

/**
 * A typed value bound to a JSON file.
 *
 * `value` is `undefined` until something is loaded or assigned. After a failed
 * load treat `undefined` as "unknown", not as data: every failure except a
 * missing file (strict load) clears it. `save()` never touches it.
 *
 * Operations on one store are queued and run in call order. Nothing here
 * guards the file against other stores or other processes.
 */
export class DocumentStore<T> {
  public readonly location: string;

  private readonly createDefault: () => T;
  private readonly codec: DocumentCodec<T>;
  private readonly fileSystem: DocumentFileSystem;
  private readonly atomicWrites: boolean;
  private readonly logger: Logger;
  private readonly runner: OperationRunner;
  private readonly document = new ResourceCell<T>();

  constructor(config: DocumentStoreConfig<T>) {
    this.location = config.location;
    this.createDefault = config.createDefault;
    this.codec = config.codec ?? createJsonCodec(config.schema);
    this.fileSystem = config.fileSystem ?? createNodeFileSystem();
    this.atomicWrites = config.atomicWrites ?? true;
    this.logger = config.logger ?? console;
    this.runner = new OperationRunner("DocumentStore", this.location, this.logger);
  }

  public get value(): T | undefined {
    return this.document.current();
  }

  public set value(next: T | undefined) {
    if (next === undefined) {
      this.document.invalidate();
    } else {
      this.document.commit(next);
    }
  }

  public get state(): OperationState {
    return this.runner.state;
  }

  /**
   * Reads and parses the file. Fails if the file does not exist.
   *
   * @param onComplete Runs once `value` holds the parsed document. Not called on failure.
   * @param onError Runs with the reason if anything fails.
   */
  public loadStrict(
    onComplete?: CompleteCallback,
    onError?: DocumentErrorCallback,
  ): Promise<Result<void, ResourceError>> {
    return this.runner.run(
      "loadStrict",
      () => this.readDocument(),
      this.callbacks(onComplete, onError),
    );
  }

  /**
   * Like `loadStrict`, except a missing file is not an error: a default value
   * is written to it first, then read back. Handy for files you don't
   * necessarily expect to exist yet (settings, save slots).
   */
  public loadOrInit(
    onComplete?: CompleteCallback,
    onError?: DocumentErrorCallback,
  ): Promise<Result<void, ResourceError>> {
    return this.runner.run(
      "loadOrInit",
      async () => {
        if (!(await this.fileSystem.exists(this.location))) {
          this.document.commit(this.createDefault());
          const saved = await this.writeDocument();
          if (!saved.success) {
            return saved;
          }
        }
        return this.readDocument();
      },
      this.callbacks(onComplete, onError),
    );
  }

  /**
   * Writes the current `value`, creating or overwriting the file.
   *
   * @param onComplete Runs once the file is written, flushed, closed and ready to be read.
   * @param onError Runs with the reason if anything fails.
   */
  public save(
    onComplete?: CompleteCallback,
    onError?: DocumentErrorCallback,
  ): Promise<Result<void, ResourceError>> {
    return this.runner.run(
      "save",
      () => this.writeDocument(),
      this.callbacks(onComplete, onError),
    );
  }

  private callbacks(
    onComplete?: CompleteCallback,
    onError?: DocumentErrorCallback,
  ): OperationCallbacks {
    return {
      onSuccess: onComplete,
      onFailure: onError ? (error) => onError(error.message) : undefined,
    };
  }

  private async readDocument(): Promise<Result<void, ResourceError>> {
    if (!(await this.fileSystem.exists(this.location))) {
      return this.fail("file-absent", `File: [${this.location}] does not exist!`);
    }

    const opened = await settle(() => this.fileSystem.openRead(this.location));
    if (!opened.success) {
      this.document.invalidate();
      return this.fail("io-fault", getGroundedError(opened.error));
    }

    const file = opened.data;
    const read = await settle(() => file.readToEnd());
    await this.release(file);

    if (!read.success) {
      this.document.invalidate();
      return this.ioFailure(
        read.error,
        `Loading file ${this.location} failed for unknown reason`,
      );
    }

    const decoded = tryCatchSync(() => this.codec.decode(read.data));
    if (!decoded.success) {
      this.document.invalidate();
      return this.fail(
        "codec-failure",
        `Failed to parse document ${this.location}: ${getGroundedError(decoded.error)}`,
      );
    }

    this.document.commit(decoded.data);
    return OK;
  }

  private async writeDocument(): Promise<Result<void, ResourceError>> {
    const value = this.document.current();
    if (value === undefined) {
      return this.fail("codec-failure", `Nothing to save: ${this.location} has no value`);
    }

    const encoded = tryCatchSync(() => this.codec.encode(value));
    if (!encoded.success) {
      return this.fail("codec-failure", getGroundedError(encoded.error));
    }

    const text = encoded.data;
    const target = this.atomicWrites ? `${this.location}.tmp` : this.location;
    const opened = await settle(async () => {
      await this.fileSystem.ensureDir(path.dirname(this.location));
      return this.fileSystem.openWrite(target);
    });
    if (!opened.success) {
      return this.fail("io-fault", getGroundedError(opened.error));
    }

    const file = opened.data;
    const unknownReason = `Failed to create a file at ${this.location} for an unknown reason`;

    const written = await settle(() => file.write(text));
    if (!written.success) {
      await this.abandon(file, target);
      return this.ioFailure(written.error, unknownReason);
    }
    if (written.data < Buffer.byteLength(text, "utf-8")) {
      await this.abandon(file, target);
      return this.fail("io-indeterminate", unknownReason);
    }

    // Wait for the data to hit the disk before calling it done.
    const flushed = await settle(() => file.flush());
    if (!flushed.success) {
      await this.abandon(file, target);
      return this.ioFailure(flushed.error, `${unknownReason} (flush failed)`);
    }
    await this.release(file);

    if (this.atomicWrites) {
      const renamed = await settle(() => this.fileSystem.rename(target, this.location));
      if (!renamed.success) {
        await this.discardTemp(target);
        return this.fail("io-fault", getGroundedError(renamed.error));
      }
    }

    return OK;
  }

  private async release(file: ReadableFile | WritableFile): Promise<void> {
    const closed = await settle(() => file.close());
    if (!closed.success) {
      this.logger.warn(
        `[DocumentStore] Failed to close ${this.location}: ${getGroundedError(closed.error)}`,
      );
    }
  }

  /** Closes a write that failed and, in atomic mode, deletes its temp file. */
  private async abandon(file: WritableFile, target: string): Promise<void> {
    await this.release(file);
    await this.discardTemp(target);
  }

  private async discardTemp(target: string): Promise<void> {
    if (!this.atomicWrites) {
      return;
    }
    const removed = await settle(() => this.fileSystem.remove(target));
    if (!removed.success) {
      this.logger.warn(
        `[DocumentStore] Failed to remove ${target}: ${getGroundedError(removed.error)}`,
      );
    }
  }

  private ioFailure(
    error: unknown,
    unknownReason: string,
  ): Result<void, ResourceError> {
    return isIndeterminate(error)
      ? this.fail("io-indeterminate", unknownReason)
      : this.fail("io-fault", getGroundedError(error));
  }

  private fail(kind: ResourceErrorKind, message: string): Result<void, ResourceError> {
    return {
      success: false,
      data: null,
      error: new ResourceError(kind, this.location, message),
    };
  }
}
