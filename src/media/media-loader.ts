import { pathToFileURL } from "url";
import { MediaType, TransportResult } from "../models";
import type {
  CompleteCallback,
  Logger,
  MediaDecoder,
  MediaDescriptor,
  MediaErrorCallback,
  MediaHandle,
  MediaLoaderConfig,
  MediaRequest,
  MediaTransport,
  OperationState,
  Result,
  TransportResponse,
} from "../models";
import { OperationRunner } from "../operations/operation-runner";
import { ResourceCell } from "../operations/resource-cell";
import { getGroundedError } from "../utils/error-parser";
import { ResourceError } from "../utils/resource-error";
import type { ResourceErrorKind } from "../utils/resource-error";
import { settle, tryCatchSync } from "../utils/try-catch";
import { createBufferedDecoder } from "./decoder";
import { resolveMediaType } from "./format-resolver";
import { createNodeTransport } from "./transport";

const UNRECOGNIZED_FORMAT =
  "Unrecognized file format. Does the filename have the correct extension?";

/**
 * An audio file somewhere on disk or on the web. Constructing one does NOT
 * load anything; call `load()` for that.
 *
 * `handle` is `undefined` until a load succeeds, is cleared when the next load
 * starts, and stays cleared if that load fails. Loads on the same instance run
 * one after another in call order.
 */
export class MediaLoader {
  public readonly location: string;
  public readonly isRemote: boolean;

  private readonly transport: MediaTransport;
  private readonly decoder: MediaDecoder;
  private readonly runner: OperationRunner;
  private readonly media = new ResourceCell<MediaHandle>();

  /**
   * @param config.location A URL (like http://example.com/example.mp3) or a file path (like /music/demo.mp3).
   * @param config.isRemote True if `location` is a web URL, false if it is a local path.
   */
  constructor(config: MediaLoaderConfig) {
    const logger: Logger = config.logger ?? console;
    this.location = config.location;
    this.isRemote = config.isRemote;
    this.transport = config.transport ?? createNodeTransport();
    this.decoder = config.decoder ?? createBufferedDecoder();
    this.runner = new OperationRunner("MediaLoader", this.location, logger);
  }

  public static fromJSON(
    descriptor: MediaDescriptor,
    options: Omit<MediaLoaderConfig, keyof MediaDescriptor> = {},
  ): MediaLoader {
    return new MediaLoader({ ...options, ...descriptor });
  }

  public get handle(): MediaHandle | undefined {
    return this.media.current();
  }

  public get state(): OperationState {
    return this.runner.state;
  }

  public toJSON(): MediaDescriptor {
    return { location: this.location, isRemote: this.isRemote };
  }

  /**
   * Loads the backing audio file.
   *
   * @param onLoadFinished Called once the audio has loaded. `handle` is ready to use by then.
   * @param onError Called with the transport result and a message if the load fails.
   * If omitted, the failure is only logged. Either way `handle` ends up `undefined`
   * (even if it was populated before).
   */
  public load(
    onLoadFinished: CompleteCallback,
    onError?: MediaErrorCallback,
  ): Promise<Result<void, ResourceError>> {
    return this.runner.run("load", () => this.fetchAndDecode(), {
      onSuccess: onLoadFinished,
      onFailure: onError
        ? (error) =>
            onError(
              error.transportResult ?? TransportResult.DataProcessingError,
              error.message,
            )
        : undefined,
    });
  }

  private async fetchAndDecode(): Promise<Result<void, ResourceError>> {
    this.media.invalidate();

    const format = resolveMediaType(this.location);
    if (format === MediaType.UNKNOWN) {
      return this.fail(
        "format-unrecognized",
        TransportResult.DataProcessingError,
        UNRECOGNIZED_FORMAT,
      );
    }

    const request = this.buildRequest(format);
    const sent = await settle(() => this.transport.send(request));
    const response: TransportResponse = sent.success
      ? sent.data
      : {
          result: TransportResult.ConnectionError,
          payload: null,
          error: getGroundedError(sent.error),
        };

    if (response.result !== TransportResult.Success) {
      return this.fail("transport-failure", response.result, response.error);
    }

    const decoded = tryCatchSync(() =>
      this.decoder.decode(response.payload, request, this.location),
    );
    if (!decoded.success) {
      return this.fail(
        "codec-failure",
        TransportResult.DataProcessingError,
        getGroundedError(decoded.error),
      );
    }

    this.media.commit(decoded.data);
    return { success: true, data: undefined, error: null };
  }

  private buildRequest(format: MediaType): MediaRequest {
    return {
      uri: this.isRemote ? this.location : pathToFileURL(this.location).href,
      mediaType: format,
    };
  }

  private fail(
    kind: ResourceErrorKind,
    result: TransportResult,
    message: string,
  ): Result<void, ResourceError> {
    this.media.invalidate();
    return {
      success: false,
      data: null,
      error: new ResourceError(kind, this.location, message, result),
    };
  }
}
