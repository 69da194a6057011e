import type { Logger } from "./operation.types";

/**
 * The audio container/codec families we know how to ask for, keyed off the file extension.
 */
export enum MediaType {
  MPEG = "MPEG",
  OGGVORBIS = "OGGVORBIS",
  WAV = "WAV",
  AIFF = "AIFF",
  XMA = "XMA",
  XM = "XM",
  IT = "IT",
  MOD = "MOD",
  AUDIOQUEUE = "AUDIOQUEUE",
  S3M = "S3M",
  VAG = "VAG",
  UNKNOWN = "UNKNOWN",
}

/**
 * How a transport request ended. Anything other than `Success` is a failure.
 */
export enum TransportResult {
  Success = "SUCCESS",
  ConnectionError = "CONNECTION_ERROR",
  ProtocolError = "PROTOCOL_ERROR",
  DataProcessingError = "DATA_PROCESSING_ERROR",
}

export interface MediaRequest {
  /** A `file://` URL for local media, the location untouched for remote media. */
  uri: string;
  /** What we expect to get back. Transports may use it for content negotiation. */
  mediaType: MediaType;
}

export type TransportResponse =
  | { result: TransportResult.Success; payload: Uint8Array; error: null }
  | {
      result: Exclude<TransportResult, TransportResult.Success>;
      payload: null;
      error: string;
    };

/**
 * Fetches raw media bytes. Implementations resolve with a failure response
 * instead of rejecting; a rejection is treated as a connection error.
 */
export interface MediaTransport {
  send(request: MediaRequest): Promise<TransportResponse>;
}

/**
 * A decoded, in-memory audio payload.
 */
export interface MediaHandle {
  readonly format: MediaType;
  readonly mimeType: string;
  readonly location: string;
  readonly bytes: Uint8Array;
  readonly byteLength: number;
  /** Lowercase hex SHA-256 of `bytes`. */
  readonly digest: string;
}

export interface MediaDecoder {
  decode(payload: Uint8Array, request: MediaRequest, location: string): MediaHandle;
}

/** What survives serialization of a media reference. The handle never does. */
export interface MediaDescriptor {
  location: string;
  isRemote: boolean;
}

export interface MediaLoaderConfig extends MediaDescriptor {
  transport?: MediaTransport;
  decoder?: MediaDecoder;
  logger?: Logger;
}

export type MediaErrorCallback = (result: TransportResult, message: string) => void;
