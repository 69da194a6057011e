import type { TransportResult } from "../models";

export type ResourceErrorKind =
  | "format-unrecognized"
  | "transport-failure"
  | "file-absent"
  | "io-fault"
  | "io-indeterminate"
  | "codec-failure";

/**
 * Every failure an operation reports. `message` is exactly what the error
 * callback receives; `transportResult` is only set for media operations.
 */
export class ResourceError extends Error {
  public readonly kind: ResourceErrorKind;
  public readonly location: string;
  public readonly transportResult?: TransportResult;

  constructor(
    kind: ResourceErrorKind,
    location: string,
    message: string,
    transportResult?: TransportResult,
  ) {
    super(message);
    this.name = "ResourceError";
    this.kind = kind;
    this.location = location;
    this.transportResult = transportResult;
  }
}
