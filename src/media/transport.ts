import { promises as fs } from "fs";
import { fileURLToPath } from "url";
import { TransportResult } from "../models";
import type { MediaRequest, MediaTransport, TransportResponse } from "../models";
import { getGroundedError } from "../utils/error-parser";
import { settle, tryCatchSync } from "../utils/try-catch";
import { mimeTypeFor } from "./format-resolver";

export interface NodeTransportOptions {
  /** Defaults to the global `fetch`. */
  fetch?: typeof fetch;
}

type FailedResult = Exclude<TransportResult, TransportResult.Success>;

function succeed(payload: Uint8Array): TransportResponse {
  return { result: TransportResult.Success, payload, error: null };
}

function fail(result: FailedResult, error: string): TransportResponse {
  return { result, payload: null, error };
}

async function readLocal(url: URL): Promise<TransportResponse> {
  const read = await settle(() => fs.readFile(fileURLToPath(url)));
  if (!read.success) {
    return fail(TransportResult.ConnectionError, getGroundedError(read.error));
  }
  return succeed(new Uint8Array(read.data));
}

async function fetchRemote(
  fetchFn: typeof fetch,
  url: URL,
  request: MediaRequest,
): Promise<TransportResponse> {
  const sent = await settle(() =>
    fetchFn(url, { headers: { Accept: mimeTypeFor(request.mediaType) } }),
  );
  if (!sent.success) {
    return fail(TransportResult.ConnectionError, getGroundedError(sent.error));
  }

  const response = sent.data;
  if (!response.ok) {
    return fail(
      TransportResult.ProtocolError,
      `HTTP/1.1 ${response.status} ${response.statusText}`.trimEnd(),
    );
  }

  const body = await settle(() => response.arrayBuffer());
  if (!body.success) {
    return fail(TransportResult.ConnectionError, getGroundedError(body.error));
  }
  return succeed(new Uint8Array(body.data));
}

/**
 * Q: Why does one transport handle both files and URLs?
 * A: Because `fetch` in Node doesn't speak `file:`. This picks the right tool
 *    for the request's scheme: `fs` for local files, `fetch` for http(s).
 *    Everything it can't do comes back as a failed response, never a throw.
 */
export function createNodeTransport(
  options: NodeTransportOptions = {},
): MediaTransport {
  const fetchFn = options.fetch ?? globalThis.fetch;

  return {
    async send(request: MediaRequest): Promise<TransportResponse> {
      const parsed = tryCatchSync(() => new URL(request.uri));
      if (!parsed.success) {
        return fail(
          TransportResult.ConnectionError,
          `Invalid request URI: ${request.uri}`,
        );
      }

      const url = parsed.data;
      switch (url.protocol) {
        case "file:":
          return readLocal(url);
        case "http:":
        case "https:":
          return fetchRemote(fetchFn, url, request);
        default:
          return fail(
            TransportResult.ConnectionError,
            `Unsupported protocol "${url.protocol}" in ${request.uri}`,
          );
      }
    },
  };
}
