import { describe, it, expect, vi, beforeEach } from "vitest";
import { sha256 } from "@noble/hashes/sha2";
import { bytesToHex } from "@noble/hashes/utils";
import { pathToFileURL } from "url";
import { MediaLoader } from "./media-loader";
import { MediaType, OperationState, TransportResult } from "../models";
import type { MediaTransport, TransportResponse } from "../models";

const logger = { debug: vi.fn(), warn: vi.fn(), error: vi.fn() };

function ok(bytes: number[]): TransportResponse {
  return { result: TransportResult.Success, payload: Uint8Array.from(bytes), error: null };
}

function fakeTransport(...responses: TransportResponse[]) {
  const send = vi.fn<MediaTransport["send"]>();
  for (const response of responses) {
    send.mockResolvedValueOnce(response);
  }
  return { send };
}

describe("MediaLoader", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("should not touch the transport when constructed", () => {
    const transport = fakeTransport();
    const loader = new MediaLoader({ location: "/sfx/hit.wav", isRemote: false, transport, logger });

    expect(loader.handle).toBeUndefined();
    expect(loader.state).toBe(OperationState.Idle);
    expect(transport.send).not.toHaveBeenCalled();
  });

  it("should load and decode a local file through a file:// request", async () => {
    const transport = fakeTransport(ok([1, 2, 3]));
    const loader = new MediaLoader({ location: "/sfx/hit.wav", isRemote: false, transport, logger });
    let lengthSeenByCallback: number | undefined;
    const onLoadFinished = vi.fn(() => {
      lengthSeenByCallback = loader.handle?.byteLength;
    });
    const onError = vi.fn();

    const result = await loader.load(onLoadFinished, onError);

    expect(result.success).toBe(true);
    expect(transport.send).toHaveBeenCalledWith({
      uri: pathToFileURL("/sfx/hit.wav").href,
      mediaType: MediaType.WAV,
    });
    expect(onLoadFinished).toHaveBeenCalledTimes(1);
    expect(lengthSeenByCallback).toBe(3);
    expect(onError).not.toHaveBeenCalled();
    expect(loader.handle).toEqual({
      format: MediaType.WAV,
      mimeType: "audio/wav",
      location: "/sfx/hit.wav",
      bytes: Uint8Array.from([1, 2, 3]),
      byteLength: 3,
      digest: bytesToHex(sha256(Uint8Array.from([1, 2, 3]))),
    });
    expect(loader.state).toBe(OperationState.Completed);
  });

  it("should request remote locations as-is", async () => {
    const transport = fakeTransport(ok([9]));
    const loader = new MediaLoader({ location: "https://cdn.test/theme.ogg", isRemote: true, transport, logger });

    await loader.load(() => {});

    expect(transport.send).toHaveBeenCalledWith({
      uri: "https://cdn.test/theme.ogg",
      mediaType: MediaType.OGGVORBIS,
    });
  });

  it("should reject unknown formats without issuing a request", async () => {
    const transport = fakeTransport();
    const loader = new MediaLoader({ location: "/sfx/readme.txt", isRemote: false, transport, logger });
    const onLoadFinished = vi.fn();
    const onError = vi.fn();

    const result = await loader.load(onLoadFinished, onError);

    expect(transport.send).not.toHaveBeenCalled();
    expect(onLoadFinished).not.toHaveBeenCalled();
    expect(onError).toHaveBeenCalledTimes(1);
    expect(onError).toHaveBeenCalledWith(
      TransportResult.DataProcessingError,
      "Unrecognized file format. Does the filename have the correct extension?",
    );
    expect(loader.handle).toBeUndefined();
    expect(result.success).toBe(false);
    expect(result.error?.kind).toBe("format-unrecognized");
    expect(loader.state).toBe(OperationState.Failed);
  });

  it("should clear a previously loaded handle when a later load fails", async () => {
    const transport = fakeTransport(ok([1]), {
      result: TransportResult.ProtocolError,
      payload: null,
      error: "HTTP/1.1 404 Not Found",
    });
    const loader = new MediaLoader({ location: "https://cdn.test/a.mp3", isRemote: true, transport, logger });
    const onError = vi.fn();

    await loader.load(() => {});
    expect(loader.handle).toBeDefined();

    await loader.load(() => {}, onError);

    expect(loader.handle).toBeUndefined();
    expect(onError).toHaveBeenCalledWith(TransportResult.ProtocolError, "HTTP/1.1 404 Not Found");
  });

  it("should keep only the second payload after two successful loads", async () => {
    const transport = fakeTransport(ok([1, 1]), ok([2, 2, 2]));
    const loader = new MediaLoader({ location: "/music/theme.mp3", isRemote: false, transport, logger });
    const onLoadFinished = vi.fn();
    const onError = vi.fn();

    await loader.load(onLoadFinished, onError);
    await loader.load(onLoadFinished, onError);

    expect(loader.handle?.bytes).toEqual(Uint8Array.from([2, 2, 2]));
    expect(onLoadFinished).toHaveBeenCalledTimes(2);
    expect(onError).not.toHaveBeenCalled();
  });

  it("should treat a rejecting transport as a connection error", async () => {
    const send = vi.fn<MediaTransport["send"]>().mockRejectedValue(new Error("socket hang up"));
    const loader = new MediaLoader({ location: "https://cdn.test/a.mp3", isRemote: true, transport: { send }, logger });
    const onError = vi.fn();

    await loader.load(() => {}, onError);

    expect(onError).toHaveBeenCalledWith(TransportResult.ConnectionError, "socket hang up");
  });

  it("should report a decoder failure as a data processing error", async () => {
    const transport = fakeTransport(ok([]));
    const loader = new MediaLoader({ location: "/sfx/empty.wav", isRemote: false, transport, logger });
    const onError = vi.fn();

    const result = await loader.load(() => {}, onError);

    expect(onError).toHaveBeenCalledWith(
      TransportResult.DataProcessingError,
      "Received an empty payload for /sfx/empty.wav.",
    );
    expect(result.error?.kind).toBe("codec-failure");
    expect(loader.handle).toBeUndefined();
  });

  it("should log instead of throwing when no error callback is given", async () => {
    const loader = new MediaLoader({ location: "/sfx/readme.txt", isRemote: false, transport: fakeTransport(), logger });

    const result = await loader.load(() => {});

    expect(result.success).toBe(false);
    expect(logger.warn).toHaveBeenCalledWith(
      "[MediaLoader] load failed with no error callback: Unrecognized file format. Does the filename have the correct extension?",
    );
  });

  it("should round-trip its descriptor without the handle", async () => {
    const loader = new MediaLoader({ location: "https://cdn.test/a.mp3", isRemote: true, transport: fakeTransport(ok([5])), logger });
    await loader.load(() => {});

    const descriptor = JSON.parse(JSON.stringify(loader));
    expect(descriptor).toEqual({ location: "https://cdn.test/a.mp3", isRemote: true });

    const revived = MediaLoader.fromJSON(descriptor, { transport: fakeTransport(), logger });
    expect(revived.location).toBe("https://cdn.test/a.mp3");
    expect(revived.isRemote).toBe(true);
    expect(revived.handle).toBeUndefined();
  });
});
