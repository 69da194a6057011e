import { sha256 } from "@noble/hashes/sha2";
import { bytesToHex } from "@noble/hashes/utils";
import type { MediaDecoder, MediaHandle, MediaRequest } from "../models";
import { mimeTypeFor } from "./format-resolver";

/**
 * The default decoder keeps the payload as-is and fingerprints it. Playback
 * engines that need PCM plug in their own `MediaDecoder`.
 */
export function createBufferedDecoder(): MediaDecoder {
  return {
    decode(payload: Uint8Array, request: MediaRequest, location: string): MediaHandle {
      if (payload.byteLength === 0) {
        throw new Error(`Received an empty payload for ${location}.`);
      }
      return {
        format: request.mediaType,
        mimeType: mimeTypeFor(request.mediaType),
        location,
        bytes: payload,
        byteLength: payload.byteLength,
        digest: bytesToHex(sha256(payload)),
      };
    },
  };
}
