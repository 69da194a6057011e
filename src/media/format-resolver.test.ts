import { describe, it, expect } from "vitest";
import { MediaType } from "../models";
import { mimeTypeFor, resolveMediaType } from "./format-resolver";

describe("resolveMediaType", () => {
  it("should ignore the case of the extension", () => {
    expect(resolveMediaType("a.MP3")).toBe(MediaType.MPEG);
    expect(resolveMediaType("Theme.Ogg")).toBe(MediaType.OGGVORBIS);
  });

  it("should map every known extension", () => {
    const expected: Array<[string, MediaType]> = [
      ["a.mp3", MediaType.MPEG],
      ["a.mp2", MediaType.MPEG],
      ["a.mpeg", MediaType.MPEG],
      ["a.ogg", MediaType.OGGVORBIS],
      ["a.wav", MediaType.WAV],
      ["a.aiff", MediaType.AIFF],
      ["a.xma", MediaType.XMA],
      ["a.xm", MediaType.XM],
      ["a.it", MediaType.IT],
      ["a.mod", MediaType.MOD],
      ["a.alac", MediaType.AUDIOQUEUE],
      ["a.aac", MediaType.AUDIOQUEUE],
      ["a.s3m", MediaType.S3M],
      ["a.vag", MediaType.VAG],
    ];
    for (const [filename, type] of expected) {
      expect(resolveMediaType(filename)).toBe(type);
    }
  });

  it("should use only the text after the last dot", () => {
    expect(resolveMediaType("/music/album.v2/track.wav")).toBe(MediaType.WAV);
    expect(resolveMediaType("track.wav.txt")).toBe(MediaType.UNKNOWN);
    expect(resolveMediaType("https://cdn.test/theme.ogg")).toBe(MediaType.OGGVORBIS);
  });

  it("should return UNKNOWN for unknown or missing extensions", () => {
    expect(resolveMediaType("a.txt")).toBe(MediaType.UNKNOWN);
    expect(resolveMediaType("noext")).toBe(MediaType.UNKNOWN);
    expect(resolveMediaType("mp3")).toBe(MediaType.UNKNOWN);
    expect(resolveMediaType("trailing.")).toBe(MediaType.UNKNOWN);
    expect(resolveMediaType("")).toBe(MediaType.UNKNOWN);
  });

  it("should not treat object prototype names as extensions", () => {
    expect(resolveMediaType("a.constructor")).toBe(MediaType.UNKNOWN);
    expect(resolveMediaType("a.toString")).toBe(MediaType.UNKNOWN);
  });

  it("should not strip query strings", () => {
    expect(resolveMediaType("https://cdn.test/theme.mp3?v=2")).toBe(MediaType.UNKNOWN);
  });
});

describe("mimeTypeFor", () => {
  it("should give a MIME hint for each type", () => {
    expect(mimeTypeFor(MediaType.MPEG)).toBe("audio/mpeg");
    expect(mimeTypeFor(MediaType.WAV)).toBe("audio/wav");
    expect(mimeTypeFor(MediaType.UNKNOWN)).toBe("application/octet-stream");
  });
});
