import { MediaType } from "../models";

const EXTENSIONS: ReadonlyMap<string, MediaType> = new Map([
  ["mp3", MediaType.MPEG],
  ["mp2", MediaType.MPEG],
  ["mpeg", MediaType.MPEG],
  ["ogg", MediaType.OGGVORBIS],
  ["wav", MediaType.WAV],
  ["aiff", MediaType.AIFF],
  ["xma", MediaType.XMA],
  ["xm", MediaType.XM],
  ["it", MediaType.IT],
  ["mod", MediaType.MOD],
  ["alac", MediaType.AUDIOQUEUE],
  ["aac", MediaType.AUDIOQUEUE],
  ["s3m", MediaType.S3M],
  ["vag", MediaType.VAG],
]);

const MIME_TYPES: Readonly<Record<MediaType, string>> = {
  [MediaType.MPEG]: "audio/mpeg",
  [MediaType.OGGVORBIS]: "audio/ogg",
  [MediaType.WAV]: "audio/wav",
  [MediaType.AIFF]: "audio/aiff",
  [MediaType.XMA]: "audio/x-xma",
  [MediaType.XM]: "audio/xm",
  [MediaType.IT]: "audio/it",
  [MediaType.MOD]: "audio/mod",
  [MediaType.AUDIOQUEUE]: "audio/aac",
  [MediaType.S3M]: "audio/s3m",
  [MediaType.VAG]: "audio/x-vag",
  [MediaType.UNKNOWN]: "application/octet-stream",
};

/**
 * Maps a filename (or URL) to the media type its extension implies.
 * The extension is whatever follows the last `.`, lowercased and nothing else:
 * no dot, or an extension we don't know, gives `MediaType.UNKNOWN`.
 */
export function resolveMediaType(filename: string): MediaType {
  const dot = filename.lastIndexOf(".");
  if (dot === -1) {
    return MediaType.UNKNOWN;
  }
  const extension = filename.slice(dot + 1).toLowerCase();
  return EXTENSIONS.get(extension) ?? MediaType.UNKNOWN;
}

export function mimeTypeFor(type: MediaType): string {
  return MIME_TYPES[type];
}
