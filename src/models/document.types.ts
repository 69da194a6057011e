import type { ZodType } from "zod";
import type { Logger } from "./operation.types";

/** The on-disk shape of every document. */
export interface DocumentEnvelope<T> {
  content: T;
}

export interface DocumentCodec<T> {
  encode(value: T): string;
  decode(text: string): T;
}

export interface ReadableFile {
  readToEnd(): Promise<string>;
  close(): Promise<void>;
}

export interface WritableFile {
  /** Resolves with the number of bytes that actually reached the file. */
  write(text: string): Promise<number>;
  flush(): Promise<void>;
  close(): Promise<void>;
}

/**
 * The file operations a DocumentStore needs. Swap it out to put documents
 * somewhere other than the local disk, or to simulate failures.
 */
export interface DocumentFileSystem {
  exists(path: string): Promise<boolean>;
  openRead(path: string): Promise<ReadableFile>;
  openWrite(path: string): Promise<WritableFile>;
  ensureDir(path: string): Promise<void>;
  rename(from: string, to: string): Promise<void>;
  /** Deletes the file. A file that is already gone is not an error. */
  remove(path: string): Promise<void>;
}

export interface DocumentStoreConfig<T> {
  location: string;
  /** Builds the value `loadOrInit` persists when no file exists yet. */
  createDefault: () => T;
  /** Validates `content` after decoding. Ignored when a custom codec is given. */
  schema?: ZodType<T>;
  codec?: DocumentCodec<T>;
  fileSystem?: DocumentFileSystem;
  /** Write to `<location>.tmp` and rename over the target. Defaults to true. */
  atomicWrites?: boolean;
  logger?: Logger;
}

export type DocumentErrorCallback = (message: string) => void;
