import { promises as fs } from "fs";
import type { DocumentFileSystem, ReadableFile, WritableFile } from "../models";

/**
 * The local-disk implementation of DocumentFileSystem, on top of `fs/promises`
 * file handles. `flush()` is an fsync, so a completed save is on stable storage.
 */
export function createNodeFileSystem(): DocumentFileSystem {
  return {
    async exists(filePath: string): Promise<boolean> {
      try {
        const stats = await fs.stat(filePath);
        return stats.isFile();
      } catch (error: unknown) {
        // ENOTDIR: some parent in the path is a regular file.
        if (
          error instanceof Error &&
          "code" in error &&
          (error.code === "ENOENT" || error.code === "ENOTDIR")
        ) {
          return false;
        }
        throw error;
      }
    },

    async openRead(filePath: string): Promise<ReadableFile> {
      const handle = await fs.open(filePath, "r");
      return {
        readToEnd: () => handle.readFile({ encoding: "utf-8" }),
        close: () => handle.close(),
      };
    },

    async openWrite(filePath: string): Promise<WritableFile> {
      const handle = await fs.open(filePath, "w");
      return {
        write: async (text: string) => {
          const { bytesWritten } = await handle.write(text, null, "utf-8");
          return bytesWritten;
        },
        flush: () => handle.sync(),
        close: () => handle.close(),
      };
    },

    async ensureDir(dirPath: string): Promise<void> {
      await fs.mkdir(dirPath, { recursive: true });
    },

    rename(from: string, to: string): Promise<void> {
      return fs.rename(from, to);
    },

    remove(filePath: string): Promise<void> {
      return fs.rm(filePath, { force: true });
    },
  };
}
