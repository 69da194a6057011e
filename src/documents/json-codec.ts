import type { ZodType } from "zod";
import type { DocumentCodec } from "../models";

// Binary values don't survive JSON on their own, so they travel as tagged objects.
// The raw value is read from the holder: `value` has already been through
// `toJSON`, which turns a Buffer into `{ type: "Buffer", data }`.
function replacer(this: unknown, key: string, value: unknown): unknown {
  const raw: unknown =
    typeof this === "object" && this !== null ? Reflect.get(this, key) : value;
  if (raw instanceof Uint8Array) {
    return { __dataType: "Uint8Array", data: Array.from(raw) };
  }
  if (raw instanceof ArrayBuffer) {
    const base64 = Buffer.from(raw).toString("base64");
    return { __dataType: "ArrayBuffer", data: base64 };
  }
  return value;
}

function isTagged(
  value: unknown,
): value is { __dataType: unknown; data: unknown } {
  return (
    typeof value === "object" &&
    value !== null &&
    "__dataType" in value &&
    "data" in value
  );
}

function reviver(_key: string, value: unknown): unknown {
  if (!isTagged(value)) {
    return value;
  }
  if (value.__dataType === "Uint8Array" && Array.isArray(value.data)) {
    return Uint8Array.from(value.data);
  }
  if (value.__dataType === "ArrayBuffer" && typeof value.data === "string") {
    const buffer = Buffer.from(value.data, "base64");
    return buffer.buffer.slice(
      buffer.byteOffset,
      buffer.byteOffset + buffer.byteLength,
    );
  }
  return value;
}

/**
 * The document format: the value lives under a single `content` field, so
 * primitives, arrays and records all persist the same way. Output is
 * pretty-printed with two-space indentation.
 *
 * `Uint8Array` (Buffer included) and `ArrayBuffer` values are written as
 * `{ "__dataType": "Uint8Array", "data": number[] }` and
 * `{ "__dataType": "ArrayBuffer", "data": base64 }`. The `__dataType` key is
 * reserved: any record in a document with one of those tags and a matching
 * `data` field comes back as binary, and Buffers come back as plain
 * `Uint8Array`s.
 *
 * Without a schema the decoded content is trusted to be a `T`.
 */
export function createJsonCodec<T>(schema?: ZodType<T>): DocumentCodec<T> {
  return {
    encode(value: T): string {
      return JSON.stringify({ content: value }, replacer, 2);
    },

    decode(text: string): T {
      const parsed: unknown = JSON.parse(text, reviver);
      if (typeof parsed !== "object" || parsed === null || !("content" in parsed)) {
        throw new Error('Document has no "content" field.');
      }
      if (schema) {
        return schema.parse(parsed.content);
      }
      return parsed.content as T;
    },
  };
}
