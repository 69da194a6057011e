export * from "./models";

export { MediaLoader } from "./media/media-loader";
export { resolveMediaType, mimeTypeFor } from "./media/format-resolver";
export { createNodeTransport } from "./media/transport";
export type { NodeTransportOptions } from "./media/transport";
export { createBufferedDecoder } from "./media/decoder";

export { DocumentStore } from "./documents/document-store";
export { createJsonCodec } from "./documents/json-codec";
export { createNodeFileSystem } from "./documents/node-file-system";

export { OperationRunner } from "./operations/operation-runner";
export type { OperationBody, OperationCallbacks } from "./operations/operation-runner";
export { ResourceCell } from "./operations/resource-cell";

export { ResourceError } from "./utils/resource-error";
export type { ResourceErrorKind } from "./utils/resource-error";
export { getGroundedError, isIndeterminate } from "./utils/error-parser";
export { tryCatch, tryCatchSync, settle } from "./utils/try-catch";
