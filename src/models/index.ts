export * from "./result.types";
export * from "./operation.types";
export * from "./media.types";
export * from "./document.types";
