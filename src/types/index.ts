/**
 * Types barrel exports
 */

export * from "./logger";
export * from "./config";
export * from "./candidates";
export * from "./priorities";
export * from "./skills";
export * from "./selection";
export * from "./profile";
export * from "./clients/http";
export * from "./clients/tei";
