/**
 * Constants barrel exports
 */

export * from "./logger";
export * from "./scoring";
export * from "./recommendation";
export * from "./phrases";
export * from "./priorities";
export * from "./formatting";
export * from "./selection";
export * from "./capabilities";
export * from "./textNormalization";
export * from "./clients/http";
export * from "./clients/tei";
