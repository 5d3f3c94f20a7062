/**
 * Utils barrel exports
 */

export * from "./text/textNormalization";
export * from "./text/wordBoundary";
export * from "./text/removeDiacritics";
export * from "./vector";
export * from "./capabilityErrors";
export * from "./profileValidation";
