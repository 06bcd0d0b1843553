/**
 * Utils barrel exports
 */

export * from "./identity/companyIdentity";
export * from "./text/normalizeText";
export * from "./async/abort";
