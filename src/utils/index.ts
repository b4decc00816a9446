/**
 * Utils barrel exports
 */

export * from "./settingsValidation";
