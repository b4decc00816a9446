export * from "./logger";
export * from "./errors";
export * from "./pipeline";
export * from "./settings";
export * from "./retry";
export * from "./naming";
export * from "./monitor";
export * from "./clients/http";
// Code Ocean wire types are NOT exported from the global barrel.
// Import directly from "@/types/clients/codeOcean" within src/clients/codeOcean/ only.
