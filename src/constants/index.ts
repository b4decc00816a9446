export * from "./logger";
export * from "./retry";
export * from "./naming";
export * from "./settings";
export * from "./clients/http";
export * from "./clients/codeOcean";
