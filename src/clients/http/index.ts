/**
 * HTTP client public API
 */

export { httpRequest, httpRequestText } from "./httpClient";
export { HttpError } from "./httpError";
