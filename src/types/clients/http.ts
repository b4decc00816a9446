/**
 * HTTP client type definitions
 */

export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE";

export type HttpQuery = Record<string, string | number | boolean>;

export interface HttpRequest {
  method: HttpMethod;
  url: string;
  headers?: Record<string, string>;
  query?: HttpQuery;
  json?: unknown;
  timeoutMs?: number;
}

export interface HttpErrorDetails {
  status: number;
  statusText: string;
  url: string;
  bodySnippet?: string;
  headers?: Headers;
}

/**
 * JSON request function type for dependency injection
 */
export type HttpRequestFn = <T>(req: HttpRequest) => Promise<T>;

/**
 * Raw text request function type for dependency injection
 */
export type HttpTextRequestFn = (req: HttpRequest) => Promise<string>;
