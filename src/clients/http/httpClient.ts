/**
 * HTTP client wrapper: general-purpose client using native fetch
 * Supports timeouts, query params, JSON and text responses, and structured error handling
 *
 * One attempt per call. Retrying is the caller's decision (see "@/retry"):
 * the mutating Code Ocean calls must never be repeated by the transport.
 */

import type { HttpQuery, HttpRequest } from "@/types";
import { HttpError } from "./httpError";
import {
  DEFAULT_HTTP_TIMEOUT_MS,
  DEFAULT_JSON_HEADERS,
  ERROR_BODY_SNIPPET_MAX_LENGTH,
} from "@/constants";
import * as logger from "@/logger";

/**
 * Build URL with query parameters
 */
function buildUrl(baseUrl: string, query?: HttpQuery): string {
  if (!query || Object.keys(query).length === 0) {
    return baseUrl;
  }

  const url = new URL(baseUrl);
  Object.entries(query).forEach(([key, value]) => {
    url.searchParams.append(key, String(value));
  });

  return url.toString();
}

/**
 * Extract a snippet of the error response body for debugging
 */
async function extractBodySnippet(response: Response): Promise<string | undefined> {
  let text: string;
  try {
    text = await response.text();
  } catch (readError) {
    logger.debug("Could not read error response body", {
      url: response.url,
      error: readError instanceof Error ? readError.message : String(readError),
    });
    return undefined;
  }
  if (!text) {
    return undefined;
  }
  return text.length > ERROR_BODY_SNIPPET_MAX_LENGTH
    ? text.substring(0, ERROR_BODY_SNIPPET_MAX_LENGTH) + "..."
    : text;
}

/**
 * Perform a single request and return the raw response
 *
 * @throws {HttpError} On non-2xx status codes
 * @throws {Error} On network errors; AbortError on timeout
 */
async function send(req: HttpRequest): Promise<Response> {
  const url = buildUrl(req.url, req.query);
  const timeoutMs = req.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;

  // Setup timeout using AbortController
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  try {
    // Build headers - defaults first, caller headers override
    const headers: Record<string, string> = {};
    if (req.json !== undefined) {
      Object.assign(headers, DEFAULT_JSON_HEADERS);
    }
    Object.assign(headers, req.headers);

    const options: RequestInit = {
      method: req.method,
      headers,
      signal: controller.signal,
    };

    if (req.json !== undefined) {
      options.body = JSON.stringify(req.json);
    }

    const response = await fetch(url, options);

    if (!response.ok) {
      const bodySnippet = await extractBodySnippet(response);
      throw new HttpError({
        status: response.status,
        statusText: response.statusText,
        url,
        bodySnippet,
        headers: response.headers,
      });
    }

    return response;
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Perform an HTTP request expecting a JSON response
 *
 * @template T - Expected response type
 * @param req - HTTP request configuration
 * @returns Parsed JSON response of type T (undefined for 204 No Content)
 * @throws {HttpError} On non-2xx status codes
 * @throws {Error} On network errors, timeouts, or a body that is not valid JSON
 */
export async function httpRequest<T>(req: HttpRequest): Promise<T> {
  const response = await send(req);

  // Handle 204 No Content
  if (response.status === 204) {
    return undefined as T;
  }

  const text = await response.text();
  if (!text) {
    return undefined as T;
  }

  try {
    return JSON.parse(text) as T;
  } catch (parseError) {
    logger.warn("JSON parse failed", {
      method: req.method,
      url: req.url,
      status: response.status,
      contentType: response.headers.get("content-type") || "none",
    });
    throw new Error(
      `Malformed JSON response from ${req.method} ${req.url}: ${parseError instanceof Error ? parseError.message : String(parseError)}`,
    );
  }
}

/**
 * Perform an HTTP request and return the body as text
 * Used for result file downloads, whose content type is not reliable.
 */
export async function httpRequestText(req: HttpRequest): Promise<string> {
  const response = await send(req);
  return response.text();
}
