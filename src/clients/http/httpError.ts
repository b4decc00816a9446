/**
 * HttpError: a non-2xx response from the HTTP client
 *
 * The Code Ocean client maps it onto the pipeline errors; 429 is the only
 * status the retry policy ever sees again.
 */

import type { HttpErrorDetails } from "@/types";
import { HTTP_STATUS_TOO_MANY_REQUESTS } from "@/constants";

export class HttpError extends Error {
  public readonly status: number;
  public readonly statusText: string;
  public readonly url: string;
  /** Start of the response body, truncated */
  public readonly bodySnippet?: string;
  public readonly headers?: Headers;

  constructor(details: HttpErrorDetails) {
    const snippet = details.bodySnippet ? ` - ${details.bodySnippet}` : "";
    super(`HTTP ${details.status} ${details.statusText} - ${details.url}${snippet}`);
    this.name = "HttpError";
    this.status = details.status;
    this.statusText = details.statusText;
    this.url = details.url;
    this.bodySnippet = details.bodySnippet;
    this.headers = details.headers;
  }

  get isRateLimited(): boolean {
    return this.status === HTTP_STATUS_TOO_MANY_REQUESTS;
  }
}
