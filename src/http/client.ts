/**
 * HTTP client abstraction. Allows stubbing in tests without touching geocoding logic.
 */

import { getLogger } from "../logger.js";

const log = getLogger("http");

const DEFAULT_TIMEOUT_MS = 10_000;

export interface HttpRequest {
  method: "GET";
  url: string;
  headers?: Record<string, string>;
  timeoutMs?: number;
}

export interface HttpResponse {
  status: number;
  headers: Record<string, string>;
  body: string;
}

export type HttpErrorCode = "ETIMEDOUT" | "ENETWORK";

/** Transport-level failure: the request never produced a response. */
export class HttpError extends Error {
  readonly request: HttpRequest;
  readonly code: HttpErrorCode;

  constructor(message: string, request: HttpRequest, code: HttpErrorCode, cause?: unknown) {
    super(message, { cause });
    this.name = "HttpError";
    this.request = request;
    this.code = code;
    Object.setPrototypeOf(this, HttpError.prototype);
  }
}

export function isHttpTimeout(e: unknown): boolean {
  return e instanceof HttpError && e.code === "ETIMEDOUT";
}

/** URL without its query string, so credentials passed as query parameters stay out of logs. */
export function redactUrl(url: string): string {
  const q = url.indexOf("?");
  return q === -1 ? url : url.slice(0, q);
}

/**
 * Minimal HTTP client interface. Default implementation uses global fetch.
 * Tests inject a stub that returns controlled responses.
 */
export interface IHttpClient {
  send(request: HttpRequest): Promise<HttpResponse>;
}

/**
 * Default implementation using fetch with timeout.
 */
export class FetchHttpClient implements IHttpClient {
  async send(request: HttpRequest): Promise<HttpResponse> {
    const timeoutMs = request.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
    const started = Date.now();
    try {
      const res = await fetch(request.url, {
        method: request.method,
        headers: request.headers,
        signal: controller.signal,
      });
      const body = await res.text();
      const headers: Record<string, string> = {};
      res.headers.forEach((v, k) => (headers[k] = v));
      log.debug(
        { method: request.method, url: redactUrl(request.url), status: res.status, ms: Date.now() - started },
        "http response"
      );
      return { status: res.status, headers, body };
    } catch (err) {
      const target = redactUrl(request.url);
      if (err instanceof Error && err.name === "AbortError") {
        throw new HttpError(`Request timed out after ${timeoutMs}ms: ${target}`, request, "ETIMEDOUT", err);
      }
      const reason = err instanceof Error ? err.message : String(err);
      throw new HttpError(`Request failed: ${target}: ${reason}`, request, "ENETWORK", err);
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
