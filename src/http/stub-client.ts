/**
 * Stub HTTP client for tests: records requests and replays configured responses in order.
 */

import type { HttpRequest, HttpResponse, IHttpClient } from "./client.js";

export type StubResponse = HttpResponse | ((request: HttpRequest) => Promise<HttpResponse>);

/** 200-style response with a JSON body */
export function jsonResponse(body: unknown, status = 200): HttpResponse {
  return {
    status,
    headers: { "content-type": "application/json" },
    body: JSON.stringify(body),
  };
}

export class StubHttpClient implements IHttpClient {
  private responses: StubResponse[] = [];
  private recordedRequests: HttpRequest[] = [];

  /** Set one response for the next request */
  setResponse(res: StubResponse): void {
    this.responses = [res];
  }

  /** Set a sequence of responses (one per request) */
  setResponses(res: StubResponse[]): void {
    this.responses = [...res];
  }

  getRecordedRequests(): HttpRequest[] {
    return [...this.recordedRequests];
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    this.recordedRequests.push(request);
    const next = this.responses.shift();
    if (next === undefined) {
      return jsonResponse({ message: "No stub response configured" }, 500);
    }
    if (typeof next === "function") {
      return next(request);
    }
    return next;
  }
}
