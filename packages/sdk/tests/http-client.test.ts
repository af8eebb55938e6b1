/**
 * HTTP Client Tests
 *
 * Verifies:
 * - GET, page and POST requests
 * - API key and request ID headers
 * - Raw body passthrough
 * - Retry on 5xx and network errors, no retry on 4xx
 * - Error envelope normalization
 * - Timeout handling
 * - Response body parsing (empty, malformed)
 */

import { describe, it, expect } from "vitest";
import { HttpClient } from "../src/http-client.js";
import { ReferralRewardsError } from "../src/types.js";

// =============================================================================
// Mock Fetch Helper
// =============================================================================

interface MockResponse {
  status: number;
  body?: unknown;
  rawBody?: string;
  headers?: Record<string, string>;
  error?: Error;
}

interface CapturedCall {
  readonly url: string;
  readonly method: string;
  readonly headers: Headers;
  readonly body: string | undefined;
}

function createMockFetch(responses: MockResponse[]): {
  fetchFn: typeof fetch;
  calls: CapturedCall[];
} {
  const calls: CapturedCall[] = [];

  const fetchFn: typeof fetch = async (input, init) => {
    calls.push({
      url: typeof input === "string" ? input : input instanceof URL ? input.toString() : input.url,
      method: init?.method ?? "GET",
      headers: new Headers(init?.headers),
      body: typeof init?.body === "string" ? init.body : undefined,
    });

    const config = responses[calls.length - 1];
    if (config === undefined) {
      throw new Error(`Mock fetch called more times than expected (call ${calls.length})`);
    }
    if (config.error !== undefined) {
      throw config.error;
    }

    const body = config.rawBody ?? (config.body !== undefined ? JSON.stringify(config.body) : "");
    return new Response(body, {
      status: config.status,
      headers: new Headers(config.headers ?? {}),
    });
  };

  return { fetchFn, calls };
}

function client(fetchFn: typeof fetch, overrides: { retries?: number; apiKey?: string } = {}): HttpClient {
  return new HttpClient({
    baseUrl: "https://rewards.example.com",
    fetchFn,
    retries: overrides.retries ?? 0,
    retryDelay: 1,
    apiKey: overrides.apiKey,
  });
}

// =============================================================================
// GET Requests
// =============================================================================

describe("HttpClient GET", () => {
  it("unwraps the data envelope", async () => {
    const { fetchFn, calls } = createMockFetch([
      { status: 200, body: { data: { id: "camp-1", name: "Launch" } } },
    ]);

    const result = await client(fetchFn).get<{ id: string; name: string }>("/api/campaigns/camp-1");

    expect(result.data).toEqual({ id: "camp-1", name: "Launch" });
    expect(result.status).toBe(200);
    expect(calls).toHaveLength(1);
    expect(calls[0]!.url).toBe("https://rewards.example.com/api/campaigns/camp-1");
    expect(calls[0]!.method).toBe("GET");
  });

  it("strips trailing slashes from the base URL", async () => {
    const { fetchFn, calls } = createMockFetch([{ status: 200, body: { data: {} } }]);

    const http = new HttpClient({
      baseUrl: "https://rewards.example.com//",
      fetchFn,
      retries: 0,
    });
    await http.get("/health");

    expect(calls[0]!.url).toBe("https://rewards.example.com/health");
  });

  it("returns bodies without an envelope as-is", async () => {
    const { fetchFn } = createMockFetch([
      { status: 200, body: { status: "ok", timestamp: "2025-01-15T10:00:00.000Z" } },
    ]);

    const result = await client(fetchFn).get("/health");

    expect(result.data).toEqual({ status: "ok", timestamp: "2025-01-15T10:00:00.000Z" });
  });

  it("keeps pagination on list pages", async () => {
    const { fetchFn } = createMockFetch([
      {
        status: 200,
        body: { data: [{ id: "a" }], pagination: { cursor: "next-1", hasMore: true } },
      },
    ]);

    const result = await client(fetchFn).getPage<{ id: string }>("/api/campaigns?limit=1");

    expect(result.data.data).toEqual([{ id: "a" }]);
    expect(result.data.pagination).toEqual({ cursor: "next-1", hasMore: true });
  });
});

// =============================================================================
// POST Requests
// =============================================================================

describe("HttpClient POST", () => {
  it("sends a JSON body", async () => {
    const { fetchFn, calls } = createMockFetch([
      { status: 201, body: { data: { id: "camp-1" } } },
    ]);

    const result = await client(fetchFn).post<{ id: string }>("/api/campaigns", {
      name: "Launch",
    });

    expect(result.data).toEqual({ id: "camp-1" });
    expect(result.status).toBe(201);
    expect(calls[0]!.method).toBe("POST");
    expect(calls[0]!.body).toBe('{"name":"Launch"}');
  });

  it("sends raw bodies unchanged with extra headers", async () => {
    const { fetchFn, calls } = createMockFetch([{ status: 201, body: { data: {} } }]);
    const raw = '{ "b": 1,  "a": 2 }';

    await client(fetchFn).postRaw("/api/webhooks/track", raw, { "X-Webhook-Signature": "abc" });

    expect(calls[0]!.body).toBe(raw);
    expect(calls[0]!.headers.get("X-Webhook-Signature")).toBe("abc");
  });
});

// =============================================================================
// Headers
// =============================================================================

describe("HttpClient headers", () => {
  it("injects the API key header when configured", async () => {
    const { fetchFn, calls } = createMockFetch([{ status: 200, body: { data: {} } }]);

    await client(fetchFn, { apiKey: "test-api-key" }).get("/api/campaigns");

    expect(calls[0]!.headers.get("X-Api-Key")).toBe("test-api-key");
  });

  it("omits the API key header when not configured", async () => {
    const { fetchFn, calls } = createMockFetch([{ status: 200, body: { data: {} } }]);

    await client(fetchFn).get("/api/campaigns");

    expect(calls[0]!.headers.get("X-Api-Key")).toBeNull();
  });

  it("sends a request ID and JSON content headers", async () => {
    const { fetchFn, calls } = createMockFetch([{ status: 200, body: { data: {} } }]);

    await client(fetchFn).get("/api/campaigns");

    expect(calls[0]!.headers.get("X-Request-Id")).toMatch(/^sdk-/);
    expect(calls[0]!.headers.get("Content-Type")).toBe("application/json");
    expect(calls[0]!.headers.get("Accept")).toBe("application/json");
  });

  it("extracts selected response headers", async () => {
    const { fetchFn } = createMockFetch([
      {
        status: 200,
        body: { data: {} },
        headers: { "content-type": "application/json", "x-request-id": "req-123" },
      },
    ]);

    const result = await client(fetchFn).get("/health");

    expect(result.headers).toEqual({
      "content-type": "application/json",
      "x-request-id": "req-123",
    });
  });
});

// =============================================================================
// Error Handling
// =============================================================================

describe("HttpClient error handling", () => {
  it("normalizes 4xx error envelopes", async () => {
    const { fetchFn } = createMockFetch([
      {
        status: 400,
        body: {
          error: {
            code: "VALIDATION_ERROR",
            message: "Request validation failed",
            details: { issues: [{ path: "name", message: "Required" }] },
          },
        },
      },
    ]);

    const error = await client(fetchFn).post("/api/campaigns", {}).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ReferralRewardsError);
    expect(error).toMatchObject({
      code: "VALIDATION_ERROR",
      message: "Request validation failed",
      statusCode: 400,
      details: { issues: [{ path: "name", message: "Required" }] },
    });
  });

  it("falls back to CLIENT_ERROR without an envelope", async () => {
    const { fetchFn } = createMockFetch([{ status: 418, rawBody: "teapot" }]);

    await expect(client(fetchFn).get("/x")).rejects.toMatchObject({
      code: "CLIENT_ERROR",
      message: "HTTP 418",
      statusCode: 418,
    });
  });

  it("does not retry 4xx errors", async () => {
    const { fetchFn, calls } = createMockFetch([
      { status: 404, body: { error: { code: "NOT_FOUND", message: "Not found" } } },
    ]);

    await expect(client(fetchFn, { retries: 3 }).get("/x")).rejects.toThrow(ReferralRewardsError);
    expect(calls).toHaveLength(1);
  });
});

// =============================================================================
// Retry Logic
// =============================================================================

describe("HttpClient retry logic", () => {
  it("retries on 5xx errors", async () => {
    const { fetchFn, calls } = createMockFetch([
      { status: 500, body: { error: { code: "INTERNAL_ERROR", message: "Internal server error" } } },
      { status: 200, body: { data: { ok: true } } },
    ]);

    const result = await client(fetchFn, { retries: 2 }).get<{ ok: boolean }>("/x");

    expect(result.data).toEqual({ ok: true });
    expect(calls).toHaveLength(2);
  });

  it("gives up after max retries on persistent 5xx", async () => {
    const { fetchFn, calls } = createMockFetch([
      { status: 503, body: { error: { code: "UNAVAILABLE", message: "Try again" } } },
      { status: 503, body: { error: { code: "UNAVAILABLE", message: "Try again" } } },
    ]);

    await expect(client(fetchFn, { retries: 1 }).get("/x")).rejects.toMatchObject({
      code: "UNAVAILABLE",
      message: "Try again",
      statusCode: 503,
    });
    expect(calls).toHaveLength(2);
  });

  it("retries network errors", async () => {
    const { fetchFn, calls } = createMockFetch([
      { status: 0, error: new Error("socket hang up") },
      { status: 200, body: { data: { ok: true } } },
    ]);

    const result = await client(fetchFn, { retries: 1 }).get<{ ok: boolean }>("/x");

    expect(result.data).toEqual({ ok: true });
    expect(calls).toHaveLength(2);
  });

  it("reports NETWORK_ERROR once retries are exhausted", async () => {
    const { fetchFn } = createMockFetch([
      { status: 0, error: new Error("connect ECONNREFUSED") },
      { status: 0, error: new Error("connect ECONNREFUSED") },
    ]);

    await expect(client(fetchFn, { retries: 1 }).get("/x")).rejects.toMatchObject({
      code: "NETWORK_ERROR",
      message: "connect ECONNREFUSED",
      statusCode: 0,
    });
  });
});

// =============================================================================
// Timeout
// =============================================================================

describe("HttpClient timeout", () => {
  it("aborts requests that exceed the timeout", async () => {
    const hangingFetch: typeof fetch = (_input, init) =>
      new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener("abort", () => {
          const abortError = new Error("The operation was aborted");
          abortError.name = "AbortError";
          reject(abortError);
        });
      });

    const http = new HttpClient({
      baseUrl: "https://rewards.example.com",
      fetchFn: hangingFetch,
      timeout: 20,
      retries: 2,
    });

    await expect(http.get("/slow")).rejects.toMatchObject({
      code: "TIMEOUT",
      message: "Request timed out after 20ms",
      statusCode: 0,
    });
  });
});

// =============================================================================
// Body Parsing
// =============================================================================

describe("HttpClient body parsing", () => {
  it("treats an empty 2xx body as an empty object", async () => {
    const { fetchFn } = createMockFetch([{ status: 200 }]);

    const result = await client(fetchFn).get("/x");

    expect(result.data).toEqual({});
  });

  it("wraps a non-JSON body as raw text", async () => {
    const { fetchFn } = createMockFetch([{ status: 200, rawBody: "plain text" }]);

    const result = await client(fetchFn).get("/x");

    expect(result.data).toEqual({ raw: "plain text" });
  });
});
