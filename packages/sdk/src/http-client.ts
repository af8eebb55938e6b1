/**
 * @referral-rewards/sdk: HTTP Client.
 *
 * Wraps native fetch() with:
 * - API key header injection
 * - Request ID generation
 * - Timeout handling
 * - Retry logic (exponential backoff for 5xx and network errors)
 * - Error envelope normalization
 *
 * Zero runtime dependencies; a custom fetch function can be injected.
 */

import type {
  PaginatedList,
  ReferralRewardsClientConfig,
  ReferralRewardsResponse,
} from "./types.js";
import { ReferralRewardsError } from "./types.js";

// =============================================================================
// Internal Helpers
// =============================================================================

const MAX_BACKOFF_MS = 10000;

interface RequestOptions {
  /** Serialized request body, sent as given */
  readonly body?: string | undefined;
  readonly headers?: Readonly<Record<string, string>> | undefined;
}

interface RawResponse {
  readonly body: unknown;
  readonly status: number;
  readonly headers: Readonly<Record<string, string>>;
}

interface ErrorEnvelope {
  readonly code: string | undefined;
  readonly message: string | undefined;
  readonly details: unknown;
}

/** Generate a simple request ID */
function generateRequestId(): string {
  return `sdk-${Date.now().toString(36)}-${Math.random().toString(36).slice(2, 8)}`;
}

/** Sleep for the given number of milliseconds */
function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Parse a response body as JSON, handling empty responses.
 */
async function parseResponseBody(response: Response): Promise<unknown> {
  const text = await response.text();
  if (text.length === 0) {
    return {};
  }
  try {
    return JSON.parse(text);
  } catch {
    return { raw: text };
  }
}

/**
 * Read `{ error: { code, message, details } }` from a response body.
 */
function readErrorEnvelope(body: unknown): ErrorEnvelope {
  const error = isRecord(body) ? body["error"] : undefined;
  if (!isRecord(error)) {
    return { code: undefined, message: undefined, details: undefined };
  }
  return {
    code: typeof error["code"] === "string" ? error["code"] : undefined,
    message: typeof error["message"] === "string" ? error["message"] : undefined,
    details: error["details"],
  };
}

/**
 * Extract selected headers from a Response.
 */
function extractHeaders(response: Response): Record<string, string> {
  const result: Record<string, string> = {};
  const interestingHeaders = ["content-type", "x-request-id", "retry-after"];

  for (const name of interestingHeaders) {
    const value = response.headers.get(name);
    if (value !== null) {
      result[name] = value;
    }
  }

  return result;
}

// =============================================================================
// HTTP Client
// =============================================================================

/**
 * Low-level HTTP client for the referral rewards API.
 */
export class HttpClient {
  private readonly baseUrl: string;
  private readonly apiKey: string | undefined;
  private readonly timeout: number;
  private readonly maxRetries: number;
  private readonly retryDelay: number;
  private readonly fetchFn: typeof fetch;

  constructor(config: ReferralRewardsClientConfig) {
    // Strip trailing slash
    this.baseUrl = config.baseUrl.replace(/\/+$/, "");
    this.apiKey = config.apiKey;
    this.timeout = config.timeout ?? 30000;
    this.maxRetries = config.retries ?? 3;
    this.retryDelay = config.retryDelay ?? 1000;
    this.fetchFn = config.fetchFn ?? globalThis.fetch;
  }

  /**
   * GET a single-record `{ data }` envelope and unwrap it.
   */
  async get<T>(path: string): Promise<ReferralRewardsResponse<T>> {
    const result = await this.request("GET", path);
    return { ...result, data: unwrapData<T>(result.body) };
  }

  /**
   * GET a `{ data, pagination }` list envelope, kept whole.
   */
  async getPage<T>(path: string): Promise<ReferralRewardsResponse<PaginatedList<T>>> {
    const result = await this.request("GET", path);
    return { ...result, data: result.body as PaginatedList<T> };
  }

  /**
   * POST a JSON body.
   */
  async post<T>(
    path: string,
    body: unknown,
    headers?: Readonly<Record<string, string>>,
  ): Promise<ReferralRewardsResponse<T>> {
    return this.postRaw<T>(path, JSON.stringify(body), headers);
  }

  /**
   * POST an already serialized body without touching its bytes.
   */
  async postRaw<T>(
    path: string,
    rawBody: string,
    headers?: Readonly<Record<string, string>>,
  ): Promise<ReferralRewardsResponse<T>> {
    const result = await this.request("POST", path, { body: rawBody, headers });
    return { ...result, data: unwrapData<T>(result.body) };
  }

  /**
   * Core request method with retry logic.
   */
  private async request(
    method: string,
    path: string,
    options: RequestOptions = {},
  ): Promise<RawResponse> {
    const url = `${this.baseUrl}${path}`;
    const requestId = generateRequestId();

    const headers: Record<string, string> = {
      "Content-Type": "application/json",
      "Accept": "application/json",
      "X-Request-Id": requestId,
      ...options.headers,
    };

    if (this.apiKey !== undefined) {
      headers["X-Api-Key"] = this.apiKey;
    }

    const init: RequestInit = {
      method,
      headers,
    };

    if (options.body !== undefined) {
      init.body = options.body;
    }

    let lastError: Error | null = null;

    for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
      try {
        const response = await this.fetchWithTimeout(url, init);
        const responseBody = await parseResponseBody(response);
        const responseHeaders = extractHeaders(response);

        // 2xx → success
        if (response.ok) {
          return {
            body: responseBody,
            status: response.status,
            headers: responseHeaders,
          };
        }

        const envelope = readErrorEnvelope(responseBody);

        // 4xx → don't retry (client errors)
        if (response.status >= 400 && response.status < 500) {
          throw new ReferralRewardsError(
            envelope.code ?? "CLIENT_ERROR",
            envelope.message ?? `HTTP ${response.status}`,
            response.status,
            envelope.details,
          );
        }

        // 5xx → retry with backoff
        if (response.status >= 500 && attempt < this.maxRetries) {
          await sleep(this.backoff(attempt));
          lastError = new ReferralRewardsError(
            "SERVER_ERROR",
            `HTTP ${response.status}`,
            response.status,
          );
          continue;
        }

        // 5xx on last attempt
        throw new ReferralRewardsError(
          envelope.code ?? "SERVER_ERROR",
          envelope.message ?? `HTTP ${response.status} after ${attempt + 1} attempts`,
          response.status,
          envelope.details,
        );
      } catch (error) {
        if (error instanceof ReferralRewardsError) {
          throw error;
        }

        // Network errors → retry
        if (attempt < this.maxRetries) {
          lastError = error instanceof Error ? error : new Error(String(error));
          await sleep(this.backoff(attempt));
          continue;
        }

        throw new ReferralRewardsError(
          "NETWORK_ERROR",
          error instanceof Error ? error.message : (lastError?.message ?? "Network error"),
          0,
        );
      }
    }

    throw new ReferralRewardsError(
      "NETWORK_ERROR",
      lastError?.message ?? "Request failed after all retries",
      0,
    );
  }

  private backoff(attempt: number): number {
    return Math.min(this.retryDelay * Math.pow(2, attempt), MAX_BACKOFF_MS);
  }

  /**
   * Fetch with a timeout using AbortController.
   */
  private async fetchWithTimeout(url: string, init: RequestInit): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      return await this.fetchFn(url, {
        ...init,
        signal: controller.signal,
      });
    } catch (error) {
      if (error instanceof Error && error.name === "AbortError") {
        throw new ReferralRewardsError(
          "TIMEOUT",
          `Request timed out after ${this.timeout}ms`,
          0,
        );
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

/**
 * Unwrap the `{ data }` envelope; bodies without one are returned as-is.
 */
function unwrapData<T>(body: unknown): T {
  const payload = isRecord(body) && "data" in body ? body["data"] : body;
  return payload as T;
}
