/**
 * @matchpool/sdk — HTTP Client.
 *
 * Wraps native fetch() with:
 * - X-Sender and Idempotency-Key headers
 * - Request ID generation
 * - Timeout handling
 * - Retry logic (exponential backoff for 5xx and network errors)
 * - Error normalization
 *
 * Uses native fetch; a custom fetch function can be injected for tests.
 */

import type { MatchpoolClientConfig, MatchpoolResponse, RequestOptions } from "./types.js";
import { MatchpoolError } from "./types.js";

// =============================================================================
// Internal Helpers
// =============================================================================

function generateRequestId(): string {
  return `sdk-${Date.now().toString(36)}-${Math.random().toString(36).slice(2, 8)}`;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function backoff(attempt: number): number {
  return Math.min(1000 * Math.pow(2, attempt), 10000);
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

interface ErrorFields {
  readonly code: string | undefined;
  readonly message: string | undefined;
  readonly details: unknown;
}

/**
 * Pull `{ error: { code, message, details } }` out of a body, tolerating
 * anything else.
 */
function readErrorFields(body: unknown): ErrorFields {
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

function extractHeaders(response: Response): Record<string, string> {
  const result: Record<string, string> = {};
  const interestingHeaders = ["content-type", "x-request-id", "x-idempotent-replay"];

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
 * Low-level HTTP client for the node API.
 */
export class HttpClient {
  private readonly baseUrl: string;
  private readonly sender: string | undefined;
  private readonly timeout: number;
  private readonly maxRetries: number;
  private readonly fetchFn: typeof fetch;

  constructor(config: MatchpoolClientConfig) {
    // Strip trailing slash
    this.baseUrl = config.baseUrl.replace(/\/+$/, "");
    this.sender = config.sender;
    this.timeout = config.timeout ?? 30000;
    this.maxRetries = config.retries ?? 3;
    this.fetchFn = config.fetchFn ?? globalThis.fetch;
  }

  async get<T>(path: string): Promise<MatchpoolResponse<T>> {
    return this.request<T>("GET", path, undefined, {});
  }

  async post<T>(path: string, body: unknown, options: RequestOptions = {}): Promise<MatchpoolResponse<T>> {
    return this.request<T>("POST", path, body, options);
  }

  /**
   * Core request method with retry logic.
   */
  private async request<T>(
    method: string,
    path: string,
    body: unknown,
    options: RequestOptions,
  ): Promise<MatchpoolResponse<T>> {
    const url = `${this.baseUrl}${path}`;

    const headers: Record<string, string> = {
      "Content-Type": "application/json",
      "Accept": "application/json",
      "X-Request-Id": generateRequestId(),
    };
    if (this.sender !== undefined) {
      headers["X-Sender"] = this.sender;
    }
    if (options.idempotencyKey !== undefined) {
      headers["Idempotency-Key"] = options.idempotencyKey;
    }

    const init: RequestInit = { method, headers };
    if (body !== undefined) {
      init.body = JSON.stringify(body);
    }

    const retries = method === "GET" || options.idempotencyKey !== undefined ? this.maxRetries : 0;
    let lastError: Error | undefined;

    for (let attempt = 0; attempt <= retries; attempt++) {
      try {
        const response = await this.fetchWithTimeout(url, init);
        const responseBody = await parseResponseBody(response);
        const responseHeaders = extractHeaders(response);

        // 2xx → success
        if (response.ok) {
          const data = isRecord(responseBody) && "data" in responseBody ? responseBody["data"] : responseBody;
          return {
            data: data as T,
            status: response.status,
            headers: responseHeaders,
          };
        }

        const error = readErrorFields(responseBody);

        // 4xx → don't retry (client errors)
        if (response.status < 500) {
          throw new MatchpoolError(
            error.code ?? "CLIENT_ERROR",
            error.message ?? `HTTP ${String(response.status)}`,
            response.status,
            error.details,
          );
        }

        // 5xx → retry with backoff
        if (attempt < retries) {
          lastError = new MatchpoolError("SERVER_ERROR", `HTTP ${String(response.status)}`, response.status);
          await sleep(backoff(attempt));
          continue;
        }

        throw new MatchpoolError(
          error.code ?? "SERVER_ERROR",
          error.message ?? `HTTP ${String(response.status)} after ${String(attempt + 1)} attempts`,
          response.status,
        );
      } catch (err) {
        if (err instanceof MatchpoolError) {
          throw err;
        }

        // Network errors → retry
        if (attempt < retries) {
          lastError = err instanceof Error ? err : new Error(String(err));
          await sleep(backoff(attempt));
          continue;
        }

        throw new MatchpoolError(
          "NETWORK_ERROR",
          err instanceof Error ? err.message : String(err),
          0,
        );
      }
    }

    throw new MatchpoolError(
      "NETWORK_ERROR",
      lastError?.message ?? "Request failed after all retries",
      0,
    );
  }

  /**
   * Fetch with a timeout using AbortController.
   */
  private async fetchWithTimeout(url: string, init: RequestInit): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      return await this.fetchFn(url, { ...init, signal: controller.signal });
    } catch (err) {
      if (err instanceof Error && err.name === "AbortError") {
        throw new MatchpoolError(
          "TIMEOUT",
          `Request timed out after ${String(this.timeout)}ms`,
          0,
        );
      }
      throw err;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
