/**
 * HTTP client for the daemon's control API.
 */

import { loadConfig, type Config } from "@channel-recorder/core";

/** Non-2xx reply from the daemon */
export class ApiError extends Error {
  readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = "ApiError";
    this.status = status;
  }
}

function replyError(status: number, body: unknown): string {
  if (typeof body === "object" && body !== null && "error" in body) {
    const { error } = body;
    if (typeof error === "string") return error;
  }
  return `HTTP ${status}`;
}

export class ApiClient {
  readonly baseUrl: string;
  private readonly token: string | null;
  private readonly timeoutMs: number;

  constructor(baseUrl: string, token: string | null = null, timeoutMs = 5000) {
    this.baseUrl = baseUrl;
    this.token = token;
    this.timeoutMs = timeoutMs;
  }

  get<T>(path: string): Promise<T> {
    return this.request<T>("GET", path);
  }

  post<T>(path: string, body?: unknown): Promise<T> {
    return this.request<T>("POST", path, body);
  }

  delete<T>(path: string, body?: unknown): Promise<T> {
    return this.request<T>("DELETE", path, body);
  }

  private async request<T>(method: string, path: string, body?: unknown): Promise<T> {
    const headers: Record<string, string> = {};
    if (this.token) headers["authorization"] = `Bearer ${this.token}`;
    if (body !== undefined) headers["content-type"] = "application/json";

    const response = await fetch(`${this.baseUrl}${path}`, {
      method,
      headers,
      body: body === undefined ? undefined : JSON.stringify(body),
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    const payload: unknown = await response.json().catch(() => null);
    if (!response.ok) {
      throw new ApiError(response.status, replyError(response.status, payload));
    }
    return payload as T;
  }
}

export function createApiClient(config: Config = loadConfig()): ApiClient {
  return new ApiClient(`http://127.0.0.1:${config.listenPort}`, config.apiToken);
}

/**
 * Message for a failed API call: the daemon's error text, or a hint
 * that it isn't running when the request never got an answer.
 */
export function describeApiFailure(error: unknown): string {
  if (error instanceof ApiError) return error.message;
  return "Failed to reach the daemon. Is it running? (channel-recorder start)";
}
