import type {
  AcquireTokenResponse,
  GenerateTokenResponse,
  HealthResponse,
  TokenAckResponse,
  TokenErrorResponse,
} from "@leasepool/core";

export interface LeasePoolClientOptions {
  baseUrl: string; // e.g. "http://localhost:8000"
  fetchImpl?: typeof fetch;
}

export class LeasePoolRequestError extends Error {
  readonly status: number;
  readonly code: string | null;

  constructor(status: number, code: string | null, message: string) {
    super(message);
    this.name = "LeasePoolRequestError";
    this.status = status;
    this.code = code;
  }
}

function isErrorResponse(value: unknown): value is TokenErrorResponse {
  if (typeof value !== "object" || value === null || !("error" in value)) return false;
  const error = value.error;
  return typeof error === "object" && error !== null && "code" in error && "message" in error;
}

export class LeasePoolClient {
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: LeasePoolClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  async health(): Promise<HealthResponse> {
    return this.request<HealthResponse>("GET", "/health");
  }

  /** Adds a token to the pool. The new token id is not returned; acquire one instead. */
  async generateToken(): Promise<GenerateTokenResponse> {
    return this.request<GenerateTokenResponse>("POST", "/token/generateToken");
  }

  async acquireToken(): Promise<AcquireTokenResponse> {
    return this.request<AcquireTokenResponse>("GET", "/token/acquireToken");
  }

  async keepAlive(token: string): Promise<TokenAckResponse> {
    return this.request<TokenAckResponse>("PUT", "/token/keepAlive", { token });
  }

  async unblockToken(token: string): Promise<TokenAckResponse> {
    return this.request<TokenAckResponse>("PUT", "/token/unblockToken", { token });
  }

  async deleteToken(token: string): Promise<TokenAckResponse> {
    return this.request<TokenAckResponse>("DELETE", "/token/deleteToken", { token });
  }

  private async request<T>(method: string, path: string, body?: unknown): Promise<T> {
    const init: RequestInit = { method };
    if (body !== undefined) {
      init.headers = { "Content-Type": "application/json" };
      init.body = JSON.stringify(body);
    }

    const res = await this.fetchImpl(`${this.baseUrl}${path}`, init);
    const payload: unknown = await res.json().catch(() => null);

    if (!res.ok) {
      if (isErrorResponse(payload)) {
        throw new LeasePoolRequestError(res.status, payload.error.code, payload.error.message);
      }
      throw new LeasePoolRequestError(res.status, null, `Request ${method} ${path} failed: ${res.status}`);
    }

    return payload as T;
  }
}
