export type TokenErrorCode =
  | "INVALID_REQUEST"
  | "TOKEN_NOT_FOUND"
  | "TOKEN_NOT_ASSIGNED"
  | "POOL_EXHAUSTED"
  | "STORE_UNAVAILABLE"
  | "INTERNAL";

export type TokenError = {
  code: TokenErrorCode;
  message: string;
  details?: unknown;
};

export type TokenErrorResponse = {
  error: TokenError;
};

export type TokenRequest = {
  token: string;
};

export type GenerateTokenResponse = {
  ok: true;
  message: string;
};

export type AcquireTokenResponse = {
  token: string;
};

export type TokenAckResponse = {
  ok: true;
  token: string;
};

export type HealthResponse = {
  ok: boolean;
};
