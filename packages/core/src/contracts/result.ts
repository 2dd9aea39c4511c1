export type LeaseErrorKind =
  | "NotFound"
  | "NotAssigned"
  | "PoolExhausted"
  | "StoreUnavailable"
  | "Internal";

export type LeaseFailure = {
  ok: false;
  kind: LeaseErrorKind;
  message: string;
};

export type LeaseSuccess<T> = {
  ok: true;
  value: T;
};

export type LeaseResult<T> = LeaseSuccess<T> | LeaseFailure;

export function success<T>(value: T): LeaseSuccess<T> {
  return { ok: true, value };
}

export function failure(kind: LeaseErrorKind, message: string): LeaseFailure {
  return { ok: false, kind, message };
}
