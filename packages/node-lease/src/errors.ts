/**
 * Raised by a LeaseStore when the backing store cannot be reached, or when an
 * expiration subscription loses its connection. Anything else a store throws
 * is treated as an internal failure.
 */
export class StoreUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StoreUnavailableError";
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
