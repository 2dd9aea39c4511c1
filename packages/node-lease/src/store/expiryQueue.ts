import { StoreUnavailableError } from "../errors";
import type { ExpirySubscription } from "./store";

type Waiter = {
  resolve: (key: string | null) => void;
  reject: (err: Error) => void;
  signal: AbortSignal;
  onAbort: () => void;
};

/**
 * Buffers expired key names between the store's push-style notifications and
 * the monitor's pull-style reads.
 */
export class ExpiryQueue implements ExpirySubscription {
  private readonly pending: string[] = [];
  private readonly waiters: Waiter[] = [];
  private failure: Error | null = null;
  private closed = false;

  constructor(private readonly onClose: () => Promise<void> = async () => undefined) {}

  push(key: string): void {
    if (this.closed || this.failure) return;

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.signal.removeEventListener("abort", waiter.onAbort);
      waiter.resolve(key);
      return;
    }

    this.pending.push(key);
  }

  fail(err: Error): void {
    if (this.closed || this.failure) return;
    this.failure = err;

    for (const waiter of this.waiters.splice(0)) {
      waiter.signal.removeEventListener("abort", waiter.onAbort);
      waiter.reject(err);
    }
  }

  get size(): number {
    return this.pending.length;
  }

  next(signal: AbortSignal): Promise<string | null> {
    if (signal.aborted) return Promise.resolve(null);

    const key = this.pending.shift();
    if (key !== undefined) return Promise.resolve(key);

    if (this.failure) return Promise.reject(this.failure);
    if (this.closed) {
      return Promise.reject(new StoreUnavailableError("Expiration subscription is closed."));
    }

    return new Promise<string | null>((resolve, reject) => {
      const waiter: Waiter = {
        resolve,
        reject,
        signal,
        onAbort: () => {
          const index = this.waiters.indexOf(waiter);
          if (index >= 0) this.waiters.splice(index, 1);
          resolve(null);
        },
      };

      signal.addEventListener("abort", waiter.onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.pending.length = 0;

    for (const waiter of this.waiters.splice(0)) {
      waiter.signal.removeEventListener("abort", waiter.onAbort);
      waiter.reject(new StoreUnavailableError("Expiration subscription is closed."));
    }

    await this.onClose();
  }
}
