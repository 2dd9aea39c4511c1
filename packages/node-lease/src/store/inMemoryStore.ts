import { StoreUnavailableError } from "../errors";
import { ExpiryQueue } from "./expiryQueue";
import type { ExpirySubscription, LeaseStore, TtlLookup } from "./store";

type ValueRecord = {
  value: string;
  expiresAtMs: number | null;
};

export interface InMemoryLeaseStoreOptions {
  nowFn?: () => number;
}

/**
 * Deterministic LeaseStore for tests and local runs. Keys expire lazily on
 * access and eagerly on `flushExpired()`; both paths notify subscribers the
 * way Redis keyspace notifications do.
 */
export class InMemoryLeaseStore implements LeaseStore {
  private readonly sets = new Map<string, Set<string>>();
  private readonly values = new Map<string, ValueRecord>();
  private readonly subscribers = new Set<ExpiryQueue>();
  private readonly nowFn: () => number;

  constructor(options: InMemoryLeaseStoreOptions = {}) {
    this.nowFn = options.nowFn ?? (() => Date.now());
  }

  get subscriberCount(): number {
    return this.subscribers.size;
  }

  async addMember(set: string, member: string): Promise<number> {
    const members = this.sets.get(set) ?? new Set<string>();
    this.sets.set(set, members);
    if (members.has(member)) return 0;
    members.add(member);
    return 1;
  }

  async removeMember(set: string, member: string): Promise<number> {
    const members = this.sets.get(set);
    if (!members || !members.has(member)) return 0;
    members.delete(member);
    if (members.size === 0) this.sets.delete(set);
    return 1;
  }

  async isMember(set: string, member: string): Promise<boolean> {
    return this.sets.get(set)?.has(member) ?? false;
  }

  async popMember(set: string): Promise<string | null> {
    const members = this.sets.get(set);
    if (!members) return null;

    const [first] = members;
    if (first === undefined) return null;

    await this.removeMember(set, first);
    return first;
  }

  async setWithTtl(key: string, value: string, ttlSeconds: number): Promise<void> {
    if (!Number.isInteger(ttlSeconds) || ttlSeconds <= 0) {
      throw new Error(`invalid expire time in 'set' command: ${ttlSeconds}`);
    }

    this.values.set(key, { value, expiresAtMs: this.nowFn() + ttlSeconds * 1000 });
  }

  async deleteKey(key: string): Promise<number> {
    const record = this.live(key);
    if (!record) return 0;
    this.values.delete(key);
    return 1;
  }

  async ttl(key: string): Promise<TtlLookup> {
    const record = this.live(key);
    return this.lookup(record);
  }

  async expire(key: string, ttlSeconds: number): Promise<boolean> {
    const record = this.live(key);
    if (!record) return false;

    if (ttlSeconds <= 0) {
      this.values.delete(key);
      return true;
    }

    record.expiresAtMs = this.nowFn() + ttlSeconds * 1000;
    return true;
  }

  async extendTtl(key: string, bySeconds: number): Promise<TtlLookup> {
    const current = await this.ttl(key);
    if (current.state !== "expiring") return current;

    await this.expire(key, current.seconds + bySeconds);
    return this.ttl(key);
  }

  async raiseTtl(key: string, minSeconds: number): Promise<TtlLookup> {
    const current = await this.ttl(key);
    if (current.state !== "expiring" || current.seconds >= minSeconds) return current;

    await this.expire(key, minSeconds);
    return this.ttl(key);
  }

  async subscribeExpirations(): Promise<ExpirySubscription> {
    const queue: ExpiryQueue = new ExpiryQueue(async () => {
      this.subscribers.delete(queue);
    });
    this.subscribers.add(queue);
    return queue;
  }

  /** Expires every key whose deadline has passed, oldest first. */
  flushExpired(): string[] {
    const nowMs = this.nowFn();
    const due = Array.from(this.values.entries())
      .filter(([, record]) => record.expiresAtMs !== null && record.expiresAtMs <= nowMs)
      .sort(([, a], [, b]) => (a.expiresAtMs ?? 0) - (b.expiresAtMs ?? 0))
      .map(([key]) => key);

    for (const key of due) {
      this.expireNow(key);
    }

    return due;
  }

  /** Severs every live subscription as a dropped connection would. */
  dropSubscriptions(): void {
    for (const queue of Array.from(this.subscribers)) {
      this.subscribers.delete(queue);
      queue.fail(new StoreUnavailableError("Connection to store lost."));
    }
  }

  async members(set: string): Promise<string[]> {
    return Array.from(this.sets.get(set) ?? []);
  }

  async get(key: string): Promise<string | null> {
    return this.live(key)?.value ?? null;
  }

  private live(key: string): ValueRecord | null {
    const record = this.values.get(key);
    if (!record) return null;

    if (record.expiresAtMs !== null && record.expiresAtMs <= this.nowFn()) {
      this.expireNow(key);
      return null;
    }

    return record;
  }

  private lookup(record: ValueRecord | null): TtlLookup {
    if (!record) return { state: "missing" };
    if (record.expiresAtMs === null) return { state: "persistent" };

    const seconds = Math.round((record.expiresAtMs - this.nowFn()) / 1000);
    return { state: "expiring", seconds };
  }

  private expireNow(key: string): void {
    this.values.delete(key);
    for (const queue of this.subscribers) {
      queue.push(key);
    }
  }
}
