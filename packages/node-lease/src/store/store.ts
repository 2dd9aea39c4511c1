export type TtlLookup =
  | { state: "missing" }
  | { state: "persistent" }
  | { state: "expiring"; seconds: number };

export interface ExpirySubscription {
  /**
   * Resolves with the next expired key name, or with null once `signal` is
   * aborted. Rejects with StoreUnavailableError when the connection drops;
   * the subscription is unusable afterwards.
   */
  next(signal: AbortSignal): Promise<string | null>;
  close(): Promise<void>;
}

export interface LeaseStore {
  addMember(set: string, member: string): Promise<number>;
  removeMember(set: string, member: string): Promise<number>;
  isMember(set: string, member: string): Promise<boolean>;
  /** Removes and returns one arbitrary member; no member is handed out twice. */
  popMember(set: string): Promise<string | null>;
  setWithTtl(key: string, value: string, ttlSeconds: number): Promise<void>;
  deleteKey(key: string): Promise<number>;
  ttl(key: string): Promise<TtlLookup>;
  expire(key: string, ttlSeconds: number): Promise<boolean>;
  /** Atomically sets the TTL to remaining + `bySeconds`. Returns the new TTL. */
  extendTtl(key: string, bySeconds: number): Promise<TtlLookup>;
  /** Atomically sets the TTL to max(remaining, `minSeconds`). Returns the new TTL. */
  raiseTtl(key: string, minSeconds: number): Promise<TtlLookup>;
  subscribeExpirations(): Promise<ExpirySubscription>;
  close?(): Promise<void>;
}

export function toTtlLookup(reply: number): TtlLookup {
  if (reply === -2) return { state: "missing" };
  if (reply === -1) return { state: "persistent" };
  return { state: "expiring", seconds: reply };
}
