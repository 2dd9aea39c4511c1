import { Redis, type RedisOptions } from "ioredis";
import { describeError, StoreUnavailableError } from "../errors";
import { silentLogger, type Logger } from "../logger";
import { ExpiryQueue } from "./expiryQueue";
import { toTtlLookup, type ExpirySubscription, type LeaseStore, type TtlLookup } from "./store";

const EXTEND_TTL_SCRIPT = `
local ttl = redis.call('TTL', KEYS[1])
if ttl < 0 then return ttl end
local extended = ttl + tonumber(ARGV[1])
redis.call('EXPIRE', KEYS[1], extended)
return extended
`;

const RAISE_TTL_SCRIPT = `
local ttl = redis.call('TTL', KEYS[1])
if ttl < 0 then return ttl end
local minimum = tonumber(ARGV[1])
if ttl < minimum then
  redis.call('EXPIRE', KEYS[1], minimum)
  return minimum
end
return ttl
`;

export function expiredChannel(db: number): string {
  return `__keyevent@${db}__:expired`;
}

export interface RedisLeaseStoreOptions {
  host?: string;
  port?: number;
  db?: number;
  client?: Redis;
  logger?: Logger;
}

export class RedisLeaseStore implements LeaseStore {
  private readonly client: Redis;
  private readonly db: number;
  private readonly logger: Logger;

  constructor(options: RedisLeaseStoreOptions = {}) {
    this.db = options.db ?? 0;
    this.logger = options.logger ?? silentLogger;

    const redisOptions: RedisOptions = {
      host: options.host,
      port: options.port,
      db: this.db,
      maxRetriesPerRequest: 1,
    };

    this.client = options.client ?? new Redis(redisOptions);
    this.client.on("error", (err: unknown) => {
      this.logger.warn(`Redis connection error: ${describeError(err)}`);
    });
  }

  /** Enables `Ex` keyspace notifications, which expiration events depend on. */
  async enableKeyspaceEvents(): Promise<void> {
    await this.call("CONFIG SET", () =>
      this.client.config("SET", "notify-keyspace-events", "Ex")
    );
  }

  addMember(set: string, member: string): Promise<number> {
    return this.call("SADD", () => this.client.sadd(set, member));
  }

  removeMember(set: string, member: string): Promise<number> {
    return this.call("SREM", () => this.client.srem(set, member));
  }

  async isMember(set: string, member: string): Promise<boolean> {
    const reply = await this.call("SISMEMBER", () => this.client.sismember(set, member));
    return reply === 1;
  }

  popMember(set: string): Promise<string | null> {
    return this.call("SPOP", () => this.client.spop(set));
  }

  async setWithTtl(key: string, value: string, ttlSeconds: number): Promise<void> {
    await this.call("SET", () => this.client.set(key, value, "EX", ttlSeconds));
  }

  deleteKey(key: string): Promise<number> {
    return this.call("DEL", () => this.client.del(key));
  }

  async ttl(key: string): Promise<TtlLookup> {
    const reply = await this.call("TTL", () => this.client.ttl(key));
    return toTtlLookup(reply);
  }

  async expire(key: string, ttlSeconds: number): Promise<boolean> {
    const reply = await this.call("EXPIRE", () => this.client.expire(key, ttlSeconds));
    return reply === 1;
  }

  async extendTtl(key: string, bySeconds: number): Promise<TtlLookup> {
    const reply = await this.call("EVAL", () => this.client.eval(EXTEND_TTL_SCRIPT, 1, key, bySeconds));
    return toTtlLookup(expectInteger(reply));
  }

  async raiseTtl(key: string, minSeconds: number): Promise<TtlLookup> {
    const reply = await this.call("EVAL", () => this.client.eval(RAISE_TTL_SCRIPT, 1, key, minSeconds));
    return toTtlLookup(expectInteger(reply));
  }

  async subscribeExpirations(): Promise<ExpirySubscription> {
    const subscriber = this.client.duplicate({
      autoResubscribe: false,
      retryStrategy: () => null,
    });
    const channel = expiredChannel(this.db);
    const queue = new ExpiryQueue(async () => {
      subscriber.disconnect();
    });

    subscriber.on("message", (source: string, key: string) => {
      if (source === channel) queue.push(key);
    });
    subscriber.on("error", (err: unknown) => {
      queue.fail(new StoreUnavailableError(`Expiration subscription failed: ${describeError(err)}`, { cause: err }));
    });
    subscriber.on("end", () => {
      queue.fail(new StoreUnavailableError("Expiration subscription connection ended."));
    });

    try {
      await subscriber.subscribe(channel);
    } catch (err) {
      subscriber.disconnect();
      throw new StoreUnavailableError(`Could not subscribe to ${channel}: ${describeError(err)}`, { cause: err });
    }

    return queue;
  }

  async close(): Promise<void> {
    await this.client.quit();
  }

  private async call<T>(command: string, run: () => Promise<T>): Promise<T> {
    try {
      return await run();
    } catch (err) {
      if (isReplyError(err)) throw err;
      throw new StoreUnavailableError(`Redis ${command} failed: ${describeError(err)}`, { cause: err });
    }
  }
}

// Command-level rejections (WRONGTYPE, script errors) come back as ReplyError.
function isReplyError(err: unknown): boolean {
  return err instanceof Error && err.name === "ReplyError";
}

function expectInteger(reply: unknown): number {
  if (typeof reply !== "number" || !Number.isInteger(reply)) {
    throw new Error(`Unexpected script reply: ${String(reply)}`);
  }
  return reply;
}
