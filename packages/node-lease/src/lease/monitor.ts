import { setTimeout as sleep } from "node:timers/promises";
import { describeError, StoreUnavailableError } from "../errors";
import { silentLogger, type Logger } from "../logger";
import type { ExpirySubscription, LeaseStore } from "../store/store";
import { ASSIGNED_SET, UNASSIGNED_SET, parseExpiredKey, tokenKeys } from "./keys";
import { TIMER_MARKER, type LeasePool } from "./pool";

const DEFAULT_BACKOFF_MS = 5000;

export type ExpiryOutcome =
  | "demoted"
  | "deleted"
  | "already-deleted"
  | "skipped"
  | "ignored";

export interface ExpiryMonitorOptions {
  store: LeaseStore;
  pool: LeasePool;
  logger?: Logger;
  backoffMs?: number;
}

/**
 * Turns store expiration events into token state transitions. Assignment
 * timer expiry demotes a token back to the pool; lease timer expiry deletes
 * it. Availability timer expiry needs no handler because an idle token's
 * lease timer runs out at the same moment.
 *
 * Events published while the subscription is down are not replayed.
 */
export class ExpiryMonitor {
  private readonly store: LeaseStore;
  private readonly pool: LeasePool;
  private readonly logger: Logger;
  private readonly backoffMs: number;
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;
  private restartPending = false;

  constructor(options: ExpiryMonitorOptions) {
    this.store = options.store;
    this.pool = options.pool;
    this.logger = options.logger ?? silentLogger;
    this.backoffMs = options.backoffMs ?? DEFAULT_BACKOFF_MS;
  }

  get running(): boolean {
    return this.loop !== null;
  }

  start(): void {
    if (this.loop) {
      // A stop is still draining; run again once it has finished.
      if (this.controller?.signal.aborted) this.restartPending = true;
      return;
    }

    const controller = new AbortController();
    this.controller = controller;
    this.logger.info("Starting expiry monitor");
    this.loop = this.run(controller.signal)
      .catch((err: unknown) => {
        this.logger.error(`Expiry monitor terminated: ${describeError(err)}`);
      })
      .finally(() => {
        if (this.controller === controller) {
          this.controller = null;
          this.loop = null;
        }
        if (this.restartPending) {
          this.restartPending = false;
          this.start();
        }
      });
  }

  async stop(): Promise<void> {
    const loop = this.loop;
    this.restartPending = false;
    if (!loop) return;

    this.controller?.abort();
    await loop;
    this.logger.info("Expiry monitor stopped");
  }

  async handleExpiredKey(key: string): Promise<ExpiryOutcome> {
    const expired = parseExpiredKey(key);
    if (!expired || expired.timer === "availability") return "ignored";

    if (expired.timer === "lease") {
      const result = await this.pool.deleteToken(expired.tokenId);
      if (result.ok) return "deleted";
      if (result.kind === "NotFound") {
        this.logger.info(`Token ${expired.tokenId} was already deleted`);
        return "already-deleted";
      }
      if (result.kind === "StoreUnavailable") {
        throw new StoreUnavailableError(result.message);
      }
      throw new Error(`Deleting expired token ${expired.tokenId} failed: ${result.message}`);
    }

    return this.demote(expired.tokenId);
  }

  private async demote(tokenId: string): Promise<ExpiryOutcome> {
    const keys = tokenKeys(tokenId);
    const lease = await this.store.ttl(keys.leaseTimer);

    if (lease.state !== "expiring" || lease.seconds <= 0) {
      this.logger.info(`Token ${tokenId} assignment expired with lease ${lease.state}, leaving it to lease expiry`);
      return "skipped";
    }

    await this.store.removeMember(ASSIGNED_SET, keys.member);
    await this.store.addMember(UNASSIGNED_SET, keys.member);
    await this.store.deleteKey(keys.assignmentTimer);
    await this.store.setWithTtl(keys.availabilityTimer, TIMER_MARKER, lease.seconds);

    this.logger.info(`Token ${tokenId} assignment expired, returned to pool for ${lease.seconds}s`);
    return "demoted";
  }

  private async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      let subscription: ExpirySubscription | null = null;

      try {
        subscription = await this.store.subscribeExpirations();
        this.logger.info("Monitoring expired tokens");
        await this.consume(subscription, signal);
      } catch (err) {
        if (err instanceof StoreUnavailableError) {
          this.logger.warn(`Connection to store lost, retrying in ${this.backoffMs}ms: ${err.message}`);
        } else {
          this.logger.error(`Expiry subscription failed, retrying in ${this.backoffMs}ms: ${describeError(err)}`);
        }
      } finally {
        if (subscription) await subscription.close();
      }

      if (signal.aborted) break;

      try {
        await sleep(this.backoffMs, undefined, { signal });
      } catch (err) {
        // Only an abort rejects the backoff wait.
        if (signal.aborted) break;
        throw err;
      }
    }
  }

  private async consume(subscription: ExpirySubscription, signal: AbortSignal): Promise<void> {
    for (;;) {
      const key = await subscription.next(signal);
      if (key === null) return;

      try {
        const outcome = await this.handleExpiredKey(key);
        if (outcome !== "ignored") {
          this.logger.info(`Expired key ${key} handled: ${outcome}`);
        }
      } catch (err) {
        if (err instanceof StoreUnavailableError) throw err;
        this.logger.error(`Failed to handle expired key ${key}: ${describeError(err)}`);
      }
    }
  }
}
