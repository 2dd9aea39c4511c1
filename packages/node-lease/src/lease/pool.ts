import { randomUUID } from "node:crypto";
import { failure, success, type LeaseResult } from "@leasepool/core";
import type { LeaseConfig } from "../config";
import { describeError, StoreUnavailableError } from "../errors";
import { silentLogger, type Logger } from "../logger";
import type { LeaseStore } from "../store/store";
import {
  ASSIGNED_SET,
  REGISTRY_SET,
  UNASSIGNED_SET,
  tokenIdFromMember,
  tokenKeys,
  type TokenKeys,
} from "./keys";

export const TIMER_MARKER = "active";

const DEFAULT_MAX_GENERATE_ATTEMPTS = 5;

export type KeepAliveOutcome = {
  promoted: boolean;
};

export type UnblockOutcome = {
  availableForSeconds: number;
};

export interface LeasePoolOptions {
  store: LeaseStore;
  config: LeaseConfig;
  logger?: Logger;
  idFactory?: () => string;
  maxGenerateAttempts?: number;
}

/**
 * Caller-driven token state transitions. Every operation is a short sequence
 * of store calls; only popMember, extendTtl and raiseTtl are atomic, so a
 * concurrent expiry can interleave between steps.
 */
export class LeasePool {
  private readonly store: LeaseStore;
  private readonly config: LeaseConfig;
  private readonly logger: Logger;
  private readonly idFactory: () => string;
  private readonly maxGenerateAttempts: number;

  constructor(options: LeasePoolOptions) {
    this.store = options.store;
    this.config = options.config;
    this.logger = options.logger ?? silentLogger;
    this.idFactory = options.idFactory ?? (() => randomUUID());
    this.maxGenerateAttempts = Math.max(1, options.maxGenerateAttempts ?? DEFAULT_MAX_GENERATE_ATTEMPTS);
  }

  generateToken(): Promise<LeaseResult<string>> {
    return this.guard("generate", async () => {
      const expiry = this.config.tokenExpirySeconds;

      for (let attempt = 1; attempt <= this.maxGenerateAttempts; attempt += 1) {
        const tokenId = this.idFactory();
        const keys = tokenKeys(tokenId);

        if (await this.store.isMember(REGISTRY_SET, keys.member)) {
          this.logger.warn(`Token ${tokenId} already exists, generating another (attempt ${attempt})`);
          continue;
        }

        await this.store.addMember(UNASSIGNED_SET, keys.member);
        await this.store.addMember(REGISTRY_SET, keys.member);
        await this.store.setWithTtl(keys.availabilityTimer, TIMER_MARKER, expiry);
        await this.store.setWithTtl(keys.leaseTimer, TIMER_MARKER, expiry);

        this.logger.info(`Token ${tokenId} generated with expiry ${expiry}s`);
        return success(tokenId);
      }

      return failure(
        "Internal",
        `Could not generate a unique token after ${this.maxGenerateAttempts} attempts.`
      );
    });
  }

  assignToken(): Promise<LeaseResult<string>> {
    return this.guard("assign", async () => {
      const member = await this.store.popMember(UNASSIGNED_SET);
      if (member === null) {
        this.logger.warn("No available tokens");
        return failure("PoolExhausted", "No available tokens.");
      }

      const tokenId = tokenIdFromMember(member);
      if (!tokenId) {
        return failure("Internal", `Unassigned set held a malformed member: ${member}`);
      }

      await this.grantLease(tokenId, tokenKeys(tokenId));
      return success(tokenId);
    });
  }

  keepAlive(tokenId: string): Promise<LeaseResult<KeepAliveOutcome>> {
    return this.guard("keep-alive", async () => {
      const keys = tokenKeys(tokenId);
      const increment = this.config.keepAliveIntervalSeconds;

      if (!(await this.store.isMember(REGISTRY_SET, keys.member))) {
        return failure("NotFound", "No such token found.");
      }

      let promoted = false;
      if (await this.store.isMember(ASSIGNED_SET, keys.member)) {
        await this.extendAssignment(tokenId, keys);
      } else if ((await this.store.removeMember(UNASSIGNED_SET, keys.member)) === 1) {
        await this.grantLease(tokenId, keys);
        promoted = true;
      } else if (await this.store.isMember(ASSIGNED_SET, keys.member)) {
        // A concurrent assign popped it between the two checks.
        await this.extendAssignment(tokenId, keys);
      } else {
        this.logger.warn(`Token ${tokenId} is in neither set, extending its lease timer only`);
      }

      const lease = await this.store.extendTtl(keys.leaseTimer, increment);
      if (lease.state === "expiring") {
        this.logger.info(`Token ${tokenId} lease ttl extended to ${lease.seconds}s`);
      } else {
        this.logger.warn(`Token ${tokenId} lease timer is ${lease.state}, nothing to extend`);
      }

      return success({ promoted });
    });
  }

  unblockToken(tokenId: string): Promise<LeaseResult<UnblockOutcome>> {
    return this.guard("unblock", async () => {
      const keys = tokenKeys(tokenId);

      if (!(await this.store.isMember(REGISTRY_SET, keys.member))) {
        return failure("NotFound", "No such token present.");
      }
      if (!(await this.store.isMember(ASSIGNED_SET, keys.member))) {
        return failure("NotAssigned", "This token is not assigned and hence cannot be unblocked.");
      }

      const lease = await this.store.ttl(keys.leaseTimer);
      if (lease.state === "missing" || (lease.state === "expiring" && lease.seconds <= 0)) {
        await this.purge(keys);
        this.logger.info(`Token ${tokenId} expired while being unblocked and was removed`);
        return failure("NotFound", "Token has expired.");
      }

      const idleSeconds = lease.state === "expiring" ? lease.seconds : this.config.tokenExpirySeconds;

      await this.store.removeMember(ASSIGNED_SET, keys.member);
      await this.store.deleteKey(keys.assignmentTimer);
      await this.store.addMember(UNASSIGNED_SET, keys.member);
      await this.store.setWithTtl(keys.availabilityTimer, TIMER_MARKER, idleSeconds);

      this.logger.info(`Token ${tokenId} unblocked with ttl ${idleSeconds}s`);
      return success({ availableForSeconds: idleSeconds });
    });
  }

  deleteToken(tokenId: string): Promise<LeaseResult<void>> {
    return this.guard("delete", async () => {
      const keys = tokenKeys(tokenId);

      if (!(await this.store.isMember(REGISTRY_SET, keys.member))) {
        return failure("NotFound", "No such token in system.");
      }

      await this.purge(keys);
      this.logger.info(`Token ${tokenId} deleted`);
      return success(undefined);
    });
  }

  private async grantLease(tokenId: string, keys: TokenKeys): Promise<void> {
    const active = this.config.activeExpirySeconds;

    await this.store.addMember(ASSIGNED_SET, keys.member);
    await this.store.setWithTtl(keys.assignmentTimer, TIMER_MARKER, active);
    await this.store.deleteKey(keys.availabilityTimer);

    const lease = await this.store.raiseTtl(keys.leaseTimer, active);
    if (lease.state === "missing") {
      this.logger.warn(`Token ${tokenId} lease timer vanished during assignment`);
    }

    this.logger.info(`Token ${tokenId} assigned for ${active}s`);
  }

  private async extendAssignment(tokenId: string, keys: TokenKeys): Promise<void> {
    const assignment = await this.store.extendTtl(keys.assignmentTimer, this.config.keepAliveIntervalSeconds);
    if (assignment.state === "expiring") {
      this.logger.info(`Token ${tokenId} assigned ttl extended to ${assignment.seconds}s`);
    } else {
      this.logger.warn(`Token ${tokenId} assignment timer is ${assignment.state}, nothing to extend`);
    }
  }

  private async purge(keys: TokenKeys): Promise<void> {
    await this.store.removeMember(UNASSIGNED_SET, keys.member);
    await this.store.removeMember(ASSIGNED_SET, keys.member);
    await this.store.removeMember(REGISTRY_SET, keys.member);
    await this.store.deleteKey(keys.assignmentTimer);
    await this.store.deleteKey(keys.availabilityTimer);
    await this.store.deleteKey(keys.leaseTimer);
  }

  private async guard<T>(
    operation: string,
    run: () => Promise<LeaseResult<T>>
  ): Promise<LeaseResult<T>> {
    try {
      return await run();
    } catch (err) {
      this.logger.error(`Error in ${operation}: ${describeError(err)}`);
      if (err instanceof StoreUnavailableError) {
        return failure("StoreUnavailable", err.message);
      }
      return failure("Internal", `Token ${operation} failed.`);
    }
  }
}
