import { describe, expect, it } from "vitest";
import { resolveLeaseConfig, resolveServiceConfig } from "../config";

describe("lease configuration", () => {
  it("falls back to defaults when nothing is set", () => {
    const config = resolveLeaseConfig({});

    expect(config).toEqual({
      tokenExpirySeconds: 300,
      activeExpirySeconds: 60,
      keepAliveIntervalSeconds: 300,
    });
    expect(Object.isFrozen(config)).toBe(true);
  });

  it("ignores invalid and non-positive values", () => {
    const config = resolveLeaseConfig({
      TOKEN_EXPIRY: "600",
      ACTIVE_EXPIRY: "abc",
      KEEP_ALIVE_INTERVAL: "-5",
    });

    expect(config).toEqual({
      tokenExpirySeconds: 600,
      activeExpirySeconds: 60,
      keepAliveIntervalSeconds: 300,
    });
  });
});

describe("lease configuration rounding", () => {
  it("falls back when a fraction rounds down to zero", () => {
    const config = resolveLeaseConfig({
      TOKEN_EXPIRY: "0.4",
      ACTIVE_EXPIRY: "0.3",
      KEEP_ALIVE_INTERVAL: "90.6",
    });

    expect(config).toEqual({
      tokenExpirySeconds: 300,
      activeExpirySeconds: 60,
      keepAliveIntervalSeconds: 91,
    });
  });
});

describe("service configuration", () => {
  it("reads the store location and server settings", () => {
    const config = resolveServiceConfig({
      PORT: "9000",
      MONITOR_BACKOFF_MS: "250",
      REDIS_HOST: " redis_server ",
      REDIS_PORT: "6380",
      REDIS_DB: "2",
      REDIS_CONFIGURE_KEYSPACE_EVENTS: "true",
      ACTIVE_EXPIRY: "45",
    });

    expect(config).toEqual({
      port: 9000,
      monitorBackoffMs: 250,
      lease: {
        tokenExpirySeconds: 300,
        activeExpirySeconds: 45,
        keepAliveIntervalSeconds: 300,
      },
      redis: {
        host: "redis_server",
        port: 6380,
        db: 2,
        configureKeyspaceEvents: true,
      },
    });
  });

  it("uses local defaults for the store", () => {
    const config = resolveServiceConfig({ REDIS_DB: "x" });

    expect(config.port).toBe(8000);
    expect(config.monitorBackoffMs).toBe(5000);
    expect(config.redis).toEqual({
      host: "127.0.0.1",
      port: 6379,
      db: 0,
      configureKeyspaceEvents: false,
    });
  });
});
