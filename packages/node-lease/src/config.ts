const DEFAULT_TOKEN_EXPIRY_SECONDS = 300;
const DEFAULT_ACTIVE_EXPIRY_SECONDS = 60;
const DEFAULT_KEEP_ALIVE_INTERVAL_SECONDS = 300;
const DEFAULT_MONITOR_BACKOFF_MS = 5000;
const DEFAULT_PORT = 8000;
const DEFAULT_REDIS_HOST = "127.0.0.1";
const DEFAULT_REDIS_PORT = 6379;

export type Env = Record<string, string | undefined>;

export type LeaseConfig = Readonly<{
  /** Initial Lease Timer and Availability Timer TTL of a fresh token. */
  tokenExpirySeconds: number;
  /** Assignment Timer TTL granted on assign. */
  activeExpirySeconds: number;
  /** Seconds added to the remaining TTL on every keep-alive. */
  keepAliveIntervalSeconds: number;
}>;

export type RedisConfig = Readonly<{
  host: string;
  port: number;
  db: number;
  configureKeyspaceEvents: boolean;
}>;

export type ServiceConfig = Readonly<{
  port: number;
  monitorBackoffMs: number;
  lease: LeaseConfig;
  redis: RedisConfig;
}>;

function readPositiveInt(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (!raw) return fallback;

  const parsed = Math.round(Number(raw));
  if (!Number.isFinite(parsed) || parsed <= 0) {
    return fallback;
  }

  return parsed;
}

function readNonNegativeInt(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (!raw) return fallback;

  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed < 0) {
    return fallback;
  }

  return parsed;
}

function readFlag(env: Env, name: string): boolean {
  const raw = env[name]?.trim().toLowerCase();
  return raw === "1" || raw === "true" || raw === "yes";
}

export function resolveLeaseConfig(env: Env = process.env): LeaseConfig {
  return Object.freeze({
    tokenExpirySeconds: readPositiveInt(env, "TOKEN_EXPIRY", DEFAULT_TOKEN_EXPIRY_SECONDS),
    activeExpirySeconds: readPositiveInt(env, "ACTIVE_EXPIRY", DEFAULT_ACTIVE_EXPIRY_SECONDS),
    keepAliveIntervalSeconds: readPositiveInt(
      env,
      "KEEP_ALIVE_INTERVAL",
      DEFAULT_KEEP_ALIVE_INTERVAL_SECONDS
    ),
  });
}

export function resolveServiceConfig(env: Env = process.env): ServiceConfig {
  const host = env.REDIS_HOST?.trim();

  return Object.freeze({
    port: readPositiveInt(env, "PORT", DEFAULT_PORT),
    monitorBackoffMs: readPositiveInt(env, "MONITOR_BACKOFF_MS", DEFAULT_MONITOR_BACKOFF_MS),
    lease: resolveLeaseConfig(env),
    redis: Object.freeze({
      host: host ? host : DEFAULT_REDIS_HOST,
      port: readPositiveInt(env, "REDIS_PORT", DEFAULT_REDIS_PORT),
      db: readNonNegativeInt(env, "REDIS_DB", 0),
      configureKeyspaceEvents: readFlag(env, "REDIS_CONFIGURE_KEYSPACE_EVENTS"),
    }),
  });
}
