import express, { type Request, type Response } from "express";
import cors from "cors";
import type { HealthResponse } from "@leasepool/core";
import { resolveLeaseConfig, type LeaseConfig } from "./config";
import { LeasePool } from "./lease/pool";
import { silentLogger, type Logger } from "./logger";
import { createTokenRouter } from "./routes/token";
import { InMemoryLeaseStore } from "./store/inMemoryStore";
import type { LeaseStore } from "./store/store";

export interface CreateAppOptions {
  pool?: LeasePool;
  store?: LeaseStore;
  config?: LeaseConfig;
  logger?: Logger;
  idFactory?: () => string;
}

export function createApp(options: CreateAppOptions = {}) {
  const logger = options.logger ?? silentLogger;
  const pool =
    options.pool ??
    new LeasePool({
      store: options.store ?? new InMemoryLeaseStore(),
      config: options.config ?? resolveLeaseConfig(),
      logger,
      idFactory: options.idFactory,
    });

  const app = express();
  app.use(cors());
  app.use(express.json({ limit: "16kb" }));

  app.get("/health", (_req: Request, res: Response) => {
    const response: HealthResponse = { ok: true };
    res.json(response);
  });

  app.use(createTokenRouter({ pool, logger }));

  return app;
}
