import express, { type Request, type Response } from "express";
import type {
  AcquireTokenResponse,
  GenerateTokenResponse,
  LeaseErrorKind,
  LeaseFailure,
  TokenAckResponse,
  TokenError,
  TokenErrorCode,
  TokenRequest,
} from "@leasepool/core";
import type { LeasePool } from "../lease/pool";
import { silentLogger, type Logger } from "../logger";

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;

export interface CreateTokenRouterArgs {
  pool: LeasePool;
  logger?: Logger;
}

const FAILURE_RESPONSES: Record<LeaseErrorKind, { status: number; code: TokenErrorCode }> = {
  NotFound: { status: 404, code: "TOKEN_NOT_FOUND" },
  NotAssigned: { status: 409, code: "TOKEN_NOT_ASSIGNED" },
  PoolExhausted: { status: 409, code: "POOL_EXHAUSTED" },
  StoreUnavailable: { status: 503, code: "STORE_UNAVAILABLE" },
  Internal: { status: 500, code: "INTERNAL" },
};

function sendError(
  res: Response,
  status: number,
  code: TokenErrorCode,
  message: string,
  details?: unknown
): void {
  const payload: TokenError = details === undefined ? { code, message } : { code, message, details };
  res.status(status).json({ error: payload });
}

function sendFailure(res: Response, result: LeaseFailure): void {
  const { status, code } = FAILURE_RESPONSES[result.kind];
  sendError(res, status, code, result.message);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

export function parseTokenRequest(body: unknown): TokenRequest | null {
  if (!isRecord(body)) return null;
  if (typeof body.token !== "string") return null;

  const token = body.token.trim().toLowerCase();
  if (!UUID_PATTERN.test(token)) return null;

  return { token };
}

export function createTokenRouter(args: CreateTokenRouterArgs) {
  const router = express.Router();
  const pool = args.pool;
  const logger = args.logger ?? silentLogger;

  router.post("/token/generateToken", async (_req: Request, res: Response) => {
    logger.info("Generate Token Called");

    const result = await pool.generateToken();
    if (!result.ok) {
      sendFailure(res, result);
      return;
    }

    const response: GenerateTokenResponse = {
      ok: true,
      message: "token successfully generated",
    };

    res.status(200).json(response);
  });

  router.get("/token/acquireToken", async (_req: Request, res: Response) => {
    logger.info("Acquire Token Called");

    const result = await pool.assignToken();
    if (!result.ok) {
      sendFailure(res, result);
      return;
    }

    const response: AcquireTokenResponse = { token: result.value };
    res.status(200).json(response);
  });

  router.put("/token/keepAlive", async (req: Request, res: Response) => {
    const requestBody = parseTokenRequest(req.body);
    if (!requestBody) {
      sendError(res, 400, "INVALID_REQUEST", "A token UUID is required.");
      return;
    }

    logger.info(`Keep Alive Called for ${requestBody.token}`);

    const result = await pool.keepAlive(requestBody.token);
    if (!result.ok) {
      sendFailure(res, result);
      return;
    }

    const response: TokenAckResponse = { ok: true, token: requestBody.token };
    res.status(200).json(response);
  });

  router.put("/token/unblockToken", async (req: Request, res: Response) => {
    const requestBody = parseTokenRequest(req.body);
    if (!requestBody) {
      sendError(res, 400, "INVALID_REQUEST", "A token UUID is required.");
      return;
    }

    logger.info(`Unblock Token Called for ${requestBody.token}`);

    const result = await pool.unblockToken(requestBody.token);
    if (!result.ok) {
      sendFailure(res, result);
      return;
    }

    const response: TokenAckResponse = { ok: true, token: requestBody.token };
    res.status(200).json(response);
  });

  router.delete("/token/deleteToken", async (req: Request, res: Response) => {
    const requestBody = parseTokenRequest(req.body);
    if (!requestBody) {
      sendError(res, 400, "INVALID_REQUEST", "A token UUID is required.");
      return;
    }

    logger.info(`Delete Token Called for ${requestBody.token}`);

    const result = await pool.deleteToken(requestBody.token);
    if (!result.ok) {
      sendFailure(res, result);
      return;
    }

    const response: TokenAckResponse = { ok: true, token: requestBody.token };
    res.status(200).json(response);
  });

  return router;
}
