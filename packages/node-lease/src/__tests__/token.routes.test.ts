import request from "supertest";
import { describe, expect, it } from "vitest";
import type { LeaseConfig } from "../config";
import { StoreUnavailableError } from "../errors";
import { createApp } from "../server";
import { InMemoryLeaseStore } from "../store/inMemoryStore";

const NOW_BASE_MS = 1700000000000;
const TOKEN = "3f2b8c4e-9a1d-4c6b-8e7f-0a1b2c3d4e5f";
const UNKNOWN_TOKEN = "aaaaaaaa-bbbb-4ccc-8ddd-eeeeeeeeeeee";

const CONFIG: LeaseConfig = {
  tokenExpirySeconds: 300,
  activeExpirySeconds: 60,
  keepAliveIntervalSeconds: 300,
};

function createDeterministicApp(store = new InMemoryLeaseStore({ nowFn: () => NOW_BASE_MS })) {
  const app = createApp({ store, config: CONFIG, idFactory: () => TOKEN });
  return { app, store };
}

describe("token endpoints", () => {
  it("GET /health reports the service as up", async () => {
    const { app } = createDeterministicApp();

    const response = await request(app).get("/health");

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ ok: true });
  });

  it("POST /token/generateToken confirms creation without exposing the token", async () => {
    const { app, store } = createDeterministicApp();

    const response = await request(app).post("/token/generateToken");

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ ok: true, message: "token successfully generated" });
    expect(await store.members("Unassigned")).toEqual([`token:${TOKEN}`]);
  });

  it("GET /token/acquireToken returns the leased token", async () => {
    const { app } = createDeterministicApp();
    await request(app).post("/token/generateToken");

    const response = await request(app).get("/token/acquireToken");

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ token: TOKEN });
  });

  it("GET /token/acquireToken reports an exhausted pool", async () => {
    const { app } = createDeterministicApp();

    const response = await request(app).get("/token/acquireToken");

    expect(response.status).toBe(409);
    expect(response.body).toEqual({
      error: { code: "POOL_EXHAUSTED", message: "No available tokens." },
    });
  });

  it("PUT /token/keepAlive acknowledges a known token", async () => {
    const { app } = createDeterministicApp();
    await request(app).post("/token/generateToken");
    await request(app).get("/token/acquireToken");

    const response = await request(app).put("/token/keepAlive").send({ token: TOKEN });

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ ok: true, token: TOKEN });
  });

  it("PUT /token/keepAlive normalizes upper-case ids", async () => {
    const { app, store } = createDeterministicApp();
    await request(app).post("/token/generateToken");

    const response = await request(app)
      .put("/token/keepAlive")
      .send({ token: ` ${TOKEN.toUpperCase()} ` });

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ ok: true, token: TOKEN });
    expect(await store.isMember("Assigned", `token:${TOKEN}`)).toBe(true);
  });

  it("PUT /token/keepAlive rejects an unknown token", async () => {
    const { app } = createDeterministicApp();

    const response = await request(app).put("/token/keepAlive").send({ token: UNKNOWN_TOKEN });

    expect(response.status).toBe(404);
    expect(response.body).toEqual({
      error: { code: "TOKEN_NOT_FOUND", message: "No such token found." },
    });
  });

  it("PUT /token/keepAlive rejects a body without a UUID", async () => {
    const { app } = createDeterministicApp();

    const response = await request(app).put("/token/keepAlive").send({ token: "not-a-token" });

    expect(response.status).toBe(400);
    expect(response.body).toEqual({
      error: { code: "INVALID_REQUEST", message: "A token UUID is required." },
    });
  });

  it("PUT /token/unblockToken releases an assigned token", async () => {
    const { app, store } = createDeterministicApp();
    await request(app).post("/token/generateToken");
    await request(app).get("/token/acquireToken");

    const response = await request(app).put("/token/unblockToken").send({ token: TOKEN });

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ ok: true, token: TOKEN });
    expect(await store.members("Unassigned")).toEqual([`token:${TOKEN}`]);
  });

  it("PUT /token/unblockToken refuses a token that is not assigned", async () => {
    const { app } = createDeterministicApp();
    await request(app).post("/token/generateToken");

    const response = await request(app).put("/token/unblockToken").send({ token: TOKEN });

    expect(response.status).toBe(409);
    expect(response.body).toEqual({
      error: {
        code: "TOKEN_NOT_ASSIGNED",
        message: "This token is not assigned and hence cannot be unblocked.",
      },
    });
  });

  it("DELETE /token/deleteToken removes a token once", async () => {
    const { app } = createDeterministicApp();
    await request(app).post("/token/generateToken");

    const first = await request(app).delete("/token/deleteToken").send({ token: TOKEN });
    const second = await request(app).delete("/token/deleteToken").send({ token: TOKEN });

    expect(first.status).toBe(200);
    expect(first.body).toEqual({ ok: true, token: TOKEN });
    expect(second.status).toBe(404);
    expect(second.body).toEqual({
      error: { code: "TOKEN_NOT_FOUND", message: "No such token in system." },
    });
  });

  it("maps a lost store connection to 503", async () => {
    class OfflineStore extends InMemoryLeaseStore {
      override async isMember(): Promise<boolean> {
        throw new StoreUnavailableError("Redis SISMEMBER failed: connect ECONNREFUSED");
      }
    }
    const { app } = createDeterministicApp(new OfflineStore());

    const response = await request(app).delete("/token/deleteToken").send({ token: TOKEN });

    expect(response.status).toBe(503);
    expect(response.body).toEqual({
      error: {
        code: "STORE_UNAVAILABLE",
        message: "Redis SISMEMBER failed: connect ECONNREFUSED",
      },
    });
  });
});
