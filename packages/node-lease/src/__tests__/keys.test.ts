import { describe, expect, it } from "vitest";
import { parseExpiredKey, tokenIdFromMember, tokenKeys } from "../lease/keys";
import { expiredChannel } from "../store/redisStore";
import { toTtlLookup } from "../store/store";

describe("token key layout", () => {
  it("derives every store key from the token id", () => {
    expect(tokenKeys("t1")).toEqual({
      member: "token:t1",
      leaseTimer: "token:t1:tokens",
      assignmentTimer: "token:t1:assigned",
      availabilityTimer: "token:t1:unassigned",
    });
  });

  it("recovers the token id from a set member", () => {
    expect(tokenIdFromMember("token:t1")).toBe("t1");
    expect(tokenIdFromMember("session:t1")).toBeNull();
    expect(tokenIdFromMember("token:t1:tokens")).toBeNull();
  });

  it("classifies expired timer keys", () => {
    expect(parseExpiredKey("token:t1:tokens")).toEqual({ timer: "lease", tokenId: "t1" });
    expect(parseExpiredKey("token:t1:assigned")).toEqual({ timer: "assignment", tokenId: "t1" });
    expect(parseExpiredKey("token:t1:unassigned")).toEqual({ timer: "availability", tokenId: "t1" });
    expect(parseExpiredKey("cache:t1:assigned")).toBeNull();
    expect(parseExpiredKey("token:t1")).toBeNull();
  });
});

describe("redis reply helpers", () => {
  it("maps TTL replies to lookups", () => {
    expect(toTtlLookup(-2)).toEqual({ state: "missing" });
    expect(toTtlLookup(-1)).toEqual({ state: "persistent" });
    expect(toTtlLookup(42)).toEqual({ state: "expiring", seconds: 42 });
  });

  it("names the expired keyevent channel of a database", () => {
    expect(expiredChannel(0)).toBe("__keyevent@0__:expired");
    expect(expiredChannel(3)).toBe("__keyevent@3__:expired");
  });
});
