import { afterEach, describe, expect, it, vi } from "vitest";

import { LoginStoreTimeoutError, type LoginStorePort } from "@relogin/contracts";
import { MemoryLoginStore } from "@relogin/login-memory";

import { withStoreTimeout } from "../src/index.js";

const never = <T>(): Promise<T> => new Promise<T>(() => undefined);

const stalledStore: LoginStorePort = {
  listUserLogins: () => never(),
  get: () => never(),
  put: () => never(),
  replace: () => never(),
  delete: () => never(),
  cleanOldLogins: () => never(),
};

describe("withStoreTimeout", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("rejects a call that does not settle in time", async () => {
    vi.useFakeTimers();
    const store = withStoreTimeout(stalledStore, 50);

    const pending = expect(store.get("alice", "serial01")).rejects.toMatchObject({
      code: "login_store.timeout",
      operation: "get",
      timeoutMs: 50,
    });
    await vi.advanceTimersByTimeAsync(50);

    await pending;
  });

  it("passes results and failures through", async () => {
    const inner = new MemoryLoginStore();
    const store = withStoreTimeout(inner, 1_000);

    await store.put({
      username: "alice",
      serial: "serial01",
      token: "tokenAAA",
      sid: "sid-a",
      createdAt: "2026-03-01T12:00:00.000Z",
      lastLogin: "2026-03-01T12:00:00.000Z",
      lastIp: "",
      lastUserAgent: "",
    });

    expect((await store.get("alice", "serial01"))?.token).toBe("tokenAAA");
    await expect(
      withStoreTimeout({ ...stalledStore, get: () => Promise.reject(new Error("offline")) }, 1_000).get("a", "b"),
    ).rejects.toThrow("offline");
  });

  it("uses a dedicated error type", async () => {
    vi.useFakeTimers();
    const pending = expect(withStoreTimeout(stalledStore, 10).cleanOldLogins(60)).rejects.toBeInstanceOf(
      LoginStoreTimeoutError,
    );
    await vi.advanceTimersByTimeAsync(10);

    await pending;
  });
});
