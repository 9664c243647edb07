import { describe, expect, it } from "vitest";

import { ConfigurationError } from "@relogin/contracts";
import { MemoryLoginStore, MemoryLoginStoreRegistry } from "@relogin/login-memory";
import { PostgresLoginStore } from "@relogin/login-postgres";

import {
  createLoginStore,
  resolveConfig,
  type LoginStoreOptions,
  type RememberMeOptions,
} from "../src/index.js";
import { RecordingSessionStore } from "./support/fakes.js";

const sessionStore = new RecordingSessionStore();

const baseOptions: RememberMeOptions = {
  store: { backend: "memory", processName: "web" },
  sessionStore,
  sessionCookie: "_app_session",
};

const reasonOf = (build: () => unknown): string | undefined => {
  try {
    build();
  } catch (error) {
    return error instanceof ConfigurationError ? error.reason : undefined;
  }
  return undefined;
};

describe("resolveConfig", () => {
  it("fills in defaults", () => {
    const config = resolveConfig(baseOptions);

    expect(config).toMatchObject({
      sessionCookie: "_app_session",
      authCookie: "remember_me",
      cookieMaxAge: 7_776_000,
      cleanerPeriod: 86_400,
      storeTimeoutMs: 5_000,
      sessionKeys: { authenticated: "authenticated", currentUser: "current_user", username: "username" },
    });
    expect(config.sessionStore).toBe(sessionStore);
  });

  it("keeps explicit settings and merges partial session keys", () => {
    const config = resolveConfig({
      ...baseOptions,
      authCookie: "keep_me",
      cookieMaxAge: 3_600,
      storeTimeoutMs: 250,
      sessionKeys: { currentUser: "user" },
    });

    expect(config.authCookie).toBe("keep_me");
    expect(config.cookieMaxAge).toBe(3_600);
    expect(config.storeTimeoutMs).toBe(250);
    expect(config.sessionKeys).toEqual({ authenticated: "authenticated", currentUser: "user", username: "username" });
  });

  it("names the missing or invalid setting", () => {
    const unknownBackend: LoginStoreOptions = JSON.parse('{"backend":"redis"}');

    expect(reasonOf(() => resolveConfig({ ...baseOptions, store: undefined }))).toBe("no_store");
    expect(reasonOf(() => resolveConfig({ ...baseOptions, store: unknownBackend }))).toBe("unknown_store");
    expect(reasonOf(() => resolveConfig({ ...baseOptions, store: { backend: "memory", processName: "" } }))).toBe(
      "no_process_name",
    );
    expect(
      reasonOf(() => resolveConfig({ ...baseOptions, store: { backend: "postgres", table: "", executor: undefined } })),
    ).toBe("no_table");
    expect(reasonOf(() => resolveConfig({ ...baseOptions, store: { backend: "postgres", table: "logins" } }))).toBe(
      "no_postgres_handle",
    );
    expect(reasonOf(() => resolveConfig({ ...baseOptions, store: { backend: "postgres", table: "bad-name" } }))).toBe(
      "invalid_table_name",
    );
    expect(reasonOf(() => resolveConfig({ ...baseOptions, sessionStore: undefined }))).toBe("no_session_store");
    expect(reasonOf(() => resolveConfig({ ...baseOptions, sessionCookie: "" }))).toBe("no_session_cookie");
    expect(reasonOf(() => resolveConfig({ ...baseOptions, cleanerPeriod: 0 }))).toBe("bad_cleaner_period");
    expect(reasonOf(() => resolveConfig({ ...baseOptions, cookieMaxAge: -1 }))).toBe("invalid_option");
  });

  it("reports option issues in the error details", () => {
    try {
      resolveConfig({ ...baseOptions, storeTimeoutMs: 1.5 });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error).toMatchObject({ code: "config.invalid_option" });
      expect(JSON.stringify(error instanceof ConfigurationError ? error.details : undefined)).toContain(
        "storeTimeoutMs",
      );
    }
  });
});

describe("createLoginStore", () => {
  it("shares one memory store per process name", () => {
    const registry = new MemoryLoginStoreRegistry();

    const first = createLoginStore({ backend: "memory", processName: "web" }, { registry });
    const second = createLoginStore({ backend: "memory", processName: "web" }, { registry });
    const other = createLoginStore({ backend: "memory", processName: "admin" }, { registry });

    expect(first).toBeInstanceOf(MemoryLoginStore);
    expect(second).toBe(first);
    expect(other).not.toBe(first);
  });

  it("builds a postgres store on the configured table", () => {
    const store = createLoginStore({
      backend: "postgres",
      table: "web_logins",
      executor: { query: async () => ({ rows: [] }) },
    });

    expect(store).toBeInstanceOf(PostgresLoginStore);
    expect(store instanceof PostgresLoginStore ? store.table : undefined).toBe("web_logins");
  });

  it("passes a custom store through", () => {
    const custom = new MemoryLoginStore();

    expect(createLoginStore({ backend: "custom", store: custom })).toBe(custom);
  });
});
