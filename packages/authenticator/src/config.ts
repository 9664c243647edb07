import { z } from "zod";

import {
  ConfigurationError,
  type Clock,
  type Login,
  type LoginStorePort,
  type SessionStorePort,
} from "@relogin/contracts";
import { resolveLoginTableName, type PgTransactionPool, type QueryExecutor } from "@relogin/login-postgres";
import type { ReloginLogger } from "@relogin/telemetry";

export const DEFAULT_AUTH_COOKIE = "remember_me";
/** Ninety days. */
export const DEFAULT_COOKIE_MAX_AGE_SECONDS = 7_776_000;
/** One day. */
export const DEFAULT_CLEANER_PERIOD_SECONDS = 86_400;
export const DEFAULT_STORE_TIMEOUT_MS = 5_000;

export type LoginStoreOptions =
  | {
      readonly backend: "memory";
      /** Stores configured with the same name share one index. */
      readonly processName: string;
      readonly initialLogins?: ReadonlyArray<Login>;
    }
  | {
      readonly backend: "postgres";
      readonly table: string;
      readonly pool?: PgTransactionPool;
      readonly executor?: QueryExecutor;
    }
  | {
      readonly backend: "custom";
      readonly store: LoginStorePort;
    };

export interface SessionKeys {
  /** Session entry holding the authenticated flag. */
  readonly authenticated: string;
  /** Session entry holding the signed-in principal. */
  readonly currentUser: string;
  /** Field of the principal that holds its username. */
  readonly username: string;
}

export interface RememberMeOptions {
  readonly store?: LoginStoreOptions;
  readonly sessionStore?: SessionStorePort;
  readonly sessionCookie?: string;
  readonly authCookie?: string;
  readonly cookieMaxAge?: number;
  readonly cleanerPeriod?: number;
  readonly storeTimeoutMs?: number;
  readonly sessionKeys?: Partial<SessionKeys>;
  readonly clock?: Clock;
  readonly logger?: ReloginLogger;
}

export interface RememberMeConfig {
  readonly store: LoginStoreOptions;
  readonly sessionStore: SessionStorePort;
  readonly sessionCookie: string;
  readonly authCookie: string;
  readonly cookieMaxAge: number;
  readonly cleanerPeriod: number;
  readonly storeTimeoutMs: number;
  readonly sessionKeys: SessionKeys;
  readonly clock?: Clock;
  readonly logger?: ReloginLogger;
}

const settingsSchema = z.object({
  authCookie: z.string().min(1).default(DEFAULT_AUTH_COOKIE),
  cookieMaxAge: z.number().int().positive().default(DEFAULT_COOKIE_MAX_AGE_SECONDS),
  cleanerPeriod: z.number().positive().finite().default(DEFAULT_CLEANER_PERIOD_SECONDS),
  storeTimeoutMs: z.number().int().positive().default(DEFAULT_STORE_TIMEOUT_MS),
  sessionKeys: z
    .object({
      authenticated: z.string().min(1).default("authenticated"),
      currentUser: z.string().min(1).default("current_user"),
      username: z.string().min(1).default("username"),
    })
    .default({}),
});

const validateStore = (store: LoginStoreOptions | undefined): LoginStoreOptions => {
  if (!store) {
    throw new ConfigurationError("no_store");
  }

  switch (store.backend) {
    case "memory":
      if (!store.processName) {
        throw new ConfigurationError("no_process_name");
      }
      return store;
    case "postgres":
      if (!store.table) {
        throw new ConfigurationError("no_table");
      }
      resolveLoginTableName(store.table);
      if (!store.pool && !store.executor) {
        throw new ConfigurationError("no_postgres_handle");
      }
      return store;
    case "custom":
      if (!store.store) {
        throw new ConfigurationError("no_store");
      }
      return store;
    default: {
      const unsupported: never = store;
      throw new ConfigurationError("unknown_store", { store: unsupported });
    }
  }
};

/**
 * Validates the options once and fills in defaults. Throws
 * {@link ConfigurationError} on the first problem found.
 */
export const resolveConfig = (options: RememberMeOptions): RememberMeConfig => {
  const store = validateStore(options.store);
  if (!options.sessionStore) {
    throw new ConfigurationError("no_session_store");
  }
  if (!options.sessionCookie) {
    throw new ConfigurationError("no_session_cookie");
  }

  const parsed = settingsSchema.safeParse({
    authCookie: options.authCookie,
    cookieMaxAge: options.cookieMaxAge,
    cleanerPeriod: options.cleanerPeriod,
    storeTimeoutMs: options.storeTimeoutMs,
    sessionKeys: options.sessionKeys,
  });
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    if (parsed.error.issues.some((issue) => issue.path[0] === "cleanerPeriod")) {
      throw new ConfigurationError("bad_cleaner_period", { issues });
    }
    throw new ConfigurationError("invalid_option", { issues });
  }

  return {
    store,
    sessionStore: options.sessionStore,
    sessionCookie: options.sessionCookie,
    ...parsed.data,
    clock: options.clock,
    logger: options.logger,
  };
};
