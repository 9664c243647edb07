import type { Clock, LoginStorePort } from "@relogin/contracts";
import { defaultMemoryLoginStoreRegistry, type MemoryLoginStoreRegistry } from "@relogin/login-memory";
import { createPostgresLoginStore, type PostgresTelemetryOptions } from "@relogin/login-postgres";

import type { LoginStoreOptions } from "./config.js";

export interface LoginStoreFactoryOptions {
  readonly clock?: Clock;
  readonly registry?: MemoryLoginStoreRegistry;
  readonly telemetry?: PostgresTelemetryOptions;
}

/** Builds the backend named by already-validated store options. */
export const createLoginStore = (
  options: LoginStoreOptions,
  factoryOptions: LoginStoreFactoryOptions = {},
): LoginStorePort => {
  switch (options.backend) {
    case "memory":
      return (factoryOptions.registry ?? defaultMemoryLoginStoreRegistry).resolve(options.processName, {
        clock: factoryOptions.clock,
        initialLogins: options.initialLogins,
      });
    case "postgres":
      return createPostgresLoginStore({
        pool: options.pool,
        executor: options.executor,
        table: options.table,
        clock: factoryOptions.clock,
        telemetry: factoryOptions.telemetry,
      });
    case "custom":
      return options.store;
  }
};
