import {
  LoginStoreError,
  systemClock,
  type Clock,
  type Login,
  type LoginStorePort,
} from "@relogin/contracts";

import type { QueryExecutor, QueryRow } from "./executors/query-executor.js";
import { translatePostgresError } from "./errors.js";
import { resolveLoginTableName } from "./tables.js";
import { createPostgresTelemetry, type PostgresTelemetryOptions } from "./telemetry.js";
import { PostgresTransactionManager, type PgTransactionPool } from "./transactions/transaction-manager.js";

export interface PostgresLoginStoreOptions {
  /** Pooled connections; each store operation runs in its own transaction. */
  readonly pool?: PgTransactionPool;
  /** Used as-is when no pool is given. */
  readonly executor?: QueryExecutor;
  readonly table?: string;
  readonly clock?: Clock;
  readonly telemetry?: PostgresTelemetryOptions;
}

type StoreOperation = "list" | "get" | "put" | "replace" | "delete" | "clean";

const readText = (row: QueryRow, column: string, table: string): string => {
  const value = row[column];
  if (typeof value !== "string") {
    throw new LoginStoreError("invalid_table_format", table);
  }
  return value;
};

const readTimestamp = (row: QueryRow, column: string, table: string): string => {
  const value = row[column];
  const date = value instanceof Date ? value : typeof value === "string" ? new Date(value) : undefined;
  if (!date || Number.isNaN(date.getTime())) {
    throw new LoginStoreError("invalid_table_format", table);
  }
  return date.toISOString();
};

const toLogin = (row: QueryRow, table: string): Login => ({
  username: readText(row, "username", table),
  serial: readText(row, "serial", table),
  token: readText(row, "token", table),
  sid: readText(row, "sid", table),
  createdAt: readTimestamp(row, "created_at", table),
  lastLogin: readTimestamp(row, "last_login", table),
  lastIp: readText(row, "last_ip", table),
  lastUserAgent: readText(row, "last_user_agent", table),
});

const toParams = (login: Login): ReadonlyArray<unknown> => [
  login.username,
  login.serial,
  login.token,
  login.sid,
  login.createdAt,
  login.lastLogin,
  login.lastIp,
  login.lastUserAgent,
];

export class PostgresLoginStore implements LoginStorePort {
  readonly table: string;
  private readonly clock: Clock;
  private readonly transactions: PostgresTransactionManager;

  constructor(options: PostgresLoginStoreOptions) {
    this.table = resolveLoginTableName(options.table);
    this.clock = options.clock ?? systemClock;
    this.transactions = new PostgresTransactionManager({
      pool: options.pool,
      executor: options.executor,
      telemetry: createPostgresTelemetry(options.telemetry),
    });
  }

  listUserLogins(username: string): Promise<ReadonlyArray<Login>> {
    return this.run("list", async (executor) => {
      const { rows } = await executor.query(`SELECT * FROM ${this.table} WHERE username = $1`, [username]);
      return rows.map((row) => toLogin(row, this.table));
    });
  }

  get(username: string, serial: string): Promise<Login | undefined> {
    return this.run("get", async (executor) => {
      const { rows } = await executor.query(
        `SELECT * FROM ${this.table} WHERE username = $1 AND serial = $2 LIMIT 1`,
        [username, serial],
      );
      return rows.length === 0 ? undefined : toLogin(rows[0], this.table);
    });
  }

  put(login: Login): Promise<void> {
    return this.run("put", async (executor) => {
      await executor.query(
        `INSERT INTO ${this.table} (
          username,
          serial,
          token,
          sid,
          created_at,
          last_login,
          last_ip,
          last_user_agent
        ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
        ON CONFLICT (username, serial) DO UPDATE SET
          token = EXCLUDED.token,
          sid = EXCLUDED.sid,
          created_at = EXCLUDED.created_at,
          last_login = EXCLUDED.last_login,
          last_ip = EXCLUDED.last_ip,
          last_user_agent = EXCLUDED.last_user_agent`,
        toParams(login),
      );
    });
  }

  replace(current: Login, next: Login): Promise<boolean> {
    if (current.username !== next.username || current.serial !== next.serial) {
      return Promise.reject(new TypeError("replace() requires both logins to share username and serial"));
    }

    return this.run("replace", async (executor) => {
      const { rows } = await executor.query(
        `UPDATE ${this.table}
          SET token = $3,
              sid = $4,
              created_at = $5,
              last_login = $6,
              last_ip = $7,
              last_user_agent = $8
          WHERE username = $1 AND serial = $2 AND token = $9
          RETURNING username`,
        [...toParams(next), current.token],
      );
      return rows.length > 0;
    });
  }

  delete(username: string, serial: string): Promise<void> {
    return this.run("delete", async (executor) => {
      await executor.query(`DELETE FROM ${this.table} WHERE username = $1 AND serial = $2`, [username, serial]);
    });
  }

  cleanOldLogins(maxAgeSeconds: number): Promise<ReadonlyArray<Login>> {
    const cutoff = new Date(this.clock.now().getTime() - maxAgeSeconds * 1000);
    return this.run("clean", async (executor) => {
      const { rows } = await executor.query(
        `DELETE FROM ${this.table} WHERE last_login < $1::timestamptz RETURNING *`,
        [cutoff.toISOString()],
      );
      return rows.map((row) => toLogin(row, this.table));
    });
  }

  private async run<T>(operation: StoreOperation, work: (executor: QueryExecutor) => Promise<T>): Promise<T> {
    try {
      return await this.transactions.runInTransaction(operation, work);
    } catch (error) {
      throw translatePostgresError(error, this.table);
    }
  }
}

export const createPostgresLoginStore = (options: PostgresLoginStoreOptions): PostgresLoginStore =>
  new PostgresLoginStore(options);
