import { LoginStoreError } from "@relogin/contracts";

import type { QueryExecutor } from "./executors/query-executor.js";
import { translatePostgresError } from "./errors.js";
import { loginTableIndexes, resolveLoginTableName } from "./tables.js";

export interface LoginTableOptions {
  readonly table?: string;
}

/** Creates the login table and its indexes when they are missing. */
export const setupLoginTable = async (executor: QueryExecutor, options: LoginTableOptions = {}): Promise<void> => {
  const table = resolveLoginTableName(options.table);
  const indexes = loginTableIndexes(table);

  await executor.query(
    `CREATE TABLE IF NOT EXISTS ${table} (
      username TEXT NOT NULL,
      serial TEXT NOT NULL,
      token TEXT NOT NULL,
      sid TEXT NOT NULL,
      created_at TIMESTAMPTZ NOT NULL,
      last_login TIMESTAMPTZ NOT NULL,
      last_ip TEXT NOT NULL,
      last_user_agent TEXT NOT NULL,
      PRIMARY KEY (username, serial)
    )`,
  );
  await executor.query(`CREATE INDEX IF NOT EXISTS ${indexes.serial} ON ${table} (serial)`);
  await executor.query(`CREATE INDEX IF NOT EXISTS ${indexes.lastLogin} ON ${table} (last_login)`);
};

/** Deletes every login. A missing table counts as already empty. */
export const clearLoginTable = async (executor: QueryExecutor, options: LoginTableOptions = {}): Promise<void> => {
  const table = resolveLoginTableName(options.table);
  try {
    await executor.query(`DELETE FROM ${table}`);
  } catch (error) {
    const translated = translatePostgresError(error, table);
    if (!(translated instanceof LoginStoreError && translated.reason === "table_not_initialized")) {
      throw translated;
    }
  }
};

export const dropLoginTable = async (executor: QueryExecutor, options: LoginTableOptions = {}): Promise<void> => {
  const table = resolveLoginTableName(options.table);
  await executor.query(`DROP TABLE IF EXISTS ${table}`);
};
