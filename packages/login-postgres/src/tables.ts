import { ConfigurationError } from "@relogin/contracts";

export const defaultLoginTableName = "relogin_logins";

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

/** Table names are interpolated into SQL, so only bare identifiers are accepted. */
export const resolveLoginTableName = (table: string | undefined): string => {
  const name = table ?? defaultLoginTableName;
  if (!IDENTIFIER.test(name)) {
    throw new ConfigurationError("invalid_table_name", { table: name });
  }
  return name;
};

export const loginTableIndexes = (table: string) => ({
  serial: `${table}_serial_idx`,
  lastLogin: `${table}_last_login_idx`,
});
