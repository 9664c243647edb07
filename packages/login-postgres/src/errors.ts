import { LoginStoreError } from "@relogin/contracts";

const UNDEFINED_TABLE = "42P01";
const FORMAT_ERROR_CODES = new Set([
  "42703", // undefined_column
  "42804", // datatype_mismatch
  "22P02", // invalid_text_representation
  "23502", // not_null_violation
  "42P10", // no unique constraint matches the ON CONFLICT target
]);

const FORMAT_ERROR_MESSAGE = /column .* does not exist|no unique or exclusion constraint/i;

const readErrorField = (error: unknown, field: "code" | "message"): string | undefined => {
  if (typeof error !== "object" || error === null || !(field in error)) {
    return undefined;
  }
  const value: unknown = Reflect.get(error, field);
  return typeof value === "string" ? value : undefined;
};

/**
 * Maps driver errors caused by a missing or mis-shaped login table onto
 * {@link LoginStoreError}. Anything else is returned untouched.
 */
export const translatePostgresError = (error: unknown, table: string): unknown => {
  if (error instanceof LoginStoreError) {
    return error;
  }

  const code = readErrorField(error, "code");
  const message = readErrorField(error, "message") ?? "";

  if (code === UNDEFINED_TABLE || /relation .* does not exist/i.test(message)) {
    return new LoginStoreError("table_not_initialized", table, error);
  }
  if ((code !== undefined && FORMAT_ERROR_CODES.has(code)) || FORMAT_ERROR_MESSAGE.test(message)) {
    return new LoginStoreError("invalid_table_format", table, error);
  }
  return error;
};
