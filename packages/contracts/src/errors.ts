import type { DomainError } from "./types/domain-error.js";

export class ReloginError extends Error implements DomainError {
  readonly code: string;
  readonly details?: Record<string, unknown>;

  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

export type ConfigurationErrorReason =
  | "no_store"
  | "unknown_store"
  | "no_process_name"
  | "no_table"
  | "no_postgres_handle"
  | "invalid_table_name"
  | "no_session_store"
  | "no_session_cookie"
  | "bad_cleaner_period"
  | "invalid_option";

const CONFIGURATION_MESSAGES: Record<ConfigurationErrorReason, string> = {
  no_store: "Login store not configured. Set `store` with a backend of memory, postgres or custom.",
  unknown_store: "Unknown login store backend.",
  no_process_name: "The memory login store requires a `processName`.",
  no_table: "The postgres login store requires a `table`.",
  no_postgres_handle: "The postgres login store requires a `pool` or an `executor`.",
  invalid_table_name: "The login table name must be a plain SQL identifier.",
  no_session_store: "Session store not configured. Set `sessionStore`.",
  no_session_cookie: "Session cookie name not configured. Set `sessionCookie`.",
  bad_cleaner_period: "The cleaner period must be a positive number of seconds.",
  invalid_option: "Invalid configuration option.",
};

export class ConfigurationError extends ReloginError {
  readonly reason: ConfigurationErrorReason;

  constructor(reason: ConfigurationErrorReason, details?: Record<string, unknown>) {
    super(`config.${reason}`, CONFIGURATION_MESSAGES[reason], details);
    this.reason = reason;
  }
}

export type LoginStoreErrorReason = "table_not_initialized" | "invalid_table_format";

export class LoginStoreError extends ReloginError {
  readonly reason: LoginStoreErrorReason;

  constructor(reason: LoginStoreErrorReason, table: string, cause?: unknown) {
    super(
      `login_store.${reason}`,
      reason === "table_not_initialized"
        ? `Login table "${table}" does not exist. Run the login table setup first.`
        : `Login table "${table}" exists but does not have the expected columns.`,
      { table },
    );
    this.reason = reason;
    this.cause = cause;
  }
}

export class LoginStoreTimeoutError extends ReloginError {
  readonly operation: string;
  readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super("login_store.timeout", `Login store ${operation} did not complete within ${timeoutMs}ms.`, {
      operation,
      timeoutMs,
    });
    this.operation = operation;
    this.timeoutMs = timeoutMs;
  }
}

export class CurrentUserError extends ReloginError {
  constructor(currentUserKey: string) {
    super(
      "protocol.no_current_user",
      `There is no logged-in user: the session has no "${currentUserKey}" entry.`,
      { currentUserKey },
    );
  }
}

export class InvalidUserError extends ReloginError {
  constructor(currentUserKey: string, usernameField: string) {
    super(
      "protocol.invalid_user",
      `The session "${currentUserKey}" entry has no "${usernameField}" field.`,
      { currentUserKey, usernameField },
    );
  }
}

export class SessionError extends ReloginError {
  constructor() {
    super("protocol.no_session", "The request has no session id. Fetch and persist the session first.");
  }
}
