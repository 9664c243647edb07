export * from "./types/domain-error.js";
export * from "./types/result.js";
export * from "./types/login.js";
export * from "./types/outcomes.js";
export * from "./errors.js";

export * from "./ports/logins/login-store-port.js";
export * from "./ports/sessions/session-store-port.js";
export * from "./ports/requests/auth-request-context.js";
