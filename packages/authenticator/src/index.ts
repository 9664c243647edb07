export {
  encodeAuthCookie,
  parseAuthCookie,
  generateSecret,
  tokensMatch,
  SECRET_BYTES,
  type AuthCookie,
} from "./cookie.js";
export {
  resolveConfig,
  DEFAULT_AUTH_COOKIE,
  DEFAULT_CLEANER_PERIOD_SECONDS,
  DEFAULT_COOKIE_MAX_AGE_SECONDS,
  DEFAULT_STORE_TIMEOUT_MS,
  type LoginStoreOptions,
  type RememberMeConfig,
  type RememberMeOptions,
  type SessionKeys,
} from "./config.js";
export { createLoginStore, type LoginStoreFactoryOptions } from "./store-factory.js";
export { withStoreTimeout } from "./timeout.js";
export { deleteLoginsWithSessions, isExpired, purgeExpiredLogins } from "./maintenance.js";
export { createAuthenticatorTelemetry, type AuthenticatorTelemetry } from "./telemetry.js";
export {
  Authenticator,
  createAuthenticator,
  type AuthenticatorDependencies,
  type AuthenticatorSettings,
  type CookieLifetimeOptions,
  type CreateAuthenticatorOptions,
} from "./authenticator.js";
export { LoginCleaner, createLoginCleaner, type CreateLoginCleanerOptions, type LoginCleanerOptions } from "./cleaner.js";
