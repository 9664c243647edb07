/**
 * One persistent login lineage for a device or browser.
 *
 * A login is never mutated in place: rotation builds a new value that keeps
 * `username`, `serial` and `createdAt` and replaces everything else.
 */
export interface Login {
  readonly username: string;
  /** Stable identifier of the lineage. */
  readonly serial: string;
  /** Single-use secret expected on the next cookie authentication. */
  readonly token: string;
  /** Ephemeral session currently bound to this login. */
  readonly sid: string;
  /** ISO-8601 timestamp of the first registration. */
  readonly createdAt: string;
  /** ISO-8601 timestamp of the latest registration or authentication. */
  readonly lastLogin: string;
  readonly lastIp: string;
  readonly lastUserAgent: string;
}

/**
 * Placeholder principal put in the session after a cookie authentication.
 * Hydrating the full user object is left to the application.
 */
export interface NotLoadedUser {
  readonly kind: "not_loaded";
  readonly username: string;
}

export const notLoadedUser = (username: string): NotLoadedUser => ({ kind: "not_loaded", username });

export const isNotLoadedUser = (value: unknown): value is NotLoadedUser =>
  typeof value === "object" &&
  value !== null &&
  "kind" in value &&
  value.kind === "not_loaded" &&
  "username" in value &&
  typeof value.username === "string";

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};
