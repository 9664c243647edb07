import type { Login } from "../../types/login.js";

/**
 * Storage for persistent logins, keyed by `(username, serial)`.
 *
 * Implementations must be linearizable per key: once a call resolves, every
 * call issued afterwards observes its effect.
 */
export interface LoginStorePort {
  listUserLogins(username: string): Promise<ReadonlyArray<Login>>;
  get(username: string, serial: string): Promise<Login | undefined>;
  /** Upserts by `(username, serial)`; the last put wins. */
  put(login: Login): Promise<void>;
  /**
   * Stores `next` only while the stored login for the same key still carries
   * `current.token`. Resolves `false` when the login is gone or was rotated
   * by someone else in the meantime.
   */
  replace(current: Login, next: Login): Promise<boolean>;
  delete(username: string, serial: string): Promise<void>;
  /**
   * Removes and returns every login whose `lastLogin` is older than
   * `now - maxAgeSeconds`.
   */
  cleanOldLogins(maxAgeSeconds: number): Promise<Iterable<Login>>;
}
