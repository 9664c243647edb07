export interface CookieOptions {
  /** Lifetime in seconds. */
  readonly maxAge: number;
}

export interface RequestSession {
  /** Current session id, if the session has been persisted. */
  id(): string | undefined;
  get(key: string): unknown;
  put(key: string, value: unknown): void;
  /** Moves the session data to a fresh id and resolves that id. */
  renew(): Promise<string>;
}

/**
 * The slice of a web request the authenticator works with. Framework
 * adapters implement it on top of their own request/response objects.
 */
export interface AuthRequestContext {
  readonly remoteIp?: string;
  readonly userAgent?: string;
  readonly session: RequestSession;
  getCookie(name: string): string | undefined;
  putCookie(name: string, value: string, options: CookieOptions): void;
  deleteCookie(name: string): void;
  /** Exposes a value to downstream handlers for this request only. */
  assign(key: string, value: unknown): void;
}
