import {
  CurrentUserError,
  InvalidUserError,
  notLoadedUser,
  SessionError,
  systemClock,
  type AuthenticationOutcome,
  type AuthRequestContext,
  type Clock,
  type CompromiseTrigger,
  type Login,
  type LoginStorePort,
  type LogoutOutcome,
  type SessionStorePort,
} from "@relogin/contracts";
import { runWithSpan } from "@relogin/telemetry";

import { createLoginStore, type LoginStoreFactoryOptions } from "./store-factory.js";
import { encodeAuthCookie, generateSecret, parseAuthCookie, tokensMatch, type AuthCookie } from "./cookie.js";
import { resolveConfig, type RememberMeOptions, type SessionKeys } from "./config.js";
import { deleteLoginsWithSessions, isExpired, purgeExpiredLogins } from "./maintenance.js";
import { createAuthenticatorTelemetry, type AuthenticatorTelemetry } from "./telemetry.js";
import { withStoreTimeout } from "./timeout.js";

export interface AuthenticatorSettings {
  readonly sessionCookie: string;
  readonly authCookie: string;
  readonly cookieMaxAge: number;
  readonly sessionKeys: SessionKeys;
}

export interface AuthenticatorDependencies {
  readonly store: LoginStorePort;
  readonly sessionStore: SessionStorePort;
  readonly settings: AuthenticatorSettings;
  readonly clock?: Clock;
  readonly telemetry?: AuthenticatorTelemetry;
}

export interface CookieLifetimeOptions {
  /** Overrides the configured auth cookie lifetime, in seconds. */
  readonly cookieMaxAge?: number;
}

type ResolvedCookie =
  | { readonly kind: "missing"; readonly reason: "no_cookie" | "invalid_cookie" | "no_login" }
  | { readonly kind: "found"; readonly cookie: AuthCookie; readonly login: Login };

const latest = (previous: string, now: Date): string =>
  Date.parse(previous) > now.getTime() ? previous : now.toISOString();

const outcomeDetail = (outcome: AuthenticationOutcome): string => {
  switch (outcome.kind) {
    case "authenticated":
      return outcome.via;
    case "not_authenticated":
      return outcome.reason;
    case "compromised":
      return outcome.trigger;
  }
};

/**
 * Persistent login on top of an ephemeral session.
 *
 * Each cookie authentication swaps the login's token for a fresh one. A
 * cookie presenting a stale token for a live serial means the cookie was
 * copied, so every login of that user is revoked.
 */
export class Authenticator {
  private readonly store: LoginStorePort;
  private readonly sessionStore: SessionStorePort;
  private readonly settings: AuthenticatorSettings;
  private readonly clock: Clock;
  private readonly telemetry: AuthenticatorTelemetry;

  constructor(dependencies: AuthenticatorDependencies) {
    this.store = dependencies.store;
    this.sessionStore = dependencies.sessionStore;
    this.settings = dependencies.settings;
    this.clock = dependencies.clock ?? systemClock;
    this.telemetry = dependencies.telemetry ?? createAuthenticatorTelemetry();
  }

  /** Creates a login for the signed-in user and sets the auth cookie. */
  async registerLogin(ctx: AuthRequestContext, options: CookieLifetimeOptions = {}): Promise<Login> {
    const { currentUser, username: usernameField } = this.settings.sessionKeys;
    const user = ctx.session.get(currentUser);
    if (user === undefined || user === null) {
      throw new CurrentUserError(currentUser);
    }
    const username: unknown = typeof user === "object" ? Reflect.get(user, usernameField) : undefined;
    if (typeof username !== "string" || username.length === 0) {
      throw new InvalidUserError(currentUser, usernameField);
    }
    const sid = ctx.session.id();
    if (!sid) {
      throw new SessionError();
    }

    const now = this.clock.now().toISOString();
    const login: Login = {
      username,
      serial: generateSecret(),
      token: generateSecret(),
      sid,
      createdAt: now,
      lastLogin: now,
      lastIp: ctx.remoteIp ?? "",
      lastUserAgent: ctx.userAgent ?? "",
    };

    await this.store.put(login);
    ctx.putCookie(this.settings.authCookie, encodeAuthCookie(login), {
      maxAge: options.cookieMaxAge ?? this.settings.cookieMaxAge,
    });
    this.telemetry.logger.info("authenticator.login.registered", { username });
    return login;
  }

  authenticate(ctx: AuthRequestContext, options: CookieLifetimeOptions = {}): Promise<AuthenticationOutcome> {
    return runWithSpan(this.telemetry.tracer, "authenticator.authenticate", async (span) => {
      const outcome = await this.authenticateRequest(ctx, options);
      span.setAttribute("relogin.outcome", outcome.kind);
      this.telemetry.authentications.add(1, { outcome: outcome.kind, detail: outcomeDetail(outcome) });
      return outcome;
    });
  }

  /** Forgets the login behind the auth cookie. Cookie problems are not errors here. */
  async logout(ctx: AuthRequestContext): Promise<LogoutOutcome> {
    const resolved = await this.resolveCookie(ctx);
    ctx.deleteCookie(this.settings.authCookie);
    if (resolved.kind === "missing") {
      return { kind: "no_login", reason: resolved.reason };
    }

    const { login } = resolved;
    await this.store.delete(login.username, login.serial);
    await this.sessionStore.deleteSession(login.sid);
    ctx.deleteCookie(this.settings.sessionCookie);
    this.telemetry.logger.info("authenticator.login.logged_out", { username: login.username });
    return { kind: "logged_out", login };
  }

  listUserLogins(username: string): Promise<ReadonlyArray<Login>> {
    return this.store.listUserLogins(username);
  }

  /** Deletes one login and its session. Resolves `false` when there was none. */
  async deleteLogin(username: string, serial: string): Promise<boolean> {
    const login = await this.store.get(username, serial);
    if (!login) {
      return false;
    }
    await deleteLoginsWithSessions(this.store, this.sessionStore, [login]);
    return true;
  }

  async deleteAllUserLogins(username: string): Promise<number> {
    const logins = await this.store.listUserLogins(username);
    return deleteLoginsWithSessions(this.store, this.sessionStore, logins);
  }

  cleanOldLogins(maxAgeSeconds: number = this.settings.cookieMaxAge): Promise<ReadonlyArray<Login>> {
    return purgeExpiredLogins(this.store, this.sessionStore, maxAgeSeconds);
  }

  private async authenticateRequest(
    ctx: AuthRequestContext,
    options: CookieLifetimeOptions,
  ): Promise<AuthenticationOutcome> {
    const { authenticated, currentUser } = this.settings.sessionKeys;

    if (ctx.session.get(authenticated)) {
      const user = ctx.session.get(currentUser);
      ctx.assign(authenticated, ctx.session.get(authenticated));
      ctx.assign(currentUser, user);
      return { kind: "authenticated", via: "session", currentUser: user };
    }

    const resolved = await this.resolveCookie(ctx);
    if (resolved.kind === "missing") {
      if (resolved.reason !== "no_cookie") {
        ctx.deleteCookie(this.settings.authCookie);
      }
      return { kind: "not_authenticated", reason: resolved.reason };
    }

    const { cookie, login } = resolved;
    if (!tokensMatch(login.token, cookie.token)) {
      return this.revoke(ctx, login, "token_mismatch");
    }

    const now = this.clock.now();
    const sid = await ctx.session.renew();
    const rotated: Login = {
      ...login,
      token: generateSecret(),
      sid,
      lastLogin: latest(login.lastLogin, now),
      lastIp: ctx.remoteIp ?? "",
      lastUserAgent: ctx.userAgent ?? "",
    };
    if (!(await this.store.replace(login, rotated))) {
      return this.revoke(ctx, login, "concurrent_rotation");
    }

    await this.sessionStore.deleteSession(login.sid);
    const user = notLoadedUser(login.username);
    ctx.session.put(authenticated, true);
    ctx.session.put(currentUser, user);
    ctx.assign(authenticated, true);
    ctx.assign(currentUser, user);
    ctx.putCookie(this.settings.authCookie, encodeAuthCookie(rotated), {
      maxAge: options.cookieMaxAge ?? this.settings.cookieMaxAge,
    });

    const siblings = await this.store.listUserLogins(login.username);
    const expired = siblings.filter(
      (sibling) => sibling.serial !== rotated.serial && isExpired(sibling, this.settings.cookieMaxAge, now),
    );
    await deleteLoginsWithSessions(this.store, this.sessionStore, expired);

    this.telemetry.logger.info("authenticator.login.rotated", {
      username: login.username,
      expiredSiblings: expired.length,
    });
    return { kind: "authenticated", via: "cookie", currentUser: user, login: rotated };
  }

  private async resolveCookie(ctx: AuthRequestContext): Promise<ResolvedCookie> {
    const value = ctx.getCookie(this.settings.authCookie);
    if (!value) {
      return { kind: "missing", reason: "no_cookie" };
    }
    const parsed = parseAuthCookie(value);
    if (!parsed.ok) {
      return { kind: "missing", reason: "invalid_cookie" };
    }
    const login = await this.store.get(parsed.value.username, parsed.value.serial);
    if (!login) {
      return { kind: "missing", reason: "no_login" };
    }
    return { kind: "found", cookie: parsed.value, login };
  }

  private async revoke(
    ctx: AuthRequestContext,
    login: Login,
    trigger: CompromiseTrigger,
  ): Promise<AuthenticationOutcome> {
    const logins = await this.store.listUserLogins(login.username);
    const revokedLogins = await deleteLoginsWithSessions(this.store, this.sessionStore, logins);
    ctx.deleteCookie(this.settings.authCookie);

    this.telemetry.revokedLogins.add(revokedLogins, { trigger });
    this.telemetry.logger.warn("authenticator.login.compromised", {
      username: login.username,
      trigger,
      revokedLogins,
    });
    return { kind: "compromised", username: login.username, serial: login.serial, trigger, revokedLogins };
  }
}

export interface CreateAuthenticatorOptions extends RememberMeOptions {
  readonly registry?: LoginStoreFactoryOptions["registry"];
}

/** Validates the options, builds the configured store and wires an {@link Authenticator}. */
export const createAuthenticator = (options: CreateAuthenticatorOptions): Authenticator => {
  const config = resolveConfig(options);
  const store = createLoginStore(config.store, { clock: config.clock, registry: options.registry });

  return new Authenticator({
    store: withStoreTimeout(store, config.storeTimeoutMs),
    sessionStore: config.sessionStore,
    settings: {
      sessionCookie: config.sessionCookie,
      authCookie: config.authCookie,
      cookieMaxAge: config.cookieMaxAge,
      sessionKeys: config.sessionKeys,
    },
    clock: config.clock,
    telemetry: createAuthenticatorTelemetry(config.logger),
  });
};
