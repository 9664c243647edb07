import {
  ConfigurationError,
  type Login,
  type LoginStorePort,
  type SessionStorePort,
} from "@relogin/contracts";
import { createReloginLogger, describeError, type ReloginLogger } from "@relogin/telemetry";

import {
  DEFAULT_CLEANER_PERIOD_SECONDS,
  DEFAULT_COOKIE_MAX_AGE_SECONDS,
  resolveConfig,
  type RememberMeOptions,
} from "./config.js";
import { purgeExpiredLogins } from "./maintenance.js";
import { createLoginStore, type LoginStoreFactoryOptions } from "./store-factory.js";
import { withStoreTimeout } from "./timeout.js";

const TEST_MODE_FIRST_TICK_MS = 1;

export interface LoginCleanerOptions {
  readonly store: LoginStorePort;
  readonly sessionStore: SessionStorePort;
  /** Seconds between runs. */
  readonly period?: number;
  /** Logins idle for longer than this many seconds are removed. */
  readonly maxAge?: number;
  /** Runs the first pass almost immediately instead of after one period. */
  readonly testMode?: boolean;
  readonly logger?: ReloginLogger;
}

const assertPositive = (value: number, name: string): void => {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigurationError(name === "period" ? "bad_cleaner_period" : "invalid_option", { [name]: value });
  }
};

/**
 * Periodically purges expired logins and their sessions. Runs never overlap:
 * the next one is scheduled once the current one has settled.
 */
export class LoginCleaner {
  private readonly store: LoginStorePort;
  private readonly sessionStore: SessionStorePort;
  private readonly period: number;
  private readonly maxAge: number;
  private readonly testMode: boolean;
  private readonly logger: ReloginLogger;
  private timer?: ReturnType<typeof setTimeout>;
  private inFlight?: Promise<void>;
  private running = false;
  /** Bumped on every start so a loop left over from an earlier run stops rescheduling. */
  private generation = 0;

  constructor(options: LoginCleanerOptions) {
    this.store = options.store;
    this.sessionStore = options.sessionStore;
    this.period = options.period ?? DEFAULT_CLEANER_PERIOD_SECONDS;
    this.maxAge = options.maxAge ?? DEFAULT_COOKIE_MAX_AGE_SECONDS;
    this.testMode = options.testMode ?? false;
    this.logger = options.logger ?? createReloginLogger({ name: "login-cleaner" });
  }

  get isRunning(): boolean {
    return this.running;
  }

  start(): void {
    assertPositive(this.period, "period");
    assertPositive(this.maxAge, "maxAge");
    if (this.running) {
      return;
    }
    this.running = true;
    this.generation += 1;
    this.logger.info("cleaner.started", { period: this.period, maxAge: this.maxAge });
    this.schedule(this.testMode ? TEST_MODE_FIRST_TICK_MS : this.period * 1000);
  }

  async stop(): Promise<void> {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
    await this.inFlight;
    this.logger.info("cleaner.stopped");
  }

  /** One purge pass. Failures are logged and reported as `undefined`. */
  async runOnce(): Promise<ReadonlyArray<Login> | undefined> {
    try {
      const removed = await purgeExpiredLogins(this.store, this.sessionStore, this.maxAge);
      this.logger.info("cleaner.tick.completed", { removed: removed.length });
      return removed;
    } catch (error) {
      this.logger.error("cleaner.tick.failed", { error: describeError(error) });
      return undefined;
    }
  }

  private schedule(delayMs: number): void {
    const generation = this.generation;
    this.timer = setTimeout(() => {
      this.timer = undefined;
      // A pass from before a stop/start cycle may still be settling; queue behind it.
      const pass = Promise.resolve(this.inFlight)
        .then(() => this.runOnce())
        .then(() => {
          if (this.inFlight === pass) {
            this.inFlight = undefined;
          }
          if (this.running && generation === this.generation) {
            this.schedule(this.period * 1000);
          }
        });
      this.inFlight = pass;
    }, delayMs);
    this.timer.unref();
  }
}

export interface CreateLoginCleanerOptions extends RememberMeOptions {
  readonly maxAge?: number;
  readonly testMode?: boolean;
  readonly registry?: LoginStoreFactoryOptions["registry"];
}

/** Builds a cleaner over the same store and session store an authenticator would use. */
export const createLoginCleaner = (options: CreateLoginCleanerOptions): LoginCleaner => {
  const config = resolveConfig(options);
  const store = createLoginStore(config.store, { clock: config.clock, registry: options.registry });

  return new LoginCleaner({
    store: withStoreTimeout(store, config.storeTimeoutMs),
    sessionStore: config.sessionStore,
    period: config.cleanerPeriod,
    maxAge: options.maxAge ?? config.cookieMaxAge,
    testMode: options.testMode,
    logger: config.logger,
  });
};
