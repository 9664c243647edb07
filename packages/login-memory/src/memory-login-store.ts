import { systemClock, type Clock, type Login, type LoginStorePort } from "@relogin/contracts";

import { Mailbox } from "./mailbox.js";

export interface MemoryLoginStoreOptions {
  readonly clock?: Clock;
  readonly initialLogins?: ReadonlyArray<Login>;
}

type UserLogins = Map<string, Login>;

const copy = (login: Login): Login => ({ ...login });

function* drain(groups: ReadonlyArray<ReadonlyArray<Login>>): Generator<Login, void, undefined> {
  for (const group of groups) {
    yield* group;
  }
}

/**
 * Keeps logins in a `username -> serial -> Login` index owned by a single
 * mailbox. Every operation is a message to that mailbox, which makes the
 * store linearizable for all callers sharing the instance.
 */
export class MemoryLoginStore implements LoginStorePort {
  private readonly index = new Map<string, UserLogins>();
  private readonly mailbox = new Mailbox();
  private readonly clock: Clock;

  constructor(options: MemoryLoginStoreOptions = {}) {
    this.clock = options.clock ?? systemClock;
    for (const login of options.initialLogins ?? []) {
      this.write(copy(login));
    }
  }

  async listUserLogins(username: string): Promise<ReadonlyArray<Login>> {
    return this.mailbox.post(() => {
      const userLogins = this.index.get(username);
      return userLogins ? Array.from(userLogins.values(), copy) : [];
    });
  }

  async get(username: string, serial: string): Promise<Login | undefined> {
    return this.mailbox.post(() => {
      const login = this.index.get(username)?.get(serial);
      return login ? copy(login) : undefined;
    });
  }

  async put(login: Login): Promise<void> {
    const stored = copy(login);
    await this.mailbox.post(() => this.write(stored));
  }

  async replace(current: Login, next: Login): Promise<boolean> {
    if (current.username !== next.username || current.serial !== next.serial) {
      throw new TypeError("replace() requires both logins to share username and serial");
    }

    const stored = copy(next);
    return this.mailbox.post(() => {
      const existing = this.index.get(current.username)?.get(current.serial);
      if (!existing || existing.token !== current.token) {
        return false;
      }
      this.write(stored);
      return true;
    });
  }

  async delete(username: string, serial: string): Promise<void> {
    await this.mailbox.post(() => {
      const userLogins = this.index.get(username);
      if (!userLogins) {
        return;
      }
      userLogins.delete(serial);
      if (userLogins.size === 0) {
        this.index.delete(username);
      }
    });
  }

  /**
   * Removal happens within one mailbox turn; the returned iterable walks the
   * removed logins once and cannot be restarted.
   */
  async cleanOldLogins(maxAgeSeconds: number): Promise<Iterable<Login>> {
    return this.mailbox.post(() => {
      const cutoff = this.clock.now().getTime() - maxAgeSeconds * 1000;
      const expired: Login[][] = [];

      for (const [username, userLogins] of this.index) {
        const kept: UserLogins = new Map();
        const removed: Login[] = [];
        for (const [serial, login] of userLogins) {
          if (Date.parse(login.lastLogin) < cutoff) {
            removed.push(login);
          } else {
            kept.set(serial, login);
          }
        }

        if (removed.length === 0) {
          continue;
        }
        if (kept.size === 0) {
          this.index.delete(username);
        } else {
          this.index.set(username, kept);
        }
        expired.push(removed);
      }

      return drain(expired);
    });
  }

  /** Number of users with at least one login. */
  async countUsers(): Promise<number> {
    return this.mailbox.post(() => this.index.size);
  }

  private write(login: Login): void {
    const userLogins = this.index.get(login.username) ?? new Map<string, Login>();
    userLogins.set(login.serial, login);
    this.index.set(login.username, userLogins);
  }
}
