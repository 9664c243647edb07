import type { Login, LoginStorePort, SessionStorePort } from "@relogin/contracts";

export const isExpired = (login: Login, maxAgeSeconds: number, now: Date): boolean =>
  Date.parse(login.lastLogin) < now.getTime() - maxAgeSeconds * 1000;

/** Deletes each login together with the session it is bound to. */
export const deleteLoginsWithSessions = async (
  store: LoginStorePort,
  sessionStore: SessionStorePort,
  logins: ReadonlyArray<Login>,
): Promise<number> => {
  for (const login of logins) {
    await store.delete(login.username, login.serial);
    await sessionStore.deleteSession(login.sid);
  }
  return logins.length;
};

/** Removes every login idle for longer than `maxAgeSeconds` and ends its session. */
export const purgeExpiredLogins = async (
  store: LoginStorePort,
  sessionStore: SessionStorePort,
  maxAgeSeconds: number,
): Promise<ReadonlyArray<Login>> => {
  const removed = [...(await store.cleanOldLogins(maxAgeSeconds))];
  for (const login of removed) {
    await sessionStore.deleteSession(login.sid);
  }
  return removed;
};
