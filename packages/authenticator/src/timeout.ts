import { LoginStoreTimeoutError, type LoginStorePort } from "@relogin/contracts";

const withTimeout = async <T>(operation: string, timeoutMs: number, pending: Promise<T>): Promise<T> => {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const expired = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new LoginStoreTimeoutError(operation, timeoutMs)), timeoutMs);
  });
  try {
    return await Promise.race([pending, expired]);
  } finally {
    clearTimeout(timer);
  }
};

/**
 * Wraps every store call so that one which has not settled after
 * `timeoutMs` rejects with {@link LoginStoreTimeoutError}.
 */
export const withStoreTimeout = (store: LoginStorePort, timeoutMs: number): LoginStorePort => ({
  listUserLogins: (username) => withTimeout("listUserLogins", timeoutMs, store.listUserLogins(username)),
  get: (username, serial) => withTimeout("get", timeoutMs, store.get(username, serial)),
  put: (login) => withTimeout("put", timeoutMs, store.put(login)),
  replace: (current, next) => withTimeout("replace", timeoutMs, store.replace(current, next)),
  delete: (username, serial) => withTimeout("delete", timeoutMs, store.delete(username, serial)),
  cleanOldLogins: (maxAgeSeconds) => withTimeout("cleanOldLogins", timeoutMs, store.cleanOldLogins(maxAgeSeconds)),
});
