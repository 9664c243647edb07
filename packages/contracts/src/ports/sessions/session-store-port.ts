/**
 * Server-side session store holding the ephemeral sessions that logins point
 * at. Only deletion is needed here; the web framework owns the rest.
 */
export interface SessionStorePort {
  deleteSession(id: string): Promise<void>;
}
