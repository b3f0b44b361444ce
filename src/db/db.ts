import { createClient, type Client } from "@libsql/client";

/** Cliente libsql; `file:` local o remoto (Turso) con token. */
export function createDb(url: string, authToken?: string): Client {
  return createClient({
    url,
    ...(authToken ? { authToken } : {}),
  });
}
