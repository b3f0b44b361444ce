// src/db/migrate.ts
import type { Client } from "@libsql/client";

const _migrated = new WeakMap<Client, Promise<void>>();

/** Crea el esquema una vez por cliente; llamadas concurrentes comparten la promesa. */
export function migrateOnce(db: Client): Promise<void> {
  const pending = _migrated.get(db);
  if (pending) return pending;
  const p = ensureSchema(db);
  _migrated.set(db, p);
  return p;
}

async function ensureSchema(db: Client): Promise<void> {
  // --- Tabla message_log (solo inserciones) ---
  await db.execute(`
    CREATE TABLE IF NOT EXISTS message_log (
      id                INTEGER PRIMARY KEY AUTOINCREMENT,
      timestamp         TEXT    NOT NULL,
      message_id        INTEGER NOT NULL,
      chat_id           TEXT    NOT NULL,
      chat_title        TEXT    NOT NULL,
      chat_type         TEXT    NOT NULL,
      user_id           TEXT    NOT NULL,
      username          TEXT,
      first_name        TEXT    NOT NULL,
      last_name         TEXT,
      text              TEXT    NOT NULL,
      message_type      TEXT    NOT NULL,
      has_media         INTEGER NOT NULL,
      media_type        TEXT,
      is_forwarded      INTEGER NOT NULL,
      reply_to_message  INTEGER,
      analysis          TEXT,
      created_at        INTEGER NOT NULL DEFAULT (unixepoch())
    )
  `);

  // --- Índices ---
  await db.execute(`CREATE INDEX IF NOT EXISTS ix_log_chat ON message_log(chat_id, id)`);
  await db.execute(`CREATE INDEX IF NOT EXISTS ix_log_user ON message_log(user_id, id)`);
}
