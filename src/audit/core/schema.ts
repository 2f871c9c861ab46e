import Database from "better-sqlite3";

export const SCHEMA_VERSION = "1";

const SCHEMA = `
CREATE TABLE IF NOT EXISTS meta (
  key TEXT NOT NULL PRIMARY KEY,
  value TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS file (
  id INTEGER NOT NULL PRIMARY KEY,
  digest TEXT NOT NULL UNIQUE,
  path TEXT NOT NULL,
  size INTEGER NOT NULL,
  primary_post_id TEXT NULL,
  created_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%SZ', 'now'))
);

CREATE TABLE IF NOT EXISTS post (
  id INTEGER NOT NULL PRIMARY KEY,
  post_id TEXT NOT NULL UNIQUE
);

CREATE TABLE IF NOT EXISTS post_file (
  post_id INTEGER NOT NULL,
  file_id INTEGER NOT NULL,
  capture_timestamp TEXT NOT NULL,
  capture_url TEXT NOT NULL,
  user_screen_name TEXT NULL,
  PRIMARY KEY (post_id, capture_timestamp),
  FOREIGN KEY (post_id) REFERENCES post (id),
  FOREIGN KEY (file_id) REFERENCES file (id)
);
CREATE INDEX IF NOT EXISTS post_file_post_id_index ON post_file (post_id);
CREATE INDEX IF NOT EXISTS post_file_file_id_index ON post_file (file_id);
CREATE INDEX IF NOT EXISTS post_file_user_screen_name_index
  ON post_file (user_screen_name);
`;

/**
 * Opens (creating if needed) the store database and applies the schema.
 * A database stamped with another schema version is refused.
 */
export function openDb(dbPath: string): Database.Database {
  const db = new Database(dbPath);
  try {
    db.pragma("journal_mode = WAL");
    db.pragma("foreign_keys = ON");
    db.exec(SCHEMA);
    const version = getMeta(db, "schema_version");
    if (version === null) {
      setMeta(db, "schema_version", SCHEMA_VERSION);
    } else if (version !== SCHEMA_VERSION) {
      throw new Error(
        `Unsupported store schema version ${version} (expected ${SCHEMA_VERSION})`,
      );
    }
  } catch (err) {
    db.close();
    throw err;
  }
  return db;
}

export function getMeta(db: Database.Database, key: string): string | null {
  const row = db
    .prepare<[string], { value: string }>(
      "SELECT value FROM meta WHERE key = ?",
    )
    .get(key);
  return row?.value ?? null;
}

export function setMeta(
  db: Database.Database,
  key: string,
  value: string,
): void {
  db.prepare<[string, string]>(
    `INSERT INTO meta (key, value) VALUES (?, ?)
     ON CONFLICT(key) DO UPDATE SET value = excluded.value`,
  ).run(key, value);
}
