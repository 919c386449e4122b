import Database from "better-sqlite3";
import {
  type BetterSQLite3Database,
  drizzle,
} from "drizzle-orm/better-sqlite3";
import { mkdirSync } from "node:fs";
import path from "node:path";
import { StoreError } from "../../shared/errors";
import { getLogger } from "../../shared/logger";
import {
  ATTENDANCE_EVENTS_TABLE,
  PERSON_COOLDOWNS_TABLE,
  schema,
} from "./schema";

export type KioskDatabase = BetterSQLite3Database<typeof schema>;

export type DatabaseHandle = {
  db: KioskDatabase;
  sqlite: Database.Database;
};

export const IN_MEMORY_DATABASE = ":memory:";

const logger = getLogger("database-client", "storage");

const createTables = (sqlite: Database.Database): void => {
  sqlite
    .prepare(
      `
        CREATE TABLE IF NOT EXISTS ${ATTENDANCE_EVENTS_TABLE} (
          seq INTEGER PRIMARY KEY AUTOINCREMENT,
          event_id TEXT NOT NULL UNIQUE,
          person_id TEXT,
          device_id TEXT NOT NULL,
          occurred_at INTEGER NOT NULL,
          kind TEXT NOT NULL,
          window_key TEXT,
          confidence REAL,
          sync_status TEXT NOT NULL DEFAULT 'Pending',
          attempts INTEGER NOT NULL DEFAULT 0,
          last_error TEXT,
          next_attempt_at INTEGER,
          permanent INTEGER NOT NULL DEFAULT 0,
          created_at INTEGER NOT NULL,
          updated_at INTEGER NOT NULL,
          synced_at INTEGER
        )
      `,
    )
    .run();
  sqlite
    .prepare(
      `
        CREATE INDEX IF NOT EXISTS attendance_events_status_occurred_idx
        ON ${ATTENDANCE_EVENTS_TABLE}(sync_status, occurred_at)
      `,
    )
    .run();

  sqlite
    .prepare(
      `
        CREATE TABLE IF NOT EXISTS ${PERSON_COOLDOWNS_TABLE} (
          person_id TEXT PRIMARY KEY NOT NULL,
          last_decision_at INTEGER NOT NULL,
          last_decision_window TEXT NOT NULL
        )
      `,
    )
    .run();
};

/**
 * Opens (creating if needed) the kiosk database. Pass ":memory:" for a
 * throwaway database.
 */
export const openDatabase = (databasePath: string): DatabaseHandle => {
  try {
    if (databasePath !== IN_MEMORY_DATABASE) {
      mkdirSync(path.dirname(path.resolve(databasePath)), { recursive: true });
    }

    const sqlite = new Database(databasePath);
    sqlite.pragma("journal_mode = WAL");
    createTables(sqlite);

    logger.info("Database ready", { path: databasePath });
    return { db: drizzle(sqlite, { schema }), sqlite };
  } catch (error) {
    logger.error(
      `Failed to open database at ${databasePath}: ${
        error instanceof Error ? error.message : "Unknown error"
      }`,
    );
    throw new StoreError("open", error);
  }
};
