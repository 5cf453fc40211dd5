import Database from "better-sqlite3";
import {
  errorMessage,
  StorageConnectionError,
  StorageQueryError,
  type StorageError,
  type StorageOperation,
} from "../errors";
import { CountRowSchema, type VisitStore } from "./types";

// ─── Embedded Store ───────────────────────────────────────
// better-sqlite3 keeps a single synchronous connection, so the event loop
// already serializes every statement. WAL lets an external reader look at
// the file while we write.

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS visits (
    id        INTEGER PRIMARY KEY AUTOINCREMENT,
    timestamp DATETIME DEFAULT CURRENT_TIMESTAMP
  )`;

const CONNECTION_CODES = new Set([
  "SQLITE_CANTOPEN",
  "SQLITE_BUSY",
  "SQLITE_LOCKED",
  "SQLITE_NOTADB",
]);

const toStorageError = (operation: StorageOperation, what: string, err: unknown): StorageError => {
  const message = `failed to ${what}: ${errorMessage(err)}`;
  if (err instanceof Database.SqliteError && CONNECTION_CODES.has(err.code)) {
    return new StorageConnectionError(operation, message, { cause: err });
  }
  return new StorageQueryError(operation, message, { cause: err });
};

/** UTC `YYYY-MM-DD HH:MM:SS`, the same text `CURRENT_TIMESTAMP` writes. */
export const sqliteTimestamp = (date: Date): string => date.toISOString().replace("T", " ").slice(0, 19);

export interface SqliteStoreOptions {
  /** Milliseconds a statement waits on a locked database before SQLITE_BUSY. */
  busyTimeoutMs?: number;
}

export class SqliteVisitStore implements VisitStore {
  private readonly insertVisit: Database.Statement<[string]>;
  private readonly countVisits: Database.Statement<[]>;

  private constructor(private readonly db: Database.Database) {
    this.insertVisit = db.prepare<[string]>("INSERT INTO visits (timestamp) VALUES (?)");
    this.countVisits = db.prepare<[]>("SELECT COUNT(*) AS count FROM visits");
  }

  /**
   * Opens (or creates) the database file and provisions the visits table.
   * Pass `":memory:"` for a throwaway database.
   */
  static open(filename: string, options: SqliteStoreOptions = {}): SqliteVisitStore {
    let db: Database.Database;
    try {
      db = new Database(filename);
    } catch (err) {
      throw new StorageConnectionError("connect", `failed to open database: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    try {
      db.pragma("journal_mode = WAL");
      db.pragma(`busy_timeout = ${options.busyTimeoutMs ?? 5_000}`);
      db.exec(SCHEMA);
      return new SqliteVisitStore(db);
    } catch (err) {
      db.close();
      throw toStorageError("provision", "create table", err);
    }
  }

  async incrementVisitCount(timestamp: Date): Promise<void> {
    this.assertOpen("increment");
    try {
      this.insertVisit.run(sqliteTimestamp(timestamp));
    } catch (err) {
      throw toStorageError("increment", "increment visit count", err);
    }
  }

  async getVisitCount(): Promise<number> {
    this.assertOpen("count");
    let row: unknown;
    try {
      row = this.countVisits.get();
    } catch (err) {
      throw toStorageError("count", "get visit count", err);
    }
    const parsed = CountRowSchema.safeParse(row);
    if (!parsed.success) {
      throw new StorageQueryError("count", "failed to get visit count: unexpected row shape", {
        cause: parsed.error,
      });
    }
    return parsed.data.count;
  }

  async ping(): Promise<void> {
    this.assertOpen("ping");
    try {
      this.db.prepare("SELECT 1").get();
    } catch (err) {
      throw toStorageError("ping", "ping database", err);
    }
  }

  async close(): Promise<void> {
    if (this.db.open) this.db.close();
  }

  private assertOpen(operation: StorageOperation): void {
    if (!this.db.open) {
      throw new StorageConnectionError(operation, "database connection is closed");
    }
  }
}
