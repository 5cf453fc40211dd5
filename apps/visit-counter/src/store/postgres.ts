import { Pool, type PoolConfig } from "pg";
import type { PostgresSettings } from "../config";
import {
  errorMessage,
  StorageConnectionError,
  StorageQueryError,
  type StorageError,
  type StorageOperation,
} from "../errors";
import type { Logger } from "../logger";
import { CountRowSchema, type VisitStore } from "./types";

// ─── Networked Store ──────────────────────────────────────
// 20 connections max, 10 kept warm. Connections are recycled after five
// minutes so a failover behind a DNS name is picked up.

/** The slice of `pg.Pool` the store uses; tests hand in a fake. */
export interface SqlPool {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
  end(): Promise<void>;
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS visits (
    id        SERIAL PRIMARY KEY,
    timestamp TIMESTAMP DEFAULT CURRENT_TIMESTAMP
  )`;

const NETWORK_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ETIMEDOUT",
  "ENOTFOUND",
  "EHOSTUNREACH",
  "EPIPE",
  "57P01", // admin_shutdown
  "57P02", // crash_shutdown
  "57P03", // cannot_connect_now
]);

const errorCode = (err: unknown): string | undefined => {
  if (typeof err === "object" && err !== null && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
};

export const isConnectionFailure = (err: unknown): boolean => {
  const code = errorCode(err);
  if (code === undefined) return false;
  // SQLSTATE class 08 is "connection exception"
  return NETWORK_CODES.has(code) || code.startsWith("08");
};

const toStorageError = (operation: StorageOperation, what: string, err: unknown): StorageError => {
  const message = `failed to ${what}: ${errorMessage(err)}`;
  return isConnectionFailure(err)
    ? new StorageConnectionError(operation, message, { cause: err })
    : new StorageQueryError(operation, message, { cause: err });
};

export const poolConfig = (settings: PostgresSettings): PoolConfig => ({
  host: settings.host,
  port: settings.port,
  user: settings.user,
  password: settings.password,
  database: settings.database,

  max: 20,
  min: 10,
  maxLifetimeSeconds: 300,
  idleTimeoutMillis: 30_000,
  connectionTimeoutMillis: 5_000,
});

export const createPool = (settings: PostgresSettings, logger: Logger): Pool => {
  const pool = new Pool(poolConfig(settings));
  pool.on("error", (err) => logger.error({ err }, "Idle pool client error"));
  return pool;
};

export class PostgresVisitStore implements VisitStore {
  private closed = false;

  private constructor(private readonly pool: SqlPool) {}

  /**
   * Verifies the pool can reach the server, then provisions the table.
   * The pool is ended before rejecting if either step fails.
   */
  static async connect(pool: SqlPool): Promise<PostgresVisitStore> {
    try {
      await pool.query("SELECT 1");
    } catch (err) {
      await pool.end();
      throw new StorageConnectionError("connect", `failed to ping database: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    try {
      await pool.query(SCHEMA);
    } catch (err) {
      await pool.end();
      throw toStorageError("provision", "create table", err);
    }

    return new PostgresVisitStore(pool);
  }

  async incrementVisitCount(timestamp: Date): Promise<void> {
    this.assertOpen("increment");
    try {
      await this.pool.query("INSERT INTO visits (timestamp) VALUES ($1)", [timestamp]);
    } catch (err) {
      throw toStorageError("increment", "increment visit count", err);
    }
  }

  async getVisitCount(): Promise<number> {
    this.assertOpen("count");
    let rows: unknown[];
    try {
      ({ rows } = await this.pool.query("SELECT COUNT(*) AS count FROM visits"));
    } catch (err) {
      throw toStorageError("count", "get visit count", err);
    }
    const parsed = CountRowSchema.safeParse(rows[0]);
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
      await this.pool.query("SELECT 1");
    } catch (err) {
      throw toStorageError("ping", "ping database", err);
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.pool.end();
  }

  private assertOpen(operation: StorageOperation): void {
    if (this.closed) {
      throw new StorageConnectionError(operation, "connection pool is closed");
    }
  }
}
