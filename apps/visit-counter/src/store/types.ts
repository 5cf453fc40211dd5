import { z } from "zod";

/**
 * Backend-agnostic access to visit records.
 *
 * Implementations provision their table before they are handed out, so
 * callers never need to check the schema. Every failure rejects with a
 * `StorageError` subclass and is never retried here.
 */
export interface VisitStore {
  /** Appends one visit record stamped with `timestamp`. */
  incrementVisitCount(timestamp: Date): Promise<void>;
  /** Number of visit records; 0 for an empty table. */
  getVisitCount(): Promise<number>;
  /** Resolves when the backend answers a trivial query. */
  ping(): Promise<void>;
  close(): Promise<void>;
}

// COUNT(*) comes back as a number from SQLite and as a bigint string from pg
export const CountRowSchema = z.object({
  count: z.coerce.number().int().nonnegative(),
});
