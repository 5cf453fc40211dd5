// ─── Error Taxonomy ───────────────────────────────────────
// Origin rejections (403) and unsupported methods (405) are plain
// responses, not exceptions, so they have no class here.

export class ConfigurationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigurationError";
  }
}

export type StorageOperation =
  | "connect"
  | "provision"
  | "increment"
  | "count"
  | "ping";

export class StorageError extends Error {
  constructor(
    readonly operation: StorageOperation,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "StorageError";
  }
}

// Backend unreachable, pool exhausted or store already closed
export class StorageConnectionError extends StorageError {
  constructor(operation: StorageOperation, message: string, options?: { cause?: unknown }) {
    super(operation, message, options);
    this.name = "StorageConnectionError";
  }
}

// Statement rejected by the engine
export class StorageQueryError extends StorageError {
  constructor(operation: StorageOperation, message: string, options?: { cause?: unknown }) {
    super(operation, message, options);
    this.name = "StorageQueryError";
  }
}

export class SerializationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SerializationError";
  }
}

export const errorMessage = (err: unknown): string =>
  err instanceof Error ? err.message : String(err);
