import type { StorageConfig } from "../config";
import type { Logger } from "../logger";
import { createPool, PostgresVisitStore } from "./postgres";
import { SqliteVisitStore } from "./sqlite";
import type { VisitStore } from "./types";

export type { VisitStore } from "./types";
export { SqliteVisitStore } from "./sqlite";
export { PostgresVisitStore, type SqlPool } from "./postgres";

/** Picks the backend once at startup; request code only sees `VisitStore`. */
export async function createVisitStore(config: StorageConfig, logger: Logger): Promise<VisitStore> {
  switch (config.driver) {
    case "sqlite": {
      const store = SqliteVisitStore.open(config.path);
      logger.info({ driver: "sqlite", path: config.path }, "Visit store ready");
      return store;
    }
    case "postgres": {
      const { host, port, database } = config.postgres;
      const store = await PostgresVisitStore.connect(createPool(config.postgres, logger));
      logger.info({ driver: "postgres", host, port, database }, "Visit store ready");
      return store;
    }
  }
}
