import { Router, type Request, type RequestHandler, type Response } from "express";
import type { IncrementVisitResponse, VisitCountResponse } from "@visit-counter/types";
import { errorMessage } from "./errors";
import { sendError, sendJsonOrError } from "./http";
import type { Logger } from "./logger";
import type { Metrics } from "./metrics";
import type { VisitStore } from "./store";

export const API_PATH = "/api/count";

interface VisitDeps {
  store: VisitStore;
  logger: Logger;
}

const incrementVisitCount = async (_req: Request, res: Response, { store, logger }: VisitDeps) => {
  try {
    await store.incrementVisitCount(new Date());
  } catch (err) {
    logger.error({ err }, "Error incrementing visit count");
    sendError(res, 500, `Failed to increment visit count: ${errorMessage(err)}`);
    return;
  }

  logger.debug("Visit count incremented");
  sendJsonOrError<IncrementVisitResponse>(res, { message: "Visit count incremented" }, logger);
};

const getVisitCount = async (_req: Request, res: Response, { store, logger }: VisitDeps) => {
  let visits: number;
  try {
    visits = await store.getVisitCount();
  } catch (err) {
    logger.error({ err }, "Error getting visit count");
    sendError(res, 500, `Failed to get visit count: ${errorMessage(err)}`);
    return;
  }

  sendJsonOrError<VisitCountResponse>(res, { visits }, logger);
};

/**
 * POST increments, GET reads, anything else is 405. The store is only
 * touched for the two supported methods.
 */
export const visitCountHandler =
  (deps: VisitDeps): RequestHandler =>
  async (req, res, next) => {
    try {
      switch (req.method) {
        case "POST":
          await incrementVisitCount(req, res, deps);
          break;
        case "GET":
          await getVisitCount(req, res, deps);
          break;
        default:
          res.setHeader("Allow", "GET, POST");
          sendError(res, 405, "Invalid request method");
      }
    } catch (err) {
      next(err);
    }
  };

// ─── Health + Scrape ──────────────────────────────────────
export const healthRouter = ({
  store,
  metrics,
  logger,
}: VisitDeps & { metrics: Metrics }): Router => {
  const router = Router();

  router.get("/healthz", (_req, res) => {
    res.type("text/plain").send("ok");
  });

  router.get("/readyz", async (_req, res) => {
    try {
      await store.ping();
      res.type("text/plain").send("ok");
    } catch (err) {
      logger.error({ err }, "Readiness check failed");
      res.status(500).type("text/plain").send("unavailable");
    }
  });

  router.get("/metrics", async (_req, res, next) => {
    try {
      res.setHeader("Content-Type", metrics.registry.contentType);
      res.send(await metrics.registry.metrics());
    } catch (err) {
      next(err);
    }
  });

  return router;
};
