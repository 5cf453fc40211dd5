import compression from "compression";
import express, { type Express, type NextFunction, type Request, type RequestHandler, type Response } from "express";
import helmet from "helmet";
import type { AppConfig } from "./config";
import { sendError } from "./http";
import type { Logger } from "./logger";
import { requestMetrics, type Metrics } from "./metrics";
import { corsPolicy, originCheck, rateLimiter, requestLogger } from "./middleware";
import { API_PATH, healthRouter, visitCountHandler } from "./routes";
import type { VisitStore } from "./store";

/** Everything a request can reach, built once at startup. */
export interface AppContext {
  config: AppConfig;
  logger: Logger;
  metrics: Metrics;
  store: VisitStore;
}

/**
 * Stages wrapped around the visit handler, outermost first. Metrics and
 * logging come before anything that can short-circuit so rejected
 * requests are still timed and logged.
 */
export function buildPipeline({ config, logger, metrics }: AppContext): RequestHandler[] {
  const pipeline: RequestHandler[] = [
    requestMetrics(metrics, API_PATH),
    requestLogger(logger),
    rateLimiter(config.rateLimit),
    corsPolicy(config.enforceOrigins ? config.allowedOrigins : undefined),
  ];
  if (config.enforceOrigins) pipeline.push(originCheck(config.allowedOrigins));
  return pipeline;
}

export function createApp(ctx: AppContext): Express {
  const app = express();
  // /API/count and /api/count/ are not the counter route
  app.set("case sensitive routing", true);
  app.set("strict routing", true);

  // Browsers on allowed origins must be able to read the JSON
  app.use(helmet({ crossOriginResourcePolicy: { policy: "cross-origin" } }));
  app.use(compression());

  app.use(healthRouter(ctx));
  app.all(API_PATH, ...buildPipeline(ctx), visitCountHandler(ctx));

  // Error handler
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    ctx.logger.error({ err }, "Unhandled error");
    if (res.headersSent) return;
    sendError(res, 500, "Internal server error");
  });

  return app;
}
