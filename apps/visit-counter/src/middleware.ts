import { randomUUID } from "crypto";
import cors from "cors";
import type { RequestHandler } from "express";
import rateLimit from "express-rate-limit";
import { sendError } from "./http";
import type { Logger } from "./logger";

// ─── Request Pipeline Stages ──────────────────────────────
// Each factory returns one stage. Stages that short-circuit answer the
// request themselves and never call next().

/**
 * Logs method, url, status and duration once the response closes. Requests
 * the client dropped before the response was flushed are logged as aborted.
 */
export const requestLogger =
  (logger: Logger): RequestHandler =>
  (req, res, next) => {
    const incoming = req.get("x-request-id");
    const requestId = incoming && incoming.length <= 128 ? incoming : randomUUID();
    const start = process.hrtime.bigint();
    res.setHeader("x-request-id", requestId);

    res.once("close", () => {
      const durationMs = Number(process.hrtime.bigint() - start) / 1_000_000;
      const aborted = !res.writableFinished;
      logger.info(
        {
          requestId,
          method: req.method,
          url: req.originalUrl,
          status: res.statusCode,
          durationMs,
          aborted,
        },
        aborted ? "request aborted" : "request completed",
      );
    });

    next();
  };

/** Per-client fixed window. Answers 429 once the window is used up. */
export const rateLimiter = ({ windowMs, max }: { windowMs: number; max: number }): RequestHandler =>
  rateLimit({
    windowMs,
    limit: max,
    standardHeaders: true,
    legacyHeaders: false,
    handler: (_req, res) => sendError(res, 429, "Too many requests"),
  });

/**
 * Without an allow-list every origin gets `Access-Control-Allow-Origin: *`.
 * With one, only listed origins get the header back and other origins get
 * none, preflight included. Preflight requests are answered here with 204.
 */
export const corsPolicy = (allowedOrigins?: readonly string[]): RequestHandler =>
  cors({
    origin: allowedOrigins ? [...allowedOrigins] : "*",
    methods: ["GET", "POST", "OPTIONS"],
    maxAge: 600,
  });

/**
 * Lets a request through only when its Origin header exactly matches an
 * allowed origin, and echoes that origin back in the CORS header.
 * A request without an Origin header is rejected; the Host header is not
 * consulted.
 */
export const originCheck =
  (allowedOrigins: readonly string[]): RequestHandler =>
  (req, res, next) => {
    // a rejection must not carry a CORS grant written by an earlier stage
    if (allowedOrigins.length === 0) {
      res.removeHeader("Access-Control-Allow-Origin");
      sendError(res, 500, "Allowed origins not set");
      return;
    }

    const origin = req.get("origin");
    if (origin === undefined || !allowedOrigins.includes(origin)) {
      res.removeHeader("Access-Control-Allow-Origin");
      sendError(res, 403, "Forbidden");
      return;
    }

    res.setHeader("Access-Control-Allow-Origin", origin);
    res.vary("Origin");
    next();
  };
