import type { RequestHandler } from "express";
import { collectDefaultMetrics, Counter, Histogram, Registry } from "prom-client";

// ─── Metrics ──────────────────────────────────────────────
// One registry per app instance rather than prom-client's global one, so
// each test builds its own and counts start at zero.

type RequestLabels = "method" | "endpoint";

export interface Metrics {
  registry: Registry;
  requestsTotal: Counter<RequestLabels>;
  requestDuration: Histogram<RequestLabels>;
}

export interface MetricsOptions {
  registry?: Registry;
  /** Also register prom-client's process and GC metrics. */
  collectDefaults?: boolean;
}

export function createMetrics(options: MetricsOptions = {}): Metrics {
  const registry = options.registry ?? new Registry();

  const requestsTotal = new Counter({
    name: "http_requests_total",
    help: "Total number of HTTP requests",
    labelNames: ["method", "endpoint"] as const,
    registers: [registry],
  });

  const requestDuration = new Histogram({
    name: "http_request_duration_seconds",
    help: "Duration of HTTP requests",
    labelNames: ["method", "endpoint"] as const,
    registers: [registry],
  });

  if (options.collectDefaults) collectDefaultMetrics({ register: registry });

  return { registry, requestsTotal, requestDuration };
}

/**
 * Times every request and counts it once the response closes, which also
 * covers requests that errored or were aborted by the client.
 *
 * Pass `endpoint` when the stage is mounted on a single route, so the label
 * is the route and not whatever spelling the client sent.
 */
export const requestMetrics =
  ({ requestsTotal, requestDuration }: Metrics, endpoint?: string): RequestHandler =>
  (req, res, next) => {
    const labels = { method: req.method, endpoint: endpoint ?? req.path };
    const stopTimer = requestDuration.startTimer(labels);

    res.once("close", () => {
      stopTimer();
      requestsTotal.inc(labels);
    });

    next();
  };
