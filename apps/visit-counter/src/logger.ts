import pino, { type DestinationStream, type Logger } from "pino";

// ─── Logger ───────────────────────────────────────────────
// Raw JSON in production for log aggregators, pino-pretty while developing.
// Tests pass their own destination to read the lines back.
export const createLogger = (
  level: string = process.env.LOG_LEVEL || "info",
  destination?: DestinationStream,
): Logger => {
  if (destination) return pino({ level }, destination);

  const pretty = process.env.NODE_ENV !== "production" && process.env.NODE_ENV !== "test";
  return pino({
    level,
    transport: pretty ? { target: "pino-pretty" } : undefined,
  });
};

export type { Logger };
