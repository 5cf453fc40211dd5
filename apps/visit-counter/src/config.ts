import { z } from "zod";
import { ConfigurationError } from "./errors";

// ─── Environment Schema ───────────────────────────────────
// Everything is read once at startup. ALLOWED_ORIGINS is required even
// when the origin check is off so a misconfigured prod deploy fails early.

const missing = (name: string) => `environment variable not set: ${name}`;

const requiredString = (name: string) =>
  z
    .string({ required_error: missing(name) })
    .trim()
    .min(1, missing(name));

const port = z.coerce.number().int().min(1).max(65_535);
const positiveInt = z.coerce.number().int().positive();

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .default("false")
  .transform((v) => v === "true" || v === "1");

const originList = requiredString("ALLOWED_ORIGINS")
  .transform((raw) =>
    raw
      .split(",")
      .map((origin) => origin.trim())
      .filter((origin) => origin.length > 0),
  )
  .refine((origins) => origins.length > 0, missing("ALLOWED_ORIGINS"));

const EnvSchema = z.object({
  PORT: port.default(8000),
  APP_ENV: z.string().trim().default("dev"),
  ALLOWED_ORIGINS: originList,
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  DB_DRIVER: z.enum(["sqlite", "postgres"]).default("sqlite"),
  SQLITE_PATH: z.string().trim().min(1).default("visits.db"),
  DB_HOST: z.string().trim().optional(),
  DB_PORT: z.string().trim().optional(),
  DB_USER: z.string().trim().optional(),
  DB_PASSWORD: z.string().optional(),
  DB_NAME: z.string().trim().optional(),
  RATE_LIMIT_WINDOW_MS: positiveInt.default(60_000),
  RATE_LIMIT_MAX: positiveInt.default(5_000),
  SHUTDOWN_GRACE_MS: positiveInt.default(5_000),
  COLLECT_DEFAULT_METRICS: booleanFlag,
});

const PostgresEnvSchema = z.object({
  DB_HOST: requiredString("DB_HOST"),
  DB_PORT: z
    .string({ required_error: missing("DB_PORT") })
    .trim()
    .min(1, missing("DB_PORT"))
    .pipe(port),
  DB_USER: requiredString("DB_USER"),
  DB_PASSWORD: z
    .string({ required_error: missing("DB_PASSWORD") })
    .min(1, missing("DB_PASSWORD")),
  DB_NAME: requiredString("DB_NAME"),
});

export type LogLevel = z.infer<typeof EnvSchema>["LOG_LEVEL"];

export interface PostgresSettings {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
}

export type StorageConfig =
  | { driver: "sqlite"; path: string }
  | { driver: "postgres"; postgres: PostgresSettings };

export interface AppConfig {
  port: number;
  appEnv: string;
  /** Origin checking middleware is mounted only when this is true. */
  enforceOrigins: boolean;
  allowedOrigins: readonly string[];
  logLevel: LogLevel;
  storage: StorageConfig;
  rateLimit: { windowMs: number; max: number };
  shutdownGraceMs: number;
  collectDefaultMetrics: boolean;
}

const formatIssues = (error: z.ZodError): string =>
  error.issues
    .map((issue) =>
      issue.message.startsWith("environment variable not set")
        ? issue.message
        : `${issue.path.join(".")}: ${issue.message}`,
    )
    .join("; ");

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError(formatIssues(parsed.error), { cause: parsed.error });
  }
  const vars = parsed.data;

  let storage: StorageConfig;
  if (vars.DB_DRIVER === "postgres") {
    const pg = PostgresEnvSchema.safeParse(env);
    if (!pg.success) {
      throw new ConfigurationError(formatIssues(pg.error), { cause: pg.error });
    }
    storage = {
      driver: "postgres",
      postgres: {
        host: pg.data.DB_HOST,
        port: pg.data.DB_PORT,
        user: pg.data.DB_USER,
        password: pg.data.DB_PASSWORD,
        database: pg.data.DB_NAME,
      },
    };
  } else {
    storage = { driver: "sqlite", path: vars.SQLITE_PATH };
  }

  return Object.freeze({
    port: vars.PORT,
    appEnv: vars.APP_ENV,
    enforceOrigins: vars.APP_ENV === "prod",
    allowedOrigins: Object.freeze([...vars.ALLOWED_ORIGINS]),
    logLevel: vars.LOG_LEVEL,
    storage,
    rateLimit: { windowMs: vars.RATE_LIMIT_WINDOW_MS, max: vars.RATE_LIMIT_MAX },
    shutdownGraceMs: vars.SHUTDOWN_GRACE_MS,
    collectDefaultMetrics: vars.COLLECT_DEFAULT_METRICS,
  });
}
