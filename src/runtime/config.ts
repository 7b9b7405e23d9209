import { DEFAULT_BATCH_SIZE } from "../core/batch";
import { QuarryError } from "../core/errors";

/** Transaction isolation levels accepted by `BEGIN ISOLATION LEVEL ...`. */
export type IsolationLevel =
  | "READ UNCOMMITTED"
  | "READ COMMITTED"
  | "REPEATABLE READ"
  | "SERIALIZABLE";

export const ISOLATION_LEVELS: readonly IsolationLevel[] = [
  "READ UNCOMMITTED",
  "READ COMMITTED",
  "REPEATABLE READ",
  "SERIALIZABLE",
];

/**
 * Sink for statement logs and best-effort cleanup failures.
 * `console` fits; so does a pino or winston logger.
 */
export type Logger = {
  debug(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
};

/** Explicit options; anything left out falls back to the environment, then to defaults. */
export type QuarryOptions = {
  url?: string;
  host?: string;
  port?: number;
  user?: string;
  password?: string;
  database?: string;
  batchSize?: number;
  isolationLevel?: IsolationLevel;
  logSql?: boolean;
  statementTimeoutMs?: number;
  maxConnections?: number;
  logger?: Logger;
};

/** Fully resolved configuration. */
export type QuarryConfig = {
  /** Set when `DATABASE_URL` / `url` was given; wins over the discrete fields. */
  url?: string;
  host: string;
  port: number;
  user: string;
  password?: string;
  database: string;
  batchSize: number;
  isolationLevel?: IsolationLevel;
  logSql: boolean;
  statementTimeoutMs?: number;
  maxConnections?: number;
  logger: Logger;
};

type Env = Readonly<Record<string, string | undefined>>;

function configurationError(message: string): QuarryError {
  return new QuarryError("configurationError", `Invalid configuration: ${message}`);
}

function positiveInt(name: string, raw: string | number | undefined): number | undefined {
  if (raw === undefined || raw === "") return undefined;
  const value = typeof raw === "number" ? raw : Number(raw.trim());
  if (!Number.isInteger(value) || value <= 0) {
    throw configurationError(`${name} must be a positive integer, got '${raw}'`);
  }
  return value;
}

function isolationLevel(raw: string | undefined): IsolationLevel | undefined {
  if (raw === undefined || raw === "") return undefined;
  const normalized = raw.trim().toUpperCase().replace(/[_\s]+/g, " ");
  const level = ISOLATION_LEVELS.find((candidate) => candidate === normalized);
  if (!level) {
    throw configurationError(`unknown isolation level '${raw}'`);
  }
  return level;
}

function flag(raw: string | undefined): boolean | undefined {
  if (raw === undefined || raw === "") return undefined;
  return ["1", "true", "yes", "on"].includes(raw.trim().toLowerCase());
}

/**
 * Merge explicit options over environment variables over defaults.
 * Next: pass the result to `quarry.connect(...)`.
 * @example
 * resolveConfig({ batchSize: 500 }, { DB_HOST: "db.internal" })
 */
export function resolveConfig(options: QuarryOptions = {}, env: Env = process.env): QuarryConfig {
  const url = options.url ?? (env.DATABASE_URL || undefined);
  const password = options.password ?? env.DB_PASSWORD;
  const statementTimeoutMs = positiveInt(
    "statementTimeoutMs",
    options.statementTimeoutMs ?? env.QUARRY_STATEMENT_TIMEOUT_MS,
  );
  const maxConnections = positiveInt("maxConnections", options.maxConnections);
  const level = options.isolationLevel ?? isolationLevel(env.QUARRY_ISOLATION_LEVEL);
  if (level !== undefined && !ISOLATION_LEVELS.includes(level)) {
    throw configurationError(`unknown isolation level '${level}'`);
  }

  const config: QuarryConfig = {
    host: options.host ?? (env.DB_HOST || "localhost"),
    port: positiveInt("port", options.port ?? env.DB_PORT) ?? 5432,
    user: options.user ?? (env.DB_USER || "postgres"),
    database: options.database ?? (env.DB_NAME || "postgres"),
    batchSize:
      positiveInt("batchSize", options.batchSize ?? env.QUARRY_BATCH_SIZE) ?? DEFAULT_BATCH_SIZE,
    logSql: options.logSql ?? flag(env.QUARRY_LOG_SQL) ?? false,
    logger: options.logger ?? console,
  };
  if (url !== undefined) config.url = url;
  if (password !== undefined) config.password = password;
  if (level !== undefined) config.isolationLevel = level;
  if (statementTimeoutMs !== undefined) config.statementTimeoutMs = statementTimeoutMs;
  if (maxConnections !== undefined) config.maxConnections = maxConnections;
  return config;
}
