import postgres from "postgres";
import type { Scalar } from "../core/row";

/** No custom type parsers are registered; values arrive as the driver parses them. */
type PostgresCustomTypeMap = Record<string, never>;

/**
 * postgres.js connection options.
 * Next: pass to `createPgClient(...)` or let `quarry.connect(...)` build them from config.
 */
export type PgConnectionOptions = postgres.Options<PostgresCustomTypeMap>;

/** A connection URL or postgres.js options. */
export type PgConnectionInput = string | PgConnectionOptions;

/** Raw result of one statement: driver rows plus the affected row count. */
export type PgResult = {
  rows: Record<string, unknown>[];
  count: number;
};

/**
 * Anything that can run a parameterised statement: the pool or one reserved connection.
 * Next: wrap it in an `Executor`.
 */
export interface PgSession {
  /**
   * Execute SQL with positional `$n` parameters.
   * Next: decode rows through the executor.
   */
  unsafe(query: string, values?: readonly Scalar[]): Promise<PgResult>;
}

/** A connection taken out of the pool; `release()` hands it back. */
export interface PgReservedSession extends PgSession {
  release(): void;
}

/**
 * Pooled Postgres client contract used by `Database`.
 * Next: call `reserve()` for transactions and `end(...)` on shutdown.
 */
export interface PgClient extends PgSession {
  reserve(): Promise<PgReservedSession>;
  /**
   * Close the pool.
   * Next: release resources by calling `db.close()`.
   */
  end(options?: { timeout?: number }): Promise<void>;
}

export type PgClientOptions = {
  /** Server-side `statement_timeout` in milliseconds. */
  statementTimeoutMs?: number;
  /** Pool size. */
  max?: number;
};

async function runUnsafe(
  sql: postgres.Sql<Record<string, unknown>>,
  query: string,
  values: readonly Scalar[] = [],
): Promise<PgResult> {
  const result = await sql.unsafe(query, [...values]);
  return { rows: Array.from(result), count: result.count };
}

function clientOptions(options: PgClientOptions): PgConnectionOptions {
  const out: PgConnectionOptions = {};
  if (options.max !== undefined) {
    out.max = options.max;
  }
  if (options.statementTimeoutMs !== undefined) {
    out.connection = { statement_timeout: options.statementTimeoutMs };
  }
  return out;
}

/**
 * Create a pooled postgres.js client.
 * Next: hand it to `new Database(...)`, or use `quarry.connect(...)`.
 */
export function createPgClient(
  input: PgConnectionInput,
  options: PgClientOptions = {},
): PgClient {
  const extra = clientOptions(options);
  const sql =
    typeof input === "string"
      ? postgres(input, extra)
      : postgres({ ...input, ...extra });
  return {
    unsafe: (query, values) => runUnsafe(sql, query, values),
    reserve: async () => {
      const reserved = await sql.reserve();
      return {
        unsafe: (query, values) => runUnsafe(reserved, query, values),
        release: () => reserved.release(),
      };
    },
    end: async (opts?: { timeout?: number }) => sql.end({ timeout: opts?.timeout }),
  };
}
