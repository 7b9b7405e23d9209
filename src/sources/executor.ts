import { databaseError } from "../core/errors";
import { isScalar, makeRow, type Row, type RowValue, type Scalar } from "../core/row";
import type { EntitySchema, FieldType } from "../core/schema";
import type { CompiledQuery } from "../core/sql";
import type { Logger } from "../runtime/config";
import type { PgResult, PgSession } from "../runtime/pgClient";

export type ExecutorOptions = {
  logger: Logger;
  logSql: boolean;
  /** Chain statements one after another; set for connections owned by a transaction. */
  serial?: boolean;
  /** Runs before each statement is sent; throws when the session may no longer be used. */
  guard?: () => void;
};

const truthy = new Set(["t", "true", "1", "y", "yes", "on"]);
const falsy = new Set(["f", "false", "0", "n", "no", "off"]);
const integerPattern = /^-?\d+$/;

function genericValue(raw: unknown): Scalar {
  if (raw === undefined) return null;
  if (isScalar(raw)) return raw;
  if (typeof raw === "bigint") return raw.toString();
  if (typeof raw === "object") return JSON.stringify(raw);
  return String(raw);
}

/**
 * Decode one driver value by the column's semantic type.
 * Values the type does not recognise fall back to the generic scalar mapping.
 */
export function decodeValue(raw: unknown, type?: FieldType): Scalar {
  if (raw === null || raw === undefined) return null;
  switch (type) {
    case "int": {
      if (typeof raw === "number") return raw;
      if (typeof raw === "bigint") {
        const value = Number(raw);
        return Number.isSafeInteger(value) ? value : raw.toString();
      }
      if (typeof raw === "string" && raw.trim() !== "") {
        const trimmed = raw.trim();
        const value = Number(trimmed);
        if (Number.isSafeInteger(value)) return value;
        // int8 beyond 2^53 stays text
        if (integerPattern.test(trimmed)) return trimmed;
        if (!Number.isNaN(value)) return value;
      }
      break;
    }
    case "float": {
      if (typeof raw === "number") return raw;
      if (typeof raw === "bigint") return Number(raw);
      if (typeof raw === "string" && raw.trim() !== "") {
        const value = Number(raw);
        if (!Number.isNaN(value)) return value;
      }
      break;
    }
    case "bool": {
      if (typeof raw === "boolean") return raw;
      if (typeof raw === "number") return raw !== 0;
      if (typeof raw === "string") {
        const lowered = raw.trim().toLowerCase();
        if (truthy.has(lowered)) return true;
        if (falsy.has(lowered)) return false;
      }
      break;
    }
    case "timestamp": {
      if (raw instanceof Date) return raw;
      if (typeof raw === "string" || typeof raw === "number") {
        const date = new Date(raw);
        if (!Number.isNaN(date.getTime())) return date;
      }
      break;
    }
    case "bytes": {
      if (raw instanceof Uint8Array) return new Uint8Array(raw);
      if (typeof raw === "string" && raw.startsWith("\\x")) {
        return new Uint8Array(Buffer.from(raw.slice(2), "hex"));
      }
      break;
    }
    case "string":
    case "uuid":
    case undefined:
      break;
  }
  return genericValue(raw);
}

/** Map a driver row to a frozen `Row`, decoding declared columns by type. */
export function decodeRow(raw: Readonly<Record<string, unknown>>, schema?: EntitySchema): Row {
  const values: Record<string, RowValue> = {};
  for (const [column, value] of Object.entries(raw)) {
    values[column] = decodeValue(value, schema?.field(column)?.type);
  }
  return makeRow(values);
}

/**
 * Runs compiled statements on one session and decodes what comes back.
 * This is the only place raw driver values become `Row`s.
 * Next: use it through a `Repo`.
 */
export class Executor {
  private _session: PgSession;
  private _options: ExecutorOptions;
  private _tail: Promise<void> = Promise.resolve();

  constructor(session: PgSession, options: ExecutorOptions) {
    this._session = session;
    this._options = options;
  }

  /** Run a compiled query and decode the rows with `schema`. */
  async query(compiled: CompiledQuery, schema?: EntitySchema): Promise<Row[]> {
    const result = await this._run(compiled.sql, compiled.params);
    return result.rows.map((row) => decodeRow(row, schema));
  }

  /** Run a statement and return the affected row count. */
  async execute(compiled: CompiledQuery): Promise<number> {
    const result = await this._run(compiled.sql, compiled.params);
    return result.count;
  }

  /** Run caller-written SQL with `$n` parameters. */
  async raw(sql: string, params: readonly Scalar[] = []): Promise<Row[]> {
    const result = await this._run(sql, params);
    return result.rows.map((row) => decodeRow(row));
  }

  private _run(sql: string, params: readonly Scalar[]): Promise<PgResult> {
    if (!this._options.serial) {
      return this._send(sql, params);
    }
    const next = this._tail.then(() => this._send(sql, params));
    // The queue only orders statements; each caller still sees its own failure.
    this._tail = next.then(
      () => undefined,
      () => undefined,
    );
    return next;
  }

  private async _send(sql: string, params: readonly Scalar[]): Promise<PgResult> {
    this._options.guard?.();
    if (this._options.logSql) {
      this._options.logger.debug(`[quarry] ${sql}`, params);
    }
    try {
      return await this._session.unsafe(sql, params);
    } catch (error) {
      throw databaseError(sql, error);
    }
  }
}
