import { Result } from "@fkws/klonk-result";

/**
 * Failure kinds raised by quarry.
 * Next: branch on `error.kind` after catching, or call `isQuarryError(error, kind)`.
 */
export type QuarryErrorKind =
  | "notFound"
  | "invalidRelationship"
  | "invalidSchema"
  | "invalidQuery"
  | "unexpectedResultCount"
  | "invalidChangeset"
  | "notImplemented"
  | "noActiveTransaction"
  | "configurationError"
  | "databaseError";

type QuarryErrorDetails = {
  /** SQL text that was running when the driver failed. */
  sql?: string;
  /** Field -> message map of a rejected changeset. */
  errors?: Readonly<Record<string, string>>;
  /** Underlying error (driver failure, timeout). */
  cause?: unknown;
};

/** Error raised by quarry; reads carry it as the error of a failed `Result`. */
export class QuarryError extends Error {
  public readonly kind: QuarryErrorKind;
  public readonly sql?: string;
  public readonly errors?: Readonly<Record<string, string>>;

  constructor(
    kind: QuarryErrorKind,
    message: string,
    details: QuarryErrorDetails = {},
  ) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = "QuarryError";
    this.kind = kind;
    if (details.sql !== undefined) {
      this.sql = details.sql;
    }
    if (details.errors !== undefined) {
      this.errors = details.errors;
    }
  }
}

/**
 * Run `work` and settle it into a `Result`.
 * A `QuarryError` is kept as the failure; other thrown values become plain errors.
 */
export async function settle<T>(work: () => Promise<T>): Promise<Result<T>> {
  try {
    return new Result({ success: true, data: await work() });
  } catch (error) {
    return new Result({
      success: false,
      error: error instanceof Error ? error : new Error(String(error)),
    });
  }
}

/** Narrow an unknown value to a `QuarryError`, optionally of one kind. */
export function isQuarryError(
  value: unknown,
  kind?: QuarryErrorKind,
): value is QuarryError {
  if (!(value instanceof QuarryError)) return false;
  return kind === undefined || value.kind === kind;
}

export function notFound(table: string, id: unknown): QuarryError {
  return new QuarryError("notFound", `${table} with id '${String(id)}' not found`);
}

export function invalidRelationship(table: string, name: string): QuarryError {
  return new QuarryError(
    "invalidRelationship",
    `Relationship '${name}' not found on '${table}'`,
  );
}

export function invalidSchema(reason: string): QuarryError {
  return new QuarryError("invalidSchema", `Invalid schema: ${reason}`);
}

export function invalidQuery(reason: string): QuarryError {
  return new QuarryError("invalidQuery", `Invalid query: ${reason}`);
}

export function unexpectedResultCount(expected: number, actual: number): QuarryError {
  return new QuarryError(
    "unexpectedResultCount",
    `Expected ${expected} result(s) but got ${actual}`,
  );
}

export function notImplemented(feature: string): QuarryError {
  return new QuarryError("notImplemented", `Feature not implemented: ${feature}`);
}

/** Wrap a driver failure with the SQL that caused it. */
export function databaseError(sql: string, cause: unknown): QuarryError {
  return new QuarryError("databaseError", `Query execution failed for '${sql}': ${describeError(cause)}`, {
    sql,
    cause,
  });
}

export function noActiveTransaction(reason: string): QuarryError {
  return new QuarryError("noActiveTransaction", `No active transaction: ${reason}`);
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
