/** Scalar values that travel between SQL parameters and decoded rows. */
export type Scalar = string | number | boolean | Date | Uint8Array | null;

/**
 * Value stored under a row key.
 * Preloaded associations attach a nested row, `null`, or a list of rows.
 */
export type RowValue = Scalar | Row | readonly Row[];

/**
 * One database row keyed by column name.
 * Rows are frozen; `attach(...)` returns a new row instead of mutating.
 */
export type Row = { readonly [column: string]: RowValue };

/** Freeze a shallow copy of a column -> value mapping. */
export function makeRow(values: Record<string, RowValue>): Row {
  return Object.freeze({ ...values });
}

/**
 * Return a new row with `value` stored under the association `name`.
 * Next: pass the enriched row to `toEntity(...)` or attach it to a parent row.
 */
export function attach(row: Row, name: string, value: Row | readonly Row[] | null): Row {
  return Object.freeze({ ...row, [name]: value });
}

export function isScalar(value: unknown): value is Scalar {
  return (
    value === null ||
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean" ||
    value instanceof Date ||
    value instanceof Uint8Array
  );
}

export function isRow(value: RowValue | undefined): value is Row {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Date) &&
    !(value instanceof Uint8Array)
  );
}

/**
 * Normalise a key value for hash lookups.
 * Postgres returns `int8` as a string and `int4` as a number, so both map to the same key.
 * Returns `undefined` for values that can never match (null, missing, nested rows).
 */
export function keyOf(value: RowValue | undefined): string | undefined {
  if (value === null || value === undefined) return undefined;
  if (typeof value === "number" || typeof value === "string") {
    return String(value);
  }
  if (typeof value === "boolean") {
    return value ? "true" : "false";
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (value instanceof Uint8Array) {
    return Buffer.from(value).toString("hex");
  }
  return undefined;
}
