import { keyOf, type Row, type Scalar } from "./row";
import type { CompiledQuery } from "./sql";

/** Default number of keys per `IN (...)` list and rows per multi-row insert. */
export const DEFAULT_BATCH_SIZE = 1000;

export function chunkArray<T>(values: readonly T[], size: number): T[][] {
  if (size <= 0) return [values.slice()];
  const out: T[][] = [];
  for (let i = 0; i < values.length; i += size) {
    out.push(values.slice(i, i + size));
  }
  return out;
}

/**
 * Drop nulls and repeated keys, keeping first-seen order.
 * `1` and `"1"` count as the same key.
 */
export function uniqueKeys(values: Iterable<Scalar | undefined>): Scalar[] {
  const seen = new Set<string>();
  const out: Scalar[] = [];
  for (const value of values) {
    if (value === undefined) continue;
    const key = keyOf(value);
    if (key === undefined || seen.has(key)) continue;
    seen.add(key);
    out.push(value);
  }
  return out;
}

/** Runs one compiled statement and returns its decoded rows. */
export type StatementRunner = (compiled: CompiledQuery) => Promise<Row[]>;

/**
 * Fetch rows for a key set, one statement per chunk, concatenating the results.
 * Chunks run one after another; `signal` is checked before each one.
 * Next: group the rows with `groupRows(...)` or `indexRows(...)`.
 */
export async function fetchInChunks(
  run: StatementRunner,
  keys: readonly Scalar[],
  batchSize: number,
  compileChunk: (chunk: Scalar[]) => CompiledQuery,
  signal?: AbortSignal,
): Promise<Row[]> {
  const rows: Row[] = [];
  for (const chunk of chunkArray(keys, batchSize)) {
    if (chunk.length === 0) continue;
    signal?.throwIfAborted();
    rows.push(...(await run(compileChunk(chunk))));
  }
  return rows;
}

/** Group rows by the normalised value of `column`; rows without a key are skipped. */
export function groupRows(rows: readonly Row[], column: string): Map<string, Row[]> {
  const groups = new Map<string, Row[]>();
  for (const row of rows) {
    const key = keyOf(row[column]);
    if (key === undefined) continue;
    const group = groups.get(key);
    if (group) {
      group.push(row);
    } else {
      groups.set(key, [row]);
    }
  }
  return groups;
}

/** Index rows by `column`; the first row wins on duplicates. */
export function indexRows(rows: readonly Row[], column: string): Map<string, Row> {
  const index = new Map<string, Row>();
  for (const row of rows) {
    const key = keyOf(row[column]);
    if (key === undefined || index.has(key)) continue;
    index.set(key, row);
  }
  return index;
}
