import { invalidQuery, invalidSchema } from "./errors";
import type { Scalar } from "./row";
import type { EntitySchema } from "./schema";
import {
  flatten,
  ident,
  joinFragments,
  param,
  paramList,
  sql,
  text,
  type CompiledQuery,
  type Fragment,
} from "./sql";
import { chunkArray } from "./batch";

/** Column-keyed values, as produced by `columnValues(...)`. */
export type ColumnValues = Readonly<Record<string, Scalar>>;

/** What an upsert collides on: a column list or a named constraint. */
export type ConflictTarget =
  | { readonly columns: readonly string[] }
  | { readonly constraint: string };

function declaredColumns(schema: EntitySchema, values: ColumnValues): string[] {
  return schema.columns.filter((column) => column in values);
}

function columnOf(schema: EntitySchema, name: string): string {
  const descriptor = schema.field(name);
  if (!descriptor) {
    throw invalidQuery(`unknown field '${name}' on '${schema.table}'`);
  }
  return descriptor.column;
}

function valueOf(values: ColumnValues, column: string): Scalar {
  return values[column] ?? null;
}

function insertHead(schema: EntitySchema, columns: readonly string[]): string {
  return `INSERT INTO ${ident(schema.table)} (${columns.map(ident).join(", ")}) VALUES `;
}

/**
 * Single-row insert in declared field order.
 * @example
 * compileInsert(users, { name: "Ada", age: 36 })
 * // INSERT INTO users (name, age) VALUES ($1, $2) RETURNING *
 */
export function compileInsert(schema: EntitySchema, values: ColumnValues): CompiledQuery {
  const columns = declaredColumns(schema, values);
  if (columns.length === 0) {
    return flatten(text(`INSERT INTO ${ident(schema.table)} DEFAULT VALUES RETURNING *`));
  }
  return flatten(
    sql(
      insertHead(schema, columns),
      "(",
      paramList(columns.map((column) => valueOf(values, column))),
      ") RETURNING *",
    ),
  );
}

/**
 * Multi-row insert, one statement per batch of at most `batchSize` rows.
 * Columns are the union of every row's columns; a row without a value gets `DEFAULT`.
 */
export function compileInsertAll(
  schema: EntitySchema,
  rows: readonly ColumnValues[],
  batchSize: number,
): CompiledQuery[] {
  const statements: CompiledQuery[] = [];
  for (const batch of chunkArray(rows, batchSize)) {
    const present = new Set<string>();
    for (const row of batch) {
      for (const column of declaredColumns(schema, row)) present.add(column);
    }
    const columns = schema.columns.filter((column) => present.has(column));
    if (columns.length === 0) {
      const statement = flatten(
        text(`INSERT INTO ${ident(schema.table)} DEFAULT VALUES RETURNING *`),
      );
      statements.push(...batch.map(() => statement));
      continue;
    }
    const tuples = batch.map((row) => {
      const cells: Fragment[] = columns.map((column) =>
        column in row ? param(valueOf(row, column)) : text("DEFAULT"),
      );
      return sql("(", joinFragments(cells, ", "), ")");
    });
    statements.push(
      flatten(sql(insertHead(schema, columns), joinFragments(tuples, ", "), " RETURNING *")),
    );
  }
  return statements;
}

/** `UPDATE ... SET ... WHERE <pk> = $n RETURNING *`. */
export function compileUpdate(
  schema: EntitySchema,
  id: Scalar,
  changes: ColumnValues,
): CompiledQuery {
  const primaryKey = schema.primaryKey.column;
  const columns = declaredColumns(schema, changes).filter((column) => column !== primaryKey);
  if (columns.length === 0) {
    throw invalidQuery(`update on '${schema.table}' has no changes`);
  }
  const assignments = columns.map((column) =>
    sql(`${ident(column)} = `, param(valueOf(changes, column))),
  );
  return flatten(
    sql(
      `UPDATE ${ident(schema.table)} SET `,
      joinFragments(assignments, ", "),
      ` WHERE ${ident(primaryKey)} = `,
      param(id),
      " RETURNING *",
    ),
  );
}

export function compileDelete(schema: EntitySchema, id: Scalar): CompiledQuery {
  return flatten(
    sql(
      `DELETE FROM ${ident(schema.table)} WHERE ${ident(schema.primaryKey.column)} = `,
      param(id),
    ),
  );
}

/**
 * `INSERT ... ON CONFLICT ... DO UPDATE SET col = EXCLUDED.col RETURNING *`.
 * `set` lists the fields to overwrite; without it every inserted column except
 * the primary key and the conflict columns is overwritten.
 */
export function compileUpsert(
  schema: EntitySchema,
  values: ColumnValues,
  conflict: ConflictTarget,
  set?: readonly string[],
): CompiledQuery {
  const columns = declaredColumns(schema, values);
  if (columns.length === 0) {
    throw invalidSchema(`upsert on '${schema.table}' has no values`);
  }

  let target: string;
  let conflictColumns: string[] = [];
  if ("constraint" in conflict) {
    target = `ON CONSTRAINT ${ident(conflict.constraint)}`;
  } else {
    if (conflict.columns.length === 0) {
      throw invalidSchema(`upsert on '${schema.table}' has an empty conflict target`);
    }
    conflictColumns = conflict.columns.map((name) => columnOf(schema, name));
    target = `(${conflictColumns.map(ident).join(", ")})`;
  }

  const primaryKey = schema.primaryKey.column;
  let updates: string[];
  if (set !== undefined) {
    if (set.length === 0) {
      throw invalidSchema(`upsert on '${schema.table}' has an empty update column list`);
    }
    updates = set.map((name) => columnOf(schema, name));
    if (updates.includes(primaryKey)) {
      throw invalidSchema(
        `upsert on '${schema.table}' cannot overwrite primary key '${primaryKey}'`,
      );
    }
  } else {
    updates = columns.filter(
      (column) => column !== primaryKey && !conflictColumns.includes(column),
    );
    if (updates.length === 0) {
      throw invalidSchema(`upsert on '${schema.table}' leaves no column to update`);
    }
  }

  const assignments = updates
    .map((column) => `${ident(column)} = EXCLUDED.${ident(column)}`)
    .join(", ");
  return flatten(
    sql(
      insertHead(schema, columns),
      "(",
      paramList(columns.map((column) => valueOf(values, column))),
      `) ON CONFLICT ${target} DO UPDATE SET ${assignments} RETURNING *`,
    ),
  );
}
