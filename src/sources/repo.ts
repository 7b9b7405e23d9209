import type { Result } from "@fkws/klonk-result";
import { Changeset } from "../core/changeset";
import {
  compileAggregate,
  compileGroupedAggregate,
  compileSelect,
  type AggregateFunction,
} from "../core/compiler";
import {
  noActiveTransaction,
  notFound,
  QuarryError,
  settle,
  unexpectedResultCount,
} from "../core/errors";
import { preload } from "../core/preload";
import { Query } from "../core/query";
import { eq } from "../core/queryFns";
import { isScalar, makeRow, type Row, type RowValue, type Scalar } from "../core/row";
import {
  columnValues,
  toEntity,
  toRow,
  type Entity,
  type EntitySchema,
  type Loaded,
  type SchemaRegistry,
} from "../core/schema";
import {
  compileDelete,
  compileInsert,
  compileInsertAll,
  compileUpdate,
  compileUpsert,
  type ColumnValues,
  type ConflictTarget,
} from "../core/writes";
import type { IsolationLevel, Logger } from "../runtime/config";
import type { PgReservedSession } from "../runtime/pgClient";
import type { Executor } from "./executor";
import { Transaction } from "./transaction";

/** Field values accepted by writes; keys are field names (column names also work). */
export type EntityInput<S extends EntitySchema> = Partial<Entity<S>> &
  Readonly<Record<string, unknown>>;

/** A write payload: a changeset or plain field values. */
export type WriteInput<S extends EntitySchema> = Changeset | EntityInput<S>;

export type GroupedValue = {
  readonly group: Row;
  readonly value: Scalar;
};

export type UpsertOptions = {
  /** Conflict columns (field or column names), or a named constraint. */
  onConflict: readonly string[] | { constraint: string };
  /** Fields to overwrite on conflict; defaults to every inserted non-key column. */
  set?: readonly string[];
};

/** Everything a repo needs; passed explicitly, never read from ambient state. */
export type RepoContext = {
  executor: Executor;
  registry: SchemaRegistry;
  batchSize: number;
  logger: Logger;
  logSql: boolean;
  isolationLevel?: IsolationLevel;
  /** Set on repos scoped to a transaction. */
  transaction?: Transaction;
  /** Hands out a dedicated connection for a new transaction; absent on scoped repos. */
  reserve?: () => Promise<PgReservedSession>;
};

const numericPattern = /^-?\d+(\.\d+)?(e[+-]?\d+)?$/i;

function aggregateValue(value: RowValue | undefined): Scalar {
  if (value === undefined || !isScalar(value)) return null;
  if (typeof value === "string" && numericPattern.test(value)) {
    return Number(value);
  }
  return value;
}

/**
 * Explicit handle for reads, writes, preloads and transactions.
 * The root handle is a `Database`; `transaction(...)` hands `work` a repo bound to one connection.
 * Next: build queries with `Query.from(...)` and run them with `run(...)`.
 */
export class Repo {
  protected readonly _context: RepoContext;

  constructor(context: RepoContext) {
    this._context = context;
  }

  get registry(): SchemaRegistry {
    return this._context.registry;
  }

  /** True for repos handed to `transaction(...)` work while that transaction is open. */
  get inTransaction(): boolean {
    return this._context.transaction?.isActive ?? false;
  }

  /**
   * Compile, run and decode `query`, then apply its preloads.
   * Reads settle into a `Result`; check `isErr()` before `unwrap()`.
   */
  async rows(query: Query): Promise<Result<Row[]>> {
    return settle(() => this._rows(query));
  }

  /** Run `query` and map the rows to entities of `schema`. */
  async run<S extends EntitySchema>(
    schema: S,
    query: Query,
  ): Promise<Result<Loaded<Entity<S>>[]>> {
    return settle(() => this._run(schema, query));
  }

  async all<S extends EntitySchema>(schema: S): Promise<Result<Loaded<Entity<S>>[]>> {
    return this.run(schema, Query.from(schema));
  }

  async first<S extends EntitySchema>(
    schema: S,
    query: Query = Query.from(schema),
  ): Promise<Result<Loaded<Entity<S>> | null>> {
    return settle(() => this._first(schema, query));
  }

  /** Fetch by primary key; the data is `null` when the row is absent. */
  async get<S extends EntitySchema>(
    schema: S,
    id: Scalar,
  ): Promise<Result<Loaded<Entity<S>> | null>> {
    return settle(() => this._get(schema, id));
  }

  /** Fetch by primary key or throw `notFound`. */
  async getOrFail<S extends EntitySchema>(schema: S, id: Scalar): Promise<Loaded<Entity<S>>> {
    const entity = await this._get(schema, id);
    if (entity === null) {
      throw notFound(schema.table, id);
    }
    return entity;
  }

  async count(query: Query): Promise<Result<number>> {
    return settle(async () => {
      const value = await this._aggregate(query, "count");
      return typeof value === "number" ? value : 0;
    });
  }

  /** Single aggregate over the query's rows; numeric results come back as numbers. */
  async aggregate(query: Query, fn: AggregateFunction, field?: string): Promise<Result<Scalar>> {
    return settle(() => this._aggregate(query, fn, field));
  }

  /** Aggregate per `groupBy(...)` bucket. */
  async groupedAggregate(
    query: Query,
    fn: AggregateFunction,
    field?: string,
  ): Promise<Result<GroupedValue[]>> {
    const { executor, registry } = this._context;
    return settle(async () => {
      const rows = await executor.query(
        compileGroupedAggregate(query, fn, field, registry),
        registry.get(query.table),
      );
      return rows.map((row) => {
        const { value, ...group } = row;
        return { group: makeRow(group), value: aggregateValue(value) };
      });
    });
  }

  /** Insert one row and return it as stored. */
  async insert<S extends EntitySchema>(schema: S, input: WriteInput<S>): Promise<Loaded<Entity<S>>> {
    const rows = await this._context.executor.query(
      compileInsert(schema, this._values(schema, input)),
      schema,
    );
    return this._single(schema, rows);
  }

  /** Insert many rows, one statement per batch. */
  async insertAll<S extends EntitySchema>(
    schema: S,
    inputs: readonly WriteInput<S>[],
  ): Promise<Loaded<Entity<S>>[]> {
    if (inputs.length === 0) return [];
    const values = inputs.map((input) => this._values(schema, input));
    const inserted: Row[] = [];
    for (const compiled of compileInsertAll(schema, values, this._context.batchSize)) {
      inserted.push(...(await this._context.executor.query(compiled, schema)));
    }
    if (inserted.length !== inputs.length) {
      throw unexpectedResultCount(inputs.length, inserted.length);
    }
    return inserted.map((row) => toEntity(schema, row, this._context.registry));
  }

  /**
   * Update by primary key and return the stored row.
   * With no changes the current row is returned; a missing row fails with `notFound`.
   */
  async update<S extends EntitySchema>(
    schema: S,
    id: Scalar,
    input: WriteInput<S>,
  ): Promise<Loaded<Entity<S>>> {
    const { [schema.primaryKey.column]: _primaryKey, ...changes } = this._values(schema, input);
    if (Object.keys(changes).length === 0) {
      return this.getOrFail(schema, id);
    }
    const rows = await this._context.executor.query(compileUpdate(schema, id, changes), schema);
    if (rows.length === 0) {
      throw notFound(schema.table, id);
    }
    return this._single(schema, rows);
  }

  /** Delete by primary key; fails with `notFound` when nothing was deleted. */
  async delete(schema: EntitySchema, id: Scalar): Promise<void> {
    const count = await this._context.executor.execute(compileDelete(schema, id));
    if (count === 0) {
      throw notFound(schema.table, id);
    }
  }

  /**
   * Insert, or update the conflicting row.
   * The existing row keeps its primary key; only the `set` fields are overwritten.
   */
  async upsert<S extends EntitySchema>(
    schema: S,
    input: WriteInput<S>,
    options: UpsertOptions,
  ): Promise<Loaded<Entity<S>>> {
    const conflict: ConflictTarget =
      "constraint" in options.onConflict
        ? { constraint: options.onConflict.constraint }
        : { columns: options.onConflict };
    const rows = await this._context.executor.query(
      compileUpsert(schema, this._values(schema, input), conflict, options.set),
      schema,
    );
    return this._single(schema, rows);
  }

  /**
   * Eager-load associations onto already fetched entities.
   * Returns new entities; the inputs are not modified.
   */
  async preload<S extends EntitySchema, E extends Readonly<Record<string, unknown>>>(
    schema: S,
    entities: readonly E[],
    ...names: string[]
  ): Promise<Result<Loaded<E>[]>> {
    return settle(async () => {
      const rows = entities.map((entity) => toRow(schema, entity));
      const enriched = await this._preloadRows(rows, schema.table, names);
      return entities.map((entity, index) => {
        const row = enriched[index];
        const associations: Record<string, unknown> = {};
        if (row) {
          const mapped: Readonly<Record<string, unknown>> = toEntity(
            schema,
            row,
            this._context.registry,
          );
          for (const name of schema.relationships.keys()) {
            if (name in mapped) associations[name] = mapped[name];
          }
        }
        return { ...entity, ...associations };
      });
    });
  }

  /** Run caller-written SQL with `$n` parameters. Failures throw, since the statement may write. */
  async raw(sql: string, params: readonly Scalar[] = []): Promise<Row[]> {
    return this._context.executor.raw(sql, params);
  }

  /**
   * Run `work` in one transaction and commit, or roll back and rethrow.
   * Called on a repo that is already inside a transaction, `work` simply joins it:
   * there is one `BEGIN ... COMMIT` per outermost call. Use `savepoint(...)` for partial rollback.
   */
  async transaction<T>(
    work: (repo: Repo) => Promise<T>,
    options: { isolationLevel?: IsolationLevel } = {},
  ): Promise<T> {
    const current = this._context.transaction;
    if (current) {
      current.assertActive();
      return work(this);
    }
    const reserve = this._context.reserve;
    if (!reserve) {
      throw new QuarryError(
        "configurationError",
        "Invalid configuration: this repo has no connection pool to start a transaction from",
      );
    }

    const isolationLevel = options.isolationLevel ?? this._context.isolationLevel;
    const session = await reserve();
    try {
      const transaction = new Transaction(session, {
        logger: this._context.logger,
        logSql: this._context.logSql,
        ...(isolationLevel === undefined ? {} : { isolationLevel }),
      });
      const scoped = new Repo({
        executor: transaction.executor,
        registry: this._context.registry,
        batchSize: this._context.batchSize,
        logger: this._context.logger,
        logSql: this._context.logSql,
        transaction,
      });
      return await transaction.run(() => work(scoped));
    } finally {
      session.release();
    }
  }

  /** Run `work` inside a savepoint of the current transaction. */
  async savepoint<T>(name: string, work: (repo: Repo) => Promise<T>): Promise<T> {
    const current = this._context.transaction;
    if (!current) {
      throw noActiveTransaction(`savepoint '${name}' needs an enclosing transaction`);
    }
    return current.savepoint(name, () => work(this));
  }

  private async _rows(query: Query): Promise<Row[]> {
    const { executor, registry } = this._context;
    const rows = await executor.query(
      compileSelect(query, registry),
      registry.get(query.table),
    );
    if (query.preloads.length === 0) return rows;
    return this._preloadRows(rows, query.table, query.preloads);
  }

  private async _run<S extends EntitySchema>(schema: S, query: Query): Promise<Loaded<Entity<S>>[]> {
    const rows = await this._rows(query);
    return rows.map((row) => toEntity(schema, row, this._context.registry));
  }

  private async _first<S extends EntitySchema>(
    schema: S,
    query: Query,
  ): Promise<Loaded<Entity<S>> | null> {
    const [entity] = await this._run(schema, query.limit(1));
    return entity ?? null;
  }

  private _get<S extends EntitySchema>(schema: S, id: Scalar): Promise<Loaded<Entity<S>> | null> {
    return this._first(schema, Query.from(schema).where(eq(schema.primaryKey.column, id)));
  }

  private async _aggregate(query: Query, fn: AggregateFunction, field?: string): Promise<Scalar> {
    const { executor, registry } = this._context;
    const [row] = await executor.query(compileAggregate(query, fn, field, registry));
    return aggregateValue(row?.value);
  }

  private _preloadRows(rows: readonly Row[], table: string, names: readonly string[]): Promise<Row[]> {
    const { executor, registry, batchSize } = this._context;
    return preload(rows, table, names, {
      run: (compiled, relatedTable) => executor.query(compiled, registry.get(relatedTable)),
      registry,
      batchSize,
    });
  }

  private _values<S extends EntitySchema>(schema: S, input: WriteInput<S>): ColumnValues {
    if (input instanceof Changeset) {
      if (!input.isValid) {
        throw new QuarryError(
          "invalidChangeset",
          `Invalid changeset for '${input.targetTable}': ${Object.entries(input.errors)
            .map(([field, message]) => `${field} ${message}`)
            .join(", ")}`,
          { errors: input.errors },
        );
      }
      return columnValues(schema, input.changes);
    }
    return columnValues(schema, input);
  }

  private _single<S extends EntitySchema>(schema: S, rows: readonly Row[]): Loaded<Entity<S>> {
    const [row] = rows;
    if (!row || rows.length !== 1) {
      throw unexpectedResultCount(1, rows.length);
    }
    return toEntity(schema, row, this._context.registry);
  }
}
