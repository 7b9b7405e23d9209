import { Changeset } from "./core/changeset";
import {
  compileAggregate,
  compileGroupedAggregate,
  compileSelect,
} from "./core/compiler";
import { isQuarryError, QuarryError } from "./core/errors";
import { preload } from "./core/preload";
import { Query } from "./core/query";
import {
  and,
  between,
  eq,
  field,
  gt,
  gte,
  ilike,
  inList,
  isNotNull,
  isNull,
  like,
  lt,
  lte,
  neq,
  not,
  or,
} from "./core/queryFns";
import {
  belongsTo,
  defineSchema,
  hasMany,
  hasOne,
  manyToMany,
  SchemaRegistry,
  type EntitySchema,
} from "./core/schema";
import {
  compileDelete,
  compileInsert,
  compileInsertAll,
  compileUpdate,
  compileUpsert,
} from "./core/writes";
import { resolveConfig, type QuarryConfig, type QuarryOptions } from "./runtime/config";
import { createPgClient, type PgConnectionInput } from "./runtime/pgClient";
import { Database } from "./sources/database";

/** Options for `quarry.connect(...)`: configuration plus the schemas to register. */
export type ConnectOptions = QuarryOptions & {
  schemas?: SchemaRegistry | readonly EntitySchema[];
};

function connectionInput(config: QuarryConfig): PgConnectionInput {
  if (config.url !== undefined) {
    return config.url;
  }
  return {
    host: config.host,
    port: config.port,
    username: config.user,
    database: config.database,
    ...(config.password === undefined ? {} : { password: config.password }),
  };
}

/**
 * Open a pooled database handle.
 * Options win over `DATABASE_URL` / `DB_*` / `QUARRY_*` environment variables.
 * Next: run queries on the returned `Database`, and `close()` it on shutdown.
 */
function connect(options: ConnectOptions = {}, env: Readonly<Record<string, string | undefined>> = process.env): Database {
  const config = resolveConfig(options, env);
  const client = createPgClient(connectionInput(config), {
    ...(config.statementTimeoutMs === undefined ? {} : { statementTimeoutMs: config.statementTimeoutMs }),
    ...(config.maxConnections === undefined ? {} : { max: config.maxConnections }),
  });
  return new Database(client, config, options.schemas ?? []);
}

const quarry = {
  /** Open a pooled database handle from options and the environment. */
  connect: connect,
  /** Resolve configuration without connecting. */
  config: resolveConfig,
  /** Declare an entity schema. */
  schema: defineSchema,
  /** Start a query. */
  from: Query.from,
  /** Relationship declarations for `quarry.schema({ relationships })`. */
  rel: { hasMany, hasOne, belongsTo, manyToMany },
  /** Condition helpers for `Query.where(...)`. */
  qfns: {
    eq,
    neq,
    gt,
    gte,
    lt,
    lte,
    like,
    ilike,
    inList,
    between,
    isNull,
    isNotNull,
    and,
    or,
    not,
    field,
  },
  /** Cast raw params into a changeset. */
  changeset: Changeset.cast,
  /** Pure SQL compilation, for inspection or custom execution. */
  compile: {
    select: compileSelect,
    aggregate: compileAggregate,
    groupedAggregate: compileGroupedAggregate,
    insert: compileInsert,
    insertAll: compileInsertAll,
    update: compileUpdate,
    delete: compileDelete,
    upsert: compileUpsert,
  },
  /** Preload associations onto rows with a custom statement runner. */
  preload: preload,
  /** Narrow caught values to `QuarryError`. */
  isError: isQuarryError,
  registry: (schemas: readonly EntitySchema[] = []): SchemaRegistry => new SchemaRegistry(schemas),
};

export { quarry, QuarryError };

export namespace quarry {
  /**
   * Public type aliases exposed under `quarry.types`.
   * Next: pick a type and use it in your model or helper signatures.
   */
  export namespace types {
    /** Entity type inferred from a schema. */
    export type Entity<S> = import("./core/schema").Entity<S>;
    /** Entity plus preloaded associations. */
    export type Loaded<E> = import("./core/schema").Loaded<E>;
    /** One decoded database row. */
    export type Row = import("./core/row").Row;
    /** Values that can be bound as parameters. */
    export type Scalar = import("./core/row").Scalar;
    /** A condition tree for `Query.where(...)`. */
    export type Condition = import("./core/query").Condition;
    /** SQL text plus ordered parameters. */
    export type CompiledQuery = import("./core/sql").CompiledQuery;
    /** Transaction isolation levels. */
    export type IsolationLevel = import("./runtime/config").IsolationLevel;
    /** Logger accepted by `quarry.connect({ logger })`. */
    export type Logger = import("./runtime/config").Logger;
    /** Discriminant of `QuarryError`. */
    export type ErrorKind = import("./core/errors").QuarryErrorKind;
  }
}
