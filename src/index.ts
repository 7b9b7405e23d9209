import * as qfns from "./core/queryFns";

export { quarry, type ConnectOptions } from "./quarry";
export { qfns };

export {
    QuarryError,
    isQuarryError,
    type QuarryErrorKind,
} from "./core/errors";
export {
    Query,
    OPERATORS,
    type Operator,
    type Comparison,
    type ConditionGroup,
    type Condition,
    type ConditionValue,
    type CompositeCondition,
    type RelationshipCondition,
    type JoinKind,
    type JoinSpec,
    type Ordering,
    type SortDirection,
    type QueryState,
} from "./core/query";
export { FieldRef, field } from "./core/queryFns";
export {
    defineSchema,
    hasMany,
    hasOne,
    belongsTo,
    manyToMany,
    joinKeys,
    toEntity,
    toRow,
    EntitySchema,
    SchemaRegistry,
    type Entity,
    type EntityFields,
    type Loaded,
    type FieldType,
    type FieldSpec,
    type FieldDescriptor,
    type RelationKind,
    type RelationshipInfo,
    type RelationshipSpec,
    type SchemaDefinition,
} from "./core/schema";
export { attach, keyOf, makeRow, type Row, type RowValue, type Scalar } from "./core/row";
export { flatten, type CompiledQuery, type Fragment } from "./core/sql";
export {
    compileSelect,
    compileAggregate,
    compileGroupedAggregate,
    type AggregateFunction,
} from "./core/compiler";
export {
    compileInsert,
    compileInsertAll,
    compileUpdate,
    compileDelete,
    compileUpsert,
    type ColumnValues,
    type ConflictTarget,
} from "./core/writes";
export { chunkArray, uniqueKeys, DEFAULT_BATCH_SIZE } from "./core/batch";
export { preload, planPreload, type PreloadContext, type PreloadNode, type PreloadRunner } from "./core/preload";
export { Changeset } from "./core/changeset";

export {
    resolveConfig,
    ISOLATION_LEVELS,
    type IsolationLevel,
    type Logger,
    type QuarryConfig,
    type QuarryOptions,
} from "./runtime/config";
export {
    createPgClient,
    type PgClient,
    type PgClientOptions,
    type PgConnectionInput,
    type PgConnectionOptions,
    type PgReservedSession,
    type PgResult,
    type PgSession,
} from "./runtime/pgClient";

export { Executor, decodeRow, decodeValue } from "./sources/executor";
export { Repo, type EntityInput, type GroupedValue, type RepoContext, type UpsertOptions, type WriteInput } from "./sources/repo";
export { Transaction, type TransactionState } from "./sources/transaction";
export { Database } from "./sources/database";
