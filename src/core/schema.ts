import { invalidQuery, invalidRelationship, invalidSchema } from "./errors";
import { isRow, makeRow, type Row, type RowValue, type Scalar } from "./row";

/** Semantic column types known to the row decoder. */
export type FieldType =
  | "string"
  | "int"
  | "float"
  | "bool"
  | "uuid"
  | "timestamp"
  | "bytes";

/** Field declaration accepted by `defineSchema(...)`. */
export type FieldSpec = {
  type: FieldType;
  /** Database column; defaults to the snake_case field name. */
  column?: string;
  /** Nullable / may be omitted on insert. */
  optional?: boolean;
};

/** One entry of a schema's field descriptor table. */
export type FieldDescriptor = {
  readonly name: string;
  readonly column: string;
  readonly type: FieldType;
  readonly optional: boolean;
};

export type RelationKind = "hasMany" | "hasOne" | "belongsTo" | "manyToMany";

/**
 * One edge of the entity graph.
 * `hasMany` / `hasOne`: `foreignKey` lives on the related table, `localKey` on the declaring one.
 * `belongsTo`: `foreignKey` lives on the declaring table, `localKey` is the referenced column of the related table.
 */
export type RelationshipInfo = {
  readonly name: string;
  readonly kind: RelationKind;
  readonly localKey: string;
  readonly foreignKey: string;
  readonly relatedTable: string;
};

/**
 * Column pair that links the declaring table (`source`) to the related table (`target`).
 * Joins compile to `declaring.source = related.target`; preloads match on the same pair.
 */
export function joinKeys(info: RelationshipInfo): { source: string; target: string } {
  if (info.kind === "belongsTo") {
    return { source: info.foreignKey, target: info.localKey };
  }
  return { source: info.localKey, target: info.foreignKey };
}

/** Relationship declaration before it is bound to a name. */
export type RelationshipSpec = {
  readonly kind: RelationKind;
  readonly relatedTable: string;
  readonly foreignKey: string;
  readonly localKey?: string;
};

type KeyOptions = { foreignKey: string; localKey?: string };

function relation(kind: RelationKind, relatedTable: string, keys: KeyOptions): RelationshipSpec {
  return {
    kind,
    relatedTable,
    foreignKey: keys.foreignKey,
    ...(keys.localKey === undefined ? {} : { localKey: keys.localKey }),
  };
}

/** Declare a one-to-many edge: related rows carry `foreignKey`. */
export function hasMany(relatedTable: string, keys: KeyOptions): RelationshipSpec {
  return relation("hasMany", relatedTable, keys);
}

/** Declare a one-to-one edge: the related row carries `foreignKey`. */
export function hasOne(relatedTable: string, keys: KeyOptions): RelationshipSpec {
  return relation("hasOne", relatedTable, keys);
}

/** Declare an owning edge: this row carries `foreignKey`, pointing at `localKey` (default `id`). */
export function belongsTo(relatedTable: string, keys: KeyOptions): RelationshipSpec {
  return relation("belongsTo", relatedTable, keys);
}

/**
 * Declare a many-to-many edge.
 * The edge can be declared and joined against, but preloading it fails with `notImplemented`.
 */
export function manyToMany(relatedTable: string, keys: KeyOptions): RelationshipSpec {
  return relation("manyToMany", relatedTable, keys);
}

/** Input accepted by `defineSchema(...)`. */
export type SchemaDefinition<F extends Record<string, FieldSpec>> = {
  table: string;
  /** Primary key field name; defaults to `id`. */
  primaryKey?: keyof F & string;
  fields: F;
  relationships?: Record<string, RelationshipSpec>;
};

type FieldValue<T extends FieldType> = T extends "int" | "float"
  ? number
  : T extends "bool"
    ? boolean
    : T extends "timestamp"
      ? Date
      : T extends "bytes"
        ? Uint8Array
        : string;

/** Entity shape inferred from a field spec map. */
export type EntityFields<F extends Record<string, FieldSpec>> = {
  [K in keyof F]: F[K] extends { optional: true }
    ? FieldValue<F[K]["type"]> | null
    : FieldValue<F[K]["type"]>;
};

/** Entity type of a schema built with `defineSchema(...)`. */
export type Entity<S> = S extends EntitySchema<infer F> ? EntityFields<F> : never;

/** Entity plus any associations attached by preloading. */
export type Loaded<E> = E & { readonly [association: string]: unknown };

const identifierPattern = /^[A-Za-z_][A-Za-z0-9_]*$/;

/** Convert `camelCase` field names to `snake_case` columns. */
export function snakeCase(name: string): string {
  return name
    .replace(/([a-z0-9])([A-Z])/g, "$1_$2")
    .replace(/[\s-]+/g, "_")
    .toLowerCase();
}

function checkIdentifier(name: string, what: string): string {
  if (!identifierPattern.test(name)) {
    throw invalidSchema(`${what} '${name}' is not a valid identifier`);
  }
  return name;
}

/**
 * Descriptor table for one entity type, built once by `defineSchema(...)`.
 * Next: register it on a `SchemaRegistry` (or pass it to `quarry.connect({ schemas })`).
 */
export class EntitySchema<F extends Record<string, FieldSpec> = Record<string, FieldSpec>> {
  public readonly table: string;
  public readonly fields: readonly FieldDescriptor[];
  public readonly primaryKey: FieldDescriptor;
  public readonly relationships: ReadonlyMap<string, RelationshipInfo>;
  /** Raw field specs, kept for type inference. */
  public readonly spec: F;
  private readonly _byName: ReadonlyMap<string, FieldDescriptor>;
  private readonly _byColumn: ReadonlyMap<string, FieldDescriptor>;

  constructor(definition: SchemaDefinition<F>) {
    this.table = checkIdentifier(definition.table, "Table");
    this.spec = definition.fields;

    const byName = new Map<string, FieldDescriptor>();
    const byColumn = new Map<string, FieldDescriptor>();
    const fields: FieldDescriptor[] = [];
    for (const [name, spec] of Object.entries(definition.fields)) {
      const column = checkIdentifier(spec.column ?? snakeCase(name), "Column");
      if (byColumn.has(column)) {
        throw invalidSchema(`column '${column}' is declared twice on '${this.table}'`);
      }
      const descriptor: FieldDescriptor = Object.freeze({
        name,
        column,
        type: spec.type,
        optional: spec.optional === true,
      });
      fields.push(descriptor);
      byName.set(name, descriptor);
      byColumn.set(column, descriptor);
    }
    this.fields = Object.freeze(fields);
    this._byName = byName;
    this._byColumn = byColumn;

    const primaryName = definition.primaryKey ?? "id";
    const primaryKey = byName.get(primaryName);
    if (!primaryKey) {
      throw invalidSchema(`'${this.table}' has no primary key field '${primaryName}'`);
    }
    this.primaryKey = primaryKey;

    const relationships = new Map<string, RelationshipInfo>();
    for (const [name, spec] of Object.entries(definition.relationships ?? {})) {
      if (byName.has(name) || byColumn.has(name)) {
        throw invalidSchema(`relationship '${name}' on '${this.table}' shadows a field`);
      }
      const defaultLocal = spec.kind === "belongsTo" ? "id" : primaryKey.column;
      relationships.set(
        name,
        Object.freeze({
          name,
          kind: spec.kind,
          relatedTable: checkIdentifier(spec.relatedTable, "Table"),
          foreignKey: checkIdentifier(spec.foreignKey, "Column"),
          localKey: checkIdentifier(spec.localKey ?? defaultLocal, "Column"),
        }),
      );
    }
    this.relationships = relationships;
  }

  /** Column names in declaration order. */
  get columns(): string[] {
    return this.fields.map((field) => field.column);
  }

  /** Find a descriptor by field name or column name. */
  field(nameOrColumn: string): FieldDescriptor | undefined {
    return this._byName.get(nameOrColumn) ?? this._byColumn.get(nameOrColumn);
  }

  /** Resolve an association by name or fail with `invalidRelationship`. */
  relationship(name: string): RelationshipInfo {
    const info = this.relationships.get(name);
    if (!info) {
      throw invalidRelationship(this.table, name);
    }
    return info;
  }
}

/**
 * Build a schema from a field declaration map.
 * @example
 * const users = defineSchema({
 *   table: "users",
 *   fields: { id: { type: "uuid" }, name: { type: "string" }, isActive: { type: "bool" } },
 *   relationships: { posts: hasMany("posts", { foreignKey: "user_id" }) },
 * });
 */
export function defineSchema<const F extends Record<string, FieldSpec>>(
  definition: SchemaDefinition<F>,
): EntitySchema<F> {
  return new EntitySchema(definition);
}

/**
 * Explicit table -> schema lookup passed to the compiler, preloader and repo.
 * There is no process-wide registry; each database handle owns one.
 */
export class SchemaRegistry {
  private _schemas = new Map<string, EntitySchema>();

  constructor(schemas: readonly EntitySchema[] = []) {
    this.register(...schemas);
  }

  register(...schemas: readonly EntitySchema[]): this {
    for (const schema of schemas) {
      const existing = this._schemas.get(schema.table);
      if (existing && existing !== schema) {
        throw invalidSchema(`table '${schema.table}' is already registered`);
      }
      this._schemas.set(schema.table, schema);
    }
    return this;
  }

  get(table: string): EntitySchema | undefined {
    return this._schemas.get(table);
  }

  require(table: string): EntitySchema {
    const schema = this._schemas.get(table);
    if (!schema) {
      throw invalidSchema(`no schema registered for table '${table}'`);
    }
    return schema;
  }

  /**
   * Resolve `table`'s association `name` or fail with `invalidRelationship`.
   * Keys declared as field names come back as the columns of the side they live on.
   */
  relationship(table: string, name: string): RelationshipInfo {
    const schema = this._schemas.get(table);
    if (!schema) {
      throw invalidRelationship(table, name);
    }
    const info = schema.relationship(name);
    const related = this._schemas.get(info.relatedTable);
    const onDeclaring = (key: string) => schema.field(key)?.column ?? key;
    const onRelated = (key: string) => related?.field(key)?.column ?? key;
    const localKey =
      info.kind === "belongsTo" ? onRelated(info.localKey) : onDeclaring(info.localKey);
    const foreignKey =
      info.kind === "belongsTo" ? onDeclaring(info.foreignKey) : onRelated(info.foreignKey);
    if (localKey === info.localKey && foreignKey === info.foreignKey) return info;
    return Object.freeze({ ...info, localKey, foreignKey });
  }

  get tables(): string[] {
    return Array.from(this._schemas.keys());
  }
}

function entityValue(value: RowValue, relatedSchema: EntitySchema | undefined, registry?: SchemaRegistry): unknown {
  if (Array.isArray(value)) {
    return value.map((entry: Row) => entityValue(entry, relatedSchema, registry));
  }
  if (isRow(value) && relatedSchema) {
    return toEntity(relatedSchema, value, registry);
  }
  return value;
}

/**
 * Map a row to an entity with a static loop over the descriptor table.
 * Associations attached to the row are mapped through the related schema when the registry knows it.
 */
export function toEntity<S extends EntitySchema>(
  schema: S,
  row: Row,
  registry?: SchemaRegistry,
): Loaded<Entity<S>> {
  const entity: Record<string, unknown> = {};
  for (const field of schema.fields) {
    const value = row[field.column];
    if (value !== undefined) {
      entity[field.name] = value;
    }
  }
  for (const [name, info] of schema.relationships) {
    const value = row[name];
    if (value === undefined) continue;
    entity[name] = entityValue(value, registry?.get(info.relatedTable), registry);
  }
  return entity as Loaded<Entity<S>>;
}

/**
 * Map entity fields back to a column-keyed row.
 * Fields that are absent from the entity are skipped; associations are dropped.
 */
export function toRow(schema: EntitySchema, entity: Readonly<Record<string, unknown>>): Row {
  return makeRow(columnValues(schema, entity));
}

/**
 * Collect declared field values as column -> scalar pairs, in declaration order.
 * Next: hand the result to `compileInsert(...)` / `compileUpdate(...)`.
 */
export function columnValues(
  schema: EntitySchema,
  values: Readonly<Record<string, unknown>>,
): Record<string, Scalar> {
  const out: Record<string, Scalar> = {};
  for (const field of schema.fields) {
    const key = field.name in values ? field.name : field.column in values ? field.column : undefined;
    if (key === undefined) continue;
    const value = values[key];
    if (value === undefined) continue;
    out[field.column] = toScalar(schema, field, value);
  }
  return out;
}

function toScalar(schema: EntitySchema, field: FieldDescriptor, value: unknown): Scalar {
  if (
    value === null ||
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean" ||
    value instanceof Date ||
    value instanceof Uint8Array
  ) {
    return value;
  }
  if (typeof value === "bigint") {
    return value.toString();
  }
  throw invalidQuery(`value for '${schema.table}.${field.name}' is not a scalar`);
}
