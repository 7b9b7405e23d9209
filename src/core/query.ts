import type { Scalar } from "./row";
import type { EntitySchema } from "./schema";

/** Comparison operators the compiler accepts. */
export const OPERATORS = [
  "=",
  "!=",
  ">",
  ">=",
  "<",
  "<=",
  "LIKE",
  "ILIKE",
  "IN",
  "BETWEEN",
  "IS NULL",
  "IS NOT NULL",
] as const;

export type Operator = (typeof OPERATORS)[number];

/** Value carried by a comparison: a scalar, or a list for `IN` / `BETWEEN`. */
export type ConditionValue = Scalar | readonly Scalar[];

/**
 * Leaf comparison node built by helpers like `eq`, `gte` and `like`.
 * `operator` is checked against `OPERATORS` when the query is compiled.
 */
export type Comparison = {
  readonly type: "comparison";
  /** Field name or column name; `table.column` addresses a joined table. */
  readonly field: string;
  readonly operator: Operator | (string & {});
  readonly value: ConditionValue;
};

/** Logical group node built by `and`, `or` and `not`. */
export type ConditionGroup = {
  readonly type: "group";
  readonly method: "AND" | "OR" | "NOT";
  readonly conditions: readonly Condition[];
};

/** A condition tree used by `Query.where(...)`. */
export type Condition = Comparison | ConditionGroup;

/** A self-contained condition group merged into the `WHERE` clause. */
export type CompositeCondition = {
  /** How the group's own conditions combine. */
  readonly method: "AND" | "OR";
  readonly conditions: readonly Condition[];
};

/** Conditions applied to the table behind an association. */
export type RelationshipCondition = {
  readonly association: string;
  readonly conditions: readonly Condition[];
};

export type JoinKind = "INNER" | "LEFT" | "RIGHT" | "FULL";

/** A join through a declared association. */
export type JoinSpec = {
  readonly association: string;
  readonly kind: JoinKind;
  /** Extra predicates ANDed onto the key equality. */
  readonly on: readonly Condition[];
};

export type SortDirection = "ASC" | "DESC";

export type Ordering = {
  readonly field: string;
  readonly direction: SortDirection;
};

/** Plain-data view of a `Query`. */
export type QueryState = {
  readonly table: string;
  /** `"*"` means every declared column of the target schema. */
  readonly selections: "*" | readonly string[];
  readonly conditions: readonly Condition[];
  readonly compositeConditions: readonly CompositeCondition[];
  readonly relationshipConditions: readonly RelationshipCondition[];
  readonly joins: readonly JoinSpec[];
  readonly orderBy: readonly Ordering[];
  readonly groupBy: readonly string[];
  readonly limit?: number;
  readonly offset?: number;
  readonly preload: readonly string[];
};

function frozen<T>(values: readonly T[]): readonly T[] {
  return Object.freeze(values.slice());
}

/**
 * Immutable, chainable query specification.
 * Every builder method returns a new `Query`; the receiver is never changed.
 * Next: compile with `compileSelect(...)` or run with `repo.all(...)`.
 */
export class Query {
  private readonly _state: QueryState;

  private constructor(state: QueryState) {
    this._state = Object.freeze(state);
    Object.freeze(this);
  }

  /** Start a query against a table name or a schema's table. */
  static from(target: string | EntitySchema): Query {
    return new Query({
      table: typeof target === "string" ? target : target.table,
      selections: "*",
      conditions: frozen([]),
      compositeConditions: frozen([]),
      relationshipConditions: frozen([]),
      joins: frozen([]),
      orderBy: frozen([]),
      groupBy: frozen([]),
      preload: frozen([]),
    });
  }

  get state(): QueryState {
    return this._state;
  }

  get table(): string {
    return this._state.table;
  }

  get selections(): "*" | readonly string[] {
    return this._state.selections;
  }

  get conditions(): readonly Condition[] {
    return this._state.conditions;
  }

  get compositeConditions(): readonly CompositeCondition[] {
    return this._state.compositeConditions;
  }

  get relationshipConditions(): readonly RelationshipCondition[] {
    return this._state.relationshipConditions;
  }

  get joins(): readonly JoinSpec[] {
    return this._state.joins;
  }

  get ordering(): readonly Ordering[] {
    return this._state.orderBy;
  }

  get grouping(): readonly string[] {
    return this._state.groupBy;
  }

  get limitValue(): number | undefined {
    return this._state.limit;
  }

  get offsetValue(): number | undefined {
    return this._state.offset;
  }

  get preloads(): readonly string[] {
    return this._state.preload;
  }

  private _with(patch: Partial<QueryState>): Query {
    return new Query({ ...this._state, ...patch });
  }

  /** Add conditions to the primary `WHERE` list (ANDed). */
  where(...conditions: Condition[]): Query {
    return this._with({
      conditions: frozen([...this._state.conditions, ...conditions]),
    });
  }

  /** Add a condition group compiled as one parenthesised fragment. */
  whereGroup(conditions: readonly Condition[], method: "AND" | "OR" = "AND"): Query {
    const group: CompositeCondition = Object.freeze({ method, conditions: frozen(conditions) });
    return this._with({
      compositeConditions: frozen([...this._state.compositeConditions, group]),
    });
  }

  /**
   * Filter on the table behind `association`.
   * Without an explicit `join(...)` for it, the compiler adds an `INNER JOIN`.
   */
  whereRelated(association: string, conditions: readonly Condition[]): Query {
    const entry: RelationshipCondition = Object.freeze({
      association,
      conditions: frozen(conditions),
    });
    return this._with({
      relationshipConditions: frozen([...this._state.relationshipConditions, entry]),
    });
  }

  /** Join the table behind a declared association. */
  join(
    association: string,
    options: { kind?: JoinKind; on?: readonly Condition[] } = {},
  ): Query {
    const spec: JoinSpec = Object.freeze({
      association,
      kind: options.kind ?? "INNER",
      on: frozen(options.on ?? []),
    });
    return this._with({ joins: frozen([...this._state.joins, spec]) });
  }

  /** Append an ordering; accepts `field("name").desc()` or a field plus direction. */
  orderBy(field: string | Ordering, direction: SortDirection = "ASC"): Query {
    const ordering: Ordering =
      typeof field === "string"
        ? { field, direction }
        : { field: field.field, direction: field.direction };
    return this._with({
      orderBy: frozen([...this._state.orderBy, Object.freeze(ordering)]),
    });
  }

  limit(n: number): Query {
    return this._with({ limit: n });
  }

  offset(n: number): Query {
    return this._with({ offset: n });
  }

  /**
   * Restrict the selected columns. The primary key is always selected.
   * Calling with no fields restores the default of every declared column.
   */
  select(...fields: string[]): Query {
    return this._with({ selections: fields.length === 0 ? "*" : frozen(fields) });
  }

  /** Eager-load associations after the rows are fetched; dotted paths nest. */
  preload(...names: string[]): Query {
    return this._with({ preload: frozen([...this._state.preload, ...names]) });
  }

  /** Group columns for `groupedAggregate(...)`. */
  groupBy(...fields: string[]): Query {
    return this._with({ groupBy: frozen([...this._state.groupBy, ...fields]) });
  }
}
