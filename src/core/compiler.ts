import { invalidQuery, notImplemented } from "./errors";
import {
  OPERATORS,
  type Comparison,
  type Condition,
  type ConditionValue,
  type JoinSpec,
  type Query,
} from "./query";
import type { Scalar } from "./row";
import {
  joinKeys,
  SchemaRegistry,
  type EntitySchema,
  type RelationshipInfo,
} from "./schema";
import {
  EMPTY,
  flatten,
  ident,
  isEmpty,
  joinFragments,
  param,
  paramList,
  qualified,
  sql,
  text,
  type CompiledQuery,
  type Fragment,
} from "./sql";

export type AggregateFunction = "count" | "sum" | "avg" | "min" | "max";

const operatorSet: ReadonlySet<string> = new Set(OPERATORS);

/** Where a bare field name resolves: one table, optionally with its schema. */
type ColumnScope = {
  /** Table name, or the alias a join gives it. */
  table: string;
  schema: EntitySchema | undefined;
  qualify: boolean;
  registry: SchemaRegistry;
};

type ResolvedJoin = {
  spec: JoinSpec;
  info: RelationshipInfo;
  /** Set when the related table is already in the query; the association name is used. */
  alias: string | undefined;
  scope: ColumnScope;
};

/** Everything between `FROM <table>` and `ORDER BY`, shared by selects and aggregates. */
type Plan = {
  root: ColumnScope;
  joins: ResolvedJoin[];
  from: Fragment;
  where: Fragment;
};

function isList(value: ConditionValue): value is readonly Scalar[] {
  return Array.isArray(value);
}

function requireColumn(schema: EntitySchema, name: string): string {
  const descriptor = schema.field(name);
  if (!descriptor) {
    throw invalidQuery(`unknown field '${name}' on '${schema.table}'`);
  }
  return descriptor.column;
}

/**
 * Resolve a field reference to SQL text.
 * `table.column` addresses another table; bare names resolve against the scope.
 */
function resolveColumn(scope: ColumnScope, name: string): string {
  const dot = name.indexOf(".");
  if (dot >= 0) {
    const table = name.slice(0, dot);
    const column = name.slice(dot + 1);
    const schema = scope.registry.get(table);
    return qualified(table, schema ? requireColumn(schema, column) : column);
  }
  const column = scope.schema ? requireColumn(scope.schema, name) : name;
  return scope.qualify ? qualified(scope.table, column) : ident(column);
}

function compileComparison(condition: Comparison, scope: ColumnScope): Fragment {
  const operator = condition.operator.toUpperCase();
  if (!operatorSet.has(operator)) {
    throw invalidQuery(`unknown operator '${condition.operator}'`);
  }
  const column = resolveColumn(scope, condition.field);
  const value = condition.value;

  switch (operator) {
    case "IS NULL":
    case "IS NOT NULL":
      return text(`${column} ${operator}`);
    case "IN": {
      if (!isList(value)) {
        throw invalidQuery(`IN on '${condition.field}' expects a list`);
      }
      if (value.length === 0) return text("0=1");
      return sql(`${column} IN (`, paramList(value), ")");
    }
    case "BETWEEN": {
      if (!isList(value) || value.length !== 2) {
        throw invalidQuery(`BETWEEN on '${condition.field}' expects two values`);
      }
      const [low = null, high = null] = value;
      return sql(`${column} BETWEEN `, param(low), " AND ", param(high));
    }
    default: {
      if (isList(value)) {
        throw invalidQuery(`${operator} on '${condition.field}' expects a single value`);
      }
      if (value === null && operator === "=") return text(`${column} IS NULL`);
      if (value === null && operator === "!=") return text(`${column} IS NOT NULL`);
      return sql(`${column} ${operator} `, param(value));
    }
  }
}

/**
 * Compile one condition tree against a scope.
 * Groups with more than one member are parenthesised; empty groups compile to nothing.
 */
function compileCondition(condition: Condition, scope: ColumnScope): Fragment {
  if (condition.type === "comparison") {
    return compileComparison(condition, scope);
  }
  const parts = condition.conditions
    .map((child) => compileCondition(child, scope))
    .filter((fragment) => !isEmpty(fragment));
  if (parts.length === 0) return EMPTY;
  if (condition.method === "NOT") {
    return sql("NOT (", joinFragments(parts, " AND "), ")");
  }
  const joined = joinFragments(parts, ` ${condition.method} `);
  return parts.length === 1 ? joined : sql("(", joined, ")");
}

function compileConditionList(
  conditions: readonly Condition[],
  scope: ColumnScope,
  method: "AND" | "OR",
  wrap: boolean,
): Fragment {
  const parts = conditions
    .map((condition) => compileCondition(condition, scope))
    .filter((fragment) => !isEmpty(fragment));
  const joined = joinFragments(parts, ` ${method} `);
  return wrap && parts.length > 1 ? sql("(", joined, ")") : joined;
}

function resolveJoins(query: Query, registry: SchemaRegistry): ResolvedJoin[] {
  const resolved: ResolvedJoin[] = [];
  const seen = new Set<string>();
  const names = new Set<string>([query.table]);
  const add = (spec: JoinSpec): void => {
    if (seen.has(spec.association)) {
      throw invalidQuery(`association '${spec.association}' is joined twice`);
    }
    const info = registry.relationship(query.table, spec.association);
    if (info.kind === "manyToMany") {
      throw notImplemented(`manyToMany join '${spec.association}'`);
    }
    const alias = names.has(info.relatedTable) ? spec.association : undefined;
    const name = alias ?? info.relatedTable;
    if (names.has(name)) {
      throw invalidQuery(`association '${spec.association}' clashes with table '${name}'`);
    }
    seen.add(spec.association);
    names.add(name);
    resolved.push({
      spec,
      info,
      alias,
      scope: {
        table: name,
        schema: registry.get(info.relatedTable),
        qualify: true,
        registry,
      },
    });
  };
  for (const spec of query.joins) add(spec);
  for (const related of query.relationshipConditions) {
    if (!seen.has(related.association)) {
      add({ association: related.association, kind: "INNER", on: [] });
    }
  }
  return resolved;
}

function compileJoin(root: ColumnScope, join: ResolvedJoin): Fragment {
  const keys = joinKeys(join.info);
  const keyEquality = text(
    `${qualified(root.table, keys.source)} = ${qualified(join.scope.table, keys.target)}`,
  );
  const extra = join.spec.on.map((condition) => compileCondition(condition, join.scope));
  const target =
    join.alias === undefined
      ? ident(join.info.relatedTable)
      : `${ident(join.info.relatedTable)} AS ${ident(join.alias)}`;
  return sql(
    `${join.spec.kind} JOIN ${target} ON `,
    joinFragments([keyEquality, ...extra], " AND "),
  );
}

function plan(query: Query, registry: SchemaRegistry): Plan {
  const table = query.table;
  const joins = resolveJoins(query, registry);
  const root: ColumnScope = {
    table,
    schema: registry.get(table),
    qualify: joins.length > 0,
    registry,
  };

  const from = joinFragments(
    [text(`FROM ${ident(table)}`), ...joins.map((join) => compileJoin(root, join))],
    " ",
  );

  const fragments: Fragment[] = [];
  fragments.push(compileConditionList(query.conditions, root, "AND", false));
  for (const group of query.compositeConditions) {
    fragments.push(compileConditionList(group.conditions, root, group.method, true));
  }
  for (const related of query.relationshipConditions) {
    const join = joins.find((candidate) => candidate.spec.association === related.association);
    if (!join) continue;
    fragments.push(compileConditionList(related.conditions, join.scope, "AND", false));
  }
  const conditions = joinFragments(fragments, " AND ");
  const where = isEmpty(conditions) ? EMPTY : sql("WHERE ", conditions);

  return { root, joins, from, where };
}

function selectList(query: Query, root: ColumnScope): string {
  const selections = query.selections;
  if (selections === "*") {
    if (!root.qualify) return "*";
    if (!root.schema) return `${ident(root.table)}.*`;
    return root.schema.columns.map((column) => qualified(root.table, column)).join(", ");
  }
  const primaryKey = resolveColumn(root, root.schema?.primaryKey.column ?? "id");
  const columns = Array.from(new Set(selections.map((name) => resolveColumn(root, name))));
  if (!columns.includes(primaryKey)) {
    columns.unshift(primaryKey);
  }
  return columns.join(", ");
}

function checkCount(name: string, value: number | undefined): number | undefined {
  if (value === undefined) return undefined;
  if (!Number.isInteger(value) || value < 0) {
    throw invalidQuery(`${name} must be a non-negative integer, got ${value}`);
  }
  return value;
}

function groupColumns(query: Query, root: ColumnScope): string[] {
  return query.grouping.map((name) => resolveColumn(root, name));
}

function tail(query: Query, root: ColumnScope, groups: readonly string[]): Fragment[] {
  const parts: Fragment[] = [];
  if (groups.length > 0) {
    parts.push(text(`GROUP BY ${groups.join(", ")}`));
  }
  if (query.ordering.length > 0) {
    const orderings = query.ordering.map((ordering) => {
      const direction = ordering.direction === "DESC" ? "DESC" : "ASC";
      return `${resolveColumn(root, ordering.field)} ${direction}`;
    });
    parts.push(text(`ORDER BY ${orderings.join(", ")}`));
  }
  const limit = checkCount("limit", query.limitValue);
  if (limit !== undefined) parts.push(text(`LIMIT ${limit}`));
  const offset = checkCount("offset", query.offsetValue);
  if (offset !== undefined) parts.push(text(`OFFSET ${offset}`));
  return parts;
}

/**
 * Compile a query into SQL text plus ordered parameters.
 * Placeholders are numbered once, in textual order, across joins, conditions and groups.
 * @example
 * compileSelect(Query.from("users").where(gte("age", 18)).limit(10))
 * // { sql: "SELECT * FROM users WHERE age >= $1 LIMIT 10", params: [18] }
 */
export function compileSelect(
  query: Query,
  registry: SchemaRegistry = new SchemaRegistry(),
): CompiledQuery {
  const { root, from, where } = plan(query, registry);
  return flatten(
    joinFragments(
      [
        text(`SELECT ${selectList(query, root)}`),
        from,
        where,
        ...tail(query, root, groupColumns(query, root)),
      ],
      " ",
    ),
  );
}

function aggregateExpression(
  fn: AggregateFunction,
  field: string | undefined,
  root: ColumnScope,
): string {
  if (field === undefined) {
    if (fn !== "count") {
      throw invalidQuery(`${fn} requires a field`);
    }
    return "COUNT(*)";
  }
  return `${fn.toUpperCase()}(${resolveColumn(root, field)})`;
}

/**
 * `SELECT <FN>(<col>) AS value` over the query's joins and conditions.
 * Ordering, limit and offset do not apply to a single aggregate row.
 */
export function compileAggregate(
  query: Query,
  fn: AggregateFunction,
  field?: string,
  registry: SchemaRegistry = new SchemaRegistry(),
): CompiledQuery {
  const { root, from, where } = plan(query, registry);
  return flatten(
    joinFragments(
      [text(`SELECT ${aggregateExpression(fn, field, root)} AS value`), from, where],
      " ",
    ),
  );
}

/** Aggregate per `groupBy(...)` bucket; the group columns are selected before `value`. */
export function compileGroupedAggregate(
  query: Query,
  fn: AggregateFunction,
  field?: string,
  registry: SchemaRegistry = new SchemaRegistry(),
): CompiledQuery {
  if (query.grouping.length === 0) {
    throw invalidQuery("grouped aggregate requires groupBy");
  }
  const { root, from, where } = plan(query, registry);
  const groups = groupColumns(query, root);
  return flatten(
    joinFragments(
      [
        text(`SELECT ${[...groups, `${aggregateExpression(fn, field, root)} AS value`].join(", ")}`),
        from,
        where,
        ...tail(query, root, groups),
      ],
      " ",
    ),
  );
}
