import {
  DEFAULT_BATCH_SIZE,
  fetchInChunks,
  groupRows,
  indexRows,
  uniqueKeys,
} from "./batch";
import { compileSelect } from "./compiler";
import { invalidRelationship, notImplemented } from "./errors";
import { Query } from "./query";
import { inList } from "./queryFns";
import { attach, isScalar, keyOf, type Row, type Scalar } from "./row";
import { joinKeys, type RelationshipInfo, type SchemaRegistry } from "./schema";
import type { CompiledQuery } from "./sql";

/** Runs a statement against `table` and returns rows decoded with that table's schema. */
export type PreloadRunner = (compiled: CompiledQuery, table: string) => Promise<Row[]>;

export type PreloadContext = {
  run: PreloadRunner;
  registry: SchemaRegistry;
  /** Keys per `IN (...)` list; defaults to 1000. */
  batchSize?: number;
  /** Cancels the whole preload; in-flight tasks stop before their next chunk. */
  signal?: AbortSignal;
};

/** One association of a preload tree; paths sharing a prefix share the node. */
export type PreloadNode = {
  readonly name: string;
  readonly info: RelationshipInfo;
  readonly children: PreloadNode[];
};

type LevelContext = {
  run: PreloadRunner;
  registry: SchemaRegistry;
  batchSize: number;
  controller: AbortController;
};

type AssociationValue = Row | readonly Row[] | null;

/**
 * Resolve every path against the registry and merge them into a tree.
 * Fails before any query is issued: unknown names with `invalidRelationship`,
 * many-to-many edges with `notImplemented`.
 */
export function planPreload(
  registry: SchemaRegistry,
  table: string,
  paths: readonly string[],
): PreloadNode[] {
  const roots: PreloadNode[] = [];
  for (const path of paths) {
    let level = roots;
    let current = table;
    for (const segment of path.split(".")) {
      if (segment.length === 0) {
        throw invalidRelationship(current, path);
      }
      const info = registry.relationship(current, segment);
      if (info.kind === "manyToMany") {
        throw notImplemented(`manyToMany preload '${path}'`);
      }
      let node = level.find((candidate) => candidate.name === segment);
      if (!node) {
        node = { name: segment, info, children: [] };
        level.push(node);
      }
      level = node.children;
      current = info.relatedTable;
    }
  }
  return roots;
}

function scalarAt(row: Row, column: string): Scalar | undefined {
  const value = row[column];
  return isScalar(value) ? value : undefined;
}

async function loadNode(
  parents: readonly Row[],
  node: PreloadNode,
  context: LevelContext,
): Promise<AssociationValue[]> {
  const { info } = node;
  const keys = joinKeys(info);
  const parentKeys = uniqueKeys(parents.map((row) => scalarAt(row, keys.source)));

  let related: Row[] = [];
  if (parentKeys.length > 0) {
    related = await fetchInChunks(
      (compiled) => context.run(compiled, info.relatedTable),
      parentKeys,
      context.batchSize,
      (chunk) =>
        compileSelect(
          Query.from(info.relatedTable).where(inList(keys.target, chunk)),
          context.registry,
        ),
      context.controller.signal,
    );
  }

  if (node.children.length > 0 && related.length > 0) {
    related = await loadLevel(related, node.children, context);
  }

  if (info.kind === "hasMany") {
    const groups = groupRows(related, keys.target);
    return parents.map((row) => {
      const key = keyOf(row[keys.source]);
      return Object.freeze(key === undefined ? [] : (groups.get(key) ?? []));
    });
  }
  const index = indexRows(related, keys.target);
  return parents.map((row) => {
    const key = keyOf(row[keys.source]);
    return key === undefined ? null : (index.get(key) ?? null);
  });
}

/**
 * Load sibling associations concurrently and attach them to `rows`.
 * The first failure aborts the shared controller so siblings stop early.
 */
async function loadLevel(
  rows: readonly Row[],
  nodes: readonly PreloadNode[],
  context: LevelContext,
): Promise<Row[]> {
  const loaded = await Promise.all(
    nodes.map((node) =>
      loadNode(rows, node, context).catch((error: unknown) => {
        context.controller.abort(error);
        throw error;
      }),
    ),
  );
  return rows.map((row, rowIndex) => {
    let enriched = row;
    nodes.forEach((node, nodeIndex) => {
      enriched = attach(enriched, node.name, loaded[nodeIndex]?.[rowIndex] ?? null);
    });
    return enriched;
  });
}

/**
 * Eager-load associations for already fetched rows of `table`.
 * Issues one query per distinct association path (per key chunk), never one per row.
 * Returns new rows; the input rows are left untouched and nothing is attached on failure.
 * @example
 * const users = await preload(rows, "users", ["posts", "posts.comments"], { run, registry });
 */
export async function preload(
  rows: readonly Row[],
  table: string,
  paths: readonly string[],
  context: PreloadContext,
): Promise<Row[]> {
  const nodes = planPreload(context.registry, table, paths);
  if (rows.length === 0 || nodes.length === 0) {
    return rows.slice();
  }

  const outer = context.signal;
  outer?.throwIfAborted();
  const controller = new AbortController();
  const forward = () => controller.abort(outer?.reason);
  outer?.addEventListener("abort", forward, { once: true });
  try {
    return await loadLevel(rows, nodes, {
      run: context.run,
      registry: context.registry,
      batchSize: context.batchSize ?? DEFAULT_BATCH_SIZE,
      controller,
    });
  } finally {
    outer?.removeEventListener("abort", forward);
  }
}
