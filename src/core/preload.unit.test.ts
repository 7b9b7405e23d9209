import { describe, expect, test, vi } from "vitest";
import { rejected } from "../testing/catchQuarry";
import { posts, testRegistry } from "../testing/schemas";
import { planPreload, preload, type PreloadRunner } from "./preload";
import { isRow, makeRow, type Row } from "./row";
import { defineSchema, hasMany, SchemaRegistry } from "./schema";
import type { CompiledQuery } from "./sql";

const tables: Record<string, Row[]> = {
  users: [
    makeRow({ id: 1, name: "Ada" }),
    makeRow({ id: 2, name: "Brian" }),
    makeRow({ id: 3, name: "Cleo" }),
  ],
  posts: [
    makeRow({ id: 10, user_id: 1, title: "First" }),
    makeRow({ id: 11, user_id: 1, title: "Second" }),
    makeRow({ id: 12, user_id: 3, title: "Third" }),
  ],
  comments: [makeRow({ id: 100, post_id: 10, body: "Nice" })],
  profiles: [makeRow({ id: 50, user_id: 2, bio: "hi" })],
};

/** Answers `SELECT * FROM t WHERE col IN (...)` from `tables` and records each statement. */
function tableRunner(log: CompiledQuery[]): PreloadRunner {
  return async (compiled, table) => {
    log.push(compiled);
    const column = /WHERE (\w+) IN/.exec(compiled.sql)?.[1] ?? "";
    const wanted = new Set(compiled.params.map(String));
    return (tables[table] ?? []).filter((row) => wanted.has(String(row[column])));
  };
}

function many(row: Row | undefined, name: string): readonly Row[] {
  const value = row?.[name];
  if (Array.isArray(value)) return value;
  throw new Error(`${name} is not a list`);
}

function one(row: Row | undefined, name: string): Row | null {
  const value = row?.[name];
  if (value === null) return null;
  if (isRow(value)) return value;
  throw new Error(`${name} is not a row`);
}

const ids = (rows: readonly Row[]) => rows.map((row) => row.id);

describe("preload", () => {
  test("hasMany costs one query for all parents", async () => {
    const log: CompiledQuery[] = [];
    const parents = tables.users ?? [];
    const loaded = await preload(parents, "users", ["posts"], {
      run: tableRunner(log),
      registry: testRegistry(),
    });

    expect(log).toEqual([
      { sql: "SELECT * FROM posts WHERE user_id IN ($1, $2, $3)", params: [1, 2, 3] },
    ]);
    expect(ids(many(loaded[0], "posts"))).toEqual([10, 11]);
    expect(many(loaded[1], "posts")).toEqual([]);
    expect(ids(many(loaded[2], "posts"))).toEqual([12]);
    expect(parents[0]?.posts).toBeUndefined();
  });

  test("a foreign key declared by field name still groups children", async () => {
    const authors = defineSchema({
      table: "users",
      fields: { id: { type: "int" }, name: { type: "string" } },
      relationships: { posts: hasMany("posts", { foreignKey: "userId" }) },
    });
    const log: CompiledQuery[] = [];
    const loaded = await preload(tables.users ?? [], "users", ["posts"], {
      run: tableRunner(log),
      registry: new SchemaRegistry([authors, posts]),
    });

    expect(log).toEqual([
      { sql: "SELECT * FROM posts WHERE user_id IN ($1, $2, $3)", params: [1, 2, 3] },
    ]);
    expect(ids(many(loaded[0], "posts"))).toEqual([10, 11]);
    expect(many(loaded[1], "posts")).toEqual([]);
    expect(ids(many(loaded[2], "posts"))).toEqual([12]);
  });

  test("nested paths add one query per level", async () => {
    const log: CompiledQuery[] = [];
    const loaded = await preload(tables.users ?? [], "users", ["posts", "posts.comments"], {
      run: tableRunner(log),
      registry: testRegistry(),
    });

    expect(log.map((entry) => entry.sql)).toEqual([
      "SELECT * FROM posts WHERE user_id IN ($1, $2, $3)",
      "SELECT * FROM comments WHERE post_id IN ($1, $2, $3)",
    ]);
    expect(log[1]?.params).toEqual([10, 11, 12]);
    const firstPosts = many(loaded[0], "posts");
    expect(ids(many(firstPosts[0], "comments"))).toEqual([100]);
    expect(many(firstPosts[1], "comments")).toEqual([]);
  });

  test("belongsTo attaches the owner or null", async () => {
    const log: CompiledQuery[] = [];
    const orphan = makeRow({ id: 13, user_id: 99, title: "Lost" });
    const loaded = await preload([...(tables.posts ?? []), orphan], "posts", ["author"], {
      run: tableRunner(log),
      registry: testRegistry(),
    });

    expect(log).toEqual([{ sql: "SELECT * FROM users WHERE id IN ($1, $2, $3)", params: [1, 3, 99] }]);
    expect(one(loaded[0], "author")?.name).toBe("Ada");
    expect(one(loaded[2], "author")?.name).toBe("Cleo");
    expect(one(loaded[3], "author")).toBeNull();
  });

  test("hasOne attaches a single row", async () => {
    const loaded = await preload(tables.users ?? [], "users", ["profile"], {
      run: tableRunner([]),
      registry: testRegistry(),
    });
    expect(one(loaded[0], "profile")).toBeNull();
    expect(one(loaded[1], "profile")?.bio).toBe("hi");
  });

  test("string and numeric keys match", async () => {
    const loaded = await preload(
      [makeRow({ id: "1", name: "Ada" }), makeRow({ id: null, name: "Nobody" })],
      "users",
      ["posts"],
      { run: tableRunner([]), registry: testRegistry() },
    );
    expect(ids(many(loaded[0], "posts"))).toEqual([10, 11]);
    expect(many(loaded[1], "posts")).toEqual([]);
  });

  test("keys are chunked by batchSize", async () => {
    const log: CompiledQuery[] = [];
    const loaded = await preload(tables.users ?? [], "users", ["posts"], {
      run: tableRunner(log),
      registry: testRegistry(),
      batchSize: 2,
    });
    expect(log).toEqual([
      { sql: "SELECT * FROM posts WHERE user_id IN ($1, $2)", params: [1, 2] },
      { sql: "SELECT * FROM posts WHERE user_id IN ($1)", params: [3] },
    ]);
    expect(ids(many(loaded[2], "posts"))).toEqual([12]);
  });

  test("no rows, no queries", async () => {
    const run = vi.fn(tableRunner([]));
    expect(await preload([], "users", ["posts"], { run, registry: testRegistry() })).toEqual([]);
    expect(run).not.toHaveBeenCalled();
  });

  test("bad paths fail before any query", async () => {
    const run = vi.fn(tableRunner([]));
    const unknown = await rejected(
      preload(tables.users ?? [], "users", ["posts", "posts.nope"], { run, registry: testRegistry() }),
    );
    expect(unknown.kind).toBe("invalidRelationship");
    expect(unknown.message).toBe("Relationship 'nope' not found on 'posts'");

    const manyToMany = await rejected(
      preload(tables.users ?? [], "users", ["tags"], { run, registry: testRegistry() }),
    );
    expect(manyToMany.kind).toBe("notImplemented");
    expect(manyToMany.message).toBe("Feature not implemented: manyToMany preload 'tags'");
    expect(run).not.toHaveBeenCalled();
  });

  test("first failure rejects and stops sibling chunks", async () => {
    const profileCalls: string[] = [];
    const run: PreloadRunner = async (compiled, table) => {
      if (table === "posts") throw new Error("boom");
      profileCalls.push(compiled.sql);
      await new Promise((resolve) => setTimeout(resolve, 10));
      return [];
    };

    await expect(
      preload(tables.users ?? [], "users", ["posts", "profile"], {
        run,
        registry: testRegistry(),
        batchSize: 1,
      }),
    ).rejects.toThrow("boom");
    await new Promise((resolve) => setTimeout(resolve, 30));
    expect(profileCalls).toEqual(["SELECT * FROM profiles WHERE user_id IN ($1)"]);
  });

  test("an aborted signal cancels the preload", async () => {
    const controller = new AbortController();
    const reason = new Error("cancelled");
    controller.abort(reason);
    const run = vi.fn(tableRunner([]));

    await expect(
      preload(tables.users ?? [], "users", ["posts"], {
        run,
        registry: testRegistry(),
        signal: controller.signal,
      }),
    ).rejects.toBe(reason);
    expect(run).not.toHaveBeenCalled();
  });
});

test("planPreload merges shared prefixes", () => {
  const nodes = planPreload(testRegistry(), "users", ["posts.comments", "posts", "profile"]);
  expect(nodes.map((node) => node.name)).toEqual(["posts", "profile"]);
  expect(nodes[0]?.children.map((node) => node.name)).toEqual(["comments"]);
});
