import { describe, expect, test } from "vitest";
import { Query } from "./query";
import { eq, field, gte, like } from "./queryFns";
import { defineSchema } from "./schema";

describe("Query", () => {
  test("starts from a table name or a schema", () => {
    const users = defineSchema({
      table: "users",
      fields: { id: { type: "int" }, name: { type: "string" } },
    });
    expect(Query.from("users").table).toBe("users");
    expect(Query.from(users).table).toBe("users");
    expect(Query.from("users").selections).toBe("*");
  });

  test("where returns a new query and leaves the original untouched", () => {
    const base = Query.from("users").where(gte("age", 18));
    const before = structuredClone(base.state);
    const next = base.where(like("email", "%@x.com"));

    expect(next).not.toBe(base);
    expect(base.state).toEqual(before);
    expect(base.conditions).toEqual([gte("age", 18)]);
    expect(next.conditions).toEqual([gte("age", 18), like("email", "%@x.com")]);
    expect({ ...next.state, conditions: base.conditions }).toEqual(base.state);
  });

  test("every builder copies instead of mutating", () => {
    const base = Query.from("posts");
    const built = base
      .whereGroup([eq("a", 1), eq("b", 2)], "OR")
      .whereRelated("author", [eq("name", "ada")])
      .join("comments", { kind: "LEFT" })
      .orderBy(field("title").desc())
      .orderBy("id")
      .limit(5)
      .offset(10)
      .select("title")
      .preload("author")
      .groupBy("user_id");

    expect(base.compositeConditions).toEqual([]);
    expect(base.joins).toEqual([]);
    expect(base.limitValue).toBeUndefined();
    expect(base.preloads).toEqual([]);

    expect(built.compositeConditions).toEqual([
      { method: "OR", conditions: [eq("a", 1), eq("b", 2)] },
    ]);
    expect(built.relationshipConditions).toEqual([
      { association: "author", conditions: [eq("name", "ada")] },
    ]);
    expect(built.joins).toEqual([{ association: "comments", kind: "LEFT", on: [] }]);
    expect(built.ordering).toEqual([
      { field: "title", direction: "DESC" },
      { field: "id", direction: "ASC" },
    ]);
    expect(built.limitValue).toBe(5);
    expect(built.offsetValue).toBe(10);
    expect(built.selections).toEqual(["title"]);
    expect(built.preloads).toEqual(["author"]);
    expect(built.grouping).toEqual(["user_id"]);
  });

  test("state is frozen", () => {
    const query = Query.from("users").where(eq("id", 1));
    expect(Object.isFrozen(query)).toBe(true);
    expect(Object.isFrozen(query.state)).toBe(true);
    expect(Object.isFrozen(query.conditions)).toBe(true);
  });

  test("select with no fields restores the default selection", () => {
    const narrowed = Query.from("users").select("name");
    expect(narrowed.select().selections).toBe("*");
  });

  test("join defaults to an inner join", () => {
    expect(Query.from("posts").join("author").joins).toEqual([
      { association: "author", kind: "INNER", on: [] },
    ]);
  });
});
