import { beforeEach, describe, expect, test, vi } from "vitest";

const mocks = vi.hoisted(() => {
  const sql = {
    unsafe: vi.fn(async () => Object.assign([], { count: 0 })),
    reserve: vi.fn(),
    end: vi.fn(async () => undefined),
  };
  return { postgres: vi.fn(() => sql), sql };
});

vi.mock("postgres", () => ({ default: mocks.postgres }));

import { quarry, QuarryError } from "./quarry";
import { users } from "./testing/schemas";

describe("quarry.connect", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  test("builds connection options from the environment", async () => {
    const db = quarry.connect({ schemas: [users] }, { DB_HOST: "db.internal", DB_PASSWORD: "test-secret" });

    expect(mocks.postgres).toHaveBeenCalledWith({
      host: "db.internal",
      port: 5432,
      username: "postgres",
      database: "postgres",
      password: "test-secret",
    });
    expect(db.registry.get("users")).toBe(users);

    await db.close(1);
    expect(mocks.sql.end).toHaveBeenCalledWith({ timeout: 1 });
  });

  test("a URL wins and pool options are forwarded", () => {
    quarry.connect(
      { url: "postgres://app@localhost/app", statementTimeoutMs: 250, maxConnections: 3 },
      { DB_HOST: "ignored" },
    );
    expect(mocks.postgres).toHaveBeenCalledWith("postgres://app@localhost/app", {
      max: 3,
      connection: { statement_timeout: 250 },
    });
  });

  test("configuration errors surface before connecting", () => {
    expect(() => quarry.connect({}, { DB_PORT: "zero" })).toThrow(QuarryError);
    expect(mocks.postgres).not.toHaveBeenCalled();
  });
});

describe("quarry facade", () => {
  test("composes queries and compiles them", () => {
    const { gte, like } = quarry.qfns;
    const query = quarry.from(users).where(gte("age", 18), like("email", "%@x.com")).limit(10);
    expect(quarry.compile.select(query, quarry.registry([users]))).toEqual({
      sql: "SELECT * FROM users WHERE age >= $1 AND email LIKE $2 LIMIT 10",
      params: [18, "%@x.com"],
    });
  });

  test("isError narrows by kind", () => {
    const error = new QuarryError("notFound", "users with id '1' not found");
    expect(quarry.isError(error)).toBe(true);
    expect(quarry.isError(error, "notFound")).toBe(true);
    expect(quarry.isError(error, "invalidQuery")).toBe(false);
    expect(quarry.isError(new Error("x"))).toBe(false);
  });

  test("changeset casts against a schema", () => {
    expect(quarry.changeset(users, { name: "Ada" }).changes).toEqual({ name: "Ada" });
  });
});
