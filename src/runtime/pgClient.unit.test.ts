import { beforeEach, describe, expect, test, vi } from "vitest";

const mocks = vi.hoisted(() => {
  const result = (rows: Record<string, unknown>[], count: number) =>
    Promise.resolve(Object.assign([...rows], { count }));
  const reserved = {
    unsafe: vi.fn(() => result([{ id: 2 }], 1)),
    release: vi.fn(),
  };
  const sql = {
    unsafe: vi.fn(() => result([{ id: 1, name: "Ada" }], 1)),
    reserve: vi.fn(async () => reserved),
    end: vi.fn(async () => undefined),
  };
  return { postgres: vi.fn(() => sql), sql, reserved };
});

vi.mock("postgres", () => ({ default: mocks.postgres }));

import { createPgClient } from "./pgClient";

describe("createPgClient", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  test("passes a URL with pool options", () => {
    createPgClient("postgres://app@localhost/app", { statementTimeoutMs: 500, max: 4 });
    expect(mocks.postgres).toHaveBeenCalledWith("postgres://app@localhost/app", {
      max: 4,
      connection: { statement_timeout: 500 },
    });
  });

  test("merges pool options into connection options", () => {
    createPgClient({ host: "db", port: 5433, username: "app" }, { max: 2 });
    expect(mocks.postgres).toHaveBeenCalledWith({ host: "db", port: 5433, username: "app", max: 2 });
  });

  test("unsafe returns plain rows and the affected count", async () => {
    const client = createPgClient("postgres://localhost/app");
    const result = await client.unsafe("SELECT * FROM users WHERE id = $1", [1]);
    expect(mocks.sql.unsafe).toHaveBeenCalledWith("SELECT * FROM users WHERE id = $1", [1]);
    expect(result).toEqual({ rows: [{ id: 1, name: "Ada" }], count: 1 });
  });

  test("reserve hands out a connection that can be released", async () => {
    const client = createPgClient("postgres://localhost/app");
    const session = await client.reserve();
    const result = await session.unsafe("BEGIN");
    session.release();

    expect(mocks.reserved.unsafe).toHaveBeenCalledWith("BEGIN", []);
    expect(result.rows).toEqual([{ id: 2 }]);
    expect(mocks.reserved.release).toHaveBeenCalledTimes(1);
  });

  test("end forwards the timeout", async () => {
    const client = createPgClient("postgres://localhost/app");
    await client.end({ timeout: 5 });
    expect(mocks.sql.end).toHaveBeenCalledWith({ timeout: 5 });
  });
});
