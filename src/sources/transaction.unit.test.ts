import { describe, expect, test, vi } from "vitest";
import { rejected } from "../testing/catchQuarry";
import { FakePgClient, type FakeHandler } from "../testing/fakePg";
import { Transaction } from "./transaction";

const savepointPattern = /^SAVEPOINT (sp_inner_[0-9a-f]{8})$/;

async function setup(handler?: FakeHandler, isolationLevel?: "SERIALIZABLE") {
  const client = new FakePgClient(handler);
  const session = await client.reserve();
  const logger = { debug: vi.fn(), warn: vi.fn() };
  const transaction = new Transaction(session, {
    logger,
    logSql: false,
    ...(isolationLevel === undefined ? {} : { isolationLevel }),
  });
  return { client, transaction, logger };
}

const statement = (sql: string) => ({ sql, params: [] });

describe("Transaction", () => {
  test("commits after work succeeds", async () => {
    const { client, transaction } = await setup();
    expect(transaction.state).toBe("idle");

    const result = await transaction.run(async () => {
      expect(transaction.isActive).toBe(true);
      await transaction.executor.execute(statement("INSERT INTO users DEFAULT VALUES RETURNING *"));
      return 5;
    });

    expect(result).toBe(5);
    expect(client.sql).toEqual(["BEGIN", "INSERT INTO users DEFAULT VALUES RETURNING *", "COMMIT"]);
    expect(transaction.state).toBe("committed");
  });

  test("rolls back and rethrows when work fails", async () => {
    const { client, transaction } = await setup();
    await expect(
      transaction.run(async () => {
        throw new Error("nope");
      }),
    ).rejects.toThrow("nope");
    expect(client.sql).toEqual(["BEGIN", "ROLLBACK"]);
    expect(transaction.state).toBe("rolledBack");
  });

  test("begins with the configured isolation level", async () => {
    const { client, transaction } = await setup(undefined, "SERIALIZABLE");
    await transaction.run(async () => undefined);
    expect(client.sql).toEqual(["BEGIN ISOLATION LEVEL SERIALIZABLE", "COMMIT"]);
  });

  test("a failed rollback is logged and the original error wins", async () => {
    const { client, transaction, logger } = await setup(({ sql }) => {
      if (sql === "ROLLBACK") throw new Error("connection lost");
      return undefined;
    });
    await expect(
      transaction.run(async () => {
        throw new Error("original");
      }),
    ).rejects.toThrow("original");

    expect(client.sql).toEqual(["BEGIN", "ROLLBACK"]);
    expect(logger.warn).toHaveBeenCalledWith(
      "[quarry] ROLLBACK failed: Query execution failed for 'ROLLBACK': connection lost",
    );
    expect(transaction.state).toBe("rolledBack");
  });

  test("a failed BEGIN is not rolled back", async () => {
    const { client, transaction } = await setup(({ sql }) => {
      if (sql === "BEGIN") throw new Error("refused");
      return undefined;
    });
    const work = vi.fn(async () => 1);

    const error = await rejected(transaction.run(work));
    expect(error.kind).toBe("databaseError");
    expect(work).not.toHaveBeenCalled();
    expect(client.sql).toEqual(["BEGIN"]);
    expect(transaction.state).toBe("rolledBack");
  });

  test("a failed COMMIT rolls back", async () => {
    const { client, transaction } = await setup(({ sql }) => {
      if (sql === "COMMIT") throw new Error("serialization failure");
      return undefined;
    });
    const error = await rejected(transaction.run(async () => 1));
    expect(error.message).toBe("Query execution failed for 'COMMIT': serialization failure");
    expect(client.sql).toEqual(["BEGIN", "COMMIT", "ROLLBACK"]);
    expect(transaction.state).toBe("rolledBack");
  });

  test("statements outside the active span are refused", async () => {
    const { client, transaction } = await setup();
    const early = await rejected(transaction.executor.execute(statement("SELECT 1")));
    expect(early.kind).toBe("noActiveTransaction");
    expect(early.message).toBe("No active transaction: transaction has not begun");

    await transaction.run(async () => undefined);
    const late = await rejected(transaction.executor.execute(statement("SELECT 1")));
    expect(late.message).toBe("No active transaction: transaction already committed");

    const again = await rejected(transaction.run(async () => undefined));
    expect(again.kind).toBe("noActiveTransaction");
    expect(client.sql).toEqual(["BEGIN", "COMMIT"]);
  });

  test("savepoint releases on success", async () => {
    const { client, transaction } = await setup();
    const value = await transaction.run(() => transaction.savepoint("inner", async () => "kept"));

    expect(value).toBe("kept");
    const [, savepoint, release, commit] = client.sql;
    const name = savepointPattern.exec(savepoint ?? "")?.[1];
    expect(name).toBeDefined();
    expect(release).toBe(`RELEASE SAVEPOINT ${name}`);
    expect(commit).toBe("COMMIT");
  });

  test("savepoint rolls back to itself on failure and the outer work continues", async () => {
    const { client, transaction } = await setup();
    await transaction.run(async () => {
      await expect(
        transaction.savepoint("inner", async () => {
          await transaction.executor.execute(statement("DELETE FROM users"));
          throw new Error("partial");
        }),
      ).rejects.toThrow("partial");
      await transaction.executor.execute(statement("SELECT 1"));
    });

    const name = savepointPattern.exec(client.sql[1] ?? "")?.[1];
    expect(client.sql).toEqual([
      "BEGIN",
      `SAVEPOINT ${name}`,
      "DELETE FROM users",
      `ROLLBACK TO SAVEPOINT ${name}`,
      `RELEASE SAVEPOINT ${name}`,
      "SELECT 1",
      "COMMIT",
    ]);
    expect(transaction.state).toBe("committed");
  });

  test("savepoint names are validated and need an open transaction", async () => {
    const { transaction } = await setup();
    expect((await rejected(transaction.savepoint("inner", async () => 1))).kind).toBe("noActiveTransaction");

    await transaction.run(async () => {
      const error = await rejected(transaction.savepoint("bad name", async () => 1));
      expect(error.kind).toBe("invalidQuery");
    });
  });
});
