import type { Result } from "@fkws/klonk-result";
import { describe, expect, test } from "vitest";
import { quarry } from "./quarry";
import { users } from "./testing/schemas";

describe("quarry.types exports", () => {
  test("exposes entity and query type aliases", () => {
    const entity: quarry.types.Entity<typeof users> = {
      id: 1,
      name: "Ada",
      email: "ada@x.com",
      age: null,
      isActive: true,
    };
    expect(entity.age).toBeNull();
  });
});

type IsEqual<A, B> =
  (<T>() => T extends A ? 1 : 2) extends <T>() => T extends B ? 1 : 2 ? true : false;

if (false) {
  type User = quarry.types.Entity<typeof users>;
  type LoadedUser = quarry.types.Loaded<User>;
  type Condition = quarry.types.Condition;
  type IsolationLevel = quarry.types.IsolationLevel;
  type ErrorKind = quarry.types.ErrorKind;

  const condition: Condition = quarry.qfns.eq("name", "Ada");
  const level: IsolationLevel = "SERIALIZABLE";
  const kind: ErrorKind = "noActiveTransaction";
  const acceptsLoaded = (_user: LoadedUser): void => {};
  const optionalAge: User = { id: 1, name: "Ada", email: "ada@x.com", age: null, isActive: true };

  const db = quarry.connect({ schemas: [users] });
  const many = db.all(users);
  const single = db.get(users, 1);
  const written = db.getOrFail(users, 1);
  const manyIsResult: IsEqual<Awaited<typeof many>, Result<LoadedUser[]>> = true;
  const singleIsResult: IsEqual<Awaited<typeof single>, Result<LoadedUser | null>> = true;
  const orFailIsPlain: IsEqual<Awaited<typeof written>, LoadedUser> = true;

  void manyIsResult;
  void singleIsResult;
  void orFailIsPlain;
  void condition;
  void level;
  void kind;
  void acceptsLoaded;
  void optionalAge;
}
