import { quarry } from "../src";

// Connection settings come from DATABASE_URL or DB_HOST / DB_PORT / DB_USER / DB_PASSWORD / DB_NAME.
const users = quarry.schema({
  table: "users",
  fields: {
    id: { type: "int" },
    name: { type: "string" },
    email: { type: "string" },
    age: { type: "int", optional: true },
  },
});

const db = quarry.connect({ schemas: [users] });
const { gte, like } = quarry.qfns;

const ada = await db.insert(users, { name: "Ada", email: "ada@x.com", age: 36 });

// Reads settle into a Result instead of throwing.
const adults = await db.run(
  users,
  quarry.from(users).where(gte("age", 18), like("email", "%@x.com")).limit(10),
);
if (adults.isErr()) {
  throw adults.error;
}

const renamed = await db.update(users, ada.id, { name: "Ada L." });

console.log(adults.unwrap().map((user) => user.name).join(", "));
console.log(renamed.name);

await db.close();
