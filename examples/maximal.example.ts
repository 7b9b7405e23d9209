import { quarry, Changeset, isQuarryError } from "../src";

const { hasMany, belongsTo } = quarry.rel;
const { eq, gte, field } = quarry.qfns;

const users = quarry.schema({
  table: "users",
  fields: {
    id: { type: "int" },
    name: { type: "string" },
    email: { type: "string" },
    isActive: { type: "bool" },
    createdAt: { type: "timestamp", optional: true },
  },
  relationships: {
    posts: hasMany("posts", { foreignKey: "user_id" }),
  },
});

const posts = quarry.schema({
  table: "posts",
  fields: {
    id: { type: "int" },
    userId: { type: "int" },
    title: { type: "string" },
    views: { type: "int" },
  },
  relationships: {
    author: belongsTo("users", { foreignKey: "user_id" }),
    comments: hasMany("comments", { foreignKey: "post_id" }),
  },
});

const comments = quarry.schema({
  table: "comments",
  fields: {
    id: { type: "int" },
    postId: { type: "int" },
    body: { type: "string" },
  },
});

const db = quarry.connect({
  schemas: [users, posts, comments],
  logSql: true,
  isolationLevel: "READ COMMITTED",
});

// Validate before writing; an invalid changeset never reaches the database.
const signup = Changeset.cast(users, { name: "Grace", email: "grace@x.com", isActive: true })
  .validateRequired("name", "email");

const grace = await db.transaction(async (tx) => {
  const user = await tx.insert(users, signup);
  await tx.insertAll(posts, [
    { userId: user.id, title: "Compilers", views: 10 },
    { userId: user.id, title: "Debugging", views: 3 },
  ]);

  // A failing sub-step rolls back to its savepoint; the outer transaction carries on.
  try {
    await tx.savepoint("bonus_post", async (sp) => {
      await sp.insert(posts, { userId: user.id, title: "Draft", views: 0 });
      throw new Error("draft rejected");
    });
  } catch (error) {
    console.warn("savepoint rolled back:", error);
  }
  return user;
});

// Users with their posts and each post's comments: three queries in total.
const withPosts = (
  await db.run(
    users,
    quarry.from(users).where(eq("is_active", true)).preload("posts", "posts.comments"),
  )
).unwrap();

// Posts joined through their author, filtered on the joined table.
const popular = await db.run(
  posts,
  quarry
    .from(posts)
    .whereRelated("author", [eq("email", "grace@x.com")])
    .where(gte("views", 5))
    .orderBy(field("views").desc()),
);
if (popular.isErr()) {
  console.error("popular posts failed:", popular.error);
} else {
  console.log(popular.unwrap().map((post) => post.title));
}

const totalViews = (await db.aggregate(quarry.from(posts), "sum", "views")).unwrap();
const perAuthor = (
  await db.groupedAggregate(quarry.from(posts).groupBy("user_id"), "count")
).unwrap();

const merged = await db.upsert(
  users,
  { name: "Grace H.", email: "grace@x.com", isActive: true },
  { onConflict: ["email"], set: ["name"] },
);

try {
  await db.getOrFail(users, 999_999);
} catch (error) {
  if (isQuarryError(error, "notFound")) {
    console.log(error.message);
  } else {
    throw error;
  }
}

console.log(grace.id, withPosts.length, totalViews, perAuthor, merged.name);

await db.close(5);
