import {
  belongsTo,
  defineSchema,
  hasMany,
  hasOne,
  manyToMany,
  SchemaRegistry,
} from "../core/schema";

export const users = defineSchema({
  table: "users",
  fields: {
    id: { type: "int" },
    name: { type: "string" },
    email: { type: "string" },
    age: { type: "int", optional: true },
    isActive: { type: "bool" },
  },
  relationships: {
    posts: hasMany("posts", { foreignKey: "user_id" }),
    profile: hasOne("profiles", { foreignKey: "user_id" }),
    tags: manyToMany("tags", { foreignKey: "user_id" }),
  },
});

export const posts = defineSchema({
  table: "posts",
  fields: {
    id: { type: "int" },
    userId: { type: "int" },
    title: { type: "string" },
  },
  relationships: {
    author: belongsTo("users", { foreignKey: "user_id" }),
    comments: hasMany("comments", { foreignKey: "post_id" }),
  },
});

export const comments = defineSchema({
  table: "comments",
  fields: {
    id: { type: "int" },
    postId: { type: "int" },
    body: { type: "string" },
  },
});

export const profiles = defineSchema({
  table: "profiles",
  fields: {
    id: { type: "int" },
    userId: { type: "int" },
    bio: { type: "string", optional: true },
  },
});

export function testRegistry(): SchemaRegistry {
  return new SchemaRegistry([users, posts, comments, profiles]);
}
