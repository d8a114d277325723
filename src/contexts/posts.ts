import type { DataSource } from "typeorm";
import { createValidatedContext, type EntityStore } from "./validatedContext";
import { Post } from "@/entities/Post";
import { postSchema, type PostInput } from "@/validations/schemas";

export type PostListQuery = {
  userId?: number;
  take?: number;
};

export function postStore(
  dataSource: DataSource,
): EntityStore<Post, PostInput, PostListQuery> {
  const repo = dataSource.getRepository(Post);
  return {
    findById: (id) =>
      repo.findOne({ where: { id }, relations: { comment: true, likes: true } }),
    findAll: (query = {}) =>
      repo.find({
        where: query.userId === undefined ? {} : { user_id: query.userId },
        take: query.take,
        order: { id: "ASC" },
      }),
    insert: (input) => repo.save(repo.create(input)),
    merge: (record, input) => repo.save(repo.merge(record, input)),
    remove: (record) => repo.remove(record),
  };
}

export function createPostContext(dataSource: DataSource) {
  return createValidatedContext<Post, PostInput, PostListQuery>(postStore(dataSource), {
    create: postSchema,
    update: postSchema.partial(),
  });
}
