import type { DataSource } from "typeorm";
import { createValidatedContext, type EntityStore } from "./validatedContext";
import { User } from "@/entities/User";
import { userSchema, type UserInput } from "@/validations/schemas";

export type UserListQuery = {
  take?: number;
};

export function userStore(
  dataSource: DataSource,
): EntityStore<User, UserInput, UserListQuery> {
  const repo = dataSource.getRepository(User);
  return {
    findById: (id) =>
      repo.findOne({ where: { id }, relations: { posts: true, likes: true } }),
    findAll: (query = {}) =>
      repo.find({
        take: query.take,
        order: { id: "ASC" },
      }),
    insert: (input) => repo.save(repo.create(input)),
    merge: (record, input) => repo.save(repo.merge(record, input)),
    remove: (record) => repo.remove(record),
  };
}

export function createUserContext(dataSource: DataSource) {
  return createValidatedContext<User, UserInput, UserListQuery>(userStore(dataSource), {
    create: userSchema,
    update: userSchema.partial(),
  });
}
