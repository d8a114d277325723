import type { z } from "zod";
import type { CrudContext } from "@/resolvers/types";
import { fail, ok } from "@/resolvers/types";
import { tree } from "@/types/validation";
import { toValidationNode } from "@/validations/toValidationNode";

/** Storage for one entity; the typeorm repositories implement it in production. */
export interface EntityStore<T, TInput, TQuery> {
  findById(id: number): Promise<T | null>;
  findAll(query?: TQuery): Promise<T[]>;
  insert(input: TInput): Promise<T>;
  merge(record: T, input: Partial<TInput>): Promise<T>;
  remove(record: T): Promise<T>;
}

export type ContextSchemas<TInput> = {
  create: z.ZodType<TInput, z.ZodTypeDef, unknown>;
  update: z.ZodType<Partial<TInput>, z.ZodTypeDef, unknown>;
};

export function createValidatedContext<T, TInput, TQuery>(
  store: EntityStore<T, TInput, TQuery>,
  schemas: ContextSchemas<TInput>,
): CrudContext<T, TQuery> {
  return {
    get: (id) => store.findById(id),
    list: (query) => store.findAll(query),

    async create(params) {
      const parsed = schemas.create.safeParse(params);
      if (!parsed.success) {
        return fail("invalid", [tree(toValidationNode(parsed.error))]);
      }
      return ok(await store.insert(parsed.data));
    },

    async update(record, params) {
      const parsed = schemas.update.safeParse(params);
      if (!parsed.success) {
        return fail("invalid", [tree(toValidationNode(parsed.error))]);
      }
      return ok(await store.merge(record, parsed.data));
    },

    async delete(record) {
      return ok(await store.remove(record));
    },
  };
}
