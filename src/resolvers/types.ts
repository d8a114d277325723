import type { RawError } from "@/types/validation";

export type ResolverFunction = "get" | "list" | "create" | "update" | "delete";

export type FailureReason = "not_found" | "invalid";

export type ResolverResult<T> =
  | { ok: true; value: T }
  | { ok: false; reason: FailureReason; errors: RawError[] };

/** Who is asking; handed to list scopes and custom create resolvers. */
export type ResolverInfo = {
  requestId?: string;
  userId?: number;
  locale?: string;
};

/**
 * Persistence operations for one entity. `create` and `update` validate
 * their params and fail with a validation tree.
 */
export interface CrudContext<T, TQuery> {
  get(id: number): Promise<T | null>;
  list(query?: TQuery): Promise<T[]>;
  create(params: unknown): Promise<ResolverResult<T>>;
  update(record: T, params: unknown): Promise<ResolverResult<T>>;
  delete(record: T): Promise<ResolverResult<T>>;
}

export const ok = <T>(value: T): ResolverResult<T> => ({ ok: true, value });

export const fail = <T>(
  reason: FailureReason,
  errors: RawError[],
): ResolverResult<T> => ({ ok: false, reason, errors });
