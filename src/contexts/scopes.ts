import type { ResolverInfo } from "@/resolvers/types";
import type { PostListQuery } from "./posts";

/** Callers identified by the gateway only see their own posts. */
export function ownPosts(
  query: PostListQuery | undefined,
  info: ResolverInfo,
): PostListQuery {
  return info.userId === undefined
    ? { ...query }
    : { ...query, userId: info.userId };
}
