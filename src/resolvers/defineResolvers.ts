import type {
  CrudContext,
  ResolverFunction,
  ResolverInfo,
  ResolverResult,
} from "./types";
import { fail, ok } from "./types";
import { message } from "@/types/validation";

export type IdArgs = { id: number };
export type CreateArgs = { params: unknown };
export type UpdateArgs = { id: number; params: unknown };

export type CreateResolver<T, TQuery> = (
  context: CrudContext<T, TQuery>,
  name: string,
  args: CreateArgs,
  info: ResolverInfo,
) => Promise<ResolverResult<T>>;

export type ResolverOptions<T, TQuery> = {
  /** Functions to generate; when non-empty nothing else is generated. */
  only?: ResolverFunction[];
  /** Functions to skip; ignored when `only` is non-empty. */
  except?: ResolverFunction[];
  listQuery?: TQuery;
  /** Narrows `listQuery` per request, e.g. to the caller's own records. */
  scope?: (query: TQuery | undefined, info: ResolverInfo) => TQuery;
  createResolver?: CreateResolver<T, TQuery>;
};

export type ResolverDefaults = Pick<
  ResolverOptions<unknown, unknown>,
  "only" | "except"
>;

export type Resolvers<T, TQuery> = {
  get?: (args: IdArgs, info: ResolverInfo) => Promise<ResolverResult<T>>;
  list?: (args: object, info: ResolverInfo) => Promise<ResolverResult<T[]>>;
  create?: (args: CreateArgs, info: ResolverInfo) => Promise<ResolverResult<T>>;
  update?: (args: UpdateArgs, info: ResolverInfo) => Promise<ResolverResult<T>>;
  delete?: (args: IdArgs, info: ResolverInfo) => Promise<ResolverResult<T>>;
  nilToError: <R>(
    record: T | null,
    fn: (record: T) => Promise<ResolverResult<R>> | ResolverResult<R>,
  ) => Promise<ResolverResult<R>>;
};

/** `camelized_schema_name` -> `CamelizedSchemaName` */
export function pascalCase(name: string): string {
  return name
    .split(/[_\-\s]+/)
    .filter(Boolean)
    .map((word) => word[0].toUpperCase() + word.slice(1))
    .join("");
}

export function shouldDefine(
  fn: ResolverFunction,
  only: ResolverFunction[] = [],
  except: ResolverFunction[] = [],
): boolean {
  if (only.length > 0) return only.includes(fn);
  return !except.includes(fn);
}

/**
 * Returns a `defineResolvers` whose `only`/`except` fall back to `defaults`
 * when a call does not pass its own.
 */
export function createResolverFactory(defaults: ResolverDefaults = {}) {
  return function defineResolvers<T, TQuery>(
    context: CrudContext<T, TQuery>,
    name: string,
    options: ResolverOptions<T, TQuery> = {},
  ): Resolvers<T, TQuery> {
    const only = options.only ?? defaults.only;
    const except = options.except ?? defaults.except;
    const notFound = `${pascalCase(name)} not found.`;

    async function nilToError<R>(
      record: T | null,
      fn: (record: T) => Promise<ResolverResult<R>> | ResolverResult<R>,
    ): Promise<ResolverResult<R>> {
      if (record === null) return fail<R>("not_found", [message(notFound)]);
      return fn(record);
    }

    const resolvers: Resolvers<T, TQuery> = { nilToError };

    if (shouldDefine("get", only, except)) {
      resolvers.get = async ({ id }) =>
        nilToError(await context.get(id), (record) => ok(record));
    }

    if (shouldDefine("list", only, except)) {
      resolvers.list = async (_args, info) => {
        const query = options.scope
          ? options.scope(options.listQuery, info)
          : options.listQuery;
        return ok(await context.list(query));
      };
    }

    if (shouldDefine("create", only, except)) {
      const createResolver = options.createResolver;
      resolvers.create = async (args, info) =>
        createResolver
          ? createResolver(context, name, args, info)
          : context.create(args.params);
    }

    if (shouldDefine("update", only, except)) {
      resolvers.update = async ({ id, params }) =>
        nilToError(await context.get(id), (record) =>
          context.update(record, params),
        );
    }

    if (shouldDefine("delete", only, except)) {
      resolvers.delete = async ({ id }) =>
        nilToError(await context.get(id), (record) => context.delete(record));
    }

    return resolvers;
  };
}

export const defineResolvers = createResolverFactory();
