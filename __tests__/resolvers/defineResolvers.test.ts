import { describe, expect, it, vi } from "vitest";
import {
  createResolverFactory,
  defineResolvers,
  pascalCase,
  shouldDefine,
} from "@/resolvers/defineResolvers";
import { ok, type CrudContext, type ResolverInfo } from "@/resolvers/types";

type Item = { id: number; x: string };
type ItemQuery = { x?: string };

function itemContext(): CrudContext<Item, ItemQuery> {
  const rows: Item[] = [
    { id: 1, x: "1" },
    { id: 2, x: "2" },
    { id: 3, x: "123" },
  ];
  return {
    get: async (id) => rows.find((row) => row.id === id) ?? null,
    list: async (query) => rows.filter((row) => !query?.x || row.x === query.x),
    create: async (params) => ok({ id: 4, x: String(params) }),
    update: async (record, params) => ok({ ...record, x: String(params) }),
    delete: async (record) => ok(record),
  };
}

const info: ResolverInfo = { requestId: "req-1", userId: 42 };

describe("defineResolvers", () => {
  it("generates every function by default", async () => {
    const resolvers = defineResolvers(itemContext(), "test");

    expect(Object.keys(resolvers).sort()).toEqual([
      "create",
      "delete",
      "get",
      "list",
      "nilToError",
      "update",
    ]);
    expect(await resolvers.get?.({ id: 3 }, info)).toEqual({ ok: true, value: { id: 3, x: "123" } });
    expect(await resolvers.list?.({}, info)).toEqual({
      ok: true,
      value: [
        { id: 1, x: "1" },
        { id: 2, x: "2" },
        { id: 3, x: "123" },
      ],
    });
    expect(await resolvers.create?.({ params: "new" }, info)).toEqual({
      ok: true,
      value: { id: 4, x: "new" },
    });
    expect(await resolvers.update?.({ id: 2, params: "changed" }, info)).toEqual({
      ok: true,
      value: { id: 2, x: "changed" },
    });
    expect(await resolvers.delete?.({ id: 1 }, info)).toEqual({ ok: true, value: { id: 1, x: "1" } });
  });

  it("reports missing records as not found", async () => {
    const resolvers = defineResolvers(itemContext(), "test");
    const notFound = {
      ok: false,
      reason: "not_found",
      errors: [{ kind: "message", message: "Test not found." }],
    };

    expect(await resolvers.get?.({ id: 0 }, info)).toEqual(notFound);
    expect(await resolvers.update?.({ id: 0, params: "x" }, info)).toEqual(notFound);
    expect(await resolvers.delete?.({ id: 0 }, info)).toEqual(notFound);
  });

  it("names the entity in PascalCase", async () => {
    const resolvers = defineResolvers(itemContext(), "camelized_schema_name");

    expect(await resolvers.get?.({ id: 0 }, info)).toEqual({
      ok: false,
      reason: "not_found",
      errors: [{ kind: "message", message: "CamelizedSchemaName not found." }],
    });
  });

  it("generates only the listed functions", () => {
    const resolvers = defineResolvers(itemContext(), "test", { only: ["create", "list"] });

    expect(Object.keys(resolvers).sort()).toEqual(["create", "list", "nilToError"]);
  });

  it("skips the excluded functions", () => {
    const resolvers = defineResolvers(itemContext(), "test", { except: ["list", "delete"] });

    expect(Object.keys(resolvers).sort()).toEqual(["create", "get", "nilToError", "update"]);
  });

  it("scopes list queries with the request info", async () => {
    const scope = vi.fn((query: ItemQuery | undefined, _info: ResolverInfo) => ({
      ...query,
      x: "123",
    }));
    const resolvers = defineResolvers(itemContext(), "test", { listQuery: { x: "1" }, scope });

    expect(await resolvers.list?.({}, info)).toEqual({ ok: true, value: [{ id: 3, x: "123" }] });
    expect(scope).toHaveBeenCalledWith({ x: "1" }, info);
  });

  it("hands creation to a custom create resolver", async () => {
    const context = itemContext();
    const createResolver = vi.fn(async () => ok({ id: 9, x: "custom" }));
    const resolvers = defineResolvers(context, "test", { createResolver });

    const args = { params: "ignored" };
    expect(await resolvers.create?.(args, info)).toEqual({ ok: true, value: { id: 9, x: "custom" } });
    expect(createResolver).toHaveBeenCalledWith(context, "test", args, info);
  });

  it("exposes nilToError for hand-written resolvers", async () => {
    const context = itemContext();
    const { nilToError } = defineResolvers(context, "test", { except: ["update"] });

    const update = async (id: number, x: string) =>
      nilToError(await context.get(id), (record) => ok({ ...record, x: `${x}!` }));

    expect(await update(3, "y")).toEqual({ ok: true, value: { id: 3, x: "y!" } });
    expect(await update(0, "y")).toEqual({
      ok: false,
      reason: "not_found",
      errors: [{ kind: "message", message: "Test not found." }],
    });
  });
});

describe("createResolverFactory", () => {
  it("applies its defaults", () => {
    const define = createResolverFactory({ only: ["create", "list"] });

    expect(Object.keys(define(itemContext(), "test")).sort()).toEqual([
      "create",
      "list",
      "nilToError",
    ]);
  });

  it("lets a call override the defaults", () => {
    const define = createResolverFactory({ except: ["list", "delete"] });

    expect(Object.keys(define(itemContext(), "test")).sort()).toEqual([
      "create",
      "get",
      "nilToError",
      "update",
    ]);
    expect(Object.keys(define(itemContext(), "test", { except: ["get"] })).sort()).toEqual([
      "create",
      "delete",
      "list",
      "nilToError",
      "update",
    ]);
  });
});

describe("shouldDefine", () => {
  it("lets only win over except", () => {
    expect(shouldDefine("get", ["get"], ["get"])).toBe(true);
    expect(shouldDefine("list", ["get"], [])).toBe(false);
    expect(shouldDefine("list", [], ["list"])).toBe(false);
    expect(shouldDefine("list")).toBe(true);
  });
});

describe("pascalCase", () => {
  it("joins underscored words", () => {
    expect(pascalCase("user")).toBe("User");
    expect(pascalCase("camelized_schema_name")).toBe("CamelizedSchemaName");
  });
});
