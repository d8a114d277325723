import { describe, expect, it, vi } from "vitest";
import { z } from "zod";
import { fakeRequest, fakeResponse, asResponse } from "../helpers/express";
import { AppError } from "@/utils/errors/AppError";
import { validate } from "@/validations";
import { idParamsSchema } from "@/validations/schemas";

describe("validate", () => {
  const middleware = validate({
    params: idParamsSchema,
    body: z.object({ title: z.string() }),
  });

  it("stores parsed parts on req.validated", () => {
    const req = fakeRequest({ params: { id: "7" }, body: { title: "hello", extra: true } });
    const next = vi.fn();

    middleware(req, asResponse(fakeResponse()), next);

    expect(next).toHaveBeenCalledWith();
    expect(req.validated?.params).toEqual({ id: 7 });
    expect(req.validated?.body).toEqual({ title: "hello" });
    expect(req.validated?.query).toEqual({});
  });

  it("reports every failing part as its own tree", () => {
    const req = fakeRequest({ params: { id: "abc" }, body: {} });
    const next = vi.fn();

    middleware(req, asResponse(fakeResponse()), next);

    const error = next.mock.calls[0][0];
    expect(error).toBeInstanceOf(AppError);
    expect(error.statusCode).toBe(400);
    expect(error.errors).toEqual([
      {
        kind: "tree",
        node: { fieldErrors: { id: [{ template: "is invalid", bindings: {} }] }, associations: {} },
      },
      {
        kind: "tree",
        node: {
          fieldErrors: { title: [{ template: "can't be blank", bindings: {} }] },
          associations: {},
        },
      },
    ]);
    expect(req.validated).toBeUndefined();
  });
});
