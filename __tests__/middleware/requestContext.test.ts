import { describe, expect, it, vi } from "vitest";
import { asResponse, fakeRequest, fakeResponse } from "../helpers/express";
import { requestContext } from "@/middleware/requestContext";
import { identityTranslator } from "@/translation/translator";
import { AppError } from "@/utils/errors/AppError";

const middleware = requestContext({
  translator: identityTranslator,
  locales: ["es", "pt_BR"],
  defaultLocale: "en",
});

describe("requestContext", () => {
  it("negotiates the locale and attaches the translator", () => {
    const req = fakeRequest({ headers: { "accept-language": "pt-BR,pt;q=0.9" } });
    const res = fakeResponse();
    const next = vi.fn();

    middleware(req, asResponse(res), next);

    expect(req.locale).toBe("pt_BR");
    expect(req.translator).toBe(identityTranslator);
    expect(res.headers["content-language"]).toBe("pt_BR");
    expect(next).toHaveBeenCalledWith();
  });

  it("uses the default locale without a usable header", () => {
    const req = fakeRequest({ headers: { "accept-language": "de" } });

    middleware(req, asResponse(fakeResponse()), vi.fn());

    expect(req.locale).toBe("en");
  });

  it("generates a request id unless one is given", () => {
    const generated = fakeRequest();
    const given = fakeRequest({ headers: { "x-request-id": "req-123" } });
    const res = fakeResponse();

    middleware(generated, asResponse(fakeResponse()), vi.fn());
    middleware(given, asResponse(res), vi.fn());

    expect(generated.requestId).toMatch(/^[0-9a-f-]{36}$/);
    expect(given.requestId).toBe("req-123");
    expect(res.headers["x-request-id"]).toBe("req-123");
  });

  it("records the gateway user", () => {
    const req = fakeRequest({ headers: { "x-user-id": "42" } });

    middleware(req, asResponse(fakeResponse()), vi.fn());

    expect(req.user).toEqual({ id: 42 });
  });

  it("ignores an empty gateway user", () => {
    const req = fakeRequest({ headers: { "x-user-id": "" } });
    const next = vi.fn();

    middleware(req, asResponse(fakeResponse()), next);

    expect(req.user).toBeUndefined();
    expect(next).toHaveBeenCalledWith();
  });

  it("rejects a gateway user that is not a record id", () => {
    for (const [header, template] of [
      ["abc", "is invalid"],
      ["0", "must be greater than %{number}"],
    ]) {
      const req = fakeRequest({ headers: { "x-user-id": header } });
      const next = vi.fn();

      middleware(req, asResponse(fakeResponse()), next);

      expect(req.user).toBeUndefined();
      const [error] = next.mock.calls[0];
      expect(error).toBeInstanceOf(AppError);
      expect(error).toMatchObject({
        statusCode: 400,
        errors: [
          {
            kind: "tree",
            node: { fieldErrors: { "x-user-id": [{ template }] }, associations: {} },
          },
        ],
      });
    }
  });
});
