import type { RequestPartSchemas } from ".";
import type { NextFunction, Request, RequestHandler, Response } from "express";
import { toValidationNode } from "./toValidationNode";
import type { ValidationNode } from "@/types/validation";
import { AppError } from "@/utils/errors/AppError";

type PartResult = { ok: true; data: unknown } | { ok: false; node: ValidationNode };

function validatePart(
  schema: RequestPartSchemas[keyof RequestPartSchemas],
  value: unknown,
): PartResult {
  if (!schema) {
    return { ok: true, data: value };
  }
  const result = schema.safeParse(value);
  if (result.success) return { ok: true, data: result.data };
  return { ok: false, node: toValidationNode(result.error) };
}

/**
 * Validates every configured request part and reports all failing parts
 * together, one validation tree per part.
 */
export function validate(schemas: RequestPartSchemas): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction) => {
    const parts = {
      params: validatePart(schemas.params, req.params),
      query: validatePart(schemas.query, req.query),
      headers: validatePart(schemas.headers, req.headers),
      body: validatePart(schemas.body, req.body),
    };

    const failed: ValidationNode[] = [];
    for (const part of Object.values(parts)) {
      if (!part.ok) failed.push(part.node);
    }
    if (failed.length > 0) return next(AppError.validation(failed));

    // do NOT assign to req.params/req.query; they are getters in express 5
    req.validated = {
      params: parts.params.ok ? parts.params.data : req.params,
      query: parts.query.ok ? parts.query.data : req.query,
      headers: parts.headers.ok ? parts.headers.data : req.headers,
      body: parts.body.ok ? parts.body.data : req.body,
    };

    return next();
  };
}
