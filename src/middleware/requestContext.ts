import type { NextFunction, Request, RequestHandler, Response } from "express";
import { v4 as uuidv4 } from "uuid";
import { z } from "zod";
import { negotiateLocale } from "@/translation/locale";
import type { Translator } from "@/translation/translator";
import { AppError } from "@/utils/errors/AppError";
import { toValidationNode } from "@/validations/toValidationNode";

// set by the gateway in front of the API
const gatewaySchema = z.object({
  "x-user-id": z.coerce.number().int().positive().optional(),
});

export type RequestContextOptions = {
  translator: Translator;
  locales: readonly string[];
  defaultLocale: string;
};

/**
 * Tags the request with an id, the negotiated locale and the translator
 * used later by the error handler.
 */
export function requestContext(options: RequestContextOptions): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const requestId = req.header("x-request-id") || uuidv4();
    req.headers["x-request-id"] = requestId;
    res.setHeader("x-request-id", requestId);
    req.requestId = requestId;

    req.locale = negotiateLocale(
      req.header("accept-language"),
      options.locales,
      options.defaultLocale,
    );
    res.setHeader("content-language", req.locale);
    req.translator = options.translator;

    const gateway = gatewaySchema.safeParse({
      "x-user-id": req.header("x-user-id") || undefined,
    });
    if (!gateway.success) {
      return next(AppError.validation([toValidationNode(gateway.error)]));
    }
    const userId = gateway.data["x-user-id"];
    if (userId !== undefined) req.user = { id: userId };

    next();
  };
}
