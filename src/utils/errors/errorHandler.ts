import type { NextFunction, Request, Response } from "express";
import { translatedErrorsTotal } from "@/metrics";
import { translateErrors as defaultTranslateErrors } from "@/middleware/translateErrors";
import { DEFAULT_LOCALE } from "@/translation/translator";
import type { Resolution } from "@/types/resolution";
import { AppError } from "@/utils/errors/AppError";
import { logger } from "@/utils/logger";

export type ErrorBody = {
  status: "error";
  message: string;
  errors?: string[];
};

export type ErrorHandlerOptions = {
  translateErrors?: typeof defaultTranslateErrors;
  /** Locale the stage falls back to; labels metrics of unlocalized requests. */
  defaultLocale?: string;
};

/**
 * Final express error middleware. Raw errors carried by an AppError go
 * through the translation stage with the request's locale and translator.
 */
export function createErrorHandler({
  translateErrors = defaultTranslateErrors,
  defaultLocale = DEFAULT_LOCALE,
}: ErrorHandlerOptions = {}) {
  return function errorHandler(
    err: Error | AppError,
    req: Request,
    res: Response,
    next: NextFunction,
  ) {
    if (res.headersSent) {
      return next(err);
    }

    if (!(err instanceof AppError)) {
      // Programming or unknown errors
      logger.error("Unexpected error", {
        requestId: req.requestId,
        name: err.name,
        message: err.message,
        stack: err.stack,
      });
      const body: ErrorBody = { status: "error", message: "Something went wrong" };
      return res.status(500).json(body);
    }

    const resolution: Resolution = {
      errors: err.errors,
      state: "unresolved",
      context: {
        locale: req.locale,
        translator: req.translator,
        requestId: req.requestId,
      },
    };
    const { errors, context } = translateErrors(resolution);
    if (errors.length > 0) {
      translatedErrorsTotal.inc({ locale: context.locale ?? defaultLocale }, errors.length);
    }

    const body: ErrorBody = {
      status: "error",
      message: err.message,
      ...(errors.length > 0 ? { errors } : {}),
    };
    return res.status(err.statusCode).json(body);
  };
}

export const errorHandler = createErrorHandler();
