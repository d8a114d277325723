import type { Request, Response, NextFunction, RequestHandler } from "express";
import { httpRequestDuration } from "@/metrics";
import { logger } from "@/utils/logger";

export const requestLogger: RequestHandler = (
  req: Request,
  res: Response,
  next: NextFunction,
) => {
  const start = process.hrtime.bigint();

  res.on("finish", () => {
    const durationMs = Number(process.hrtime.bigint() - start) / 1_000_000;
    const route = req.route?.path ?? "unknown";

    httpRequestDuration.observe(
      { method: req.method, route, status: String(res.statusCode) },
      durationMs / 1000,
    );

    const logLevel =
      res.statusCode >= 500 ? "error" : res.statusCode >= 400 ? "warn" : "info";

    logger.log(logLevel, "http_request", {
      requestId: req.requestId,
      method: req.method,
      path: req.originalUrl,
      statusCode: res.statusCode,
      durationMs: Math.round(durationMs),
      locale: req.locale,
      userId: req.user?.id ?? null,
    });
  });

  next();
};
