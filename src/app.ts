import express, { type Router } from "express";
import config from "@/config";
import { register } from "@/metrics";
import { requestContext } from "@/middleware/requestContext";
import { requestLogger } from "@/middleware/requestLogger";
import { createTranslateErrors } from "@/middleware/translateErrors";
import { asyncHandler } from "@/middleware/asyncHandler";
import { healthRouter, type ReadinessProbe } from "@/routes/health.route";
import type { CatalogTranslator } from "@/translation/catalog";
import { createErrorHandler } from "@/utils/errors/errorHandler";

export type AppOptions = {
  translator: CatalogTranslator;
  /** Mount path -> router, e.g. `users` -> crudRouter(userResolvers). */
  routers: Record<string, Router>;
  isReady: ReadinessProbe;
  defaultLocale?: string;
};

export function createApp(options: AppOptions) {
  const defaultLocale = options.defaultLocale ?? config.DEFAULT_LOCALE;
  const app = express();

  app.use(
    requestContext({
      translator: options.translator,
      locales: options.translator.locales,
      defaultLocale,
    }),
  );
  app.use(express.json({ limit: "1mb" }));
  app.use(requestLogger);

  app.use(healthRouter(options.isReady, options.translator.locales));
  app.get(
    "/metrics",
    asyncHandler(async (_req, res) => {
      res.setHeader("Content-Type", register.contentType);
      res.end(await register.metrics());
    }),
  );

  for (const [path, router] of Object.entries(options.routers)) {
    app.use(`/${path}`, router);
  }

  app.use(
    createErrorHandler({
      translateErrors: createTranslateErrors({
        defaultLocale,
        translator: options.translator,
      }),
      defaultLocale,
    }),
  );
  return app;
}
