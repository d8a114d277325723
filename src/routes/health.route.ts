import { Router } from "express";

export type ReadinessProbe = () => Promise<boolean>;

export function healthRouter(isReady: ReadinessProbe, locales: readonly string[]): Router {
  const router = Router();

  router.get("/health", (_req, res) => {
    res.status(200).json({ status: "ok" });
  });

  router.get("/ready", async (_req, res, next) => {
    try {
      if (!(await isReady())) {
        return res.status(503).json({ status: "not-ready", reason: "database" });
      }
      res.status(200).json({ status: "ready", locales });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
