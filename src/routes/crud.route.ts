import { Router, type Request, type Response } from "express";
import { asyncHandler } from "@/middleware/asyncHandler";
import type { Resolvers } from "@/resolvers/defineResolvers";
import type { ResolverInfo, ResolverResult } from "@/resolvers/types";
import { AppError } from "@/utils/errors/AppError";
import { validate } from "@/validations";
import { idParamsSchema } from "@/validations/schemas";

export function resolverInfo(req: Request): ResolverInfo {
  return {
    requestId: req.requestId,
    userId: req.user?.id,
    locale: req.locale,
  };
}

function idParam(req: Request): number {
  return idParamsSchema.parse(req.validated?.params ?? req.params).id;
}

export function send<T>(res: Response, result: ResolverResult<T>, status = 200) {
  if (!result.ok) {
    throw result.reason === "not_found"
      ? AppError.notFound(result.errors)
      : AppError.unprocessable(result.errors);
  }
  return res.status(status).json({ data: result.value });
}

/** Mounts the resolvers that were generated; missing ones get no route. */
export function crudRouter<T, TQuery>(resolvers: Resolvers<T, TQuery>): Router {
  const router = Router();
  const withId = validate({ params: idParamsSchema });
  const { get, list, create, update } = resolvers;
  const remove = resolvers.delete;

  if (list) {
    router.get(
      "/",
      asyncHandler(async (req, res) => send(res, await list({}, resolverInfo(req)))),
    );
  }
  if (get) {
    router.get(
      "/:id",
      withId,
      asyncHandler(async (req, res) =>
        send(res, await get({ id: idParam(req) }, resolverInfo(req))),
      ),
    );
  }
  if (create) {
    router.post(
      "/",
      asyncHandler(async (req, res) =>
        send(res, await create({ params: req.body }, resolverInfo(req)), 201),
      ),
    );
  }
  if (update) {
    router.put(
      "/:id",
      withId,
      asyncHandler(async (req, res) =>
        send(
          res,
          await update({ id: idParam(req), params: req.body }, resolverInfo(req)),
        ),
      ),
    );
  }
  if (remove) {
    router.delete(
      "/:id",
      withId,
      asyncHandler(async (req, res) =>
        send(res, await remove({ id: idParam(req) }, resolverInfo(req))),
      ),
    );
  }

  return router;
}
