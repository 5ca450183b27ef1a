import { NextFunction, Request, Response, Router } from "express";
import { ApiResponse, Route, RouteListMeta } from "@routes-service/types";
import { RouteService } from "./route.service";
import { countQuerySchema, createRouteSchema, listQuerySchema, updateRouteSchema } from "./schemas";

export const createRouter = (service: RouteService): Router => {
  const router = Router();

  // ─── Health ─────────────────────────────────────────────
  router.get("/ping", (_req, res) => {
    res.json({ status: "pong" });
  });

  router.get("/routes/ping", (_req, res) => {
    res.json({ status: "ok" });
  });

  router.get("/health", async (_req, res) => {
    const [db] = await Promise.allSettled([service.checkDatabase()]);
    res.json({
      ok: true,
      pid: process.pid,
      ts: Date.now(),
      db: db.status === "fulfilled" ? "ok" : "down",
    });
  });

  // ─── Reset (development only) ───────────────────────────
  const reset = async (_req: Request, res: Response, next: NextFunction) => {
    try {
      await service.reset();
      res.json({ status: "ok", message: "All routes were deleted" });
    } catch (err) {
      next(err);
    }
  };
  router.post("/reset", reset);
  router.post("/routes/reset", reset);

  // ─── Routes ─────────────────────────────────────────────
  // /routes/count must be registered before /routes/:id
  router.get("/routes/count", async (req, res, next) => {
    try {
      const { flight } = countQuerySchema.parse(req.query);
      const count = await service.count(flight);
      res.json({ data: { count } } satisfies ApiResponse<{ count: number }>);
    } catch (err) {
      next(err);
    }
  });

  router.get("/routes", async (req, res, next) => {
    try {
      const query = listQuerySchema.parse(req.query);
      const { routes, total } = await service.list(query);
      res.json({
        data: routes,
        meta: { total, offset: query.offset, limit: query.limit },
      } satisfies ApiResponse<Route[], RouteListMeta>);
    } catch (err) {
      next(err);
    }
  });

  router.post("/routes", async (req, res, next) => {
    try {
      const input = createRouteSchema.parse(req.body);
      const route = await service.create(input);
      res.status(201).json({ data: route } satisfies ApiResponse<Route>);
    } catch (err) {
      next(err);
    }
  });

  router.get("/routes/:id", async (req, res, next) => {
    try {
      const route = await service.get(req.params.id);
      res.json({ data: route } satisfies ApiResponse<Route>);
    } catch (err) {
      next(err);
    }
  });

  // PUT takes the same partial body as PATCH
  const update = async (req: Request<{ id: string }>, res: Response, next: NextFunction) => {
    try {
      const changes = updateRouteSchema.parse(req.body);
      const route = await service.update(req.params.id, changes);
      res.json({ data: route } satisfies ApiResponse<Route>);
    } catch (err) {
      next(err);
    }
  };
  router.patch("/routes/:id", update);
  router.put("/routes/:id", update);

  router.delete("/routes/:id", async (req, res, next) => {
    try {
      await service.delete(req.params.id);
      res.status(204).send();
    } catch (err) {
      next(err);
    }
  });

  return router;
};
