/**
 * HTTP contract tests: the express app from buildApp() driven through supertest,
 * backed by the in-memory repository so no database is needed.
 */

import { jest, describe, it, expect, beforeEach } from "@jest/globals";
import request from "supertest";
import { Express } from "express";
import { buildApp } from "../app";
import { RouteService } from "../route.service";
import { InMemoryRouteRepository } from "./helpers/in-memory-route.repository";

const UUID = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;
const MISSING_ID = "3c8e2f1a-7b6d-4e5f-9a0b-1c2d3e4f5a6b";

const VALID_ROUTE = {
  origin: "Bogotá",
  destination: "Medellín",
  departure_date: "2025-09-01T08:00:00Z",
  arrival_date: "2025-09-01T16:00:00Z",
  capacity: 4,
  description: "Comfortable and safe",
};

describe("routes API", () => {
  let repo: InMemoryRouteRepository;
  let app: Express;

  beforeEach(() => {
    repo = new InMemoryRouteRepository();
    app = buildApp({ service: new RouteService(repo, { allowReset: true }) });
  });

  const createRoute = async (overrides: Record<string, unknown> = {}) => {
    const res = await request(app).post("/routes").send({ ...VALID_ROUTE, ...overrides });
    expect(res.status).toBe(201);
    return res.body.data;
  };

  describe("health", () => {
    it("answers ping without touching the database", async () => {
      repo.reachable = false;

      const root = await request(app).get("/ping");
      const routes = await request(app).get("/routes/ping");

      expect(root.status).toBe(200);
      expect(root.body).toEqual({ status: "pong" });
      expect(routes.status).toBe(200);
      expect(routes.body).toEqual({ status: "ok" });
    });

    it("reports the database state on /health", async () => {
      const up = await request(app).get("/health");
      expect(up.status).toBe(200);
      expect(up.body).toMatchObject({ ok: true, pid: process.pid, db: "ok" });

      repo.reachable = false;
      const down = await request(app).get("/health");
      expect(down.status).toBe(200);
      expect(down.body.db).toBe("down");
    });
  });

  describe("POST /routes", () => {
    it("creates a route that GET returns unchanged", async () => {
      const res = await request(app).post("/routes").send({
        origin: "A",
        destination: "B",
        departure_date: "2025-01-01T00:00Z",
        arrival_date: "2025-01-02T00:00Z",
        capacity: 10,
      });

      expect(res.status).toBe(201);
      expect(res.body.data.id).toMatch(UUID);
      expect(res.body.data).toMatchObject({
        flight_id: null,
        origin: "A",
        destination: "B",
        departure_date: "2025-01-01T00:00:00.000Z",
        arrival_date: "2025-01-02T00:00:00.000Z",
        capacity: 10,
        description: null,
      });

      const fetched = await request(app).get(`/routes/${res.body.data.id}`);
      expect(fetched.status).toBe(200);
      expect(fetched.body).toEqual({ data: res.body.data });
    });

    it("answers 422 with every failing field", async () => {
      const res = await request(app).post("/routes").send({
        origin: "",
        destination: "Medellín",
        departure_date: "2025-09-01T16:00:00Z",
        arrival_date: "2025-09-01T08:00:00Z",
        capacity: 0,
      });

      expect(res.status).toBe(422);
      expect(res.body.error).toBe("Validation failed");
      expect(res.body.details.map((d: { field: string }) => d.field)).toEqual([
        "origin",
        "capacity",
        "arrival_date",
      ]);
    });

    it("answers 422 for a capacity the column cannot hold", async () => {
      const res = await request(app).post("/routes").send({ ...VALID_ROUTE, capacity: 3_000_000_000 });

      expect(res.status).toBe(422);
      expect(res.body.details).toEqual([
        { field: "capacity", message: "capacity must be at most 2147483647" },
      ]);
      expect(repo.routes).toHaveLength(0);
    });

    it("answers 422 for a date that does not exist", async () => {
      const res = await request(app)
        .post("/routes")
        .send({ ...VALID_ROUTE, departure_date: "2025-02-30T00:00Z", arrival_date: "2025-03-05T00:00Z" });

      expect(res.status).toBe(422);
      expect(res.body.details).toEqual([
        { field: "departure_date", message: "departure_date is not a valid date" },
      ]);
    });

    it("answers 422 when required fields are missing", async () => {
      const res = await request(app).post("/routes").send({ origin: "Bogotá" });

      expect(res.status).toBe(422);
      expect(res.body.details).toContainEqual({ field: "destination", message: "destination is required" });
      expect(res.body.details).toContainEqual({ field: "capacity", message: "capacity is required" });
    });

    it("answers 400 for a body that is not JSON", async () => {
      const res = await request(app)
        .post("/routes")
        .set("Content-Type", "application/json")
        .send("{ not json");

      expect(res.status).toBe(400);
      expect(res.body).toEqual({ error: "Malformed JSON body" });
    });

    it("answers 409 for a flight that already has a route", async () => {
      await createRoute({ flight_id: "AV123" });

      const res = await request(app).post("/routes").send({ ...VALID_ROUTE, flight_id: "AV123" });

      expect(res.status).toBe(409);
      expect(res.body).toEqual({ error: "A route with this flight_id already exists" });
    });
  });

  describe("GET /routes", () => {
    it("returns an empty page", async () => {
      const res = await request(app).get("/routes");

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ data: [], meta: { total: 0, offset: 0, limit: 100 } });
    });

    it("pages with skip and limit, newest first", async () => {
      for (let i = 0; i < 5; i++) {
        await createRoute({ destination: `Ciudad ${i}` });
      }

      const res = await request(app).get("/routes?skip=2&limit=2");

      expect(res.status).toBe(200);
      expect(res.body.data.map((r: { destination: string }) => r.destination)).toEqual([
        "Ciudad 2",
        "Ciudad 1",
      ]);
      expect(res.body.meta).toEqual({ total: 5, offset: 2, limit: 2 });
    });

    it("filters by flight", async () => {
      await createRoute({ flight_id: "AV1" });
      const wanted = await createRoute({ flight_id: "AV2" });

      const res = await request(app).get("/routes").query({ flight: "AV2" });

      expect(res.body.data).toEqual([wanted]);
      expect(res.body.meta.total).toBe(1);
    });

    it("answers 422 for a bad page size", async () => {
      const res = await request(app).get("/routes?limit=abc");

      expect(res.status).toBe(422);
      expect(res.body.details).toEqual([{ field: "limit", message: "limit must be a non-negative integer" }]);
    });

    it.each(["limit=1e20", "offset=100000000000000000000", "limit="])(
      "answers 422 for ?%s",
      async (query) => {
        const res = await request(app).get(`/routes?${query}`);

        expect(res.status).toBe(422);
      },
    );

    it("count matches a list that covers every row", async () => {
      await createRoute();
      await createRoute({ destination: "Cali" });

      const count = await request(app).get("/routes/count");
      const list = await request(app).get(`/routes?limit=${count.body.data.count}`);

      expect(count.status).toBe(200);
      expect(count.body).toEqual({ data: { count: 2 } });
      expect(list.body.data).toHaveLength(2);
    });
  });

  describe("GET /routes/:id", () => {
    it.each([MISSING_ID, "not-a-uuid"])("answers 404 for %s", async (id) => {
      const res = await request(app).get(`/routes/${id}`);

      expect(res.status).toBe(404);
      expect(res.body).toEqual({ error: "Route not found" });
    });
  });

  describe("PATCH and PUT /routes/:id", () => {
    it.each(["patch", "put"] as const)("%s applies a partial update", async (method) => {
      const created = await createRoute();

      const res = await request(app)[method](`/routes/${created.id}`).send({ origin: "Cali", capacity: 6 });

      expect(res.status).toBe(200);
      expect(res.body.data).toEqual({ ...created, origin: "Cali", capacity: 6 });
    });

    it("answers 422 when the merged dates are inverted", async () => {
      const created = await createRoute();

      const res = await request(app)
        .patch(`/routes/${created.id}`)
        .send({ departure_date: "2025-09-02T00:00:00Z" });

      expect(res.status).toBe(422);
      expect(res.body.details).toEqual([
        { field: "departure_date", message: "arrival_date must be after departure_date" },
      ]);
    });

    it("answers 422 for an empty body", async () => {
      const created = await createRoute();

      const res = await request(app).patch(`/routes/${created.id}`).send({});

      expect(res.status).toBe(422);
      expect(res.body.details).toEqual([{ field: "body", message: "No fields to update" }]);
    });

    it("answers 422 when trying to change the id", async () => {
      const created = await createRoute();

      const res = await request(app).patch(`/routes/${created.id}`).send({ id: MISSING_ID });

      expect(res.status).toBe(422);
    });

    it("answers 404 for an unknown route", async () => {
      const res = await request(app).patch(`/routes/${MISSING_ID}`).send({ origin: "Nueva Ciudad" });

      expect(res.status).toBe(404);
      expect(res.body).toEqual({ error: "Route not found" });
    });
  });

  describe("DELETE /routes/:id", () => {
    it("answers 204, then 404 on the next lookup", async () => {
      const created = await createRoute();

      const res = await request(app).delete(`/routes/${created.id}`);
      expect(res.status).toBe(204);
      expect(res.body).toEqual({});

      expect((await request(app).get(`/routes/${created.id}`)).status).toBe(404);
      expect((await request(app).delete(`/routes/${created.id}`)).status).toBe(404);
    });
  });

  describe("reset", () => {
    it.each(["/reset", "/routes/reset"])("POST %s clears the table", async (path) => {
      await createRoute();

      const res = await request(app).post(path);

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ status: "ok", message: "All routes were deleted" });
      expect((await request(app).get("/routes/count")).body).toEqual({ data: { count: 0 } });
    });

    it("answers 403 when reset is disabled", async () => {
      const locked = buildApp({ service: new RouteService(repo, { allowReset: false }) });

      const res = await request(locked).post("/reset");

      expect(res.status).toBe(403);
      expect(res.body).toEqual({ error: "Reset is disabled in this environment" });
    });
  });

  describe("plumbing", () => {
    it("answers 404 for unknown paths", async () => {
      const res = await request(app).get("/flights");

      expect(res.status).toBe(404);
      expect(res.body).toEqual({ error: "Not found" });
    });

    it("echoes the caller's request id", async () => {
      const res = await request(app).get("/ping").set("x-request-id", "req-42");

      expect(res.headers["x-request-id"]).toBe("req-42");
    });

    it("hides unexpected errors behind a 500", async () => {
      jest.spyOn(repo, "count").mockRejectedValueOnce(new Error("connection lost"));

      const res = await request(app).get("/routes/count");

      expect(res.status).toBe(500);
      expect(res.body).toEqual({ error: "Internal server error" });
    });

    it("rate limits per client when configured", async () => {
      const limited = buildApp({
        service: new RouteService(repo, { allowReset: true }),
        rateLimit: { windowMs: 60_000, max: 2 },
      });

      expect((await request(limited).get("/ping")).status).toBe(200);
      expect((await request(limited).get("/ping")).status).toBe(200);
      expect((await request(limited).get("/ping")).status).toBe(429);
    });
  });
});
