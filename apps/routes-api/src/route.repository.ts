import { Route } from "@routes-service/types";
import { ensureSchema, Queryable } from "./db";
import { ConflictError, ValidationError } from "./errors";

export interface NewRoute {
  id: string;
  flight_id: string | null;
  origin: string;
  destination: string;
  departure_date: Date;
  arrival_date: Date;
  capacity: number;
  description: string | null;
}

export type RouteChanges = Partial<Omit<NewRoute, "id">>;

export interface RouteListFilter {
  offset: number;
  limit: number;
  flight?: string;
}

/** Storage for routes. Lookups return null for a missing id; the service decides what that means. */
export interface RouteRepository {
  insert(route: NewRoute): Promise<Route>;
  /** Newest first. */
  list(filter: RouteListFilter): Promise<Route[]>;
  count(flight?: string): Promise<number>;
  findById(id: string): Promise<Route | null>;
  update(id: string, changes: RouteChanges): Promise<Route | null>;
  delete(id: string): Promise<boolean>;
  /** Empties the table, creating it first if needed. */
  truncate(): Promise<void>;
  ping(): Promise<void>;
}

type RouteRow = {
  id: string;
  flight_id: string | null;
  origin: string;
  destination: string;
  departure_date: Date;
  arrival_date: Date;
  capacity: number;
  description: string | null;
  created_at: Date;
};

const COLUMNS =
  "id, flight_id, origin, destination, departure_date, arrival_date, capacity, description, created_at";

// SET order is fixed so the generated SQL is stable
const UPDATABLE_COLUMNS = [
  "flight_id",
  "origin",
  "destination",
  "departure_date",
  "arrival_date",
  "capacity",
  "description",
] as const satisfies readonly (keyof RouteChanges)[];

const UNIQUE_VIOLATION = "23505";
const CHECK_VIOLATION = "23514";

export class PgRouteRepository implements RouteRepository {
  constructor(private readonly db: Queryable) {}

  async insert(route: NewRoute): Promise<Route> {
    try {
      const { rows } = await this.db.query<RouteRow>(
        `INSERT INTO routes
           (id, flight_id, origin, destination, departure_date, arrival_date, capacity, description)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
         RETURNING ${COLUMNS}`,
        [
          route.id,
          route.flight_id,
          route.origin,
          route.destination,
          route.departure_date,
          route.arrival_date,
          route.capacity,
          route.description,
        ],
      );
      return toRoute(rows[0]);
    } catch (err) {
      throw translateWriteError(err);
    }
  }

  async list({ offset, limit, flight }: RouteListFilter): Promise<Route[]> {
    const params: unknown[] = [];
    let where = "";
    if (flight !== undefined) {
      params.push(flight);
      where = `WHERE flight_id = $${params.length}`;
    }
    params.push(limit, offset);

    const { rows } = await this.db.query<RouteRow>(
      `SELECT ${COLUMNS} FROM routes ${where}
       ORDER BY created_at DESC, id DESC
       LIMIT $${params.length - 1} OFFSET $${params.length}`,
      params,
    );
    return rows.map(toRoute);
  }

  async count(flight?: string): Promise<number> {
    const { rows } =
      flight === undefined
        ? await this.db.query<{ total: string }>("SELECT COUNT(*) AS total FROM routes")
        : await this.db.query<{ total: string }>(
            "SELECT COUNT(*) AS total FROM routes WHERE flight_id = $1",
            [flight],
          );
    // COUNT(*) is a bigint, which pg hands back as a string
    return Number(rows[0].total);
  }

  async findById(id: string): Promise<Route | null> {
    const { rows } = await this.db.query<RouteRow>(
      `SELECT ${COLUMNS} FROM routes WHERE id = $1`,
      [id],
    );
    return rows.length ? toRoute(rows[0]) : null;
  }

  async update(id: string, changes: RouteChanges): Promise<Route | null> {
    const sets: string[] = [];
    const params: unknown[] = [];
    for (const column of UPDATABLE_COLUMNS) {
      const value = changes[column];
      if (value === undefined) continue;
      params.push(value);
      sets.push(`${column} = $${params.length}`);
    }
    if (!sets.length) return this.findById(id);

    params.push(id);
    try {
      const { rows } = await this.db.query<RouteRow>(
        `UPDATE routes SET ${sets.join(", ")}
         WHERE id = $${params.length}
         RETURNING ${COLUMNS}`,
        params,
      );
      return rows.length ? toRoute(rows[0]) : null;
    } catch (err) {
      throw translateWriteError(err);
    }
  }

  async delete(id: string): Promise<boolean> {
    const { rowCount } = await this.db.query("DELETE FROM routes WHERE id = $1", [id]);
    return (rowCount ?? 0) > 0;
  }

  async truncate(): Promise<void> {
    await ensureSchema(this.db);
    await this.db.query("TRUNCATE TABLE routes");
  }

  async ping(): Promise<void> {
    await this.db.query("SELECT 1");
  }
}

function toRoute(row: RouteRow): Route {
  return {
    id: row.id,
    flight_id: row.flight_id,
    origin: row.origin,
    destination: row.destination,
    departure_date: row.departure_date.toISOString(),
    arrival_date: row.arrival_date.toISOString(),
    capacity: row.capacity,
    description: row.description,
    created_at: row.created_at.toISOString(),
  };
}

// Constraint violations become API errors; anything else is the caller's 500.
function translateWriteError(err: unknown): unknown {
  if (!(err instanceof Error) || !("code" in err)) return err;

  if (err.code === UNIQUE_VIOLATION) {
    return new ConflictError("A route with this flight_id already exists");
  }
  if (err.code === CHECK_VIOLATION) {
    const constraint = "constraint" in err ? err.constraint : undefined;
    return constraint === "routes_capacity_positive"
      ? new ValidationError([{ field: "capacity", message: "capacity must be greater than 0" }])
      : new ValidationError([
          { field: "arrival_date", message: "arrival_date must be after departure_date" },
        ]);
  }
  return err;
}
