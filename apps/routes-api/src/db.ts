import { Pool, QueryResult, QueryResultRow } from "pg";
import { Logger } from "pino";
import { DbConfig } from "./config";
import { logger as defaultLogger } from "./logger";

/** The slice of pg.Pool / pg.PoolClient the repositories use. */
export interface Queryable {
  query<R extends QueryResultRow = QueryResultRow>(
    text: string,
    values?: unknown[],
  ): Promise<QueryResult<R>>;
}

// ─── DB Pool ──────────────────────────────────────────────
// Every request borrows a client for one statement and hands it back.
export const createPool = (db: DbConfig, log: Logger = defaultLogger): Pool => {
  const pool = new Pool({
    host: db.host,
    port: db.port,
    database: db.database,
    user: db.user,
    password: db.password,

    max: db.max,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 5_000,
    application_name: "routes-api",
  });

  pool.on("error", (err) => log.error({ err }, "Idle pool client error"));
  return pool;
};

// ─── Schema ───────────────────────────────────────────────
export const ROUTES_DDL = `
  CREATE TABLE IF NOT EXISTS routes (
    id             UUID PRIMARY KEY,
    flight_id      TEXT UNIQUE,
    origin         TEXT NOT NULL,
    destination    TEXT NOT NULL,
    departure_date TIMESTAMPTZ NOT NULL,
    arrival_date   TIMESTAMPTZ NOT NULL,
    capacity       INTEGER NOT NULL,
    description    TEXT,
    created_at     TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    CONSTRAINT routes_capacity_positive CHECK (capacity > 0),
    CONSTRAINT routes_dates_ordered CHECK (departure_date < arrival_date)
  )`;

export const ensureSchema = async (db: Queryable): Promise<void> => {
  await db.query(ROUTES_DDL);
};
