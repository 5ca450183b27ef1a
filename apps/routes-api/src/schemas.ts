import { z } from "zod";

// ─── Timestamps ───────────────────────────────────────────
// ISO-8601 with at least hours and minutes. No zone designator means UTC.
const ISO_TIMESTAMP = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:\d{2})?$/i;
const ZONE_SUFFIX = /(Z|[+-]\d{2}:\d{2})$/i;
const CLOCK_FIELDS = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2})(?::(\d{2}))?/;

// Date rolls impossible values over (02-30 becomes 03-02), so the digits
// sent must survive a round trip through Date.UTC unchanged.
const isRealClockTime = (value: string): boolean => {
  const match = CLOCK_FIELDS.exec(value);
  if (!match) return false;
  const [year, month, day, hour, minute, second] = match.slice(1).map((v) => Number(v ?? 0));
  const utc = new Date(Date.UTC(year, month - 1, day, hour, minute, second));
  return (
    utc.getUTCFullYear() === year &&
    utc.getUTCMonth() === month - 1 &&
    utc.getUTCDate() === day &&
    utc.getUTCHours() === hour &&
    utc.getUTCMinutes() === minute &&
    utc.getUTCSeconds() === second
  );
};

const timestamp = (field: string) =>
  z
    .string({
      required_error: `${field} is required`,
      invalid_type_error: `${field} must be an ISO-8601 timestamp`,
    })
    .regex(ISO_TIMESTAMP, `${field} must be an ISO-8601 timestamp`)
    .transform((value, ctx) => {
      const date = new Date(ZONE_SUFFIX.test(value) ? value : `${value}Z`);
      if (!isRealClockTime(value) || Number.isNaN(date.getTime())) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${field} is not a valid date` });
        return z.NEVER;
      }
      return date;
    });

const text = (field: string) =>
  z
    .string({
      required_error: `${field} is required`,
      invalid_type_error: `${field} must be a string`,
    })
    .trim()
    .min(1, `${field} must not be empty`);

const capacity = z
  .number({
    required_error: "capacity is required",
    invalid_type_error: "capacity must be an integer",
  })
  .int("capacity must be an integer")
  .positive("capacity must be greater than 0")
  .max(2_147_483_647, "capacity must be at most 2147483647"); // INTEGER column

const description = z
  .string({ invalid_type_error: "description must be a string" })
  .nullable()
  .optional();

// ─── Bodies ───────────────────────────────────────────────
// strict(): unknown keys are rejected, which also keeps id and created_at immutable.

export const createRouteSchema = z
  .object({
    flight_id: text("flight_id").nullable().optional(),
    origin: text("origin"),
    destination: text("destination"),
    departure_date: timestamp("departure_date"),
    arrival_date: timestamp("arrival_date"),
    capacity,
    description,
  })
  .strict()
  .superRefine((route, ctx) => {
    if (route.departure_date >= route.arrival_date) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["arrival_date"],
        message: "arrival_date must be after departure_date",
      });
    }
  });

export const updateRouteSchema = z
  .object({
    flight_id: text("flight_id").nullable().optional(),
    origin: text("origin").optional(),
    destination: text("destination").optional(),
    departure_date: timestamp("departure_date").optional(),
    arrival_date: timestamp("arrival_date").optional(),
    capacity: capacity.optional(),
    description,
  })
  .strict()
  .refine((changes) => Object.keys(changes).length > 0, { message: "No fields to update" });

export type CreateRouteInput = z.infer<typeof createRouteSchema>;
export type UpdateRouteInput = z.infer<typeof updateRouteSchema>;

// ─── Query strings ────────────────────────────────────────

const flightFilter = z
  .string()
  .trim()
  .optional()
  .transform((v) => v || undefined);

// digits only: rejects "", "-1", "1.5" and "1e20" before anything is coerced
const pageNumber = (field: string) => {
  const message = `${field} must be a non-negative integer`;
  return z
    .string({ invalid_type_error: message })
    .regex(/^\d+$/, message)
    .pipe(
      z.coerce
        .number()
        .max(Number.MAX_SAFE_INTEGER, `${field} must be at most ${Number.MAX_SAFE_INTEGER}`),
    );
};

export const DEFAULT_PAGE_SIZE = 100;

export const listQuerySchema = z
  .object({
    offset: pageNumber("offset").optional(),
    skip: pageNumber("skip").optional(), // older clients page with ?skip=
    limit: pageNumber("limit").default(String(DEFAULT_PAGE_SIZE)),
    flight: flightFilter,
  })
  .transform(({ offset, skip, limit, flight }) => ({
    offset: offset ?? skip ?? 0,
    limit,
    flight,
  }));

export const countQuerySchema = z.object({ flight: flightFilter });

export type ListRoutesQuery = z.infer<typeof listQuerySchema>;

export const routeIdSchema = z.string().uuid();
