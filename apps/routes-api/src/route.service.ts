import { randomUUID } from "crypto";
import { Route } from "@routes-service/types";
import { ForbiddenError, NotFoundError, ValidationError } from "./errors";
import { RouteListFilter, RouteRepository } from "./route.repository";
import { CreateRouteInput, routeIdSchema, UpdateRouteInput } from "./schemas";

export interface RouteServiceOptions {
  /** Whether reset() may truncate the table. */
  allowReset: boolean;
  newId?: () => string;
}

export interface RoutePage {
  routes: Route[];
  total: number;
}

/**
 * Business rules on top of a RouteRepository. Inputs arrive already shaped
 * by the zod schemas; this layer owns existence checks and the rules that
 * need the stored row, such as date ordering after a partial update.
 */
export class RouteService {
  private readonly newId: () => string;

  constructor(
    private readonly repo: RouteRepository,
    private readonly options: RouteServiceOptions,
  ) {
    this.newId = options.newId ?? randomUUID;
  }

  create(input: CreateRouteInput): Promise<Route> {
    return this.repo.insert({
      id: this.newId(),
      flight_id: input.flight_id ?? null,
      origin: input.origin,
      destination: input.destination,
      departure_date: input.departure_date,
      arrival_date: input.arrival_date,
      capacity: input.capacity,
      description: input.description ?? null,
    });
  }

  async list(query: RouteListFilter): Promise<RoutePage> {
    const [routes, total] = await Promise.all([
      this.repo.list(query),
      this.repo.count(query.flight),
    ]);
    return { routes, total };
  }

  count(flight?: string): Promise<number> {
    return this.repo.count(flight);
  }

  async get(id: string): Promise<Route> {
    // a malformed id can never match a row
    if (!routeIdSchema.safeParse(id).success) throw new NotFoundError();

    const route = await this.repo.findById(id);
    if (!route) throw new NotFoundError();
    return route;
  }

  async update(id: string, changes: UpdateRouteInput): Promise<Route> {
    const current = await this.get(id);

    const departure = changes.departure_date ?? new Date(current.departure_date);
    const arrival = changes.arrival_date ?? new Date(current.arrival_date);
    if (departure >= arrival) {
      throw new ValidationError([
        {
          field: changes.arrival_date ? "arrival_date" : "departure_date",
          message: "arrival_date must be after departure_date",
        },
      ]);
    }
    if ((changes.capacity ?? current.capacity) <= 0) {
      throw new ValidationError([{ field: "capacity", message: "capacity must be greater than 0" }]);
    }

    // the row can disappear between the read and the write
    const updated = await this.repo.update(id, changes);
    if (!updated) throw new NotFoundError();
    return updated;
  }

  async delete(id: string): Promise<void> {
    if (!routeIdSchema.safeParse(id).success) throw new NotFoundError();
    if (!(await this.repo.delete(id))) throw new NotFoundError();
  }

  async reset(): Promise<void> {
    if (!this.options.allowReset) {
      throw new ForbiddenError("Reset is disabled in this environment");
    }
    await this.repo.truncate();
  }

  checkDatabase(): Promise<void> {
    return this.repo.ping();
  }
}
