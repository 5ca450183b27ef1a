import { ZodError } from "zod";
import { ApiError, ApiErrorDetail } from "@routes-service/types";

/**
 * Base class for errors that map onto an HTTP status.
 * Anything that is not an AppError is rendered as a 500.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly details?: ApiErrorDetail[],
  ) {
    super(message);
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): ApiError {
    return this.details ? { error: this.message, details: this.details } : { error: this.message };
  }
}

export class ValidationError extends AppError {
  constructor(details: ApiErrorDetail[], message = "Validation failed") {
    super(message, 422, details);
  }

  static fromZod(err: ZodError): ValidationError {
    return new ValidationError(
      err.issues.map((issue) => ({
        field: issue.path.length ? issue.path.join(".") : "body",
        message: issue.message,
      })),
    );
  }
}

export class NotFoundError extends AppError {
  constructor(message = "Route not found") {
    super(message, 404);
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super(message, 409);
  }
}

export class ForbiddenError extends AppError {
  constructor(message: string) {
    super(message, 403);
  }
}
