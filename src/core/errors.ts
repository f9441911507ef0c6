export type ErrorCode =
  | "not_found"
  | "validation_failed"
  | "already_assigned"
  | "constraint_violation"
  | "transport_failed";

export abstract class AppError extends Error {
  abstract readonly code: ErrorCode;
  abstract readonly status: number;

  constructor(message: string, readonly details?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
  }
}

export class NotFoundError extends AppError {
  readonly code = "not_found";
  readonly status = 404;

  constructor(readonly entity: "worker" | "house" | "assignment", readonly id: string) {
    super(`${entity} not found: ${id}`, { entity, id });
  }
}

export class ValidationError extends AppError {
  readonly code = "validation_failed";
  readonly status = 400;
}

export class AlreadyAssignedError extends AppError {
  readonly code = "already_assigned";
  readonly status = 409;

  constructor(readonly houseId: string, readonly date: string) {
    super(`house ${houseId} is already assigned on ${date}`, { houseId, date });
  }
}

export class ConstraintError extends AppError {
  readonly code = "constraint_violation";
  readonly status = 409;
}

export class TransportError extends AppError {
  readonly code = "transport_failed";
  readonly status = 502;

  constructor(message: string, readonly reason: "timeout" | "auth" | "connection" | "rejected" | "unknown") {
    super(message, { reason });
  }
}

export function isAppError(e: unknown): e is AppError {
  return e instanceof AppError;
}
