/**
 * Domain errors. Services throw these and they travel unchanged to the HTTP
 * and MCP boundaries, which map `status` onto the response.
 */
export abstract class AppError extends Error {
  abstract readonly status: number;
}

export class NotFoundError extends AppError {
  readonly status = 404;

  constructor(entity: string, id: string) {
    super(`${entity} not found: ${id}`);
    this.name = "NotFoundError";
  }
}

export class ForbiddenError extends AppError {
  readonly status = 403;

  constructor(message: string) {
    super(message);
    this.name = "ForbiddenError";
  }
}

export class InvalidInputError extends AppError {
  readonly status = 400;

  constructor(message: string) {
    super(message);
    this.name = "InvalidInputError";
  }
}

export class ConflictError extends AppError {
  readonly status = 409;

  constructor(message: string) {
    super(message);
    this.name = "ConflictError";
  }
}

export class UnauthenticatedError extends AppError {
  readonly status = 401;

  constructor(message = "Could not validate credentials") {
    super(message);
    this.name = "UnauthenticatedError";
  }
}
