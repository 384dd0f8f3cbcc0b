export abstract class DomainError extends Error {
  abstract readonly status: number;

  /** Fields merged into the error body next to message and status. */
  extra(): Record<string, unknown> {
    return {};
  }
}

export class NotFoundError extends DomainError {
  readonly status = 404;

  constructor(readonly resource: string, readonly id: number) {
    super(`${resource} ${id} not found`);
    this.name = 'NotFoundError';
  }
}

export class ValidationError extends DomainError {
  readonly status = 422;

  constructor(message: string, readonly details?: Record<string, unknown>) {
    super(message);
    this.name = 'ValidationError';
  }

  extra(): Record<string, unknown> {
    return this.details ? { details: this.details } : {};
  }
}

export class ConflictError extends DomainError {
  readonly status = 409;

  constructor(readonly field: string, message: string) {
    super(message);
    this.name = 'ConflictError';
  }

  extra(): Record<string, unknown> {
    return { field: this.field };
  }
}
