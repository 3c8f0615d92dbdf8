export class HttpError extends Error {
  readonly statusCode: number;
  readonly details?: unknown;

  constructor(statusCode: number, message: string, details?: unknown) {
    super(message);
    this.name = "HttpError";
    this.statusCode = statusCode;
    this.details = details;
  }

  get code(): string {
    if (this.statusCode === 404) return "NOT_FOUND";
    if (this.statusCode === 409) return "CONFLICT";
    if (this.statusCode === 422) return "VALIDATION_ERROR";
    if (this.statusCode === 400) return "BAD_REQUEST";
    return "INTERNAL";
  }
}

export type EntityName =
  | "Account"
  | "Period"
  | "Transaction"
  | "LedgerEntry"
  | "Client"
  | "Product"
  | "Invoice"
  | "InvoiceLine";

/** A referenced row does not exist. */
export class NotFoundError extends HttpError {
  readonly entity: EntityName;

  constructor(entity: EntityName, id: string) {
    super(404, `${entity} ${id} not found`, { entity, id });
    this.name = "NotFoundError";
    this.entity = entity;
  }

  override get code(): string {
    return "NOT_FOUND";
  }
}

/** A write would break an invariant; nothing was persisted. */
export class ConstraintViolation extends HttpError {
  constructor(message: string, details?: unknown) {
    super(422, message, details);
    this.name = "ConstraintViolation";
  }

  override get code(): string {
    return "CONSTRAINT_VIOLATION";
  }
}

/** The unit of work lost a race on its parent row; retry the whole operation. */
export class ConcurrencyConflict extends HttpError {
  constructor(message: string, details?: unknown) {
    super(409, message, details);
    this.name = "ConcurrencyConflict";
  }

  override get code(): string {
    return "CONCURRENCY_CONFLICT";
  }
}

export class ReferentialIntegrityError extends HttpError {
  constructor(entity: EntityName, id: string, referencedBy: EntityName, count: number) {
    super(
      409,
      `Cannot delete ${entity} ${id}: ${count} ${referencedBy} record(s) still reference it`,
      { entity, id, referencedBy, count },
    );
    this.name = "ReferentialIntegrityError";
  }

  override get code(): string {
    return "REFERENTIAL_INTEGRITY";
  }
}

export class DuplicateKeyError extends HttpError {
  readonly field: string;

  constructor(entity: EntityName, field: string, value: string) {
    super(409, `${entity} with ${field} "${value}" already exists`, { entity, field, value });
    this.name = "DuplicateKeyError";
    this.field = field;
  }
}
