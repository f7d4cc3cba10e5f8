import { AppError, SerializedAppError } from "./AppError";

/**
 * Domain-level errors
 *
 * Raised by the normalizers' throwing entry points and by use cases.
 */

export class ValidationError extends AppError {
  constructor(
    message: string,
    public readonly field?: string,
    code = "VALIDATION_ERROR",
  ) {
    super(message, code);
    this.name = "ValidationError";
  }

  toJSON(): SerializedAppError & { field?: string } {
    return {
      ...super.toJSON(),
      field: this.field,
    };
  }
}

export class InvalidReferenceError extends ValidationError {
  constructor(public readonly input: string | null | undefined) {
    super(
      `Invalid verse reference: '${input ?? ""}'`,
      "verseReference",
      "INVALID_REFERENCE",
    );
    this.name = "InvalidReferenceError";
  }
}

export class InvalidStrongsNumberError extends ValidationError {
  constructor(public readonly input: string | null | undefined) {
    super(
      `Invalid Strong's number format: '${input ?? ""}'`,
      "strongsNumber",
      "INVALID_STRONGS_NUMBER",
    );
    this.name = "InvalidStrongsNumberError";
  }
}

export class InvalidRmacCodeError extends ValidationError {
  constructor(public readonly input: string | null | undefined) {
    super(`Invalid RMAC code: '${input ?? ""}'`, "code", "INVALID_RMAC_CODE");
    this.name = "InvalidRmacCodeError";
  }
}

export class EntityNotFoundError extends AppError {
  constructor(entityName: string, id: string) {
    super(`${entityName} not found for: '${id}'`, "ENTITY_NOT_FOUND");
    this.name = "EntityNotFoundError";
  }
}
