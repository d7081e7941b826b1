// src/lib/errors.ts
import type { ApiError } from "../middleware/errorHandler";

export type StudentErrorCode =
  | "VALIDATION_ERROR"
  | "DUPLICATE_KEY"
  | "NOT_FOUND"
  | "IMPORT_READ_ERROR"
  | "IMPORT_SCHEMA_ERROR";

export class StudentRecordError extends Error implements ApiError {
  readonly statusCode: number;
  readonly code: StudentErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    statusCode: number,
    code: StudentErrorCode,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
  }
}

// Caller-supplied value outside its allowed domain (e.g. marks > 100)
export class ValidationError extends StudentRecordError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 400, "VALIDATION_ERROR", details);
  }
}

export class DuplicateKeyError extends StudentRecordError {
  constructor(rollNo: string) {
    super("Student with this roll number already exists.", 409, "DUPLICATE_KEY", {
      roll_no: rollNo,
    });
  }
}

export class NotFoundError extends StudentRecordError {
  constructor(rollNo: string) {
    super("Student not found.", 404, "NOT_FOUND", { roll_no: rollNo });
  }
}

export class ImportReadError extends StudentRecordError {
  constructor(reason: string) {
    super(`Failed to read file: ${reason}`, 400, "IMPORT_READ_ERROR");
  }
}

export class ImportSchemaError extends StudentRecordError {
  constructor(missing: string[]) {
    super(
      "File must contain 'name', 'roll_no', and 'marks' columns.",
      422,
      "IMPORT_SCHEMA_ERROR",
      { missing }
    );
  }
}
