import type { RawError, ValidationNode } from "@/types/validation";
import { tree } from "@/types/validation";

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly errors: RawError[];

  constructor(
    message: string,
    statusCode: number = 500,
    isOperational = true,
    errors: RawError[] = [],
  ) {
    super(message);
    this.name = this.constructor.name;
    this.isOperational = isOperational;
    this.statusCode = statusCode;
    this.errors = errors;
    Error.captureStackTrace(this, this.constructor);
  }

  /** Request parts that failed their schema, one tree per part. */
  static validation(nodes: ValidationNode[]): AppError {
    return new AppError("Validation failed", 400, true, nodes.map(tree));
  }

  static notFound(errors: RawError[]): AppError {
    return new AppError("Not found", 404, true, errors);
  }

  static unprocessable(errors: RawError[]): AppError {
    return new AppError("Record is invalid", 422, true, errors);
  }
}
