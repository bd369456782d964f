/**
 * @file src/domain/errors.ts
 * @description
 * Error taxonomy for the order core. Route handlers map these to HTTP responses.
 */

import { z, type ZodError } from "zod";

/**
 * Base application error
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  /** false for internal inconsistencies that need an operator */
  public readonly isOperational: boolean;
  public readonly details?: unknown;

  constructor(message: string, code: string, statusCode = 500, isOperational = true, details?: unknown) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    this.details = details;
  }

  /** JSON body for API responses */
  toJSON(): Record<string, unknown> {
    const body: Record<string, unknown> = { error: this.message, code: this.code };
    if (this.details !== undefined) body.details = this.details;
    return body;
  }
}

export class ValidationError extends AppError {
  constructor(message = "Validation failed", details?: unknown) {
    super(message, "VALIDATION_ERROR", 422, true, details);
  }

  static fromZod(err: ZodError): ValidationError {
    return new ValidationError(
      "Validation failed",
      err.issues.map((iss) => ({ path: iss.path.join("."), message: iss.message, code: iss.code }))
    );
  }
}

export class UnauthorizedError extends AppError {
  constructor(message = "Not authenticated") {
    super(message, "UNAUTHORIZED", 401);
  }
}

export class ForbiddenError extends AppError {
  constructor(message = "Not authorized") {
    super(message, "FORBIDDEN", 403);
  }
}

export class NotFoundError extends AppError {
  constructor(resource: "Order" | "Medicine" | "Line item", id: string) {
    super(`${resource} not found: ${id}`, "NOT_FOUND", 404, true, { resource, id });
  }
}

export class OutOfStockError extends AppError {
  public readonly medicineId: string;

  constructor(medicineId: string, medicineName: string, requested: number, available: number) {
    super(
      `Only ${available} of "${medicineName}" available, ${requested} requested`,
      "OUT_OF_STOCK",
      409,
      true,
      { medicineId, medicineName, requested, available }
    );
    this.medicineId = medicineId;
  }
}

export class InvalidStateError extends AppError {
  constructor(action: string, expected: string, actual: { orderStatus: string; paymentStatus: string }) {
    super(
      `Cannot ${action}: order must be ${expected} (currently ${actual.orderStatus}/${actual.paymentStatus})`,
      "INVALID_STATE",
      409,
      true,
      { expected, ...actual }
    );
  }
}

export class ConflictError extends AppError {
  constructor(message = "Order was modified concurrently, please retry") {
    super(message, "CONFLICT", 409);
  }
}

export class StockCommitFailedError extends AppError {
  constructor(orderId: string, medicineId: string, quantity: number) {
    super(
      `Stock commit failed for order ${orderId}: medicine ${medicineId} does not hold ${quantity} reserved units`,
      "STOCK_COMMIT_FAILED",
      500,
      false,
      { orderId, medicineId, quantity }
    );
  }
}

/**
 * Parse with a zod schema, rethrowing failures as ValidationError.
 */
export function parseOrThrow<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown): T {
  const res = schema.safeParse(value);
  if (!res.success) throw ValidationError.fromZod(res.error);
  return res.data;
}
