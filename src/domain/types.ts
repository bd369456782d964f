/**
 * @file src/domain/types.ts
 * @description
 * Domain enums, request schemas and money helpers for the order core.
 */

import { z } from "zod";

/**
 * Order lifecycle states. `delivered` is terminal.
 */
export const OrderStatusEnum = z.enum(["cart", "pending", "confirmed", "dispatched", "delivered"]);
export type OrderStatus = z.infer<typeof OrderStatusEnum>;

/**
 * Payment sub-states. `rejected` loops back to `proof_uploaded` on resubmission.
 */
export const PaymentStatusEnum = z.enum(["unpaid", "proof_uploaded", "paid", "rejected"]);
export type PaymentStatus = z.infer<typeof PaymentStatusEnum>;

/** Roles supplied by the identity provider */
export const RoleEnum = z.enum(["buyer", "seller", "admin"]);
export type Role = z.infer<typeof RoleEnum>;

/** Who an audit event is attributed to */
export type TimelineActor = "buyer" | "seller" | "system";

/** The acting principal for an operation */
export interface Actor {
  id: string;
  role: Role;
  username?: string;
}

/** 24-hex-char document id */
export const DocIdSchema = z
  .string()
  .trim()
  .regex(/^[a-f0-9]{24}$/i, { message: "must be a 24-character hex id" });

const QuantitySchema = z.coerce
  .number()
  .int("quantity must be an integer")
  .min(1, "quantity must be at least 1");

export const AddToCartSchema = z.object({
  medicineId: DocIdSchema,
  quantity: QuantitySchema,
});
export type AddToCartInput = z.infer<typeof AddToCartSchema>;

export const UpdateLineSchema = z.object({
  medicineId: DocIdSchema,
  delta: z.coerce
    .number()
    .int("delta must be an integer")
    .refine((d) => d !== 0, { message: "delta must not be zero" }),
});
export type UpdateLineInput = z.infer<typeof UpdateLineSchema>;

export const SubmitPaymentSchema = z.object({
  paymentId: z.string().trim().min(1, "paymentId is required"),
  addressLine: z.string().trim().min(1, "addressLine is required"),
  city: z.string().trim().min(1, "city is required"),
});
export type SubmitPaymentInput = z.infer<typeof SubmitPaymentSchema>;

export const RejectPaymentSchema = z.object({
  reason: z.string().trim().min(1, "reason is required"),
});

export const DispatchSchema = z.object({
  trackingNo: z.string().trim().min(1).optional(),
});

export const MarkReadSchema = z.object({
  ids: z.array(DocIdSchema).optional(),
});

export const BuyerOrderSortEnum = z.enum(["created_desc", "created_asc", "total_desc", "total_asc"]);
export type BuyerOrderSort = z.infer<typeof BuyerOrderSortEnum>;

export const BuyerOrderQuerySchema = z.object({
  status: OrderStatusEnum.optional(),
  q: z.string().trim().max(100).optional(),
  sort: BuyerOrderSortEnum.default("created_desc"),
});
export type BuyerOrderQuery = z.infer<typeof BuyerOrderQuerySchema>;

export const PharmacyOrderQuerySchema = z.object({
  orderStatus: OrderStatusEnum.optional(),
  paymentStatus: PaymentStatusEnum.optional(),
});

/** Accepted payment-proof extensions */
export const RECEIPT_EXTENSIONS = [".jpg", ".jpeg", ".png", ".pdf"] as const;

/**
 * Lower-cased extension of a filename including the dot, or "" when absent.
 */
export function fileExtension(filename: string): string {
  const base = filename.split(/[\\/]/).pop() ?? "";
  const dot = base.lastIndexOf(".");
  return dot > 0 ? base.slice(dot).toLowerCase() : "";
}

export function isAllowedReceiptExtension(ext: string): boolean {
  return RECEIPT_EXTENSIONS.some((e) => e === ext);
}

/**
 * Convert a decimal amount to integer cents, rounding half away from zero.
 */
export function toCents(amount: number): number {
  if (!Number.isFinite(amount)) {
    throw new Error(`Invalid amount: ${amount}`);
  }
  return Math.sign(amount) * Math.round(Math.abs(amount) * 100);
}

export function fromCents(cents: number): number {
  return cents / 100;
}

/**
 * Line total computed in integer cents so that 3 x 10.1 is 30.3, not 30.299999...
 */
export function lineTotal(quantity: number, price: number): number {
  return fromCents(quantity * toCents(price));
}

/**
 * Sum of quantity x price over the given lines.
 */
export function sumLines(lines: ReadonlyArray<{ quantity: number; price: number }>): number {
  let cents = 0;
  for (const l of lines) cents += l.quantity * toCents(l.price);
  return fromCents(cents);
}

/**
 * Display format used across projections, e.g. `1234.50Ks`.
 */
export function formatCurrency(amount: number): string {
  return `${amount.toFixed(2)}Ks`;
}

/**
 * `YYYY-MM-DD HH:mm` in UTC, or an em dash when there is no timestamp.
 */
export function formatTimestamp(d: Date | null | undefined): string {
  if (!d) return "—";
  const iso = d.toISOString();
  return `${iso.slice(0, 10)} ${iso.slice(11, 16)}`;
}
