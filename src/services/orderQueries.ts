/**
 * @file src/services/orderQueries.ts
 * @description
 * Read-only order projections for buyer and pharmacy views. Money is rendered
 * with `formatCurrency`, times with `formatTimestamp`.
 */

import type { OrderDoc } from "../domain/docs";
import { parseOrThrow } from "../domain/errors";
import {
  BuyerOrderQuerySchema,
  PharmacyOrderQuerySchema,
  formatCurrency,
  formatTimestamp,
  type Actor,
  type OrderStatus,
  type PaymentStatus,
} from "../domain/types";
import type { AppContext } from "../lib/store";
import { loadScopedOrder, requireRole } from "./orderWrites";

export interface OrderSummaryView {
  id: string;
  pharmacyName: string;
  orderStatus: OrderStatus;
  paymentStatus: PaymentStatus;
  itemCount: number;
  total: string;
  createdAt: string;
  updatedAt: string;
}

export interface OrderLineView {
  medicineId: string;
  medicineName: string;
  quantity: number;
  price: string;
  total: string;
}

export interface OrderDetailView extends OrderSummaryView {
  buyerId: string;
  items: OrderLineView[];
  payment: {
    paymentId: string | null;
    receiptPath: string | null;
    rejectedReason: string | null;
    uploadedAt: string;
    sellerReceiptPath: string | null;
    sellerReceiptSentAt: string;
  };
  shipping: { addressLine: string; city: string } | null;
  dispatch: { trackingNo: string | null; at: string } | null;
  deliveredAt: string;
}

export interface TimelineView {
  at: string;
  actor: string;
  action: string;
  meta: Record<string, unknown>;
}

export interface PharmacyOrderDetailView extends OrderDetailView {
  timeline: TimelineView[];
}

export function toSummary(o: OrderDoc): OrderSummaryView {
  return {
    id: o.id,
    pharmacyName: o.pharmacyName,
    orderStatus: o.orderStatus,
    paymentStatus: o.paymentStatus,
    itemCount: o.items.reduce((n, l) => n + l.quantity, 0),
    total: formatCurrency(o.totalAmount),
    createdAt: formatTimestamp(o.createdAt),
    updatedAt: formatTimestamp(o.updatedAt),
  };
}

export function toDetail(o: OrderDoc): OrderDetailView {
  return {
    ...toSummary(o),
    buyerId: o.buyerId,
    items: o.items.map((l) => ({
      medicineId: l.medicineId,
      medicineName: l.medicineName,
      quantity: l.quantity,
      price: formatCurrency(l.price),
      total: formatCurrency(l.total),
    })),
    payment: {
      paymentId: o.payment.paymentId,
      receiptPath: o.payment.receiptPath,
      rejectedReason: o.payment.rejectedReason,
      uploadedAt: formatTimestamp(o.payment.uploadedAt),
      sellerReceiptPath: o.payment.sellerReceiptPath,
      sellerReceiptSentAt: formatTimestamp(o.payment.sellerReceiptSentAt),
    },
    shipping: o.shipping,
    dispatch: o.dispatch ? { trackingNo: o.dispatch.trackingNo, at: formatTimestamp(o.dispatch.ts) } : null,
    deliveredAt: formatTimestamp(o.delivered?.ts),
  };
}

function toPharmacyDetail(o: OrderDoc): PharmacyOrderDetailView {
  return {
    ...toDetail(o),
    timeline: o.timeline.map((e) => ({
      at: formatTimestamp(e.ts),
      actor: e.actor,
      action: e.action,
      meta: e.meta,
    })),
  };
}

// Buyer

export async function listBuyerOrders(ctx: AppContext, actor: Actor, raw: unknown): Promise<OrderSummaryView[]> {
  requireRole(actor, "buyer");
  const q = parseOrThrow(BuyerOrderQuerySchema, raw);
  const orders = await ctx.orders.find({
    buyerId: actor.id,
    orderStatus: q.status ? [q.status] : undefined,
    text: q.q || undefined,
    sort: q.sort,
  });
  return orders.map(toSummary);
}

export async function getBuyerOrder(ctx: AppContext, actor: Actor, orderId: string): Promise<OrderDetailView> {
  requireRole(actor, "buyer");
  return toDetail(await loadScopedOrder(ctx, actor, orderId));
}

// Pharmacy

export async function listPharmacyOrders(
  ctx: AppContext,
  actor: Actor,
  raw: unknown
): Promise<OrderSummaryView[]> {
  requireRole(actor, "seller");
  const q = parseOrThrow(PharmacyOrderQuerySchema, raw);
  const orders = await ctx.orders.find({
    pharmacyId: actor.id,
    orderStatus: q.orderStatus ? [q.orderStatus] : undefined,
    paymentStatus: q.paymentStatus ? [q.paymentStatus] : undefined,
    sort: "created_desc",
  });
  return orders.map(toSummary);
}

/**
 * Pending orders awaiting a seller decision or a buyer resubmission, latest activity first.
 */
export async function reviewQueue(ctx: AppContext, actor: Actor): Promise<OrderSummaryView[]> {
  requireRole(actor, "seller");
  const orders = await ctx.orders.find({
    pharmacyId: actor.id,
    orderStatus: ["pending"],
    paymentStatus: ["proof_uploaded", "rejected"],
    sort: "updated_desc",
  });
  return orders.map(toSummary);
}

export async function getPharmacyOrder(
  ctx: AppContext,
  actor: Actor,
  orderId: string
): Promise<PharmacyOrderDetailView> {
  requireRole(actor, "seller");
  return toPharmacyDetail(await loadScopedOrder(ctx, actor, orderId));
}
