/**
 * @file src/services/cartService.ts
 * @description
 * Cart Manager: add-to-cart merging, line quantity changes and cancellation of
 * open orders. Stock is only touched when the order is already pending.
 */

import type { LineItem, MedicineDoc, NewOrderDoc, OrderDoc } from "../domain/docs";
import {
  ConflictError,
  NotFoundError,
  OutOfStockError,
  ValidationError,
  parseOrThrow,
} from "../domain/errors";
import {
  EMPTY_PAYMENT,
  findLine,
  makeLine,
  orderTotal,
  removeLine,
  repriceLine,
  resizeLine,
  upsertLine,
} from "../domain/order";
import { assertOpen } from "../domain/stateMachine";
import { AddToCartSchema, DocIdSchema, UpdateLineSchema, lineTotal, type Actor } from "../domain/types";
import { DuplicateOpenOrderError, type AppContext } from "../lib/store";
import { log, metrics } from "../util/log";
import {
  applyWithEvent,
  loadScopedOrder,
  orderLockKey,
  pairLockKey,
  requireRole,
  withConflictRetry,
} from "./orderWrites";
import { availableOf, release, releaseBatch, reserve, type StockRequest } from "./stockLedger";
import { buildEvent } from "./timeline";

export const UNKNOWN_PHARMACY = "Unknown Pharmacy";

export interface AddToCartResult {
  order: OrderDoc;
  /** false when a new cart was created */
  merged: boolean;
}

export interface UpdateLineResult {
  /** null when the last line was removed and the order deleted */
  order: OrderDoc | null;
  deleted: boolean;
}

async function loadMedicine(ctx: AppContext, medicineId: string): Promise<MedicineDoc> {
  const med = await ctx.medicines.findById(medicineId);
  if (!med) throw new NotFoundError("Medicine", medicineId);
  return med;
}

async function outOfStock(ctx: AppContext, med: MedicineDoc, requested: number): Promise<OutOfStockError> {
  const fresh = await ctx.medicines.findById(med.id);
  return new OutOfStockError(med.id, med.name, requested, fresh ? availableOf(fresh) : 0);
}

/**
 * Add `quantity` of a medicine to the buyer's open order for its pharmacy,
 * creating the order when there is none.
 *
 * @throws {NotFoundError} unknown medicine
 * @throws {OutOfStockError} fewer units available than requested
 */
export async function addToCart(ctx: AppContext, actor: Actor, raw: unknown): Promise<AddToCartResult> {
  requireRole(actor, "buyer");
  const input = parseOrThrow(AddToCartSchema, raw);

  const med = await loadMedicine(ctx, input.medicineId);
  if (med.expirationDate && med.expirationDate.getTime() <= ctx.now().getTime()) {
    throw new ValidationError(`"${med.name}" has expired and cannot be ordered`);
  }
  if (availableOf(med) < input.quantity) {
    throw new OutOfStockError(med.id, med.name, input.quantity, availableOf(med));
  }

  const pharmacyName = (await ctx.pharmacies.displayName(med.sellerId)) ?? UNKNOWN_PHARMACY;

  const result = await ctx.locks.runExclusive(pairLockKey(actor.id, med.sellerId), () =>
    withConflictRetry("addToCart", async () => {
      const open = await ctx.orders.findOpen(actor.id, med.sellerId);
      if (!open) {
        return { order: await createCart(ctx, actor, med, pharmacyName, input.quantity), merged: false };
      }
      const order = await ctx.locks.runExclusive(orderLockKey(open.id), () =>
        mergeIntoOrder(ctx, open.id, med, input.quantity)
      );
      return { order, merged: true };
    })
  );

  metrics.inc("cartMutations");
  log({
    evt: "cart.item_added",
    orderId: result.order.id,
    buyerId: actor.id,
    medicineId: med.id,
    quantity: input.quantity,
    merged: result.merged,
  });
  return result;
}

async function createCart(
  ctx: AppContext,
  actor: Actor,
  med: MedicineDoc,
  pharmacyName: string,
  quantity: number
): Promise<OrderDoc> {
  const now = ctx.now();
  const items = [makeLine(med, quantity)];
  const doc: NewOrderDoc = {
    buyerId: actor.id,
    pharmacyId: med.sellerId,
    pharmacyName,
    items,
    totalAmount: orderTotal(items),
    orderStatus: "cart",
    paymentStatus: "unpaid",
    isOpen: true,
    payment: { ...EMPTY_PAYMENT },
    shipping: null,
    dispatch: null,
    delivered: null,
    timeline: [buildEvent(ctx, "buyer", "create_cart", { medicineId: med.id, quantity })],
    version: 0,
    createdAt: now,
    updatedAt: now,
  };
  try {
    return await ctx.orders.insert(doc);
  } catch (err) {
    // Someone else opened the pair's order first; retry as a merge
    if (err instanceof DuplicateOpenOrderError) throw new ConflictError(err.message);
    throw err;
  }
}

/**
 * Grow (or append) the medicine's line on an open order. Pending orders reserve
 * the added units before the write and give them back if the write loses.
 */
async function mergeIntoOrder(
  ctx: AppContext,
  orderId: string,
  med: MedicineDoc,
  quantity: number
): Promise<OrderDoc> {
  const order = await ctx.orders.findById(orderId);
  if (!order || !order.isOpen) throw new ConflictError();
  assertOpen("add to cart", order);

  const isPending = order.orderStatus === "pending";
  if (isPending && !(await reserve(ctx, med.id, quantity))) {
    throw await outOfStock(ctx, med, quantity);
  }

  const existing = findLine(order.items, med.id);
  let line: LineItem;
  if (!existing) {
    line = makeLine(med, quantity, isPending ? quantity : 0);
  } else {
    const grown = resizeLine(
      existing,
      existing.quantity + quantity,
      existing.reservedQty + (isPending ? quantity : 0)
    );
    line = isPending ? grown : repriceLine(grown, med);
  }
  const items = upsertLine(order.items, line);

  try {
    return await applyWithEvent(
      ctx,
      order,
      {
        items,
        totalAmount: orderTotal(items),
        orderStatus: order.orderStatus,
        paymentStatus: order.paymentStatus,
      },
      buildEvent(ctx, "buyer", "add_to_cart", {
        medicineId: med.id,
        quantityAdded: quantity,
        lineTotalAdded: lineTotal(quantity, line.price),
      })
    );
  } catch (err) {
    if (isPending) await release(ctx, med.id, quantity);
    throw err;
  }
}

/**
 * Change a line's quantity by a signed delta. Dropping to zero or below removes
 * the line; removing the last line deletes the order.
 */
export async function updateLineQuantity(
  ctx: AppContext,
  actor: Actor,
  orderId: string,
  raw: unknown
): Promise<UpdateLineResult> {
  requireRole(actor, "buyer");
  const id = parseOrThrow(DocIdSchema, orderId);
  const input = parseOrThrow(UpdateLineSchema, raw);

  const result = await ctx.locks.runExclusive(orderLockKey(id), () =>
    withConflictRetry("updateLineQuantity", async () => {
      const order = await loadScopedOrder(ctx, actor, id);
      assertOpen("update quantity", order);
      const line = findLine(order.items, input.medicineId);
      if (!line) throw new NotFoundError("Line item", input.medicineId);
      return applyLineDelta(ctx, order, line, input.delta);
    })
  );

  metrics.inc("cartMutations");
  log({
    evt: result.deleted ? "cart.emptied" : "cart.quantity_changed",
    orderId: id,
    medicineId: input.medicineId,
    delta: input.delta,
  });
  return result;
}

async function applyLineDelta(
  ctx: AppContext,
  order: OrderDoc,
  line: LineItem,
  delta: number
): Promise<UpdateLineResult> {
  const isPending = order.orderStatus === "pending";
  const quantity = Math.max(0, line.quantity + delta);

  let reserved = 0;
  if (delta > 0) {
    const med = await loadMedicine(ctx, line.medicineId);
    if (isPending) {
      if (!(await reserve(ctx, med.id, delta))) throw await outOfStock(ctx, med, delta);
      reserved = delta;
    } else if (availableOf(med) < delta) {
      throw new OutOfStockError(med.id, med.name, delta, availableOf(med));
    }
  }
  const reservedQty = Math.min(line.reservedQty + reserved, quantity);
  const toRelease = line.reservedQty + reserved - reservedQty;

  const items =
    quantity === 0
      ? removeLine(order.items, line.medicineId)
      : upsertLine(order.items, resizeLine(line, quantity, reservedQty));

  if (items.length === 0) {
    await deleteOpenOrder(ctx, order);
    return { order: null, deleted: true };
  }

  let updated: OrderDoc;
  try {
    updated = await applyWithEvent(
      ctx,
      order,
      {
        items,
        totalAmount: orderTotal(items),
        orderStatus: order.orderStatus,
        paymentStatus: order.paymentStatus,
      },
      buildEvent(ctx, "buyer", quantity === 0 ? "remove_item" : "update_quantity", {
        medicineId: line.medicineId,
        delta,
        quantity,
      })
    );
  } catch (err) {
    if (reserved > 0) await release(ctx, line.medicineId, reserved);
    throw err;
  }
  if (toRelease > 0) await release(ctx, line.medicineId, toRelease);
  return { order: updated, deleted: false };
}

/**
 * Cancel an open order: the order is deleted and any held reservations released.
 */
export async function cancelOrder(ctx: AppContext, actor: Actor, orderId: string): Promise<{ released: StockRequest[] }> {
  requireRole(actor, "buyer");
  const id = parseOrThrow(DocIdSchema, orderId);

  const released = await ctx.locks.runExclusive(orderLockKey(id), () =>
    withConflictRetry("cancelOrder", async () => {
      const order = await loadScopedOrder(ctx, actor, id);
      assertOpen("cancel", order);
      return deleteOpenOrder(ctx, order);
    })
  );

  metrics.inc("cartMutations");
  log({ evt: "order.cancelled", orderId: id, buyerId: actor.id, released });
  return { released };
}

/**
 * Delete an open order at its read version, then release what its lines hold.
 * The caller must hold the order lock.
 *
 * @throws {ConflictError} when the order changed since it was read
 */
export async function deleteOpenOrder(ctx: AppContext, order: OrderDoc): Promise<StockRequest[]> {
  assertOpen("cancel", order);
  if (!(await ctx.orders.delete(order.id, order.version))) throw new ConflictError();

  const held = order.items
    .filter((l) => l.reservedQty > 0)
    .map((l) => ({ medicineId: l.medicineId, medicineName: l.medicineName, quantity: l.reservedQty }));
  await releaseBatch(ctx, held);
  return held;
}
