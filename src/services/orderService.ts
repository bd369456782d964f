/**
 * @file src/services/orderService.ts
 * @description
 * Order State Machine operations: payment submission, seller verification and
 * rejection, dispatch, delivery and the seller receipt. Every transition is
 * checked against `RULES`, written with its timeline event in one update, and
 * serialized per order.
 */

import { randomUUID } from "node:crypto";
import type { OrderDoc, OrderPatch } from "../domain/docs";
import {
  ConflictError,
  InvalidStateError,
  NotFoundError,
  OutOfStockError,
  StockCommitFailedError,
  ValidationError,
  parseOrThrow,
} from "../domain/errors";
import { foldLines, orderTotal, reservationShortfall } from "../domain/order";
import { nextState } from "../domain/stateMachine";
import {
  DispatchSchema,
  DocIdSchema,
  RECEIPT_EXTENSIONS,
  RejectPaymentSchema,
  SubmitPaymentSchema,
  fileExtension,
  formatCurrency,
  isAllowedReceiptExtension,
  type Actor,
} from "../domain/types";
import { DuplicateOpenOrderError, type AppContext } from "../lib/store";
import { maxUploadBytes } from "../util/env";
import { errorMessage, log, metrics } from "../util/log";
import { notify } from "./notificationService";
import {
  applyWithEvent,
  loadScopedOrder,
  orderLockKey,
  pairLockKey,
  requireRole,
  withConflictRetry,
} from "./orderWrites";
import {
  commitBatch,
  releaseBatch,
  reserveBatch,
  revertCommits,
  type StockRequest,
} from "./stockLedger";
import { buildEvent, recordEvent } from "./timeline";
import { renderVoucher, voucherFileName } from "./voucher";

/** Uploaded payment proof */
export interface ProofFile {
  filename: string;
  data: Uint8Array;
}

export interface VerifyResult {
  order: OrderDoc;
  /** false when the voucher could not be issued; the seller can resend it */
  voucherIssued: boolean;
}

function checkProof(proof: ProofFile): string {
  const ext = fileExtension(proof.filename);
  if (!isAllowedReceiptExtension(ext)) {
    throw new ValidationError(`Receipt must be one of ${RECEIPT_EXTENSIONS.join(", ")}`, {
      filename: proof.filename,
    });
  }
  if (proof.data.byteLength === 0) throw new ValidationError("Receipt file is empty");
  const max = maxUploadBytes();
  if (proof.data.byteLength > max) {
    throw new ValidationError(`Receipt exceeds ${max} bytes`, { size: proof.data.byteLength });
  }
  return ext;
}

async function discardUpload(ctx: AppContext, orderId: string, ref: string): Promise<void> {
  try {
    await ctx.files.remove(ref);
  } catch (err) {
    log({ level: "warn", evt: "receipt.discard_failed", orderId, ref, error: errorMessage(err) });
  }
}

function statusPatch(order: OrderDoc): OrderPatch {
  return { orderStatus: order.orderStatus, paymentStatus: order.paymentStatus };
}

// ---------------------------------------------------------------------------
// Buyer: submit payment proof
// ---------------------------------------------------------------------------

/**
 * Submit payment proof and shipping details. Reserves whatever each line does
 * not already hold; on a shortage every reservation made here is rolled back and
 * the order is left untouched.
 *
 * @throws {OutOfStockError} naming the first line that could not be reserved
 * @throws {InvalidStateError} unless the order is cart/unpaid or pending with unpaid/rejected payment
 */
export async function submitPayment(
  ctx: AppContext,
  actor: Actor,
  orderId: string,
  raw: unknown,
  proof: ProofFile
): Promise<OrderDoc> {
  requireRole(actor, "buyer");
  const id = parseOrThrow(DocIdSchema, orderId);
  const input = parseOrThrow(SubmitPaymentSchema, raw);
  const ext = checkProof(proof);

  // Stored once the stock is held; deleted again if the submission fails
  const upload: { path: string | null } = { path: null };

  const order = await ctx.locks.runExclusive(orderLockKey(id), async () => {
    try {
      return await withConflictRetry("submitPayment", async () => {
        const current = await loadScopedOrder(ctx, actor, id);
        const next = nextState("submit_payment", current);

        const requests: StockRequest[] = reservationShortfall(current.items).map(({ line, missing }) => ({
          medicineId: line.medicineId,
          medicineName: line.medicineName,
          quantity: missing,
        }));
        const batch = await reserveBatch(ctx, requests);
        if (!batch.ok) {
          throw new OutOfStockError(
            batch.failed.medicineId,
            batch.failed.medicineName,
            batch.failed.quantity,
            batch.available
          );
        }

        const now = ctx.now();
        try {
          const receiptPath = (upload.path ??= await ctx.files.save(id, `${randomUUID()}${ext}`, proof.data));
          return await applyWithEvent(
            ctx,
            current,
            {
              ...next,
              items: current.items.map((l) => ({ ...l, reservedQty: l.quantity })),
              payment: {
                ...current.payment,
                paymentId: input.paymentId,
                receiptPath,
                rejectedReason: null,
                uploadedAt: now,
              },
              shipping: { addressLine: input.addressLine, city: input.city },
            },
            buildEvent(ctx, "buyer", "submit_order", {
              paymentId: input.paymentId,
              receiptPath,
              resubmission: current.paymentStatus === "rejected",
              reserved: batch.applied,
            })
          );
        } catch (err) {
          await releaseBatch(ctx, batch.applied);
          throw err;
        }
      });
    } catch (err) {
      if (upload.path) await discardUpload(ctx, id, upload.path);
      throw err;
    }
  });

  metrics.inc("ordersSubmitted");
  log({ evt: "order.submitted", orderId: id, buyerId: actor.id, total: order.totalAmount });
  await notify(ctx, {
    userId: order.pharmacyId,
    role: "seller",
    type: "proof_uploaded",
    title: "Payment proof uploaded",
    message: `${actor.username ?? "A buyer"} uploaded payment proof for order ${id} (${formatCurrency(order.totalAmount)})`,
    orderId: id,
  });
  return order;
}

// ---------------------------------------------------------------------------
// Seller: verify / reject
// ---------------------------------------------------------------------------

/**
 * Verify a payment: commit every line's reservation into real stock, confirm
 * the order, issue the seller receipt and notify the buyer.
 *
 * @throws {StockCommitFailedError} when a reservation does not back its line;
 *   stock and order status are left as they were
 */
export async function verifyPayment(ctx: AppContext, actor: Actor, orderId: string): Promise<VerifyResult> {
  requireRole(actor, "seller");
  const id = parseOrThrow(DocIdSchema, orderId);

  const result = await ctx.locks.runExclusive(orderLockKey(id), async () => {
    const confirmed = await withConflictRetry("verifyPayment", async () => {
      const current = await loadScopedOrder(ctx, actor, id);
      const next = nextState("verify_payment", current);

      const unbacked = current.items.find((l) => l.reservedQty !== l.quantity);
      if (unbacked) {
        await reportCommitFailure(ctx, current, unbacked.medicineId, unbacked.quantity);
      }

      const requests: StockRequest[] = current.items.map((l) => ({
        medicineId: l.medicineId,
        medicineName: l.medicineName,
        quantity: l.quantity,
      }));
      const batch = await commitBatch(ctx, requests);
      if (!batch.ok) {
        await reportCommitFailure(ctx, current, batch.failed.medicineId, batch.failed.quantity);
      }

      try {
        return await applyWithEvent(
          ctx,
          current,
          { ...next, items: current.items.map((l) => ({ ...l, reservedQty: 0 })) },
          buildEvent(ctx, "seller", "payment_verified", { committed: requests })
        );
      } catch (err) {
        await revertCommits(ctx, requests);
        throw err;
      }
    });

    metrics.inc("paymentsVerified");
    log({ evt: "order.payment_verified", orderId: id, pharmacyId: confirmed.pharmacyId });

    try {
      return { order: await issueVoucher(ctx, id), voucherIssued: true };
    } catch (err) {
      log({
        level: "error",
        evt: "voucher.failed",
        orderId: id,
        error: errorMessage(err),
      });
      return { order: confirmed, voucherIssued: false };
    }
  });

  await notify(ctx, {
    userId: result.order.buyerId,
    role: "buyer",
    type: "payment_verified",
    title: "Payment verified",
    message: `${result.order.pharmacyName} verified your payment for order ${id}`,
    orderId: id,
  });
  return result;
}

/**
 * Log, record and throw a commit failure. The order keeps `proof_uploaded` for
 * manual reconciliation.
 */
async function reportCommitFailure(
  ctx: AppContext,
  order: OrderDoc,
  medicineId: string,
  quantity: number
): Promise<never> {
  log({
    level: "error",
    evt: "stock.commit_failed",
    orderId: order.id,
    medicineId,
    quantity,
    items: order.items.map((l) => ({
      medicineId: l.medicineId,
      quantity: l.quantity,
      reservedQty: l.reservedQty,
    })),
  });
  await recordEvent(ctx, order.id, "system", "stock_commit_failed", { medicineId, quantity });
  throw new StockCommitFailedError(order.id, medicineId, quantity);
}

/**
 * Reject a payment. Reservations stay held so the buyer can resubmit. If the
 * buyer opened another cart for this pharmacy meanwhile, its lines are folded
 * into the rejected order and the cart is deleted.
 */
export async function rejectPayment(
  ctx: AppContext,
  actor: Actor,
  orderId: string,
  raw: unknown
): Promise<OrderDoc> {
  requireRole(actor, "seller");
  const { reason } = parseOrThrow(RejectPaymentSchema, raw);
  const { id, buyerId, pharmacyId } = await loadScopedOrder(ctx, actor, orderId);

  const order = await ctx.locks.runExclusive(pairLockKey(buyerId, pharmacyId), () =>
    ctx.locks.runExclusive(orderLockKey(id), () =>
      withConflictRetry("rejectPayment", async () => {
        const current = await loadScopedOrder(ctx, actor, id);
        const next = nextState("reject_payment", current);
        const sibling = await ctx.orders.findOpen(buyerId, pharmacyId);

        const write = (extra: OrderDoc | null) => {
          const items = extra ? foldLines(current.items, extra.items) : current.items;
          return applyWithEvent(
            ctx,
            current,
            {
              ...next,
              items,
              totalAmount: orderTotal(items),
              payment: { ...current.payment, rejectedReason: reason },
            },
            buildEvent(ctx, "seller", "payment_rejected", {
              reason,
              ...(extra ? { foldedOrderId: extra.id } : {}),
            })
          ).catch((err: unknown) => {
            throw err instanceof DuplicateOpenOrderError ? new ConflictError(err.message) : err;
          });
        };

        if (!sibling) return write(null);
        return ctx.locks.runExclusive(orderLockKey(sibling.id), () => foldSibling(ctx, sibling.id, write));
      })
    )
  );

  metrics.inc("paymentsRejected");
  log({ evt: "order.payment_rejected", orderId: id, reason });
  await notify(ctx, {
    userId: order.buyerId,
    role: "buyer",
    type: "payment_rejected",
    title: "Payment rejected",
    message: `${order.pharmacyName} rejected your payment for order ${id}: ${reason}`,
    orderId: id,
  });
  return order;
}

/**
 * Delete the sibling cart, then run `write` with it. If the write fails the
 * sibling's contents are restored as a new cart before the error propagates.
 */
async function foldSibling(
  ctx: AppContext,
  siblingId: string,
  write: (sibling: OrderDoc) => Promise<OrderDoc>
): Promise<OrderDoc> {
  const sibling = await ctx.orders.findById(siblingId);
  if (!sibling || !sibling.isOpen) throw new ConflictError();
  if (!(await ctx.orders.delete(sibling.id, sibling.version))) throw new ConflictError();

  try {
    return await write(sibling);
  } catch (err) {
    const { id: _dropped, ...rest } = sibling;
    const restored = await ctx.orders.insert({ ...rest, version: 0 });
    log({ level: "warn", evt: "order.fold_restored", siblingId, restoredId: restored.id });
    throw err;
  }
}

// ---------------------------------------------------------------------------
// Seller: fulfillment
// ---------------------------------------------------------------------------

export async function dispatchOrder(
  ctx: AppContext,
  actor: Actor,
  orderId: string,
  raw: unknown
): Promise<OrderDoc> {
  requireRole(actor, "seller");
  const id = parseOrThrow(DocIdSchema, orderId);
  const { trackingNo } = parseOrThrow(DispatchSchema, raw ?? {});

  const order = await ctx.locks.runExclusive(orderLockKey(id), () =>
    withConflictRetry("dispatchOrder", async () => {
      const current = await loadScopedOrder(ctx, actor, id);
      const next = nextState("dispatch", current);
      return applyWithEvent(
        ctx,
        current,
        { ...next, dispatch: { trackingNo: trackingNo ?? null, ts: ctx.now() } },
        buildEvent(ctx, "seller", "dispatched", { trackingNo: trackingNo ?? null })
      );
    })
  );

  log({ evt: "order.dispatched", orderId: id, trackingNo: trackingNo ?? null });
  return order;
}

/**
 * Mark an order delivered. Only allowed once the seller receipt has been sent.
 */
export async function markDelivered(ctx: AppContext, actor: Actor, orderId: string): Promise<OrderDoc> {
  requireRole(actor, "seller");
  const id = parseOrThrow(DocIdSchema, orderId);

  const order = await ctx.locks.runExclusive(orderLockKey(id), () =>
    withConflictRetry("markDelivered", async () => {
      const current = await loadScopedOrder(ctx, actor, id);
      const next = nextState("deliver", current);
      if (!current.payment.sellerReceiptSentAt) {
        throw new InvalidStateError(
          "mark delivered",
          "confirmed/paid or dispatched/paid with the seller receipt sent",
          current
        );
      }
      return applyWithEvent(
        ctx,
        current,
        { ...next, delivered: { ts: ctx.now() } },
        buildEvent(ctx, "seller", "delivered")
      );
    })
  );

  metrics.inc("ordersDelivered");
  log({ evt: "order.delivered", orderId: id });
  await notify(ctx, {
    userId: order.buyerId,
    role: "buyer",
    type: "order_delivered",
    title: "Order delivered",
    message: `Order ${id} from ${order.pharmacyName} was marked delivered`,
    orderId: id,
  });
  return order;
}

/**
 * (Re)issue the seller receipt for a confirmed or dispatched order.
 */
export async function sendSellerReceipt(ctx: AppContext, actor: Actor, orderId: string): Promise<OrderDoc> {
  requireRole(actor, "seller");
  const id = parseOrThrow(DocIdSchema, orderId);

  return ctx.locks.runExclusive(orderLockKey(id), async () => {
    nextState("send_seller_receipt", await loadScopedOrder(ctx, actor, id));
    return issueVoucher(ctx, id);
  });
}

/**
 * Render, store and record the voucher. The caller must hold the order lock.
 */
async function issueVoucher(ctx: AppContext, orderId: string): Promise<OrderDoc> {
  const order = await ctx.orders.findById(orderId);
  if (!order) throw new NotFoundError("Order", orderId);
  nextState("send_seller_receipt", order);

  const issuedAt = ctx.now();
  const path = await ctx.files.save(
    orderId,
    voucherFileName(orderId),
    new TextEncoder().encode(renderVoucher(order, issuedAt))
  );

  const updated = await withConflictRetry("issueVoucher", async () => {
    const current = await ctx.orders.findById(orderId);
    if (!current) throw new NotFoundError("Order", orderId);
    return applyWithEvent(
      ctx,
      current,
      {
        ...statusPatch(current),
        payment: { ...current.payment, sellerReceiptPath: path, sellerReceiptSentAt: issuedAt },
      },
      buildEvent(ctx, "seller", "seller_receipt_sent", { path })
    );
  });

  log({ evt: "voucher.issued", orderId, path });
  return updated;
}
