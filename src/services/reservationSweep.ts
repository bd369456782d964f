/**
 * @file src/services/reservationSweep.ts
 * @description
 * Releases stock held by rejected orders the buyer has abandoned. Runs only when
 * an operator triggers it or the periodic sweep is enabled; otherwise rejected
 * reservations are held indefinitely.
 */

import { ConflictError } from "../domain/errors";
import type { AppContext } from "../lib/store";
import { log, metrics } from "../util/log";
import { deleteOpenOrder } from "./cartService";
import { notify } from "./notificationService";
import { orderLockKey } from "./orderWrites";

export interface SweepResult {
  cutoff: string;
  scanned: number;
  cancelled: string[];
  skipped: string[];
}

/**
 * Cancel every pending/rejected order not updated within `holdMs`.
 */
export async function sweepRejectedOrders(ctx: AppContext, holdMs: number): Promise<SweepResult> {
  const cutoff = new Date(ctx.now().getTime() - holdMs);
  const stale = await ctx.orders.find({
    orderStatus: ["pending"],
    paymentStatus: ["rejected"],
    updatedBefore: cutoff,
    sort: "updated_desc",
  });

  const result: SweepResult = { cutoff: cutoff.toISOString(), scanned: stale.length, cancelled: [], skipped: [] };

  for (const candidate of stale) {
    const released = await ctx.locks.runExclusive(orderLockKey(candidate.id), async () => {
      const order = await ctx.orders.findById(candidate.id);
      // Resubmitted, edited or cancelled since the scan
      if (!order || order.paymentStatus !== "rejected" || order.updatedAt >= cutoff) return null;
      try {
        return await deleteOpenOrder(ctx, order);
      } catch (err) {
        if (err instanceof ConflictError) return null;
        throw err;
      }
    });

    if (!released) {
      result.skipped.push(candidate.id);
      continue;
    }

    result.cancelled.push(candidate.id);
    metrics.inc("ordersSwept");
    log({ evt: "sweep.released", orderId: candidate.id, buyerId: candidate.buyerId, released });
    await notify(ctx, {
      userId: candidate.buyerId,
      role: "buyer",
      type: "order_expired",
      title: "Order expired",
      message: `Order ${candidate.id} from ${candidate.pharmacyName} was cancelled after its payment stayed rejected`,
      orderId: candidate.id,
    });
  }

  log({ evt: "sweep.completed", ...result, cancelled: result.cancelled.length, skipped: result.skipped.length });
  return result;
}
