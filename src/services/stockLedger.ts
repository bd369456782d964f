/**
 * @file src/services/stockLedger.ts
 * @description
 * Reserve / release / commit primitives over catalog records, and the
 * compensating batch protocol built on them. Every primitive is one conditional
 * update; none reads-then-writes.
 */

import type { MedicineDoc } from "../domain/docs";
import { ValidationError } from "../domain/errors";
import type { AppContext } from "../lib/store";
import { log, metrics } from "../util/log";

/** One medicine/quantity leg of a batch */
export interface StockRequest {
  medicineId: string;
  medicineName: string;
  quantity: number;
}

export type BatchResult =
  | { ok: true; applied: StockRequest[] }
  | { ok: false; failed: StockRequest; available: number };

export function availableOf(m: Pick<MedicineDoc, "stock" | "reserved">): number {
  return Math.max(0, m.stock - m.reserved);
}

function assertQuantity(qty: number): void {
  if (!Number.isInteger(qty) || qty < 1) {
    throw new ValidationError(`Stock quantity must be a positive integer, got ${qty}`);
  }
}

/**
 * Hold `qty` units. Fails (returns false) when fewer than `qty` are available at
 * the moment of the update.
 */
export async function reserve(ctx: AppContext, medicineId: string, qty: number): Promise<boolean> {
  assertQuantity(qty);
  const ok = await ctx.medicines.tryReserve(medicineId, qty);
  metrics.inc(ok ? "reserveOk" : "reserveFail");
  if (!ok) log({ level: "warn", evt: "stock.reserve_failed", medicineId, qty });
  return ok;
}

/**
 * Give back `qty` held units. Fails instead of driving `reserved` negative.
 */
export async function release(ctx: AppContext, medicineId: string, qty: number): Promise<boolean> {
  assertQuantity(qty);
  const ok = await ctx.medicines.tryRelease(medicineId, qty);
  if (!ok) log({ level: "warn", evt: "stock.release_failed", medicineId, qty });
  return ok;
}

/**
 * Turn `qty` held units into a permanent stock deduction.
 */
export async function commit(ctx: AppContext, medicineId: string, qty: number): Promise<boolean> {
  assertQuantity(qty);
  const ok = await ctx.medicines.tryCommit(medicineId, qty);
  metrics.inc(ok ? "commitOk" : "commitFail");
  return ok;
}

/**
 * Reserve each request in order. On the first failure every earlier reservation
 * is released and the failing leg is reported with its current availability.
 */
export async function reserveBatch(ctx: AppContext, requests: ReadonlyArray<StockRequest>): Promise<BatchResult> {
  const applied: StockRequest[] = [];
  for (const req of requests) {
    if (await reserve(ctx, req.medicineId, req.quantity)) {
      applied.push(req);
      continue;
    }
    await releaseBatch(ctx, applied);
    const med = await ctx.medicines.findById(req.medicineId);
    return { ok: false, failed: req, available: med ? availableOf(med) : 0 };
  }
  return { ok: true, applied };
}

/**
 * Release every request, continuing past failures.
 *
 * @returns the requests that could not be released (already logged)
 */
export async function releaseBatch(ctx: AppContext, requests: ReadonlyArray<StockRequest>): Promise<StockRequest[]> {
  const failed: StockRequest[] = [];
  for (const req of requests) {
    if (!(await release(ctx, req.medicineId, req.quantity))) failed.push(req);
  }
  if (failed.length) {
    log({ level: "error", evt: "stock.release_batch_incomplete", failed });
  }
  return failed;
}

/**
 * Commit each request in order. On the first failure the earlier commits are
 * reverted, so stock is left as it was before the call.
 */
export async function commitBatch(ctx: AppContext, requests: ReadonlyArray<StockRequest>): Promise<BatchResult> {
  const applied: StockRequest[] = [];
  for (const req of requests) {
    if (await commit(ctx, req.medicineId, req.quantity)) {
      applied.push(req);
      continue;
    }
    await revertCommits(ctx, applied);
    const med = await ctx.medicines.findById(req.medicineId);
    return { ok: false, failed: req, available: med ? med.reserved : 0 };
  }
  return { ok: true, applied };
}

/**
 * Put committed units back into both `stock` and `reserved`.
 */
export async function revertCommits(ctx: AppContext, requests: ReadonlyArray<StockRequest>): Promise<void> {
  for (const req of requests) {
    await ctx.medicines.revertCommit(req.medicineId, req.quantity);
  }
  if (requests.length) log({ level: "warn", evt: "stock.commit_reverted", requests });
}
