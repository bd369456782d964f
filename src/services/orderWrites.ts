/**
 * @file src/services/orderWrites.ts
 * @description
 * Scoped order loading, version-checked writes and the retry loop shared by the
 * cart and state-machine services.
 */

import type { OrderDoc, OrderPatch, TimelineEvent } from "../domain/docs";
import { ConflictError, ForbiddenError, NotFoundError, parseOrThrow } from "../domain/errors";
import { DocIdSchema, type Actor, type Role } from "../domain/types";
import type { AppContext } from "../lib/store";
import { log } from "../util/log";

/** Attempts made before a version conflict is surfaced to the caller */
export const MAX_WRITE_ATTEMPTS = 3;

export function orderLockKey(orderId: string): string {
  return `order:${orderId}`;
}

export function pairLockKey(buyerId: string, pharmacyId: string): string {
  return `pair:${buyerId}:${pharmacyId}`;
}

/**
 * @throws {ForbiddenError} unless the actor holds one of `roles`
 */
export function requireRole(actor: Actor, ...roles: Role[]): void {
  if (!roles.includes(actor.role)) {
    throw new ForbiddenError(`Requires role ${roles.join(" or ")}`);
  }
}

/**
 * Load an order visible to the actor: buyers see their own, sellers see their
 * pharmacy's, admins see all. Anything else is reported as not found.
 */
export async function loadScopedOrder(ctx: AppContext, actor: Actor, orderId: string): Promise<OrderDoc> {
  const id = parseOrThrow(DocIdSchema, orderId);
  const order = await ctx.orders.findById(id);
  const visible =
    order !== null &&
    (actor.role === "admin" ||
      (actor.role === "buyer" && order.buyerId === actor.id) ||
      (actor.role === "seller" && order.pharmacyId === actor.id));
  if (!order || !visible) throw new NotFoundError("Order", id);
  return order;
}

/**
 * Write `patch` together with its audit event. The event lands in the same
 * document update as the state change.
 *
 * @throws {ConflictError} when the order changed since it was read
 */
export async function applyWithEvent(
  ctx: AppContext,
  order: OrderDoc,
  patch: OrderPatch,
  event: TimelineEvent
): Promise<OrderDoc> {
  const updated = await ctx.orders.update(order.id, order.version, patch, event);
  if (!updated) throw new ConflictError();
  return updated;
}

/**
 * Run `attempt` until it stops failing with a ConflictError, at most MAX_WRITE_ATTEMPTS times.
 * `attempt` must have compensated its own stock effects before throwing.
 */
export async function withConflictRetry<T>(label: string, attempt: () => Promise<T>): Promise<T> {
  for (let i = 1; ; i++) {
    try {
      return await attempt();
    } catch (err) {
      if (!(err instanceof ConflictError) || i >= MAX_WRITE_ATTEMPTS) throw err;
      log({ level: "warn", evt: "order.write_conflict", op: label, attempt: i });
    }
  }
}
