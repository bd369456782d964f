/**
 * @file src/services/timeline.ts
 * @description
 * Audit/timeline recorder. Events are appended, never edited.
 */

import type { TimelineEvent } from "../domain/docs";
import { NotFoundError } from "../domain/errors";
import type { TimelineActor } from "../domain/types";
import type { AppContext } from "../lib/store";

/**
 * Build an event stamped with the context clock. Pass it to a state-changing
 * write so it is stored atomically with the change it documents.
 */
export function buildEvent(
  ctx: AppContext,
  actor: TimelineActor,
  action: string,
  meta: Record<string, unknown> = {}
): TimelineEvent {
  return { ts: ctx.now(), actor, action, meta };
}

/**
 * Append a standalone event and stamp `updatedAt`. For occurrences that do not
 * change the order's state, such as a failed stock commit.
 */
export async function recordEvent(
  ctx: AppContext,
  orderId: string,
  actor: TimelineActor,
  action: string,
  meta: Record<string, unknown> = {}
): Promise<TimelineEvent> {
  const event = buildEvent(ctx, actor, action, meta);
  const ok = await ctx.orders.appendEvent(orderId, event);
  if (!ok) throw new NotFoundError("Order", orderId);
  return event;
}
