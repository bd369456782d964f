/**
 * @file src/services/notificationService.ts
 * @description
 * Records notification events for buyers and sellers. Recording is best effort:
 * a failed insert is logged and never undoes the order change that caused it.
 */

import type { NotificationDoc, NotificationType } from "../domain/docs";
import { ValidationError } from "../domain/errors";
import type { Actor, Role } from "../domain/types";
import type { AppContext } from "../lib/store";
import { errorMessage, log } from "../util/log";

export interface NotificationInput {
  userId: string;
  role: Role;
  type: NotificationType;
  title: string;
  message: string;
  orderId?: string | null;
}

export const DEFAULT_NOTIFICATION_LIMIT = 20;
export const MAX_NOTIFICATION_LIMIT = 100;

/**
 * Record a notification. Returns null when the write failed.
 */
export async function notify(ctx: AppContext, input: NotificationInput): Promise<NotificationDoc | null> {
  try {
    return await ctx.notifications.insert({
      userId: input.userId,
      role: input.role,
      type: input.type,
      title: input.title,
      message: input.message,
      orderId: input.orderId ?? null,
      isRead: false,
      readAt: null,
      createdAt: ctx.now(),
    });
  } catch (err) {
    log({
      level: "error",
      evt: "notification.failed",
      userId: input.userId,
      type: input.type,
      orderId: input.orderId ?? null,
      error: errorMessage(err),
    });
    return null;
  }
}

export interface NotificationFeed {
  items: NotificationDoc[];
  unread: number;
}

/**
 * Latest notifications for the actor, newest first, plus the unread count.
 */
export async function listNotifications(
  ctx: AppContext,
  actor: Actor,
  limit = DEFAULT_NOTIFICATION_LIMIT
): Promise<NotificationFeed> {
  if (!Number.isInteger(limit) || limit < 1 || limit > MAX_NOTIFICATION_LIMIT) {
    throw new ValidationError(`limit must be an integer between 1 and ${MAX_NOTIFICATION_LIMIT}`);
  }
  const [items, unread] = await Promise.all([
    ctx.notifications.listForUser(actor.id, limit),
    ctx.notifications.countUnread(actor.id),
  ]);
  return { items, unread };
}

/**
 * Mark the given notifications (or all of them) read.
 *
 * @returns number of notifications that changed
 */
export async function markNotificationsRead(
  ctx: AppContext,
  actor: Actor,
  ids?: ReadonlyArray<string>
): Promise<number> {
  return ctx.notifications.markRead(actor.id, ids, ctx.now());
}
