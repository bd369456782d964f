/**
 * @file api/notifications.ts
 * @description
 * HTTP handler for `GET /notifications`
 */

import { z } from "zod";
import { parseOrThrow } from "../src/domain/errors";
import { getContext } from "../src/lib/context";
import {
  DEFAULT_NOTIFICATION_LIMIT,
  MAX_NOTIFICATION_LIMIT,
  listNotifications,
} from "../src/services/notificationService";
import { allowMethods, handleError, json, methodNotAllowed, queryOf, requireActor } from "./_util";

export const config = { runtime: "nodejs" };

const QuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(MAX_NOTIFICATION_LIMIT).default(DEFAULT_NOTIFICATION_LIMIT),
});

/**
 * Route handler for `GET /notifications?limit=`; returns `{ items, unread }`
 */
export default async function handler(req: Request): Promise<Response> {
  if (!allowMethods(req, ["GET"])) return methodNotAllowed(["GET"]);

  try {
    const actor = requireActor(req);
    const { limit } = parseOrThrow(QuerySchema, queryOf(req));
    const ctx = await getContext();
    return json(await listNotifications(ctx, actor, limit), 200);
  } catch (err) {
    return handleError(err, "GET /notifications");
  }
}
