/**
 * @file api/notifications/mark-read.ts
 * @description
 * HTTP handler for `POST /notifications/mark-read`
 */

import { parseOrThrow } from "../../src/domain/errors";
import { MarkReadSchema } from "../../src/domain/types";
import { getContext } from "../../src/lib/context";
import { markNotificationsRead } from "../../src/services/notificationService";
import {
  allowMethods,
  error,
  handleError,
  json,
  methodNotAllowed,
  parseJson,
  requireActor,
} from "../_util";

export const config = { runtime: "nodejs" };

/**
 * Route handler for `POST /notifications/mark-read` with `{ ids? }`; omitting
 * `ids` marks everything read.
 */
export default async function handler(req: Request): Promise<Response> {
  if (!allowMethods(req, ["POST"])) return methodNotAllowed(["POST"]);

  try {
    const actor = requireActor(req);
    const body = await parseJson(req);
    if (body == null) return error("Invalid JSON", 400);
    const { ids } = parseOrThrow(MarkReadSchema, body);

    const ctx = await getContext();
    return json({ updated: await markNotificationsRead(ctx, actor, ids) }, 200);
  } catch (err) {
    return handleError(err, "POST /notifications/mark-read");
  }
}
