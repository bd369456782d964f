/**
 * @file api/admin/reservations/sweep.ts
 * @description
 * HTTP handler for `POST /admin/reservations/sweep`. Operator-triggered release
 * of stock held by abandoned rejected orders.
 */

import { z } from "zod";
import { parseOrThrow } from "../../../src/domain/errors";
import { getContext } from "../../../src/lib/context";
import { sweepRejectedOrders } from "../../../src/services/reservationSweep";
import { rejectedHoldMs } from "../../../src/util/env";
import { allowMethods, handleError, json, methodNotAllowed, queryOf, requireKey } from "../../_util";

export const config = { runtime: "nodejs" };

const QuerySchema = z.object({
  holdMs: z.coerce.number().int().min(0).optional(),
});

/**
 * Route handler for `POST /admin/reservations/sweep?holdMs=`; `holdMs`
 * overrides REJECTED_HOLD_MS for this run.
 */
export default async function handler(req: Request): Promise<Response> {
  if (!allowMethods(req, ["POST"])) return methodNotAllowed(["POST"]);

  const unauth = requireKey(req);
  if (unauth) return unauth;

  try {
    const { holdMs } = parseOrThrow(QuerySchema, queryOf(req));
    const ctx = await getContext();
    return json(await sweepRejectedOrders(ctx, holdMs ?? rejectedHoldMs()), 200);
  } catch (err) {
    return handleError(err, "POST /admin/reservations/sweep");
  }
}
