/**
 * @file api/pharmacy/orders/review.ts
 * @description
 * HTTP handler for `GET /pharmacy/orders/review`
 */

import { getContext } from "../../../src/lib/context";
import { reviewQueue } from "../../../src/services/orderQueries";
import { allowMethods, handleError, json, methodNotAllowed, requireActor } from "../../_util";

export const config = { runtime: "nodejs" };

export default async function handler(req: Request): Promise<Response> {
  if (!allowMethods(req, ["GET"])) return methodNotAllowed(["GET"]);

  try {
    const actor = requireActor(req);
    const ctx = await getContext();
    return json({ orders: await reviewQueue(ctx, actor) }, 200);
  } catch (err) {
    return handleError(err, "GET /pharmacy/orders/review");
  }
}
