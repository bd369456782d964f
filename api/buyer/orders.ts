/**
 * @file api/buyer/orders.ts
 * @description
 * HTTP handler for `GET /buyer/orders`
 */

import { getContext } from "../../src/lib/context";
import { listBuyerOrders } from "../../src/services/orderQueries";
import { allowMethods, handleError, json, methodNotAllowed, queryOf, requireActor } from "../_util";

export const config = { runtime: "nodejs" };

/**
 * Route handler for `GET /buyer/orders?status=&q=&sort=`
 */
export default async function handler(req: Request): Promise<Response> {
  if (!allowMethods(req, ["GET"])) return methodNotAllowed(["GET"]);

  try {
    const actor = requireActor(req);
    const ctx = await getContext();
    const orders = await listBuyerOrders(ctx, actor, queryOf(req));
    return json({ orders }, 200);
  } catch (err) {
    return handleError(err, "GET /buyer/orders");
  }
}
