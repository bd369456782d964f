/**
 * @file api/pharmacy/orders.ts
 * @description
 * HTTP handler for `GET /pharmacy/orders`
 */

import { getContext } from "../../src/lib/context";
import { listPharmacyOrders } from "../../src/services/orderQueries";
import { allowMethods, handleError, json, methodNotAllowed, queryOf, requireActor } from "../_util";

export const config = { runtime: "nodejs" };

/**
 * Route handler for `GET /pharmacy/orders?orderStatus=&paymentStatus=`
 */
export default async function handler(req: Request): Promise<Response> {
  if (!allowMethods(req, ["GET"])) return methodNotAllowed(["GET"]);

  try {
    const actor = requireActor(req);
    const ctx = await getContext();
    return json({ orders: await listPharmacyOrders(ctx, actor, queryOf(req)) }, 200);
  } catch (err) {
    return handleError(err, "GET /pharmacy/orders");
  }
}
