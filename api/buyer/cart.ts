/**
 * @file api/buyer/cart.ts
 * @description
 * HTTP handler for `POST /buyer/cart`
 */

import { getContext } from "../../src/lib/context";
import { addToCart } from "../../src/services/cartService";
import { toDetail } from "../../src/services/orderQueries";
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
 * Route handler for `POST /buyer/cart`. Responds 201 when a new cart was
 * opened and 200 when the item was merged into the open order.
 */
export default async function handler(req: Request): Promise<Response> {
  if (!allowMethods(req, ["POST"])) return methodNotAllowed(["POST"]);

  try {
    const actor = requireActor(req);
    const body = await parseJson(req);
    if (body == null) return error("Invalid JSON", 400);

    const ctx = await getContext();
    const { order, merged } = await addToCart(ctx, actor, body);
    return json({ merged, order: toDetail(order) }, merged ? 200 : 201);
  } catch (err) {
    return handleError(err, "POST /buyer/cart");
  }
}
