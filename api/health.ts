/**
 * @file api/health.ts
 * @description
 * Health check endpoint for the order core
 */

import { getContext } from "../src/lib/context";
import { isMongoHealthy } from "../src/lib/mongo";
import { buildHealthReport } from "../src/util/log";
import { json, error, allowMethods, methodNotAllowed, handleError } from "./_util";

/**
 * Route handler for `GET /health`
 */
export default async function handler(req: Request): Promise<Response> {
  if (!allowMethods(req, ["GET"])) return methodNotAllowed(["GET"]);

  try {
    const dbConnected = await isMongoHealthy();
    if (!dbConnected) return error("Database connection failed", 500);

    const ctx = await getContext();
    const [openOrders, awaitingReview] = await Promise.all([
      ctx.orders.count({ orderStatus: ["cart", "pending"], paymentStatus: ["unpaid", "rejected"] }),
      ctx.orders.count({ orderStatus: ["pending"], paymentStatus: ["proof_uploaded"] }),
    ]);

    return json(buildHealthReport({ dbConnected, openOrders, awaitingReview }), 200);
  } catch (err) {
    return handleError(err, "GET /health");
  }
}
