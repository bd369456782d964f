/**
 * @file src/server/app.ts
 * @description
 * Portable Express server that uses the /api route modules
 */

import express from "express";
import helmet from "helmet";
import cors from "cors";
import morgan from "morgan";
import rateLimit from "express-rate-limit";
import { getContext } from "../lib/context";
import { closeMongo } from "../lib/mongo";
import { sweepRejectedOrders } from "../services/reservationSweep";
import { envBool, envInt, rejectedHoldMs } from "../util/env";
import { errorMessage, log } from "../util/log";
import { expressWrap } from "./expressWrap";

import cartHandler from "../../api/buyer/cart";
import buyerOrdersHandler from "../../api/buyer/orders";
import buyerOrderHandler from "../../api/buyer/orders/[id]";
import buyerItemsHandler from "../../api/buyer/orders/[id]/items";
import submitHandler from "../../api/buyer/orders/[id]/submit";
import pharmacyOrdersHandler from "../../api/pharmacy/orders";
import reviewHandler from "../../api/pharmacy/orders/review";
import pharmacyOrderHandler from "../../api/pharmacy/orders/[id]";
import verifyHandler from "../../api/pharmacy/orders/[id]/verify";
import rejectHandler from "../../api/pharmacy/orders/[id]/reject";
import dispatchHandler from "../../api/pharmacy/orders/[id]/dispatch";
import deliveredHandler from "../../api/pharmacy/orders/[id]/delivered";
import receiptHandler from "../../api/pharmacy/orders/[id]/receipt";
import notificationsHandler from "../../api/notifications";
import markReadHandler from "../../api/notifications/mark-read";
import sweepHandler from "../../api/admin/reservations/sweep";
import healthHandler from "../../api/health";

import dotenv from "dotenv";
dotenv.config();

// Config
const PORT = envInt("PORT", 3000);
const ENABLE_RESERVATION_SWEEP = envBool("ENABLE_RESERVATION_SWEEP");
const RESERVATION_SWEEP_INTERVAL_MS = envInt("RESERVATION_SWEEP_INTERVAL_MS", 600_000);

// App & middleware
const app = express();
app.disable("x-powered-by");
app.use(helmet());
app.use(cors());
app.use(express.json({ limit: "1mb" }));
app.use(morgan("combined"));
app.use(rateLimit({ windowMs: 60_000, max: 120 }));

// Routes (wrapped)

// Buyer
app.post("/buyer/cart", expressWrap(cartHandler));
app.get("/buyer/orders", expressWrap(buyerOrdersHandler));
app.get("/buyer/orders/:id", expressWrap(buyerOrderHandler));
app.delete("/buyer/orders/:id", expressWrap(buyerOrderHandler));
app.patch("/buyer/orders/:id/items", expressWrap(buyerItemsHandler));
app.post("/buyer/orders/:id/submit", expressWrap(submitHandler));

// Pharmacy ("review" is registered before ":id")
app.get("/pharmacy/orders", expressWrap(pharmacyOrdersHandler));
app.get("/pharmacy/orders/review", expressWrap(reviewHandler));
app.get("/pharmacy/orders/:id", expressWrap(pharmacyOrderHandler));
app.post("/pharmacy/orders/:id/verify", expressWrap(verifyHandler));
app.post("/pharmacy/orders/:id/reject", expressWrap(rejectHandler));
app.post("/pharmacy/orders/:id/dispatch", expressWrap(dispatchHandler));
app.post("/pharmacy/orders/:id/delivered", expressWrap(deliveredHandler));
app.post("/pharmacy/orders/:id/receipt", expressWrap(receiptHandler));

// Notifications
app.get("/notifications", expressWrap(notificationsHandler));
app.post("/notifications/mark-read", expressWrap(markReadHandler));

// Operator
app.post("/admin/reservations/sweep", expressWrap(sweepHandler));

// GET /health
app.get("/health", expressWrap(healthHandler));

// Start server
const server = app.listen(PORT, () => {
  log({ evt: "server.listening", port: PORT });
});

// Periodic release of abandoned rejected orders
let sweepTimer: NodeJS.Timeout | null = null;
if (ENABLE_RESERVATION_SWEEP) {
  const tick = async () => {
    try {
      await sweepRejectedOrders(await getContext(), rejectedHoldMs());
    } catch (e) {
      log({ level: "error", evt: "sweep.cron_failed", error: errorMessage(e) });
    } finally {
      sweepTimer = setTimeout(() => void tick(), RESERVATION_SWEEP_INTERVAL_MS);
    }
  };
  sweepTimer = setTimeout(() => void tick(), RESERVATION_SWEEP_INTERVAL_MS);
}

// Graceful shutdown
function shutdown() {
  if (sweepTimer) clearTimeout(sweepTimer);
  server.close(() => {
    closeMongo()
      .catch((e: unknown) =>
        log({ level: "error", evt: "mongo.close_failed", error: errorMessage(e) })
      )
      .finally(() => process.exit(0));
  });
}
process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);
