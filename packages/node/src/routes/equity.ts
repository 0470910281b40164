/**
 * Equity routes.
 *
 * GET  /api/v1/equity                        — Totals and every payee
 * GET  /api/v1/equity/payees/:index          — One payee
 * POST /api/v1/equity/deposits               — Record incoming funds
 * POST /api/v1/equity/payees/:index/release  — Pay what the payee is owed
 * POST /api/v1/equity/payees/:index/rotate   — Enable the payee's next address
 * GET  /api/v1/equity/payouts/:address       — Total paid out to an address
 */

import { Hono } from "hono";
import type { Context } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { AddressSchema } from "../config.js";
import { DepositSchema, PayeeIndexParamSchema, RotateSchema } from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";
import {
  toEquityView,
  toPayeeView,
  toReceiptView,
  toReleaseView,
  toRotationView,
} from "../types/views.js";
import { validateBody } from "../middleware/validate.js";

function payeeIndexParam(c: Context): number | undefined {
  const parsed = PayeeIndexParamSchema.safeParse(c.req.param("index"));
  return parsed.success ? parsed.data : undefined;
}

const INVALID_INDEX = createErrorEnvelope("VALIDATION_ERROR", "Invalid payee index");

export function createEquityRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", async (c) => {
    const snapshot = await c.get("service").equitySnapshot();
    return c.json({ data: toEquityView(snapshot) });
  });

  routes.get("/payees/:index", async (c) => {
    const index = payeeIndexParam(c);
    if (index === undefined) return c.json(INVALID_INDEX, 400);

    const payee = await c.get("service").getPayee(index);
    if (payee === undefined) {
      return c.json(createErrorEnvelope("NOT_FOUND", `Payee ${String(index)} not found`), 404);
    }
    return c.json({ data: toPayeeView(payee) });
  });

  routes.post("/deposits", validateBody(DepositSchema), (c) => {
    const body = c.get("validatedBody");
    const receipt = c.get("service").deposit(body.from, body.amount);
    return c.json({ data: toReceiptView(receipt) }, 201);
  });

  routes.post("/payees/:index/release", async (c) => {
    const index = payeeIndexParam(c);
    if (index === undefined) return c.json(INVALID_INDEX, 400);

    const result = await c.get("service").release(index);
    return c.json({ data: toReleaseView(result) });
  });

  routes.post("/payees/:index/rotate", validateBody(RotateSchema), async (c) => {
    const index = payeeIndexParam(c);
    if (index === undefined) return c.json(INVALID_INDEX, 400);

    const body = c.get("validatedBody");
    const result = await c.get("service").rotate(index, body.caller, body.signature);
    return c.json({ data: toRotationView(result) });
  });

  routes.get("/payouts/:address", (c) => {
    const parsed = AddressSchema.safeParse(c.req.param("address"));
    if (!parsed.success) {
      return c.json(createErrorEnvelope("VALIDATION_ERROR", "Invalid address"), 400);
    }
    return c.json({
      data: {
        address: parsed.data,
        total: c.get("service").payoutsTo(parsed.data).toString(),
      },
    });
  });

  return routes;
}
