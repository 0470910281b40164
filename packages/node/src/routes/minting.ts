/**
 * Voucher redemption routes.
 *
 * GET  /api/v1/minting/domain           — Signing domain and authority
 * POST /api/v1/minting/redemptions      — Redeem a signed voucher
 * GET  /api/v1/minting/assets/:assetId  — Issued asset
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { RedeemVoucherSchema, UintStringSchema } from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";
import { toAssetView, toDomainView, toRedemptionView } from "../types/views.js";
import { validateBody } from "../middleware/validate.js";

export function createMintingRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/domain", (c) => {
    const service = c.get("service");
    return c.json({
      domain: toDomainView(service.mintDomain()),
      authority: service.mint.designatedAuthority(),
      redemptions: service.mint.redemptionCount,
    });
  });

  routes.post("/redemptions", validateBody(RedeemVoucherSchema), async (c) => {
    const service = c.get("service");
    const body = c.get("validatedBody");

    const redemption = await service.redeem(body.requester, body.voucher, body.payment);
    return c.json({ data: toRedemptionView(redemption) }, 201);
  });

  routes.get("/assets/:assetId", (c) => {
    const service = c.get("service");
    const parsed = UintStringSchema.safeParse(c.req.param("assetId"));
    if (!parsed.success) {
      return c.json(createErrorEnvelope("VALIDATION_ERROR", "Invalid asset ID"), 400);
    }

    const asset = service.getAsset(parsed.data);
    if (asset === undefined) {
      return c.json(
        createErrorEnvelope("NOT_FOUND", `Asset ${parsed.data.toString()} not found`),
        404,
      );
    }
    return c.json({ data: toAssetView(asset) });
  });

  return routes;
}
