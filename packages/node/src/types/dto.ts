/**
 * Request DTOs with Zod validation schemas.
 *
 * Each DTO has a Zod schema and a derived TypeScript type. Amounts and
 * asset IDs travel as decimal strings and come out as bigint.
 */

import { z } from "zod";
import type { Hex } from "@mintsplit/types";
import { AddressSchema } from "../config.js";

// =============================================================================
// Shared Schemas
// =============================================================================

export const UintStringSchema = z
  .string()
  .regex(/^\d+$/, "Expected a non-negative integer as a decimal string")
  .transform((value) => BigInt(value));

export const HexSchema = z.custom<Hex>(
  (value) => typeof value === "string" && /^0x[0-9a-fA-F]*$/.test(value),
  { message: "Expected 0x-prefixed hex" },
);

export const PayeeIndexParamSchema = z
  .string()
  .regex(/^\d+$/, "Expected a payee index")
  .transform((value) => Number(value));

export const PaginationQuerySchema = z.object({
  cursor: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

// =============================================================================
// Minting DTOs
// =============================================================================

export const VoucherSchema = z.object({
  assetId: UintStringSchema,
  minPrice: UintStringSchema,
  metadataUri: z.string(),
  signature: HexSchema,
});

export const RedeemVoucherSchema = z.object({
  requester: AddressSchema,
  payment: UintStringSchema,
  voucher: VoucherSchema,
});

export type RedeemVoucherDto = z.infer<typeof RedeemVoucherSchema>;

// =============================================================================
// Equity DTOs
// =============================================================================

export const DepositSchema = z.object({
  from: AddressSchema,
  amount: UintStringSchema.refine((value) => value > 0n, {
    message: "Amount must be positive",
  }),
});

export type DepositDto = z.infer<typeof DepositSchema>;

export const RotateSchema = z.object({
  caller: AddressSchema,
  signature: HexSchema,
});

export type RotateDto = z.infer<typeof RotateSchema>;

// =============================================================================
// Event DTOs
// =============================================================================

export const ListEventsQuerySchema = PaginationQuerySchema.extend({
  afterPosition: z.coerce.number().int().min(0).optional(),
  type: z.string().min(1).optional(),
});

export type ListEventsQuery = z.infer<typeof ListEventsQuerySchema>;

export const ListStreamEventsQuerySchema = PaginationQuerySchema.extend({
  afterVersion: z.coerce.number().int().min(0).optional(),
});

export type ListStreamEventsQuery = z.infer<typeof ListStreamEventsQuerySchema>;
