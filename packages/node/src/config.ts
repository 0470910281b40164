/**
 * @mintsplit/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 * The payee table lives in a JSON file named by EQUITY_CONFIG_PATH.
 */

import { readFileSync } from "node:fs";
import { getAddress, isAddress } from "viem";
import { z } from "zod";
import type { Address } from "@mintsplit/types";

// =============================================================================
// Shared Schemas
// =============================================================================

export const AddressSchema = z
  .custom<Address>(
    (value) => typeof value === "string" && isAddress(value, { strict: false }),
    { message: "Expected a 20-byte hex address" },
  )
  .transform((value) => getAddress(value));

// =============================================================================
// Environment
// =============================================================================

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Voucher signing domain
  MINT_NAME: z.string().min(1).default("Mintsplit Lazy Minting"),
  MINT_VERSION: z.string().min(1).default("1"),
  CHAIN_ID: z.coerce.number().int().min(1).default(31337),
  MINT_CONTRACT_ADDRESS: AddressSchema,
  MINT_AUTHORITY_ADDRESS: AddressSchema,
  BASE_TOKEN_URI: z.string().default(""),

  // Equity
  EQUITY_NAME: z.string().min(1).default("Mintsplit Equity"),
  EQUITY_CONTRACT_ADDRESS: AddressSchema,
  EQUITY_CONFIG_PATH: z.string().min(1),
  EQUITY_GROUP_SIZE: z.coerce.number().int().min(2).default(3),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if required env vars are missing or invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}

// =============================================================================
// Payee table
// =============================================================================

const SharesSchema = z
  .union([
    z.string().regex(/^\d+$/, "Expected an integer string"),
    z
      .number()
      .int()
      .refine((value) => Number.isSafeInteger(value), {
        message: "Numeric shares must be a safe integer; use a string for larger values",
      }),
  ])
  .transform((value) => BigInt(value))
  .refine((value) => value > 0n, { message: "Shares must be positive" });

export const EquityFileSchema = z.object({
  payees: z
    .array(
      z.object({
        addresses: z.array(AddressSchema).min(1),
        shares: SharesSchema,
      }),
    )
    .min(1),
});

export type EquityFile = z.infer<typeof EquityFileSchema>;

/**
 * Parse a payee table from its JSON text.
 *
 * @throws {Error} on malformed JSON
 * @throws {z.ZodError} on a table that does not match the schema
 */
export function parseEquityFile(text: string): EquityFile {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new Error("Equity config is not valid JSON", { cause: err });
  }
  return EquityFileSchema.parse(raw);
}

/**
 * Read and parse the payee table at `path`.
 */
export function loadEquityFile(path: string): EquityFile {
  return parseEquityFile(readFileSync(path, "utf-8"));
}
