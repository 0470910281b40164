/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Domain errors carry a string `code`; every domain code maps to a
 * status, anything else is a 500 with a generic message.
 */

import type { Context } from "hono";
import { ZodError } from "zod";
import { createErrorEnvelope } from "../types/error.js";
import type { DomainErrorCode } from "../types/error.js";
import { formatZodErrors } from "./validate.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

export type ErrorStatus = 400 | 403 | 404 | 409 | 422 | 500 | 502;

const STATUS_MAP: Readonly<Record<DomainErrorCode, ErrorStatus>> = {
  // Minting
  INVALID_REQUESTER: 400,
  INVALID_VOUCHER: 400,
  INVALID_SIGNATURE_FORMAT: 400,
  INSUFFICIENT_PAYMENT: 400,
  UNAUTHORIZED_SIGNER: 403,
  DUPLICATE_METADATA: 409,

  // Asset registry and authority
  DUPLICATE_ASSET_ID: 409,
  ASSET_NOT_FOUND: 404,
  ZERO_OWNER: 400,
  NOT_AUTHORITY: 403,

  // Equity: construction and input
  LENGTH_MISMATCH: 400,
  NO_PAYEES: 400,
  BAD_ADDRESS_COUNT: 400,
  ZERO_ADDRESS: 400,
  INVALID_ADDRESS: 400,
  INVALID_SHARES: 400,
  INVALID_GROUP_SIZE: 400,
  INVALID_AMOUNT: 400,
  BAD_PAYEE_INDEX: 400,

  // Equity: authorization
  CALLER_NOT_PAYEE: 403,
  SELF_ROTATION_FORBIDDEN: 403,
  CALLER_ADDRESS_DISABLED: 403,

  // Equity: state
  ALL_ADDRESSES_USED: 422,
  NOTHING_DUE: 422,
  TRANSFER_REJECTED: 502,
  DESTINATION_REFUSED: 502,

  // Rotation attestations
  INVALID_ATTESTATION: 400,
  ATTESTATION_SIGNER_MISMATCH: 403,
};

function errorCode(err: Error): string | undefined {
  return "code" in err && typeof err.code === "string" ? err.code : undefined;
}

function isDomainErrorCode(code: string): code is DomainErrorCode {
  return Object.hasOwn(STATUS_MAP, code);
}

export function statusFor(code: string | undefined): ErrorStatus {
  return code !== undefined && isDomainErrorCode(code) ? STATUS_MAP[code] : 500;
}

// =============================================================================
// Middleware
// =============================================================================

/**
 * Global error handler. Registered as Hono's onError handler.
 */
export function handleError(err: Error, c: Context): Response {
  if (err instanceof ZodError) {
    return c.json(
      createErrorEnvelope("VALIDATION_ERROR", "Request validation failed", {
        issues: formatZodErrors(err),
      }),
      400,
    );
  }

  const code = errorCode(err);

  // Don't leak internal details
  if (code === undefined || !isDomainErrorCode(code)) {
    return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
  }

  return c.json(createErrorEnvelope(code, err.message), STATUS_MAP[code]);
}
