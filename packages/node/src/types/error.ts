/**
 * Error envelope for API responses:
 * { error: { code, message, details? } }
 *
 * `code` is either one of the HTTP layer's own codes or the `code` of the
 * domain error that was thrown, passed through unchanged.
 */

import type {
  AssetRegistryErrorCode,
  AuthorityErrorCode,
  MintErrorCode,
} from "@mintsplit/minting";
import type { EquityErrorCode, PayoutTransportErrorCode } from "@mintsplit/equity";
import type { AttestationErrorCode } from "../services/rotation-attestation.js";

// =============================================================================
// Error Codes
// =============================================================================

export type ApiErrorCode = "VALIDATION_ERROR" | "NOT_FOUND" | "INTERNAL_ERROR";

export type DomainErrorCode =
  | MintErrorCode
  | AssetRegistryErrorCode
  | AuthorityErrorCode
  | EquityErrorCode
  | PayoutTransportErrorCode
  | AttestationErrorCode;

export type ErrorCode = ApiErrorCode | DomainErrorCode;

// =============================================================================
// Envelope
// =============================================================================

export interface ErrorDetail {
  readonly code: ErrorCode;
  readonly message: string;
  readonly details?: Record<string, unknown>;
}

export interface ErrorEnvelope {
  readonly error: ErrorDetail;
}

export function createErrorEnvelope(
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>,
): ErrorEnvelope {
  return { error: details === undefined ? { code, message } : { code, message, details } };
}
