/**
 * @mintsplit/minting — Voucher redemption.
 *
 * Provides:
 * - EIP-712 voucher digest and signer recovery
 * - VoucherLedger, the replay guard keyed by metadata hash
 * - MintAuthority, the redemption state machine
 * - Asset registry and authority collaborators (in-memory)
 * - VoucherSigner for issuing vouchers with a local key
 *
 * @packageDocumentation
 */

// Types
export type {
  SigningDomain,
  VoucherPayload,
  Voucher,
  Redemption,
  MintErrorCode,
} from "./types.js";
export { MintError } from "./types.js";

// Signature verification
export {
  VOUCHER_PRIMARY_TYPE,
  VOUCHER_TYPES,
  voucherMessage,
  voucherDigest,
  isEncodableVoucher,
  assertSignatureFormat,
  recoverVoucherSigner,
  metadataHash,
} from "./typed-data.js";

// Replay guard
export { VoucherLedger } from "./voucher-ledger.js";

// Collaborators
export type {
  AssetRecord,
  AssetRegistry,
  AssetRegistryErrorCode,
  InMemoryAssetRegistryOptions,
} from "./asset-registry.js";
export { AssetRegistryError, InMemoryAssetRegistry } from "./asset-registry.js";
export type { AuthoritySource, AuthorityErrorCode } from "./authority.js";
export { AuthorityError, FixedAuthority } from "./authority.js";

// Redemption
export type { ProceedsSink, MintAuthorityOptions } from "./mint-authority.js";
export { MintAuthority } from "./mint-authority.js";

// Signing
export { VoucherSigner } from "./voucher-signer.js";
