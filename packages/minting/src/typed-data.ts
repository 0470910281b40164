/**
 * SignatureVerifier — EIP-712 typed-data digest and signer recovery.
 *
 * The struct is named `NFTVoucher` with fields `tokenId`, `minPriceWei`
 * and `metadataURI`; vouchers signed by existing tooling verify as-is.
 *
 * All functions are pure.
 */

import {
  getAddress,
  hashTypedData,
  keccak256,
  recoverTypedDataAddress,
  stringToBytes,
} from "viem";
import type { Address, Hex } from "@mintsplit/types";
import type { SigningDomain, Voucher, VoucherPayload } from "./types.js";
import { MintError } from "./types.js";

export const VOUCHER_PRIMARY_TYPE = "NFTVoucher";

export const VOUCHER_TYPES = {
  NFTVoucher: [
    { name: "tokenId", type: "uint256" },
    { name: "minPriceWei", type: "uint256" },
    { name: "metadataURI", type: "string" },
  ],
} as const;

const SIGNATURE_PATTERN = /^0x[0-9a-fA-F]{130}$/;
const RECOVERY_BYTES = new Set([0, 1, 27, 28]);
const UINT256_MAX = 2n ** 256n - 1n;
/** Half the secp256k1 group order; canonical signatures have s at or below it. */
const SECP256K1_N_HALF = 0x7fffffffffffffffffffffffffffffff5d576e7357a4501ddfe92f46681b20a0n;

/** The typed message as it is hashed. */
export function voucherMessage(payload: VoucherPayload): {
  tokenId: bigint;
  minPriceWei: bigint;
  metadataURI: string;
} {
  return {
    tokenId: payload.assetId,
    minPriceWei: payload.minPrice,
    metadataURI: payload.metadataUri,
  };
}

/** True when both integers fit the signed uint256 fields. */
export function isEncodableVoucher(payload: VoucherPayload): boolean {
  return (
    payload.assetId >= 0n &&
    payload.assetId <= UINT256_MAX &&
    payload.minPrice >= 0n &&
    payload.minPrice <= UINT256_MAX
  );
}

/**
 * Domain-separated digest of a voucher's signed fields.
 */
export function voucherDigest(domain: SigningDomain, payload: VoucherPayload): Hex {
  return hashTypedData({
    domain,
    types: VOUCHER_TYPES,
    primaryType: VOUCHER_PRIMARY_TYPE,
    message: voucherMessage(payload),
  });
}

/**
 * Check the signature's shape: 65 bytes, a recognised recovery byte and a
 * low `s`. The high-`s` twin of a valid signature recovers to the same
 * signer and is rejected.
 *
 * @throws MintError INVALID_SIGNATURE_FORMAT
 */
export function assertSignatureFormat(signature: string): asserts signature is Hex {
  if (!SIGNATURE_PATTERN.test(signature)) {
    throw new MintError(
      "INVALID_SIGNATURE_FORMAT",
      `Invalid signature length: expected 65 bytes, got ${describeLength(signature)}`,
    );
  }
  const v = Number.parseInt(signature.slice(130, 132), 16);
  if (!RECOVERY_BYTES.has(v)) {
    throw new MintError(
      "INVALID_SIGNATURE_FORMAT",
      `Invalid signature recovery byte: ${String(v)}`,
    );
  }
  const sValue = BigInt(`0x${signature.slice(66, 130)}`);
  if (sValue > SECP256K1_N_HALF) {
    throw new MintError("INVALID_SIGNATURE_FORMAT", "Invalid signature 's' value");
  }
}

/**
 * Recover the address that signed `voucher` under `domain`.
 *
 * A signature that cannot be recovered at all is reported as
 * INVALID_SIGNATURE_FORMAT; a well-formed signature by the wrong key
 * recovers to some other address and is the caller's to reject.
 */
export async function recoverVoucherSigner(
  domain: SigningDomain,
  voucher: Voucher,
): Promise<Address> {
  assertSignatureFormat(voucher.signature);

  try {
    const signer = await recoverTypedDataAddress({
      domain,
      types: VOUCHER_TYPES,
      primaryType: VOUCHER_PRIMARY_TYPE,
      message: voucherMessage(voucher),
      signature: voucher.signature,
    });
    return getAddress(signer);
  } catch (err) {
    throw new MintError(
      "INVALID_SIGNATURE_FORMAT",
      "Signature could not be recovered",
      { cause: err },
    );
  }
}

/**
 * keccak-256 of the metadata URI's UTF-8 bytes. Redemption records are
 * keyed by this hash.
 */
export function metadataHash(metadataUri: string): Hex {
  return keccak256(stringToBytes(metadataUri));
}

function describeLength(signature: string): string {
  if (!/^0x[0-9a-fA-F]*$/.test(signature) || signature.length % 2 !== 0) {
    return "malformed hex";
  }
  return `${String((signature.length - 2) / 2)} bytes`;
}
