/**
 * Rotation attestations — proof that an HTTP caller controls the payee
 * address it names.
 *
 * The caller signs `AddressRotation { payeeIndex, enabledIndex }` under
 * the equity signing domain, binding the target's current enabled index.
 * Once the rotation happens the index moves on and the same signature
 * no longer matches.
 */

import { getAddress, isAddressEqual, recoverTypedDataAddress } from "viem";
import type { Address, Hex } from "@mintsplit/types";
import type { SigningDomain } from "@mintsplit/minting";

export const ROTATION_PRIMARY_TYPE = "AddressRotation";

export const ROTATION_TYPES = {
  AddressRotation: [
    { name: "payeeIndex", type: "uint256" },
    { name: "enabledIndex", type: "uint256" },
  ],
} as const;

export type AttestationErrorCode = "INVALID_ATTESTATION" | "ATTESTATION_SIGNER_MISMATCH";

export class AttestationError extends Error {
  public readonly code: AttestationErrorCode;
  constructor(code: AttestationErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "AttestationError";
    this.code = code;
  }
}

export interface RotationClaim {
  readonly payeeIndex: number;
  readonly enabledIndex: number;
}

export function rotationMessage(claim: RotationClaim): {
  payeeIndex: bigint;
  enabledIndex: bigint;
} {
  return {
    payeeIndex: BigInt(claim.payeeIndex),
    enabledIndex: BigInt(claim.enabledIndex),
  };
}

/**
 * Check that `signature` over `claim` was made by `caller`.
 *
 * @throws AttestationError INVALID_ATTESTATION | ATTESTATION_SIGNER_MISMATCH
 */
export async function verifyRotationAttestation(
  domain: SigningDomain,
  claim: RotationClaim,
  caller: Address,
  signature: Hex,
): Promise<void> {
  let signer: Address;
  try {
    signer = await recoverTypedDataAddress({
      domain,
      types: ROTATION_TYPES,
      primaryType: ROTATION_PRIMARY_TYPE,
      message: rotationMessage(claim),
      signature,
    });
  } catch (err) {
    throw new AttestationError("INVALID_ATTESTATION", "Rotation signature could not be recovered", {
      cause: err,
    });
  }

  if (!isAddressEqual(signer, caller)) {
    throw new AttestationError(
      "ATTESTATION_SIGNER_MISMATCH",
      `Rotation was signed by ${getAddress(signer)}, not ${getAddress(caller)}`,
    );
  }
}
