/**
 * Authority collaborator — who may sign vouchers.
 */

import { getAddress, isAddress, isAddressEqual } from "viem";
import { ZERO_ADDRESS } from "@mintsplit/types";
import type { Address } from "@mintsplit/types";

export interface AuthoritySource {
  /** The only address whose voucher signatures are honoured. */
  designatedAuthority(): Address;
}

export type AuthorityErrorCode = "NOT_AUTHORITY" | "ZERO_ADDRESS";

export class AuthorityError extends Error {
  public readonly code: AuthorityErrorCode;
  constructor(code: AuthorityErrorCode, message: string) {
    super(message);
    this.name = "AuthorityError";
    this.code = code;
  }
}

/**
 * An authority set at deployment, transferable only by its current holder.
 */
export class FixedAuthority implements AuthoritySource {
  private _authority: Address;

  constructor(authority: Address) {
    this._authority = FixedAuthority.validate(authority);
  }

  designatedAuthority(): Address {
    return this._authority;
  }

  /**
   * Hand over signing rights to `next`.
   *
   * @throws AuthorityError NOT_AUTHORITY if `caller` is not the current authority
   */
  transfer(caller: Address, next: Address): Address {
    if (!isAddress(caller, { strict: false }) || !isAddressEqual(caller, this._authority)) {
      throw new AuthorityError("NOT_AUTHORITY", "Caller is not the designated authority");
    }
    this._authority = FixedAuthority.validate(next);
    return this._authority;
  }

  private static validate(address: string): Address {
    if (!isAddress(address, { strict: false }) || isAddressEqual(address, ZERO_ADDRESS)) {
      throw new AuthorityError("ZERO_ADDRESS", `Invalid authority address: "${address}"`);
    }
    return getAddress(address);
  }
}
