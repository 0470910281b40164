/**
 * VoucherSigner — produce vouchers under the issuer's key.
 *
 * Signs with EIP-712 (eth_signTypedData_v4) over the same domain and
 * types that the verifier hashes.
 */

import { privateKeyToAccount } from "viem/accounts";
import type { PrivateKeyAccount } from "viem/accounts";
import type { Address, Hex } from "@mintsplit/types";
import type { SigningDomain, Voucher, VoucherPayload } from "./types.js";
import { VOUCHER_PRIMARY_TYPE, VOUCHER_TYPES, voucherMessage } from "./typed-data.js";

export class VoucherSigner {
  private readonly account: PrivateKeyAccount;
  private readonly domain: SigningDomain;

  constructor(privateKey: Hex, domain: SigningDomain) {
    this.account = privateKeyToAccount(privateKey);
    this.domain = domain;
  }

  get address(): Address {
    return this.account.address;
  }

  async sign(payload: VoucherPayload): Promise<Voucher> {
    const signature = await this.account.signTypedData({
      domain: this.domain,
      types: VOUCHER_TYPES,
      primaryType: VOUCHER_PRIMARY_TYPE,
      message: voucherMessage(payload),
    });
    return { ...payload, signature };
  }

  /** Sign a batch, preserving order. */
  async signAll(payloads: readonly VoucherPayload[]): Promise<readonly Voucher[]> {
    const vouchers: Voucher[] = [];
    for (const payload of payloads) {
      vouchers.push(await this.sign(payload));
    }
    return vouchers;
  }
}
