/**
 * VoucherLedger — the set of metadata hashes already redeemed.
 *
 * Entries are only ever added. A hash, once marked, blocks every later
 * redemption of the same metadata URI, whatever asset ID it names.
 * MintAuthority checks and marks inside one critical section.
 */

import type { Hex } from "@mintsplit/types";
import { MintError } from "./types.js";

export class VoucherLedger {
  private readonly _used: Map<string, string> = new Map();

  isUsed(hash: Hex): boolean {
    return this._used.has(hash.toLowerCase());
  }

  /**
   * @throws MintError DUPLICATE_METADATA
   */
  assertUnused(hash: Hex): void {
    if (this.isUsed(hash)) {
      throw new MintError(
        "DUPLICATE_METADATA",
        `Metadata already redeemed (hash ${hash})`,
      );
    }
  }

  /**
   * Record a hash as redeemed.
   *
   * @throws MintError DUPLICATE_METADATA if it already was
   */
  markUsed(hash: Hex, redeemedAt: string = new Date().toISOString()): void {
    this.assertUnused(hash);
    this._used.set(hash.toLowerCase(), redeemedAt);
  }

  get size(): number {
    return this._used.size;
  }

  /** Redeemed hashes with the time they were marked, in insertion order. */
  entries(): readonly { readonly hash: string; readonly redeemedAt: string }[] {
    return [...this._used].map(([hash, redeemedAt]) => ({ hash, redeemedAt }));
  }
}
