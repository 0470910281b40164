/**
 * Asset registry collaborator.
 *
 * MintAuthority issues assets through this interface and relies on
 * `issue` rejecting an asset ID that already exists. Ownership transfer
 * is outside this system.
 */

import { getAddress, isAddressEqual } from "viem";
import { ZERO_ADDRESS } from "@mintsplit/types";
import type { Address } from "@mintsplit/types";

// =============================================================================
// Error
// =============================================================================

export type AssetRegistryErrorCode =
  | "DUPLICATE_ASSET_ID"
  | "ASSET_NOT_FOUND"
  | "ZERO_OWNER";

export class AssetRegistryError extends Error {
  public readonly code: AssetRegistryErrorCode;
  constructor(code: AssetRegistryErrorCode, message: string) {
    super(message);
    this.name = "AssetRegistryError";
    this.code = code;
  }
}

// =============================================================================
// Interface
// =============================================================================

export interface AssetRecord {
  readonly assetId: bigint;
  readonly owner: Address;
  readonly metadataUri?: string;
  readonly issuedAt: string;
}

export interface AssetRegistry {
  /**
   * Create `assetId` owned by `owner`.
   *
   * @throws AssetRegistryError DUPLICATE_ASSET_ID if it already exists
   */
  issue(owner: Address, assetId: bigint): void;

  /**
   * Attach a metadata URI to an existing asset. Must not fail for an asset
   * issued earlier in the same operation.
   */
  bindMetadata(assetId: bigint, metadataUri: string): void;

  ownerOf(assetId: bigint): Address | undefined;

  metadataOf(assetId: bigint): string | undefined;

  balanceOf(owner: Address): number;
}

// =============================================================================
// In-memory implementation
// =============================================================================

export interface InMemoryAssetRegistryOptions {
  /** Prefix joined to every bound metadata URI by `tokenUri()`. */
  readonly baseUri?: string;
}

export class InMemoryAssetRegistry implements AssetRegistry {
  private readonly _assets: Map<bigint, AssetRecord> = new Map();
  private readonly _balances: Map<string, number> = new Map();
  private readonly _baseUri: string;

  constructor(options: InMemoryAssetRegistryOptions = {}) {
    this._baseUri = options.baseUri ?? "";
  }

  issue(owner: Address, assetId: bigint): void {
    if (isAddressEqual(owner, ZERO_ADDRESS)) {
      throw new AssetRegistryError("ZERO_OWNER", "Cannot issue to the zero address");
    }
    if (this._assets.has(assetId)) {
      throw new AssetRegistryError(
        "DUPLICATE_ASSET_ID",
        `Asset ${assetId.toString()} already issued`,
      );
    }

    const normalized = getAddress(owner);
    this._assets.set(assetId, {
      assetId,
      owner: normalized,
      issuedAt: new Date().toISOString(),
    });
    const key = normalized.toLowerCase();
    this._balances.set(key, (this._balances.get(key) ?? 0) + 1);
  }

  bindMetadata(assetId: bigint, metadataUri: string): void {
    const record = this.requireAsset(assetId);
    this._assets.set(assetId, { ...record, metadataUri });
  }

  ownerOf(assetId: bigint): Address | undefined {
    return this._assets.get(assetId)?.owner;
  }

  metadataOf(assetId: bigint): string | undefined {
    return this._assets.get(assetId)?.metadataUri;
  }

  balanceOf(owner: Address): number {
    return this._balances.get(owner.toLowerCase()) ?? 0;
  }

  getAsset(assetId: bigint): AssetRecord | undefined {
    return this._assets.get(assetId);
  }

  /**
   * Resolved metadata location: the bound URI, prefixed by the base URI
   * when both are set.
   */
  tokenUri(assetId: bigint): string {
    const record = this.requireAsset(assetId);
    const uri = record.metadataUri ?? "";
    if (this._baseUri === "") return uri;
    return uri === "" ? "" : `${this._baseUri}${uri}`;
  }

  get size(): number {
    return this._assets.size;
  }

  private requireAsset(assetId: bigint): AssetRecord {
    const record = this._assets.get(assetId);
    if (!record) {
      throw new AssetRegistryError(
        "ASSET_NOT_FOUND",
        `Asset ${assetId.toString()} not found`,
      );
    }
    return record;
  }
}
