/**
 * Response shapes. Bigints become decimal strings.
 */

import type { Redemption, SigningDomain } from "@mintsplit/minting";
import type {
  EquitySnapshot,
  FundsReceipt,
  PayeeSnapshot,
  ReleaseResult,
  RotationResult,
} from "@mintsplit/equity";
import type { AssetView } from "../services/mintsplit-service.js";

export function toDomainView(domain: SigningDomain) {
  return {
    name: domain.name,
    version: domain.version,
    chainId: domain.chainId,
    verifyingContract: domain.verifyingContract,
  };
}

export function toRedemptionView(redemption: Redemption) {
  return {
    assetId: redemption.assetId.toString(),
    owner: redemption.owner,
    signer: redemption.signer,
    metadataUri: redemption.metadataUri,
    metadataHash: redemption.metadataHash,
    payment: redemption.payment.toString(),
    redeemedAt: redemption.redeemedAt,
  };
}

export function toAssetView(asset: AssetView) {
  return {
    assetId: asset.assetId.toString(),
    owner: asset.owner,
    metadataUri: asset.metadataUri ?? null,
    tokenUri: asset.tokenUri,
    issuedAt: asset.issuedAt,
  };
}

export function toPayeeView(payee: PayeeSnapshot) {
  return {
    index: payee.index,
    addresses: payee.addresses,
    shares: payee.shares.toString(),
    released: payee.released.toString(),
    releasable: payee.releasable.toString(),
    enabledIndex: payee.enabledIndex,
    enabledAddress: payee.enabledAddress,
  };
}

export function toEquityView(snapshot: EquitySnapshot) {
  return {
    groupSize: snapshot.groupSize,
    payeeCount: snapshot.payeeCount,
    totalShares: snapshot.totalShares.toString(),
    totalReleased: snapshot.totalReleased.toString(),
    totalReceived: snapshot.totalReceived.toString(),
    balance: snapshot.balance.toString(),
    payees: snapshot.payees.map(toPayeeView),
  };
}

export function toReceiptView(receipt: FundsReceipt) {
  return {
    from: receipt.from,
    amount: receipt.amount.toString(),
    balance: receipt.balance.toString(),
    receivedAt: receipt.receivedAt,
  };
}

export function toReleaseView(result: ReleaseResult) {
  return {
    payeeIndex: result.payeeIndex,
    to: result.to,
    amount: result.amount.toString(),
  };
}

export function toRotationView(result: RotationResult) {
  return {
    payeeIndex: result.payeeIndex,
    enabledIndex: result.enabledIndex,
    enabledAddress: result.enabledAddress,
  };
}
