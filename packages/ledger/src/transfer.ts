import type { AssetRef, LockId } from "@vestlock/types";

export type TransferResult = { ok: true } | { ok: false; reason: string };

/** Moves assets between an account and the ledger's custody. */
export interface AssetTransfer {
  transferIn(asset: AssetRef, from: string, amount: bigint): Promise<TransferResult>;
  transferOut(asset: AssetRef, to: string, amount: bigint): Promise<TransferResult>;
}

/** Who currently holds the position token for a lock. */
export interface OwnershipRegistry {
  ownerOf(id: LockId): Promise<string | undefined>;
}
