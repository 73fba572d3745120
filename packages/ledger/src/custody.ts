import type { AssetRef, LockId } from "@vestlock/types";
import { TransferFailedError, type TransferDirection } from "./errors";
import type { AssetTransfer, TransferResult } from "./transfer";

/** Custody that could not be released after its record was gone. */
export interface PendingRelease {
  id: LockId;
  asset: AssetRef;
  to: string;
  amount: bigint;
  reason: string;
  failedAt: bigint;
}

/**
 * Run one custody movement. A failure result or a thrown error both
 * become TransferFailedError.
 */
export async function moveCustody(
  assets: AssetTransfer,
  direction: TransferDirection,
  asset: AssetRef,
  account: string,
  amount: bigint
): Promise<void> {
  let result: TransferResult;
  try {
    result =
      direction === "in"
        ? await assets.transferIn(asset, account, amount)
        : await assets.transferOut(asset, account, amount);
  } catch (err) {
    throw new TransferFailedError(direction, err instanceof Error ? err.message : String(err));
  }
  if (!result.ok) throw new TransferFailedError(direction, result.reason);
}
