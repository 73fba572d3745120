// Position interfaces: anything that can value and date a position by id.

import type { AssetRef, LockId } from "./lock";

/**
 * Valuation interface.
 *
 * `getBalance` is the current value of the position, denominated in
 * `getAsset(id)`. For multi-unit positions it is the value of a single
 * unit; multiply by the holder's unit count for the total.
 */
export interface ValuedPosition {
  getAsset(id: LockId): AssetRef;
  getBalance(id: LockId): bigint;
}

/**
 * Maturity interface.
 *
 * Per-lock implementations return the absolute unlock time (unix seconds).
 * Fungible-wide implementations ignore the id and return 0n.
 */
export interface MaturingPosition {
  getMaturity(id: LockId): bigint;
}

export type TimeLockedPosition = ValuedPosition & MaturingPosition;
