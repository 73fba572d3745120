// Types for the time-locked asset ledger (per-lock, linear vesting)

/**
 * The fungible asset a lock is denominated in.
 *
 *   - native: the chain's own currency (STX)
 *   - token:  a SIP-010 fungible token, identified by "ADDRESS.contract-name"
 */
export type AssetRef =
  | { kind: "native" }
  | { kind: "token"; contractId: string };

export const NATIVE_ASSET: AssetRef = { kind: "native" };

/** Lock identifiers are unsigned integers that fit a Clarity `uint`. */
export type LockId = bigint;

export type LockState = "active" | "withdrawn";

/**
 * A single time lock.
 *
 * Everything except `state` is fixed when the lock is created.
 */
export interface Lock {
  id: LockId;
  owner: string;           // identity entitled to withdraw (unless an ownership registry is configured)
  asset: AssetRef;
  amount: bigint;          // locked quantity, in the asset's base units
  creationTime: bigint;    // unix seconds
  duration: bigint;        // seconds
  maturity: bigint;        // creationTime + duration
  state: LockState;
}

/** Stable string key for an asset, used for maps and persisted state. */
export function assetKey(asset: AssetRef): string {
  return asset.kind === "native" ? "native" : `token:${asset.contractId}`;
}

/** Inverse of assetKey(). Also accepts a bare contract id for a token. */
export function parseAsset(key: string): AssetRef {
  if (key === "native" || key === "stx") return NATIVE_ASSET;
  const contractId = key.startsWith("token:") ? key.slice("token:".length) : key;
  if (!contractId.includes(".")) {
    throw new Error(`Invalid asset "${key}": expected "native" or "ADDRESS.contract-name"`);
  }
  return { kind: "token", contractId };
}

export function sameAsset(a: AssetRef, b: AssetRef): boolean {
  return assetKey(a) === assetKey(b);
}
