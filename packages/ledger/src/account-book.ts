import { assetKey, type AssetRef } from "@vestlock/types";
import { InvalidAmountError } from "./errors";
import type { AssetTransfer, TransferResult } from "./transfer";

export const DEFAULT_CUSTODY_ACCOUNT = "vestlock-custody";

export interface BalanceEntry {
  asset: string;    // assetKey()
  account: string;
  amount: bigint;
}

/**
 * In-process balance book for fungible assets.
 *
 * Custody for locked funds is just another account, so the sum over all
 * accounts of an asset never changes except through credit().
 */
export class AccountBook implements AssetTransfer {
  private readonly balances = new Map<string, Map<string, bigint>>();

  constructor(
    readonly custodyAccount: string = DEFAULT_CUSTODY_ACCOUNT,
    entries: BalanceEntry[] = []
  ) {
    for (const entry of entries) {
      this.accounts(entry.asset).set(entry.account, entry.amount);
    }
  }

  /** Mint `amount` into `account` out of thin air. */
  credit(asset: AssetRef, account: string, amount: bigint): bigint {
    if (amount <= 0n) throw new InvalidAmountError(amount);
    const balances = this.accounts(assetKey(asset));
    const next = (balances.get(account) ?? 0n) + amount;
    balances.set(account, next);
    return next;
  }

  balanceOf(asset: AssetRef, account: string): bigint {
    return this.balances.get(assetKey(asset))?.get(account) ?? 0n;
  }

  custodyBalance(asset: AssetRef): bigint {
    return this.balanceOf(asset, this.custodyAccount);
  }

  async transferIn(asset: AssetRef, from: string, amount: bigint): Promise<TransferResult> {
    return this.move(asset, from, this.custodyAccount, amount);
  }

  async transferOut(asset: AssetRef, to: string, amount: bigint): Promise<TransferResult> {
    return this.move(asset, this.custodyAccount, to, amount);
  }

  snapshot(): BalanceEntry[] {
    const entries: BalanceEntry[] = [];
    for (const [asset, accounts] of this.balances) {
      for (const [account, amount] of accounts) {
        if (amount > 0n) entries.push({ asset, account, amount });
      }
    }
    return entries;
  }

  // -----------------------------------------------------------------------
  // Internal helpers
  // -----------------------------------------------------------------------

  private move(asset: AssetRef, from: string, to: string, amount: bigint): TransferResult {
    if (amount <= 0n) return { ok: false, reason: `invalid amount ${amount}` };
    const balances = this.accounts(assetKey(asset));
    const available = balances.get(from) ?? 0n;
    if (available < amount) {
      return {
        ok: false,
        reason: `insufficient ${assetKey(asset)} balance for ${from}: ${available} < ${amount}`,
      };
    }
    balances.set(from, available - amount);
    balances.set(to, (balances.get(to) ?? 0n) + amount);
    return { ok: true };
  }

  private accounts(key: string): Map<string, bigint> {
    let accounts = this.balances.get(key);
    if (!accounts) {
      accounts = new Map();
      this.balances.set(key, accounts);
    }
    return accounts;
  }
}
