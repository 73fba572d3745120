/**
 * ledger.ts
 *
 * LockLedger owns the lifecycle of every lock:
 *
 *   (none) ──deposit──▶ active ──withdraw (owner, after maturity)──▶ withdrawn
 *
 * Deposits take custody before the record is created, and the id is only
 * committed once the record exists. Withdrawals remove
 * the record before custody is released, so nothing that runs during the
 * release (a callback, a second call) can see the lock as still active.
 */

import {
  assetKey,
  sameAsset,
  type AssetRef,
  type Lock,
  type LockId,
  type TimeLockedPosition,
} from "@vestlock/types";
import { systemClock, type Clock } from "./clock";
import {
  DuplicateIdError,
  InvalidAmountError,
  InvalidDurationError,
  LockPeriodOngoingError,
  ReentrantCallError,
  TransferFailedError,
  UnauthorizedError,
} from "./errors";
import { moveCustody, type PendingRelease } from "./custody";
import { SequentialIdDeriver, type IdDeriver } from "./ids";
import { logger as defaultLogger, type Logger } from "./logger";
import { InMemoryLockStore, type LockStore } from "./store";
import type { AssetTransfer, OwnershipRegistry } from "./transfer";
import { isMatured, maturityOf, vestedValue } from "./vesting";

// -----------------------------------------------------------------------
// Types
// -----------------------------------------------------------------------

export interface LockLedgerOptions {
  assets: AssetTransfer;
  store?: LockStore;
  ids?: IdDeriver;
  /** When set, withdraw authorization asks the registry instead of Lock.owner. */
  ownership?: OwnershipRegistry;
  clock?: Clock;
  logger?: Logger;
  /** Reject any entry point called while another is in flight. Default true. */
  reentrancyGuard?: boolean;
  pendingReleases?: PendingRelease[];
}

// -----------------------------------------------------------------------
// LockLedger
// -----------------------------------------------------------------------

export class LockLedger implements TimeLockedPosition {
  readonly store: LockStore;
  readonly ids: IdDeriver;

  private readonly assets: AssetTransfer;
  private readonly ownership?: OwnershipRegistry;
  private readonly clock: Clock;
  private readonly log: Logger;
  private readonly reentrancyGuard: boolean;
  private readonly pending: PendingRelease[];
  private inFlight: string | null = null;

  constructor(options: LockLedgerOptions) {
    this.assets = options.assets;
    this.store = options.store ?? new InMemoryLockStore();
    this.ids = options.ids ?? new SequentialIdDeriver();
    this.ownership = options.ownership;
    this.clock = options.clock ?? systemClock;
    this.log = options.logger ?? defaultLogger.child({ component: "ledger" });
    this.reentrancyGuard = options.reentrancyGuard ?? true;
    this.pending = [...(options.pendingReleases ?? [])];
  }

  // -----------------------------------------------------------------------
  // Public: lifecycle
  // -----------------------------------------------------------------------

  /**
   * Lock `amount` of `asset` from `caller` for `duration` seconds.
   * Resolves to the new lock's id.
   */
  deposit(caller: string, asset: AssetRef, amount: bigint, duration: bigint): Promise<LockId> {
    return this.exclusive("deposit", async () => {
      if (amount <= 0n) throw new InvalidAmountError(amount);
      if (duration < 0n) throw new InvalidDurationError(duration);

      const creationTime = this.clock.now();
      const maturity = creationTime + duration;
      const request = { owner: caller, amount, maturity };
      const id = this.ids.peek(request);
      if (this.store.has(id)) throw new DuplicateIdError(id);

      await moveCustody(this.assets, "in", asset, caller, amount);

      const lock: Lock = {
        id,
        owner: caller,
        asset,
        amount,
        creationTime,
        duration,
        maturity,
        state: "active",
      };

      try {
        this.store.create(id, lock);
      } catch (err) {
        // No record, so custody goes back.
        await this.refund(lock, err);
        throw err;
      }
      this.ids.commit(request);

      this.log.info(
        `Lock ${id} created — ${amount} ${assetKey(asset)} from ${caller}, matures at ${maturity}`
      );
      return id;
    });
  }

  /**
   * Release a matured lock to its owner. Resolves to the released amount.
   */
  withdraw(caller: string, id: LockId): Promise<bigint> {
    return this.exclusive("withdraw", async () => {
      const lock = this.store.get(id);

      const owner = this.ownership ? await this.ownership.ownerOf(id) : lock.owner;
      if (owner !== caller) throw new UnauthorizedError(id, caller);

      const now = this.clock.now();
      if (!isMatured(lock, now)) throw new LockPeriodOngoingError(id, lock.maturity, now);

      // Effect before interaction.
      this.store.remove(id);

      try {
        await moveCustody(this.assets, "out", lock.asset, caller, lock.amount);
      } catch (err) {
        const reason = err instanceof TransferFailedError ? err.reason : String(err);
        this.pending.push({
          id,
          asset: lock.asset,
          to: caller,
          amount: lock.amount,
          reason,
          failedAt: now,
        });
        this.log.error(
          `Lock ${id} removed but release of ${lock.amount} ${assetKey(lock.asset)} ` +
            `to ${caller} failed: ${reason}. Funds remain in custody.`
        );
        throw new TransferFailedError("out", reason, { recordRemoved: true });
      }

      this.log.info(`Lock ${id} withdrawn — ${lock.amount} ${assetKey(lock.asset)} to ${caller}`);
      return lock.amount;
    });
  }

  // -----------------------------------------------------------------------
  // Public: queries
  // -----------------------------------------------------------------------

  getLock(id: LockId): Lock {
    return this.store.get(id);
  }

  getAsset(id: LockId): AssetRef {
    return this.store.get(id).asset;
  }

  /** Vested value of the lock at `at` (defaults to now). */
  getBalance(id: LockId, at: bigint = this.clock.now()): bigint {
    return vestedValue(this.store.get(id), at);
  }

  /** Absolute unlock time. Unknown ids throw NotFoundError, never return 0. */
  getMaturity(id: LockId): bigint {
    return maturityOf(this.store.get(id));
  }

  activeLocks(): Lock[] {
    return this.store.values();
  }

  locksOf(owner: string): Lock[] {
    return this.store.values().filter((lock) => lock.owner === owner);
  }

  /** Active locks whose maturity has passed at `at`. */
  maturedLocks(at: bigint = this.clock.now()): Lock[] {
    return this.store.values().filter((lock) => isMatured(lock, at));
  }

  /** Sum of active lock amounts in `asset`. */
  custodied(asset: AssetRef): bigint {
    return this.store
      .values()
      .filter((lock) => sameAsset(lock.asset, asset))
      .reduce((sum, lock) => sum + lock.amount, 0n);
  }

  pendingReleases(): PendingRelease[] {
    return this.pending.map((release) => ({ ...release }));
  }

  // -----------------------------------------------------------------------
  // Internal helpers
  // -----------------------------------------------------------------------

  private async exclusive<T>(operation: string, body: () => Promise<T>): Promise<T> {
    if (!this.reentrancyGuard) return body();
    if (this.inFlight) throw new ReentrantCallError(operation, this.inFlight);

    this.inFlight = operation;
    try {
      return await body();
    } finally {
      this.inFlight = null;
    }
  }

  /**
   * Return custody for a deposit whose record could not be created. If the
   * return fails too, the funds are recorded as a pending release and the
   * error thrown carries the creation failure as its cause.
   */
  private async refund(lock: Lock, creationError: unknown): Promise<void> {
    try {
      await moveCustody(this.assets, "out", lock.asset, lock.owner, lock.amount);
    } catch (err) {
      const reason = err instanceof TransferFailedError ? err.reason : String(err);
      this.pending.push({
        id: lock.id,
        asset: lock.asset,
        to: lock.owner,
        amount: lock.amount,
        reason,
        failedAt: lock.creationTime,
      });
      this.log.error(
        `Lock ${lock.id} could not be created and the refund of ${lock.amount} ` +
          `${assetKey(lock.asset)} to ${lock.owner} failed: ${reason}. Funds remain in custody.`
      );
      throw new TransferFailedError("out", reason, { cause: creationError });
    }
  }
}
