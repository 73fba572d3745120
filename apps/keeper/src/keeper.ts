/**
 * keeper.ts
 *
 * The keeper hosts one LockLedger backed by an in-process custody book and
 * a JSON state file:
 *
 *  1. Commands  (credit, deposit, withdraw, show, list)
 *     Each mutating command runs against the ledger and then writes the
 *     whole state back, whether the command succeeded or not (a failed
 *     command may still have left a pending release).
 *
 *  2. Watch loop  (every config.watch.intervalMs)
 *     Reports active locks that have matured and any release that failed
 *     after its lock was removed.
 */

import {
  AccountBook,
  ContentIdDeriver,
  InMemoryLockStore,
  LockLedger,
  SequentialIdDeriver,
  isMatured,
  systemClock,
  vestedValue,
  type Clock,
  type Logger,
  type OwnershipRegistry,
} from "@vestlock/ledger";
import { assetKey, type AssetRef, type Lock, type LockId } from "@vestlock/types";
import type { IdStrategy } from "./config";
import { emptyState, loadState, saveState, type KeeperState } from "./state";

// -----------------------------------------------------------------------
// Types
// -----------------------------------------------------------------------

export interface KeeperOptions {
  statePath: string;
  idStrategy: IdStrategy;
  custodyAccount: string;
  reentrancyGuard: boolean;
  logger: Logger;
  ownership?: OwnershipRegistry;
  clock?: Clock;
}

export interface LockView {
  lock: Lock;
  value: bigint;
  matured: boolean;
}

// -----------------------------------------------------------------------
// Keeper class
// -----------------------------------------------------------------------

export class Keeper {
  readonly ledger: LockLedger;
  readonly book: AccountBook;

  private readonly ids: SequentialIdDeriver | ContentIdDeriver;
  private readonly clock: Clock;
  private readonly log: Logger;
  private watchTimer: ReturnType<typeof setInterval> | null = null;

  /** Open the keeper on its state file, starting empty if there is none. */
  static open(options: KeeperOptions): Keeper {
    const state = loadState(options.statePath);
    if (state && state.ids.strategy !== options.idStrategy) {
      options.logger.warn(
        `State file uses ${state.ids.strategy} ids; ignoring ID_STRATEGY=${options.idStrategy}.`
      );
    }
    return new Keeper(state ?? emptyState(options.idStrategy), options);
  }

  constructor(state: KeeperState, private readonly options: KeeperOptions) {
    this.clock = options.clock ?? systemClock;
    this.log = options.logger;

    this.ids =
      state.ids.strategy === "content"
        ? new ContentIdDeriver(new Map(state.ids.nonces))
        : new SequentialIdDeriver(state.ids.cursor);

    this.book = new AccountBook(options.custodyAccount, state.balances);

    this.ledger = new LockLedger({
      assets: this.book,
      store: new InMemoryLockStore(
        new Map(state.locks.map((lock) => [lock.id, lock])),
        new Set(state.retired)
      ),
      ids: this.ids,
      ownership: options.ownership,
      clock: this.clock,
      logger: this.log.child({ component: "ledger" }),
      reentrancyGuard: options.reentrancyGuard,
      pendingReleases: state.pendingReleases,
    });
  }

  // -----------------------------------------------------------------------
  // Public: commands
  // -----------------------------------------------------------------------

  credit(account: string, asset: AssetRef, amount: bigint): bigint {
    const balance = this.book.credit(asset, account, amount);
    this.save();
    this.log.info(`Credited ${amount} ${assetKey(asset)} to ${account} (balance ${balance})`);
    return balance;
  }

  async deposit(caller: string, asset: AssetRef, amount: bigint, duration: bigint): Promise<LockId> {
    try {
      return await this.ledger.deposit(caller, asset, amount, duration);
    } finally {
      this.save();
    }
  }

  async withdraw(caller: string, id: LockId): Promise<bigint> {
    try {
      return await this.ledger.withdraw(caller, id);
    } finally {
      this.save();
    }
  }

  show(id: LockId): LockView {
    return this.view(this.ledger.getLock(id), this.clock.now());
  }

  list(owner?: string): LockView[] {
    const now = this.clock.now();
    const locks = owner ? this.ledger.locksOf(owner) : this.ledger.activeLocks();
    return locks.map((lock) => this.view(lock, now));
  }

  // -----------------------------------------------------------------------
  // Public: watch loop
  // -----------------------------------------------------------------------

  start(intervalMs: number): void {
    this.log.info(`Keeper watching ${this.options.statePath} every ${intervalMs / 1000}s`);

    // Run immediately on start, then on a timer
    this.runWatchTick();
    this.watchTimer = setInterval(() => this.runWatchTick(), intervalMs);
  }

  stop(): void {
    if (this.watchTimer) clearInterval(this.watchTimer);
    this.watchTimer = null;
    this.log.info("Keeper stopped.");
  }

  /** Log every matured lock and every stuck release. Returns the matured locks. */
  runWatchTick(): Lock[] {
    const now = this.clock.now();
    const matured = this.ledger.maturedLocks(now);

    for (const lock of matured) {
      this.log.info(
        `Lock ${lock.id} matured at ${lock.maturity} — ${lock.amount} ${assetKey(lock.asset)} ` +
          `withdrawable by ${lock.owner}`
      );
    }

    const stuck = this.ledger.pendingReleases();
    if (stuck.length > 0) {
      this.log.warn(`${stuck.length} release(s) failed after removal and need manual recovery.`);
    }

    this.log.info(`Watch tick — ${matured.length} of ${this.ledger.activeLocks().length} active locks matured.`);
    return matured;
  }

  // -----------------------------------------------------------------------
  // State
  // -----------------------------------------------------------------------

  snapshot(): KeeperState {
    return {
      ids:
        this.ids instanceof ContentIdDeriver
          ? { strategy: "content", nonces: this.ids.nonces() }
          : { strategy: "sequential", cursor: this.ids.cursor },
      locks: this.ledger.activeLocks(),
      retired: this.ledger.store.retired(),
      balances: this.book.snapshot(),
      pendingReleases: this.ledger.pendingReleases(),
    };
  }

  private save(): void {
    saveState(this.options.statePath, this.snapshot());
  }

  private view(lock: Lock, now: bigint): LockView {
    return { lock, value: vestedValue(lock, now), matured: isMatured(lock, now) };
  }
}
