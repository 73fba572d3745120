import type { AssetRef, LockId, TimeLockedPosition } from "@vestlock/types";
import { systemClock, type Clock } from "./clock";
import {
  InvalidAmountError,
  InvalidDurationError,
  LockPeriodOngoingError,
  TransferFailedError,
} from "./errors";
import { moveCustody, type PendingRelease } from "./custody";
import { logger as defaultLogger, type Logger } from "./logger";
import type { AssetTransfer } from "./transfer";
import { vestedValue } from "./vesting";

export interface PooledPositionOptions {
  asset: AssetRef;
  /** Base units of `asset` backing one pool unit. */
  unitSize: bigint;
  creationTime: bigint;
  duration: bigint;
  assets: AssetTransfer;
  clock?: Clock;
  logger?: Logger;
}

/**
 * A fungible position: every unit shares one vesting schedule, so ids
 * carry no meaning here.
 *
 * getBalance() is the value of a single unit; a holder's value is that
 * times unitsOf(holder). getMaturity() is 0n by convention; the shared
 * unlock time is `maturity`. A release that fails after the holding is
 * cleared is kept in pendingReleases() under id 0n.
 */
export class PooledPosition implements TimeLockedPosition {
  readonly asset: AssetRef;
  readonly unitSize: bigint;
  readonly creationTime: bigint;
  readonly duration: bigint;
  readonly maturity: bigint;

  private readonly assets: AssetTransfer;
  private readonly clock: Clock;
  private readonly log: Logger;
  private readonly holdings = new Map<string, bigint>();
  private readonly pending: PendingRelease[] = [];

  constructor(options: PooledPositionOptions) {
    if (options.unitSize <= 0n) throw new InvalidAmountError(options.unitSize);
    if (options.duration < 0n) throw new InvalidDurationError(options.duration);

    this.asset = options.asset;
    this.unitSize = options.unitSize;
    this.creationTime = options.creationTime;
    this.duration = options.duration;
    this.maturity = options.creationTime + options.duration;
    this.assets = options.assets;
    this.clock = options.clock ?? systemClock;
    this.log = options.logger ?? defaultLogger.child({ component: "pool" });
  }

  /** Buy `units` pool units. Resolves to the caller's unit balance afterwards. */
  async deposit(caller: string, units: bigint): Promise<bigint> {
    if (units <= 0n) throw new InvalidAmountError(units);

    const amount = units * this.unitSize;
    await moveCustody(this.assets, "in", this.asset, caller, amount);

    const held = (this.holdings.get(caller) ?? 0n) + units;
    this.holdings.set(caller, held);
    this.log.info(`Pool deposit — ${caller} +${units} units (${amount} base units), holds ${held}`);
    return held;
  }

  /** Redeem every unit the caller holds. Resolves to the base units released. */
  async withdraw(caller: string): Promise<bigint> {
    const units = this.unitsOf(caller);
    if (units === 0n) throw new InvalidAmountError(units);

    const now = this.clock.now();
    if (now < this.maturity) throw new LockPeriodOngoingError(0n, this.maturity, now);

    const amount = units * this.unitSize;
    this.holdings.delete(caller);

    try {
      await moveCustody(this.assets, "out", this.asset, caller, amount);
    } catch (err) {
      const reason = err instanceof TransferFailedError ? err.reason : String(err);
      this.pending.push({ id: 0n, asset: this.asset, to: caller, amount, reason, failedAt: now });
      this.log.error(`Pool release of ${amount} to ${caller} failed: ${reason}. Funds remain in custody.`);
      throw new TransferFailedError("out", reason, { recordRemoved: true });
    }
    return amount;
  }

  pendingReleases(): PendingRelease[] {
    return this.pending.map((release) => ({ ...release }));
  }

  unitsOf(holder: string): bigint {
    return this.holdings.get(holder) ?? 0n;
  }

  get totalUnits(): bigint {
    let total = 0n;
    for (const units of this.holdings.values()) total += units;
    return total;
  }

  getAsset(_id: LockId = 0n): AssetRef {
    return this.asset;
  }

  getBalance(_id: LockId = 0n, at: bigint = this.clock.now()): bigint {
    return vestedValue(
      {
        amount: this.unitSize,
        creationTime: this.creationTime,
        duration: this.duration,
        maturity: this.maturity,
      },
      at
    );
  }

  getMaturity(_id: LockId = 0n): bigint {
    return 0n;
  }
}
