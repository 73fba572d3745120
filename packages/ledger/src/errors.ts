import type { LockId } from "@vestlock/types";

/**
 * Ledger error codes. Numbered like contract error codes:
 * 1xx authorization, 2xx lock state and arguments.
 */
export const LedgerErrorCode = {
  Unauthorized: 100,
  NotFound: 200,
  LockPeriodOngoing: 201,
  InvalidAmount: 205,
  InvalidDuration: 206,
  DuplicateId: 207,
  TransferFailed: 208,
  ReentrantCall: 209,
} as const;

export type LedgerErrorCode = (typeof LedgerErrorCode)[keyof typeof LedgerErrorCode];

/** Base class for every error the ledger throws. */
export class LedgerError extends Error {
  constructor(public readonly code: LedgerErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;

    // Extending Error breaks the prototype chain when compiled down.
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class UnauthorizedError extends LedgerError {
  constructor(public readonly id: LockId, public readonly caller: string) {
    super(LedgerErrorCode.Unauthorized, `${caller} is not the owner of lock ${id}`);
  }
}

export class NotFoundError extends LedgerError {
  constructor(public readonly id: LockId) {
    super(LedgerErrorCode.NotFound, `Lock ${id} not found`);
  }
}

export class LockPeriodOngoingError extends LedgerError {
  constructor(
    public readonly id: LockId,
    public readonly maturity: bigint,
    public readonly now: bigint
  ) {
    super(
      LedgerErrorCode.LockPeriodOngoing,
      `Lock ${id} matures at ${maturity}; ${maturity - now}s remaining`
    );
  }
}

export class InvalidAmountError extends LedgerError {
  constructor(public readonly amount: bigint) {
    super(LedgerErrorCode.InvalidAmount, `Amount must be positive, got ${amount}`);
  }
}

export class InvalidDurationError extends LedgerError {
  constructor(public readonly duration: bigint) {
    super(LedgerErrorCode.InvalidDuration, `Duration must not be negative, got ${duration}`);
  }
}

export class DuplicateIdError extends LedgerError {
  constructor(public readonly id: LockId) {
    super(LedgerErrorCode.DuplicateId, `Lock id ${id} has already been issued`);
  }
}

export type TransferDirection = "in" | "out";

export interface TransferFailureDetails {
  /** The lock was removed before the release was attempted. */
  recordRemoved?: boolean;
  /** The error that made a compensating release necessary. */
  cause?: unknown;
}

/**
 * An asset movement did not succeed.
 *
 * When `recordRemoved` is true, or when a `cause` is attached, the funds
 * are still in custody with no lock behind them and show up in
 * pendingReleases().
 */
export class TransferFailedError extends LedgerError {
  readonly recordRemoved: boolean;

  constructor(
    public readonly direction: TransferDirection,
    public readonly reason: string,
    details: TransferFailureDetails = {}
  ) {
    const context =
      details.cause !== undefined
        ? ` while undoing a failed deposit (${describeCause(details.cause)}); funds remain in custody`
        : details.recordRemoved
          ? " (lock already removed; funds remain in custody)"
          : "";
    super(
      LedgerErrorCode.TransferFailed,
      `Transfer ${direction} failed: ${reason}${context}`,
      details.cause !== undefined ? { cause: details.cause } : undefined
    );
    this.recordRemoved = details.recordRemoved ?? false;
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

export class ReentrantCallError extends LedgerError {
  constructor(public readonly operation: string, public readonly inFlight: string) {
    super(
      LedgerErrorCode.ReentrantCall,
      `Reentrant call: ${operation} attempted while ${inFlight} is in flight`
    );
  }
}

export function isLedgerError(err: unknown): err is LedgerError {
  return err instanceof LedgerError;
}
