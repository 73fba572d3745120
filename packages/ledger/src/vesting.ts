import type { Lock } from "@vestlock/types";

type Schedule = Pick<Lock, "amount" | "creationTime" | "duration" | "maturity">;

/**
 * Value of a lock at `now`, vesting linearly from creation to maturity.
 *
 *   now >= maturity  → amount
 *   otherwise        → amount * (now - creationTime) / duration   (truncated)
 *
 * A zero-duration lock is fully vested at creation.
 */
export function vestedValue(lock: Schedule, now: bigint): bigint {
  if (lock.duration === 0n || now >= lock.maturity) return lock.amount;
  if (now <= lock.creationTime) return 0n;
  return (lock.amount * (now - lock.creationTime)) / lock.duration;
}

export function maturityOf(lock: Pick<Lock, "maturity">): bigint {
  return lock.maturity;
}

export function isMatured(lock: Pick<Lock, "maturity">, now: bigint): boolean {
  return now >= lock.maturity;
}
