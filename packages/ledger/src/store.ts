import type { Lock, LockId } from "@vestlock/types";
import { DuplicateIdError, NotFoundError } from "./errors";

/**
 * Mapping from lock id to lock.
 *
 * An id that has been removed is retired: it can never be created again,
 * and `get` reports it as not found.
 */
export interface LockStore {
  create(id: LockId, lock: Lock): void;
  get(id: LockId): Lock;
  has(id: LockId): boolean;
  remove(id: LockId): Lock;
  values(): Lock[];
  retired(): LockId[];
}

export class InMemoryLockStore implements LockStore {
  constructor(
    private readonly locks: Map<LockId, Lock> = new Map(),
    private readonly retiredIds: Set<LockId> = new Set()
  ) {}

  create(id: LockId, lock: Lock): void {
    if (this.has(id)) throw new DuplicateIdError(id);
    this.locks.set(id, { ...lock, id });
  }

  get(id: LockId): Lock {
    const lock = this.locks.get(id);
    if (!lock) throw new NotFoundError(id);
    return { ...lock };
  }

  /** True for live and retired ids alike. */
  has(id: LockId): boolean {
    return this.locks.has(id) || this.retiredIds.has(id);
  }

  /** Removes the lock and returns its final, withdrawn state. */
  remove(id: LockId): Lock {
    const lock = this.locks.get(id);
    if (!lock) throw new NotFoundError(id);
    this.locks.delete(id);
    this.retiredIds.add(id);
    return { ...lock, state: "withdrawn" };
  }

  values(): Lock[] {
    return [...this.locks.values()].map((lock) => ({ ...lock }));
  }

  retired(): LockId[] {
    return [...this.retiredIds];
  }
}
