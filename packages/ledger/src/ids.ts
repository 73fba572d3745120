import { createHash } from "node:crypto";
import { serializeCV, stringUtf8CV, tupleCV, uintCV } from "@stacks/transactions";
import type { LockId } from "@vestlock/types";

export interface IdRequest {
  owner: string;
  amount: bigint;
  maturity: bigint;
}

/**
 * peek() names the id the next lock would get without using it up;
 * commit() uses it up once that lock has been created.
 */
export interface IdDeriver {
  peek(request: IdRequest): LockId;
  commit(request: IdRequest): void;
}

/** 0, 1, 2, … in creation order. */
export class SequentialIdDeriver implements IdDeriver {
  constructor(private nextId: LockId = 0n) {}

  peek(): LockId {
    return this.nextId;
  }

  commit(): void {
    this.nextId++;
  }

  /** The id the next lock will get. */
  get cursor(): LockId {
    return this.nextId;
  }
}

/**
 * Hash of (owner, amount, maturity, nonce).
 *
 * The nonce is a per-owner sequence, so one owner opening two identical
 * locks in the same second still gets two ids.
 */
export class ContentIdDeriver implements IdDeriver {
  constructor(private readonly ownerNonces: Map<string, bigint> = new Map()) {}

  peek({ owner, amount, maturity }: IdRequest): LockId {
    return contentId(owner, amount, maturity, this.nonceOf(owner));
  }

  commit({ owner }: IdRequest): void {
    this.ownerNonces.set(owner, this.nonceOf(owner) + 1n);
  }

  nonces(): Map<string, bigint> {
    return new Map(this.ownerNonces);
  }

  private nonceOf(owner: string): bigint {
    return this.ownerNonces.get(owner) ?? 0n;
  }
}

// Ids are kept to 128 bits so they fit a Clarity uint.
const ID_BYTES = 16;

/**
 * First 128 bits of sha256 over the Clarity serialization of
 * { owner, amount, maturity, nonce }.
 */
export function contentId(
  owner: string,
  amount: bigint,
  maturity: bigint,
  nonce: bigint
): LockId {
  const encoded = serializeCV(
    tupleCV({
      owner: stringUtf8CV(owner),
      amount: uintCV(amount),
      maturity: uintCV(maturity),
      nonce: uintCV(nonce),
    })
  );
  const digest = createHash("sha256").update(encoded).digest();
  return BigInt(`0x${digest.subarray(0, ID_BYTES).toString("hex")}`);
}
