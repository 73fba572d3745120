import { describe, it, expect } from "vitest";
import { ContentIdDeriver, SequentialIdDeriver, contentId, type IdRequest } from "@vestlock/ledger";

const REQUEST = { owner: "alice", amount: 1_000n, maturity: 1_700_001_000n };

describe("SequentialIdDeriver", () => {
  /** Peek then commit, as the ledger does for a successful deposit. */
  function take(ids: SequentialIdDeriver): bigint {
    const id = ids.peek();
    ids.commit();
    return id;
  }

  it("starts at 0 and counts up", () => {
    const ids = new SequentialIdDeriver();
    expect([take(ids), take(ids), take(ids)]).toEqual([0n, 1n, 2n]);
    expect(ids.cursor).toBe(3n);
  });

  it("peek does not advance the cursor", () => {
    const ids = new SequentialIdDeriver();
    expect([ids.peek(), ids.peek()]).toEqual([0n, 0n]);
    expect(ids.cursor).toBe(0n);
  });

  it("resumes from a saved cursor", () => {
    const ids = new SequentialIdDeriver(42n);
    expect(ids.peek()).toBe(42n);
  });
});

describe("contentId", () => {
  it("is deterministic", () => {
    expect(contentId("alice", 1_000n, 5n, 0n)).toBe(contentId("alice", 1_000n, 5n, 0n));
  });

  it("changes with every field", () => {
    const base = contentId("alice", 1_000n, 5n, 0n);
    expect(contentId("bob", 1_000n, 5n, 0n)).not.toBe(base);
    expect(contentId("alice", 1_001n, 5n, 0n)).not.toBe(base);
    expect(contentId("alice", 1_000n, 6n, 0n)).not.toBe(base);
    expect(contentId("alice", 1_000n, 5n, 1n)).not.toBe(base);
  });

  it("fits in 128 bits", () => {
    const id = contentId("alice", 2n ** 127n, 2n ** 64n, 0n);
    expect(id >= 0n).toBe(true);
    expect(id < 2n ** 128n).toBe(true);
  });
});

describe("ContentIdDeriver", () => {
  /** Peek then commit, as the ledger does for a successful deposit. */
  function take(ids: ContentIdDeriver, request: IdRequest): bigint {
    const id = ids.peek(request);
    ids.commit(request);
    return id;
  }

  it("gives two identical requests from one owner different ids", () => {
    const ids = new ContentIdDeriver();
    const first = take(ids, REQUEST);
    const second = take(ids, REQUEST);
    expect(first).not.toBe(second);
    expect(first).toBe(contentId("alice", 1_000n, 1_700_001_000n, 0n));
    expect(second).toBe(contentId("alice", 1_000n, 1_700_001_000n, 1n));
  });

  it("keeps a separate nonce per owner", () => {
    const ids = new ContentIdDeriver();
    take(ids, REQUEST);
    const bob = take(ids, { ...REQUEST, owner: "bob" });
    expect(bob).toBe(contentId("bob", 1_000n, 1_700_001_000n, 0n));
    expect(ids.nonces()).toEqual(new Map([["alice", 1n], ["bob", 1n]]));
  });

  it("resumes from saved nonces", () => {
    const ids = new ContentIdDeriver();
    take(ids, REQUEST);
    take(ids, REQUEST);

    const resumed = new ContentIdDeriver(ids.nonces());
    expect(resumed.peek(REQUEST)).toBe(contentId("alice", 1_000n, 1_700_001_000n, 2n));
  });

  it("keeps the nonce until commit", () => {
    const ids = new ContentIdDeriver();
    expect(ids.peek(REQUEST)).toBe(ids.peek(REQUEST));
    expect(ids.nonces()).toEqual(new Map());
  });
});
