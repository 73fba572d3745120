import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import pino from "pino";
import { NATIVE_ASSET } from "@vestlock/types";
import { ManualClock, NotFoundError, TransferFailedError } from "@vestlock/ledger";
import { parseCommand } from "../apps/keeper/src/cli";
import { Keeper, type KeeperOptions } from "../apps/keeper/src/keeper";
import { emptyState, loadState, parseState, serializeState } from "../apps/keeper/src/state";
import { parseContractId } from "../apps/keeper/src/stacks";

// -----------------------------------------------------------------------
// Constants
// -----------------------------------------------------------------------

const T = 1_700_000_000n;

let dir: string;
let statePath: string;

// -----------------------------------------------------------------------
// Helpers
// -----------------------------------------------------------------------

/** Open a keeper on the shared state file at time `now`. */
function open(now: bigint = T, overrides: Partial<KeeperOptions> = {}): Keeper {
  return Keeper.open({
    statePath,
    idStrategy: "sequential",
    custodyAccount: "custody",
    reentrancyGuard: true,
    logger: pino({ level: "silent" }),
    clock: new ManualClock(now),
    ...overrides,
  });
}

// -----------------------------------------------------------------------

describe("keeper", () => {
  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "vestlock-"));
    statePath = join(dir, "state.json");
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  // =====================================================================
  // persistence
  // =====================================================================
  describe("state file", () => {
    it("starts empty when there is no file", () => {
      expect(loadState(statePath)).toBeUndefined();
      expect(open().list()).toEqual([]);
    });

    it("locks and balances survive a restart", async () => {
      const keeper = open();
      keeper.credit("alice", NATIVE_ASSET, 5_000n);
      const id = await keeper.deposit("alice", NATIVE_ASSET, 1_000n, 1_000n);

      const reopened = open(T + 250n);
      expect(reopened.show(id)).toMatchObject({ value: 250n, matured: false });
      expect(reopened.show(id).lock.amount).toBe(1_000n);
      expect(reopened.book.balanceOf(NATIVE_ASSET, "alice")).toBe(4_000n);
      expect(reopened.book.custodyBalance(NATIVE_ASSET)).toBe(1_000n);
    });

    it("withdrawn ids stay retired and the id counter carries on", async () => {
      const keeper = open();
      keeper.credit("alice", NATIVE_ASSET, 5_000n);
      await keeper.deposit("alice", NATIVE_ASSET, 1_000n, 1_000n);

      const later = open(T + 1_000n);
      await expect(later.withdraw("alice", 0n)).resolves.toBe(1_000n);

      const reopened = open(T + 1_000n);
      expect(reopened.list()).toEqual([]);
      expect(() => reopened.show(0n)).toThrow(NotFoundError);
      expect(reopened.snapshot().retired).toEqual([0n]);
      await expect(reopened.deposit("alice", NATIVE_ASSET, 10n, 0n)).resolves.toBe(1n);
    });

    it("a failed deposit leaves the id for the next lock", async () => {
      const keeper = open();
      await expect(keeper.deposit("alice", NATIVE_ASSET, 10n, 10n)).rejects.toBeInstanceOf(
        TransferFailedError
      );
      expect(keeper.snapshot().ids).toEqual({ strategy: "sequential", cursor: 0n });

      const reopened = open();
      reopened.credit("alice", NATIVE_ASSET, 10n);
      await expect(reopened.deposit("alice", NATIVE_ASSET, 10n, 10n)).resolves.toBe(0n);
    });

    it("content ids keep their nonces across restarts", async () => {
      const keeper = open(T, { idStrategy: "content" });
      keeper.credit("alice", NATIVE_ASSET, 100n);
      const first = await keeper.deposit("alice", NATIVE_ASSET, 10n, 60n);

      const reopened = open(T, { idStrategy: "content" });
      const second = await reopened.deposit("alice", NATIVE_ASSET, 10n, 60n);
      expect(second).not.toBe(first);
      expect(reopened.list("alice")).toHaveLength(2);
    });

    it("the file stores bigints as decimal strings", async () => {
      const keeper = open();
      keeper.credit("alice", NATIVE_ASSET, 7n);

      const doc = JSON.parse(readFileSync(statePath, "utf8"));
      expect(doc).toEqual({
        version: 1,
        ids: { strategy: "sequential", cursor: "0" },
        locks: [],
        retired: [],
        balances: [{ asset: "native", account: "alice", amount: "7" }],
        pendingReleases: [],
      });
    });

    it("serializeState output parses back to the same state", () => {
      const state = emptyState("content");
      state.ids = { strategy: "content", nonces: new Map([["alice", 2n]]) };
      state.locks = [
        {
          id: 9n,
          owner: "alice",
          asset: { kind: "token", contractId: "ST1TEST.test-token" },
          amount: 40n,
          creationTime: 100n,
          duration: 20n,
          maturity: 120n,
          state: "active",
        },
      ];
      state.retired = [3n];

      expect(parseState(JSON.parse(serializeState(state)))).toEqual(state);
    });

    it("rejects a lock with a zero amount", () => {
      const raw = JSON.parse(serializeState(emptyState("sequential")));
      raw.locks = [
        {
          id: "0",
          owner: "alice",
          asset: "native",
          amount: "0",
          creationTime: "1",
          duration: "1",
          maturity: "2",
        },
      ];
      expect(() => parseState(raw)).toThrow("Invalid keeper state: locks.0: lock amount must be positive");
    });

    it("rejects a balance whose asset is not a valid key", () => {
      const raw = JSON.parse(serializeState(emptyState("sequential")));
      raw.balances = [{ asset: "bogus", account: "alice", amount: "7" }];
      expect(() => parseState(raw)).toThrow(
        'Invalid keeper state: balances.0.asset: Error: Invalid asset "bogus": expected "native" or "ADDRESS.contract-name"'
      );
    });

    it("rejects a file from another version", () => {
      writeFileSync(statePath, JSON.stringify({ version: 2 }));
      expect(() => loadState(statePath)).toThrow(/Invalid keeper state: version/);
    });
  });

  // =====================================================================
  // watch loop
  // =====================================================================
  describe("runWatchTick", () => {
    it("returns the matured locks only", async () => {
      const keeper = open();
      keeper.credit("alice", NATIVE_ASSET, 100n);
      await keeper.deposit("alice", NATIVE_ASSET, 10n, 5n);
      await keeper.deposit("alice", NATIVE_ASSET, 10n, 50n);

      const later = open(T + 5n);
      expect(later.runWatchTick().map((lock) => lock.id)).toEqual([0n]);
    });
  });
});

// -----------------------------------------------------------------------

describe("parseCommand", () => {
  it("parses a token deposit", () => {
    expect(
      parseCommand(["deposit", "alice", "1000", "86400", "--asset", "ST1TEST.test-token"])
    ).toEqual({
      name: "deposit",
      caller: "alice",
      amount: 1_000n,
      duration: 86_400n,
      asset: { kind: "token", contractId: "ST1TEST.test-token" },
    });
  });

  it("defaults to the native asset", () => {
    expect(parseCommand(["credit", "bob", "5"])).toEqual({
      name: "credit",
      account: "bob",
      amount: 5n,
      asset: NATIVE_ASSET,
    });
  });

  it("parses withdraw, show, list and watch", () => {
    expect(parseCommand(["withdraw", "alice", "3"])).toEqual({ name: "withdraw", caller: "alice", id: 3n });
    expect(parseCommand(["show", "3"])).toEqual({ name: "show", id: 3n });
    expect(parseCommand(["list"])).toEqual({ name: "list", owner: undefined });
    expect(parseCommand(["watch"])).toEqual({ name: "watch" });
  });

  it("rejects a malformed amount", () => {
    expect(() => parseCommand(["credit", "bob", "1.5"])).toThrow(
      'amount must be an unsigned integer, got "1.5"'
    );
  });

  it("rejects an unknown command", () => {
    expect(() => parseCommand(["burn"])).toThrow('Unknown command "burn"');
  });
});

describe("parseContractId", () => {
  it("splits address and contract name", () => {
    expect(parseContractId("ST1TEST.vestlock-positions")).toEqual(["ST1TEST", "vestlock-positions"]);
  });

  it("rejects an id without a contract name", () => {
    expect(() => parseContractId("ST1TEST")).toThrow('Invalid contract id: "ST1TEST"');
  });
});
