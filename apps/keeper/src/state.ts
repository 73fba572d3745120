/**
 * state.ts
 *
 * The keeper's ledger lives in a single JSON file. Bigints are stored as
 * decimal strings and everything is validated on the way back in.
 */

import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { z } from "zod";
import type { BalanceEntry, PendingRelease } from "@vestlock/ledger";
import { assetKey, parseAsset, type Lock, type LockId } from "@vestlock/types";

// -----------------------------------------------------------------------
// Types
// -----------------------------------------------------------------------

export type IdState =
  | { strategy: "sequential"; cursor: bigint }
  | { strategy: "content"; nonces: Map<string, bigint> };

export interface KeeperState {
  ids: IdState;
  locks: Lock[];
  retired: LockId[];
  balances: BalanceEntry[];
  pendingReleases: PendingRelease[];
}

export const STATE_VERSION = 1;

// -----------------------------------------------------------------------
// Schema
// -----------------------------------------------------------------------

const uint = z
  .string()
  .regex(/^\d+$/, "expected an unsigned integer string")
  .transform((value) => BigInt(value));

const asset = z.string().transform((key, ctx) => {
  try {
    return parseAsset(key);
  } catch (err) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: String(err) });
    return z.NEVER;
  }
});

const lockSchema = z
  .object({
    id: uint,
    owner: z.string().min(1),
    asset,
    amount: uint,
    creationTime: uint,
    duration: uint,
    maturity: uint,
  })
  .refine((lock) => lock.amount > 0n, "lock amount must be positive")
  .refine(
    (lock) => lock.maturity === lock.creationTime + lock.duration,
    "maturity must equal creationTime + duration"
  );

const idsSchema = z.discriminatedUnion("strategy", [
  z.object({ strategy: z.literal("sequential"), cursor: uint }),
  z.object({ strategy: z.literal("content"), nonces: z.record(uint) }),
]);

const stateSchema = z.object({
  version: z.literal(STATE_VERSION),
  ids: idsSchema,
  locks: z.array(lockSchema),
  retired: z.array(uint),
  balances: z.array(
    z.object({ asset: asset.transform((ref) => assetKey(ref)), account: z.string(), amount: uint })
  ),
  pendingReleases: z.array(
    z.object({
      id: uint,
      asset,
      to: z.string(),
      amount: uint,
      reason: z.string(),
      failedAt: uint,
    })
  ),
});

// -----------------------------------------------------------------------
// Public API
// -----------------------------------------------------------------------

export function emptyState(strategy: IdState["strategy"]): KeeperState {
  return {
    ids: strategy === "content" ? { strategy, nonces: new Map() } : { strategy, cursor: 0n },
    locks: [],
    retired: [],
    balances: [],
    pendingReleases: [],
  };
}

/** Parse a state document. Throws with every schema issue listed. */
export function parseState(raw: unknown): KeeperState {
  const parsed = stateSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid keeper state: ${issues}`);
  }

  const { ids, locks, retired, balances, pendingReleases } = parsed.data;
  return {
    ids:
      ids.strategy === "content"
        ? { strategy: "content", nonces: new Map(Object.entries(ids.nonces)) }
        : ids,
    locks: locks.map((lock) => ({ ...lock, state: "active" as const })),
    retired,
    balances,
    pendingReleases,
  };
}

export function serializeState(state: KeeperState): string {
  const str = (value: bigint) => value.toString();

  const doc = {
    version: STATE_VERSION,
    ids:
      state.ids.strategy === "content"
        ? {
            strategy: "content",
            nonces: Object.fromEntries(
              [...state.ids.nonces].map(([owner, nonce]) => [owner, str(nonce)])
            ),
          }
        : { strategy: "sequential", cursor: str(state.ids.cursor) },
    locks: state.locks.map((lock) => ({
      id: str(lock.id),
      owner: lock.owner,
      asset: assetKey(lock.asset),
      amount: str(lock.amount),
      creationTime: str(lock.creationTime),
      duration: str(lock.duration),
      maturity: str(lock.maturity),
    })),
    retired: state.retired.map(str),
    balances: state.balances.map((entry) => ({ ...entry, amount: str(entry.amount) })),
    pendingReleases: state.pendingReleases.map((release) => ({
      ...release,
      id: str(release.id),
      asset: assetKey(release.asset),
      amount: str(release.amount),
      failedAt: str(release.failedAt),
    })),
  };
  return `${JSON.stringify(doc, null, 2)}\n`;
}

/** Load the state file, or undefined when it does not exist yet. */
export function loadState(path: string): KeeperState | undefined {
  if (!existsSync(path)) return undefined;
  return parseState(JSON.parse(readFileSync(path, "utf8")));
}

/** Write via a temp file and rename, so a crash never leaves half a file. */
export function saveState(path: string, state: KeeperState): void {
  mkdirSync(dirname(path), { recursive: true });
  const tmp = `${path}.tmp`;
  writeFileSync(tmp, serializeState(state));
  renameSync(tmp, path);
}
