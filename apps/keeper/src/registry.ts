import { uintCV } from "@stacks/transactions";
import type { OwnershipRegistry } from "@vestlock/ledger";
import type { LockId } from "@vestlock/types";
import { readOnly } from "./stacks";

/**
 * Lock ownership as recorded by a SIP-009 position NFT, where the token id
 * is the lock id. `get-owner` returns (ok (optional principal)).
 */
export class StacksPositionRegistry implements OwnershipRegistry {
  constructor(private readonly contractId: string) {}

  async ownerOf(id: LockId): Promise<string | undefined> {
    const json = await readOnly(this.contractId, "get-owner", [uintCV(id)]);
    return principalFromOptional(json);
  }
}

/** Pull the principal out of cvToJSON output for (optional principal). */
export function principalFromOptional(json: unknown): string | undefined {
  if (!isRecord(json)) return undefined;
  const inner = json.value;
  if (!isRecord(inner)) return undefined;
  return typeof inner.value === "string" ? inner.value : undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}
