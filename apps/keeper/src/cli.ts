import { NATIVE_ASSET, parseAsset, type AssetRef } from "@vestlock/types";

export type Command =
  | { name: "credit"; account: string; amount: bigint; asset: AssetRef }
  | { name: "deposit"; caller: string; amount: bigint; duration: bigint; asset: AssetRef }
  | { name: "withdraw"; caller: string; id: bigint }
  | { name: "show"; id: bigint }
  | { name: "list"; owner?: string }
  | { name: "watch" };

export const USAGE = `Usage:
  keeper credit   <account> <amount> [--asset native|ADDRESS.contract]
  keeper deposit  <caller> <amount> <duration-seconds> [--asset native|ADDRESS.contract]
  keeper withdraw <caller> <lock-id>
  keeper show     <lock-id>
  keeper list     [owner]
  keeper watch`;

function uintArg(value: string | undefined, label: string): bigint {
  if (value === undefined || !/^\d+$/.test(value)) {
    throw new Error(`${label} must be an unsigned integer, got "${value ?? ""}"`);
  }
  return BigInt(value);
}

function requiredArg(value: string | undefined, label: string): string {
  if (!value) throw new Error(`Missing ${label}`);
  return value;
}

/** Parse process.argv.slice(2) into a command. Throws with a usage hint. */
export function parseCommand(argv: string[]): Command {
  const args = [...argv];

  let asset = NATIVE_ASSET;
  const assetFlag = args.indexOf("--asset");
  if (assetFlag !== -1) {
    asset = parseAsset(requiredArg(args[assetFlag + 1], "--asset value"));
    args.splice(assetFlag, 2);
  }

  const [name, ...rest] = args;
  switch (name) {
    case "credit":
      return {
        name,
        account: requiredArg(rest[0], "account"),
        amount: uintArg(rest[1], "amount"),
        asset,
      };
    case "deposit":
      return {
        name,
        caller: requiredArg(rest[0], "caller"),
        amount: uintArg(rest[1], "amount"),
        duration: uintArg(rest[2], "duration"),
        asset,
      };
    case "withdraw":
      return { name, caller: requiredArg(rest[0], "caller"), id: uintArg(rest[1], "lock-id") };
    case "show":
      return { name, id: uintArg(rest[0], "lock-id") };
    case "list":
      return { name, owner: rest[0] };
    case "watch":
      return { name };
    default:
      throw new Error(`Unknown command "${name ?? ""}"\n${USAGE}`);
  }
}
