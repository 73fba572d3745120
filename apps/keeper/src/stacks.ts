/**
 * stacks.ts
 *
 * Read-only access to Stacks contracts.
 *
 * Uses @stacks/transactions v6 API (callReadOnlyFunction, cvToJSON…).
 */

import {
  callReadOnlyFunction,
  ClarityType,
  cvToJSON,
  type ClarityValue,
} from "@stacks/transactions";
import { StacksMainnet, StacksTestnet, StacksDevnet } from "@stacks/network";
import { config } from "./config";

// -----------------------------------------------------------------------
// Network
// -----------------------------------------------------------------------

function getNetwork() {
  switch (config.network) {
    case "mainnet":
      return new StacksMainnet({ url: config.apiUrl });
    case "testnet":
      return new StacksTestnet({ url: config.apiUrl });
    default:
      return new StacksDevnet({ url: config.apiUrl });
  }
}

// -----------------------------------------------------------------------
// Contract address parsing
// -----------------------------------------------------------------------

/** Split "ST1ABC…XYZ.contract-name" into [contractAddress, contractName]. */
export function parseContractId(id: string): [string, string] {
  const dot = id.lastIndexOf(".");
  if (dot <= 0 || dot === id.length - 1) throw new Error(`Invalid contract id: "${id}"`);
  return [id.slice(0, dot), id.slice(dot + 1)];
}

// -----------------------------------------------------------------------
// Public API
// -----------------------------------------------------------------------

/**
 * Call a read-only contract function and return the parsed JSON value.
 * Unwraps a top-level (ok …) automatically; throws on (err …).
 */
export async function readOnly(
  contractId: string,
  functionName: string,
  functionArgs: ClarityValue[] = []
): Promise<unknown> {
  const [contractAddress, contractName] = parseContractId(contractId);

  const result = await callReadOnlyFunction({
    network: getNetwork(),
    contractAddress,
    contractName,
    functionName,
    functionArgs,
    senderAddress: contractAddress,
  });

  if (result.type === ClarityType.ResponseErr) {
    const json = cvToJSON(result);
    throw new Error(`${contractName}::${functionName} returned err ${JSON.stringify(json.value)}`);
  }

  if (result.type === ClarityType.ResponseOk) {
    return cvToJSON(result.value);
  }

  return cvToJSON(result);
}
