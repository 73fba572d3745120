import "dotenv/config";

export type IdStrategy = "sequential" | "content";

function idStrategy(value: string | undefined): IdStrategy {
  return value === "content" ? "content" : "sequential";
}

export const config = {
  network: process.env.STACKS_NETWORK ?? "devnet",
  apiUrl: process.env.STACKS_API_URL ?? "http://localhost:3999",

  // SIP-009 contract ("ADDRESS.contract-name") whose token ids are lock ids.
  // When set, withdraw is authorized against the token's current owner
  // instead of the depositor recorded on the lock.
  positionNftAddress: process.env.POSITION_NFT_ADDRESS ?? "",

  // Account in the custody book that holds locked funds.
  custodyAccount: process.env.CUSTODY_ACCOUNT ?? "vestlock-custody",

  ledger: {
    stateFile: process.env.KEEPER_STATE_FILE ?? ".vestlock/state.json",
    idStrategy: idStrategy(process.env.ID_STRATEGY),
    reentrancyGuard: process.env.REENTRANCY_GUARD !== "false",
  },

  watch: {
    // How often the watch loop looks for matured locks.
    intervalMs: Number(process.env.WATCH_INTERVAL_MS ?? 60_000),
  },

  log: {
    level: process.env.LOG_LEVEL ?? "info",
    pretty: process.env.PRETTY_LOGS !== "false",
  },
} as const;
