/**
 * Vestlock keeper
 *
 * Hosts a time-lock ledger on a local state file.
 *
 * Usage:
 *   npm run keeper -- credit alice 1000
 *   npm run keeper -- deposit alice 1000 86400
 *   npm run keeper -- withdraw alice 0
 *   npm run keeper -- watch
 *
 * Environment variables (see .env.example):
 *   STACKS_NETWORK, STACKS_API_URL, POSITION_NFT_ADDRESS, CUSTODY_ACCOUNT,
 *   KEEPER_STATE_FILE, ID_STRATEGY, REENTRANCY_GUARD, WATCH_INTERVAL_MS,
 *   LOG_LEVEL, PRETTY_LOGS
 */

import { assetKey } from "@vestlock/types";
import { parseCommand, USAGE } from "./cli";
import { config } from "./config";
import { Keeper, type LockView } from "./keeper";
import { logger } from "./logger";
import { StacksPositionRegistry } from "./registry";

function describe({ lock, value, matured }: LockView): string {
  return (
    `#${lock.id} owner=${lock.owner} asset=${assetKey(lock.asset)} amount=${lock.amount} ` +
    `value=${value} maturity=${lock.maturity}${matured ? " (matured)" : ""}`
  );
}

async function main() {
  const command = parseCommand(process.argv.slice(2));

  const keeper = Keeper.open({
    statePath: config.ledger.stateFile,
    idStrategy: config.ledger.idStrategy,
    custodyAccount: config.custodyAccount,
    reentrancyGuard: config.ledger.reentrancyGuard,
    logger,
    ownership: config.positionNftAddress
      ? new StacksPositionRegistry(config.positionNftAddress)
      : undefined,
  });

  switch (command.name) {
    case "credit":
      keeper.credit(command.account, command.asset, command.amount);
      break;
    case "deposit": {
      const id = await keeper.deposit(command.caller, command.asset, command.amount, command.duration);
      logger.info(`Lock id: ${id}`);
      break;
    }
    case "withdraw": {
      const amount = await keeper.withdraw(command.caller, command.id);
      logger.info(`Released ${amount}`);
      break;
    }
    case "show":
      logger.info(describe(keeper.show(command.id)));
      break;
    case "list": {
      const views = keeper.list(command.owner);
      if (views.length === 0) logger.info("No active locks.");
      for (const view of views) logger.info(describe(view));
      break;
    }
    case "watch": {
      keeper.start(config.watch.intervalMs);

      // Graceful shutdown on SIGINT / SIGTERM
      const shutdown = () => {
        keeper.stop();
        process.exit(0);
      };
      process.on("SIGINT", shutdown);
      process.on("SIGTERM", shutdown);
      break;
    }
  }
}

main().catch((err) => {
  logger.error(`Fatal: ${err instanceof Error ? err.message : String(err)}`);
  if (err instanceof Error && err.message.startsWith("Missing")) logger.info(USAGE);
  process.exitCode = 1;
});
