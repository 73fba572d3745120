import pino from "pino";

export type { Logger } from "pino";

export const logger = pino({
  name: "vestlock-ledger",
  level: process.env.LOG_LEVEL ?? "info",
});
