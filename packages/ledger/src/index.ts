export * from "./account-book";
export * from "./clock";
export * from "./custody";
export * from "./errors";
export * from "./ids";
export * from "./ledger";
export * from "./logger";
export * from "./pool";
export * from "./store";
export type * from "./transfer";
export * from "./vesting";
