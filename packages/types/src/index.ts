export * from "./lock";
export type * from "./position";
