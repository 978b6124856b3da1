export * from "./errors.js";
export * from "./currency.js";
export { CurrencyBalance } from "./CurrencyBalance.js";
export type { CurrencyAmount } from "./CurrencyBalance.js";
export * from "./splits.js";
export * from "./ledger.js";
export * from "./aggregate.js";
export * from "./subscriptions.js";
export * from "./timeline.js";
export * from "./settlement.js";
