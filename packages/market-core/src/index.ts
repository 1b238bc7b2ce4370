export { MarketDataStore } from "./marketDataStore";
export type { MarketDataStoreOptions } from "./marketDataStore";
export { lowerBound, insertSorted } from "./search";
export { assertFinite, assertPositive, assertNonNegative } from "./guards";
