/**
 * Providers module
 *
 * Provider detection, key parsing and the fetcher table.
 */

export * from "./providers.types";
export { detectProvider, parseProviderKey } from "./detect";
export { createFetcher, FETCHER_FACTORIES } from "./factory";
