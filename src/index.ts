/**
 * artifetch
 *
 * Fetch repositories, directories, files and binary artifacts from a single
 * source URI. I/O goes through injected interfaces, see EngineContext.
 */

// Entry point
export { fetch, createNodeContext } from "./fetch";
export type { FetchArtifactOptions, NodeContextOptions } from "./fetch";

// Core interfaces, errors, redaction, Node implementations
export * from "#/core";

// Configuration (.artifetch.yaml + environment)
export * from "#/config";

// URI grammar for content sources
export * from "#/source";

// Provider detection and fetcher table
export * from "#/providers";

// Backends
export * from "#/fetchers";

// Zip extraction
export * from "#/archive";

export { VERSION } from "#/constants";
