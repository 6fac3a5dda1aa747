/**
 * Fetcher factory
 *
 * Single decision point for creating fetchers.
 * The table is the ONLY place that knows about specific backend implementations.
 */

import type { EngineContext } from "#/core";
import { ArtifactoryFetcher, RepoCloneFetcher, RepoContentFetcher, type Fetcher } from "#/fetchers";
import type { ProviderKind } from "./providers.types";

type FetcherFactory = (context: EngineContext) => Fetcher;

export const FETCHER_FACTORIES: { readonly [K in ProviderKind]: FetcherFactory } = {
  artifactory: ({ config, http, fs, logger }) => new ArtifactoryFetcher(config.artifactory, http, fs, logger),
  content: ({ config, http, fs, logger }) =>
    new RepoContentFetcher(config.gitlab, config.github, http, fs, logger),
  git: ({ config, shell, fs, logger }) => new RepoCloneFetcher(config.git, shell, fs, logger),
};

/**
 * Create the fetcher for a provider kind
 */
export function createFetcher(kind: ProviderKind, context: EngineContext): Fetcher {
  return FETCHER_FACTORIES[kind](context);
}
