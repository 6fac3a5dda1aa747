/**
 * Entry point
 *
 * Resolves the provider, runs its fetcher and surfaces every failure as a
 * FetchError carrying the original error as `cause`.
 */

import { resolve } from "path";
import {
  FetchError,
  createNodeFileSystem,
  createNodeHttpClient,
  createNodeShellExecutor,
  createSilentLogger,
  isArtifetchError,
  redactCredentials,
  type EngineContext,
  type Logger,
} from "#/core";
import { loadConfig, withDotEnv, type ConfigEnv } from "#/config";
import { createFetcher, detectProvider, parseProviderKey } from "#/providers";
import type { RequestedKind } from "#/source";

export interface FetchArtifactOptions {
  /** Destination directory. Defaults to the working directory */
  dest?: string;
  /** Provider key or alias; detected from the source when omitted */
  provider?: string;
  branch?: string;
  kind?: RequestedKind;
}

export interface NodeContextOptions {
  env?: ConfigEnv;
  cwd?: string;
  logger?: Logger;
}

/**
 * Build an engine context backed by Node's fs, fetch and child_process.
 * Configuration is read once, here: environment over `<cwd>/.env` over the config file.
 */
export function createNodeContext(options: NodeContextOptions = {}): EngineContext {
  const fs = createNodeFileSystem();
  const cwd = options.cwd ?? process.cwd();
  const config = loadConfig({
    env: withDotEnv(options.env ?? process.env, fs, cwd),
    fs,
    cwd,
  });

  return {
    fs,
    http: createNodeHttpClient(config.http.timeoutMs),
    shell: createNodeShellExecutor(),
    logger: options.logger ?? createSilentLogger(),
    config,
  };
}

function toFetchError(err: unknown): FetchError {
  if (err instanceof FetchError) {
    return err;
  }
  const message = redactCredentials(err instanceof Error ? err.message : String(err));
  const code = isArtifetchError(err) ? err.code : "FETCH_FAILED";
  return new FetchError(message, code, err);
}

/**
 * Fetch `source` into `options.dest` and return the local path.
 *
 * @example
 * await fetch("gitlab://group/sub/repo@main//services/auth", { dest: "out" })
 * → "/abs/out"
 */
export async function fetch(
  source: string,
  options: FetchArtifactOptions = {},
  context?: EngineContext
): Promise<string> {
  try {
    const ctx = context ?? createNodeContext();
    const provider = options.provider ? parseProviderKey(options.provider) : detectProvider(source);
    const dest = resolve(options.dest ?? ".");

    ctx.logger.debug(`Using provider ${provider} for ${redactCredentials(source)}`);

    const result = await createFetcher(provider, ctx).fetch(source, dest, {
      branch: options.branch,
      kind: options.kind,
    });

    ctx.logger.info(`Fetched via ${provider}: ${result}`);
    return result;
  } catch (err) {
    throw toFetchError(err);
  }
}
