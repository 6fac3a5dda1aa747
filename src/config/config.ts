/**
 * Config loader
 *
 * Sources, lowest to highest priority:
 * 1. Built-in defaults
 * 2. Config file (ARTIFETCH_CONFIG, else .artifetch.yaml in cwd)
 * 3. Environment variables
 */

import { join } from "path";
import dotenv from "dotenv";
import type { FileSystem } from "#/core/interfaces";
import { ConfigurationError } from "#/core/errors";
import {
  CONFIG_FILE_NAME,
  DOTENV_FILE_NAME,
  DEFAULT_GIT_BINARY,
  DEFAULT_GIT_HOST,
  DEFAULT_GIT_PROTOCOL,
  DEFAULT_GIT_TIMEOUT_MS,
  DEFAULT_GIT_USER,
  DEFAULT_GITHUB_API_BASE,
  DEFAULT_GITLAB_API_BASE,
  DEFAULT_HTTP_TIMEOUT_MS,
  GITLAB_API_SUFFIX,
} from "#/constants";
import { ConfigEnvSchema, ConfigFileSchema, type ConfigFile } from "./schema";
import { safeParseYaml, safeValidate } from "./friendly-errors";
import type { ConfigEnv, ResolvedConfig } from "./config.types";

export interface LoadConfigOptions {
  env: ConfigEnv;
  fs: FileSystem;
  cwd: string;
}

function trimTrailingSlashes(value: string): string {
  return value.trim().replace(/\/+$/, "");
}

/**
 * Resolve the GitLab API base.
 *
 * Precedence:
 * 1. Full API base (used verbatim, trailing slash trimmed)
 * 2. Host with http(s) scheme → scheme://host/path + /api/v4
 * 3. Host without scheme → https://host + /api/v4
 * 4. https://gitlab.com/api/v4
 *
 * @example
 * resolveGitLabApiBase({ host: "git.example.com" }) → "https://git.example.com/api/v4"
 * resolveGitLabApiBase({ host: "http://git.local:8080/gitlab/" }) → "http://git.local:8080/gitlab/api/v4"
 */
export function resolveGitLabApiBase(overrides: { apiBase?: string; host?: string }): string {
  if (overrides.apiBase && overrides.apiBase.trim()) {
    return trimTrailingSlashes(overrides.apiBase);
  }

  const host = overrides.host ? trimTrailingSlashes(overrides.host) : "";
  if (host) {
    if (/^https?:\/\//i.test(host)) {
      const url = new URL(host);
      const base = trimTrailingSlashes(`${url.protocol}//${url.host}${url.pathname}`);
      return `${base}${GITLAB_API_SUFFIX}`;
    }
    return `https://${host}${GITLAB_API_SUFFIX}`;
  }

  return DEFAULT_GITLAB_API_BASE;
}

/**
 * Reduce a host override to the bare host used for clone URLs.
 *
 * @example
 * toCloneHost("https://git.example.com/") → "git.example.com"
 */
export function toCloneHost(host: string): string {
  const trimmed = trimTrailingSlashes(host);
  if (/^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed)) {
    return new URL(trimmed).host;
  }
  return trimmed;
}

/**
 * Overlay `env` on the variables of `<cwd>/.env`.
 * Values already present in `env` win; a missing .env file changes nothing.
 */
export function withDotEnv(env: ConfigEnv, fs: FileSystem, cwd: string): ConfigEnv {
  const path = join(cwd, DOTENV_FILE_NAME);
  if (!fs.exists(path)) {
    return env;
  }

  const merged: ConfigEnv = dotenv.parse(fs.readFileBinary(path));
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined) {
      merged[key] = value;
    }
  }
  return merged;
}

function readConfigFile(options: LoadConfigOptions, explicitPath?: string): ConfigFile {
  const path = explicitPath ?? join(options.cwd, CONFIG_FILE_NAME);

  if (!options.fs.exists(path)) {
    if (explicitPath) {
      throw new ConfigurationError(`Config file not found: ${explicitPath}`);
    }
    return {};
  }

  const content = options.fs.readFileBinary(path).toString("utf-8");
  const result = safeParseYaml(content, ConfigFileSchema, path);
  if (!result.success) {
    throw new ConfigurationError(result.error.message, result.error.details);
  }
  return result.data;
}

/**
 * Build the process-wide configuration.
 * Throws ConfigurationError on an invalid file or environment value.
 */
export function loadConfig(options: LoadConfigOptions): ResolvedConfig {
  const envResult = safeValidate(options.env, ConfigEnvSchema, "Invalid environment");
  if (!envResult.success) {
    throw new ConfigurationError(envResult.error.message, envResult.error.details);
  }
  const env = envResult.data;
  const file = readConfigFile(options, env.ARTIFETCH_CONFIG);

  // ARTIFETCH_GIT_HOST serves both the GitLab API and shorthand clone URLs
  const gitlabHost = env.ARTIFETCH_GIT_HOST ?? file.gitlab?.host;
  const gitHost = env.ARTIFETCH_GIT_HOST ?? file.git?.host;

  return {
    gitlab: {
      apiBase: resolveGitLabApiBase({
        apiBase: env.ARTIFETCH_GITLAB_API_BASE ?? file.gitlab?.apiBase,
        host: gitlabHost,
      }),
      token: env.GITLAB_TOKEN ?? file.gitlab?.token,
    },
    github: {
      apiBase: trimTrailingSlashes(
        env.ARTIFETCH_GITHUB_API_BASE ?? file.github?.apiBase ?? DEFAULT_GITHUB_API_BASE
      ),
      token: env.GITHUB_TOKEN ?? file.github?.token,
    },
    artifactory: {
      baseUrl: (() => {
        const url = env.ARTIFETCH_ARTIFACTORY_URL ?? file.artifactory?.url;
        return url ? trimTrailingSlashes(url) : undefined;
      })(),
      token: env.ARTIFACTORY_TOKEN ?? file.artifactory?.token,
    },
    git: {
      binary: env.GIT_BINARY ?? file.git?.binary ?? DEFAULT_GIT_BINARY,
      host: gitHost ? toCloneHost(gitHost) : DEFAULT_GIT_HOST,
      protocol: env.ARTIFETCH_GIT_PROTO ?? file.git?.protocol ?? DEFAULT_GIT_PROTOCOL,
      user: env.ARTIFETCH_GIT_USER ?? file.git?.user ?? DEFAULT_GIT_USER,
      timeoutMs: env.ARTIFETCH_GIT_TIMEOUT_MS ?? file.git?.timeoutMs ?? DEFAULT_GIT_TIMEOUT_MS,
    },
    http: {
      timeoutMs: env.ARTIFETCH_HTTP_TIMEOUT_MS ?? file.http?.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS,
    },
  };
}

/**
 * Configuration with only built-in defaults. Handy for tests and embedding.
 */
export function defaultConfig(): ResolvedConfig {
  return {
    gitlab: { apiBase: DEFAULT_GITLAB_API_BASE },
    github: { apiBase: DEFAULT_GITHUB_API_BASE },
    artifactory: {},
    git: {
      binary: DEFAULT_GIT_BINARY,
      host: DEFAULT_GIT_HOST,
      protocol: DEFAULT_GIT_PROTOCOL,
      user: DEFAULT_GIT_USER,
      timeoutMs: DEFAULT_GIT_TIMEOUT_MS,
    },
    http: { timeoutMs: DEFAULT_HTTP_TIMEOUT_MS },
  };
}
