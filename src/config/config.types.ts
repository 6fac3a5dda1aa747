/**
 * Config types
 *
 * ResolvedConfig is built once per process from the config file and the
 * environment, then handed to fetcher constructors. Fetchers never read
 * process.env themselves.
 */

export type { ConfigFile, GitProtocol } from "./schema";
import type { GitProtocol } from "./schema";

export interface GitLabSettings {
  /** API base including /api/v4, no trailing slash */
  apiBase: string;
  token?: string;
}

export interface GitHubSettings {
  apiBase: string;
  token?: string;
}

export interface ArtifactorySettings {
  /** Base URL repository keys are appended to, e.g. https://host/artifactory */
  baseUrl?: string;
  token?: string;
}

export interface GitSettings {
  binary: string;
  host: string;
  protocol: GitProtocol;
  user: string;
  timeoutMs: number;
}

export interface HttpSettings {
  timeoutMs: number;
}

export interface ResolvedConfig {
  gitlab: GitLabSettings;
  github: GitHubSettings;
  artifactory: ArtifactorySettings;
  git: GitSettings;
  http: HttpSettings;
}

/** Environment variables read by loadConfig */
export type ConfigEnv = Record<string, string | undefined>;
