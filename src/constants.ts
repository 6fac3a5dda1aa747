/**
 * Global constants for artifetch
 */

export const USER_AGENT = "artifetch";

// Ref used when a source names no branch, tag or sha
export const DEFAULT_REF = "HEAD";

export const GITLAB_API_SUFFIX = "/api/v4";
export const DEFAULT_GITLAB_API_BASE = `https://gitlab.com${GITLAB_API_SUFFIX}`;

export const GITHUB_PUBLIC_HOST = "github.com";
export const DEFAULT_GITHUB_API_BASE = "https://api.github.com";
// GitHub Enterprise serves its REST API under /api/v3 of the web host
export const GITHUB_ENTERPRISE_API_SUFFIX = "/api/v3";

// Shorthand clone sources (group/repo) expand against these
export const DEFAULT_GIT_HOST = "gitlab.com";
export const DEFAULT_GIT_USER = "git";
export const DEFAULT_GIT_PROTOCOL = "ssh";
export const DEFAULT_GIT_BINARY = "git";

export const DEFAULT_HTTP_TIMEOUT_MS = 60_000;
export const DEFAULT_GIT_TIMEOUT_MS = 600_000;

export const CONFIG_FILE_NAME = ".artifetch.yaml";
export const DOTENV_FILE_NAME = ".env";

// Literal token that marks a source as an artifact-repository location
export const ARTIFACT_REPOSITORY_TOKEN = "artifactory";

export const VERSION = "0.1.0";
