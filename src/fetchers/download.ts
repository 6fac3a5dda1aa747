/**
 * Download utilities
 *
 * URL builders and header generators are pure functions.
 * Downloads stream through the injected HttpClient and FileSystem.
 */

import { randomUUID } from "crypto";
import { tmpdir } from "os";
import { join } from "path";
import { HttpError, redactUrl, type FileSystem, type HttpClient } from "#/core";
import { USER_AGENT } from "#/constants";

/** Encode each segment of a slash-separated path, keeping the slashes */
function encodePath(path: string): string {
  return path.split("/").map(encodeURIComponent).join("/");
}

/**
 * Build GitLab API raw file URL.
 *
 * @example
 * buildGitLabFileUrl("https://gitlab.com/api/v4", "group/repo", "docs/a.md", "main")
 * → "https://gitlab.com/api/v4/projects/group%2Frepo/repository/files/docs%2Fa.md/raw?ref=main"
 */
export function buildGitLabFileUrl(apiBase: string, projectPath: string, filePath: string, ref: string): string {
  const project = encodeURIComponent(projectPath);
  const file = encodeURIComponent(filePath);
  return `${apiBase}/projects/${project}/repository/files/${file}/raw?ref=${encodeURIComponent(ref)}`;
}

/**
 * Build GitLab API archive URL. With `path`, GitLab only packs that subtree,
 * still under the synthetic top folder.
 */
export function buildGitLabArchiveUrl(apiBase: string, projectPath: string, ref: string, path?: string): string {
  const params = new URLSearchParams({ sha: ref });
  if (path) {
    params.set("path", path);
  }
  return `${apiBase}/projects/${encodeURIComponent(projectPath)}/repository/archive.zip?${params.toString()}`;
}

export function buildGitHubZipballUrl(apiBase: string, owner: string, repo: string, ref: string): string {
  return `${apiBase}/repos/${owner}/${repo}/zipball/${encodePath(ref)}`;
}

export function buildGitHubContentsUrl(
  apiBase: string,
  owner: string,
  repo: string,
  filePath: string,
  ref: string
): string {
  return `${apiBase}/repos/${owner}/${repo}/contents/${encodePath(filePath)}?ref=${encodeURIComponent(ref)}`;
}

/**
 * Get headers for GitLab API requests.
 */
export function getGitLabHeaders(token?: string): Record<string, string> {
  const headers: Record<string, string> = {
    "User-Agent": USER_AGENT,
  };

  if (token) {
    headers["PRIVATE-TOKEN"] = token;
  }

  return headers;
}

/**
 * Get headers for GitHub API requests.
 * File downloads pass the raw media type so the body is the file itself.
 */
export function getGitHubHeaders(token?: string, accept = "application/vnd.github+json"): Record<string, string> {
  const headers: Record<string, string> = {
    Accept: accept,
    "User-Agent": USER_AGENT,
  };

  if (token) {
    headers.Authorization = `Bearer ${token}`;
  }

  return headers;
}

export const GITHUB_RAW_MEDIA_TYPE = "application/vnd.github.raw";

/**
 * Get headers for plain bearer-token downloads.
 */
export function getBearerHeaders(token?: string): Record<string, string> {
  const headers: Record<string, string> = {
    "User-Agent": USER_AGENT,
  };

  if (token) {
    headers.Authorization = `Bearer ${token}`;
  }

  return headers;
}

/**
 * Run `fn` with a fresh temp file path. The file is removed afterwards,
 * whether `fn` resolves or throws.
 */
export async function withTempFile<T>(
  fs: FileSystem,
  suffix: string,
  fn: (path: string) => Promise<T>
): Promise<T> {
  const tempPath = join(tmpdir(), `artifetch-${randomUUID()}${suffix}`);
  try {
    return await fn(tempPath);
  } finally {
    if (fs.exists(tempPath)) {
      fs.unlink(tempPath);
    }
  }
}

/**
 * Stream `url` into `targetPath`.
 * Throws HttpError (with a redacted URL) on a non-2xx response.
 */
export async function downloadToFile(
  http: HttpClient,
  fs: FileSystem,
  url: string,
  targetPath: string,
  headers: Record<string, string> = {}
): Promise<void> {
  const response = await http.fetch(url, {
    headers: { "User-Agent": USER_AGENT, ...headers },
    redirect: "follow",
  });

  if (!response.ok) {
    throw new HttpError(response.status, response.statusText, redactUrl(url));
  }

  if (!response.body) {
    fs.writeFileBinary(targetPath, Buffer.alloc(0));
    return;
  }

  await fs.writeFileStream(targetPath, response.body);
}
