/**
 * Source parsing utilities
 *
 * Pure functions turning content source strings into FetchRequests.
 *
 * Supported formats:
 * - `gitlab://group/repo` → whole repository at HEAD
 * - `gitlab://group/sub/repo@v1.2.3` → nested namespace, explicit ref
 * - `gitlab://group/repo@main//services/auth` → directory
 * - `gitlab://group/repo@main//CHANGELOG.md` → single file
 * - `gitlab://https://gitlab.example.com/group/repo/-/tree/main/docs` → web URL, API base from host
 * - `github://owner/repo@main//src` → same grammar against GitHub
 * - `github://https://github.com/owner/repo/tree/main/src` → GitHub web URL
 */

import { ParseError, redactCredentials } from "#/core";
import {
  DEFAULT_GITHUB_API_BASE,
  DEFAULT_REF,
  GITHUB_ENTERPRISE_API_SUFFIX,
  GITHUB_PUBLIC_HOST,
  GITLAB_API_SUFFIX,
} from "#/constants";
import type {
  ContentPlatform,
  FetchKind,
  FetchRequest,
  ParseFetchUriOptions,
  RequestedKind,
} from "./source.types";

export const CONTENT_SCHEMES: Record<ContentPlatform, string> = {
  gitlab: "gitlab://",
  github: "github://",
};

const SUBPATH_SEPARATOR = "//";
const WEB_UI_EXTRAS_SEGMENT = "-";
const WEB_UI_MODES = new Set(["tree", "blob"]);

interface ParsedLocation {
  namespace: string;
  repo: string;
  ref?: string;
  subpath?: string;
  apiBase?: string;
}

function trimSlashes(value: string): string {
  return value.replace(/^\/+|\/+$/g, "");
}

function emptyToUndefined(value: string | undefined): string | undefined {
  return value ? value : undefined;
}

function fail(message: string, uri: string): never {
  throw new ParseError(message, redactCredentials(uri));
}

/**
 * Split "a/b/c" into namespace "a/b" and repo "c".
 */
function splitNamespaceRepo(segments: string[], uri: string): { namespace: string; repo: string } {
  const parts = segments.map(trimSlashes).filter(Boolean);
  const repo = parts[parts.length - 1];
  if (parts.length < 2 || !repo) {
    fail(`Expected 'namespace/repo' in '${redactCredentials(uri)}'`, uri);
  }
  return { namespace: parts.slice(0, -1).join("/"), repo };
}

/**
 * Compact grammar: <namespace>/<repo>[@<ref>][//<subpath>]
 *
 * The subpath splits off first, at the first "//", so refs may contain "/"
 * and subpaths may contain "@".
 */
function parseCompact(rest: string, uri: string): ParsedLocation {
  const subpathIndex = rest.indexOf(SUBPATH_SEPARATOR);
  const head = subpathIndex === -1 ? rest : rest.slice(0, subpathIndex);
  const subpath = subpathIndex === -1 ? undefined : rest.slice(subpathIndex + SUBPATH_SEPARATOR.length);

  const atIndex = head.indexOf("@");
  const beforeAt = atIndex === -1 ? head : head.slice(0, atIndex);
  const ref = atIndex === -1 ? undefined : head.slice(atIndex + 1);

  return {
    ...splitNamespaceRepo(beforeAt.split("/"), uri),
    ref: emptyToUndefined(ref),
    subpath: emptyToUndefined(subpath === undefined ? undefined : trimSlashes(subpath)),
  };
}

function webApiBase(platform: ContentPlatform, url: URL): string {
  if (platform === "gitlab") {
    return `${url.protocol}//${url.host}${GITLAB_API_SUFFIX}`;
  }
  if (url.hostname === GITHUB_PUBLIC_HOST) {
    return DEFAULT_GITHUB_API_BASE;
  }
  return `${url.protocol}//${url.host}${GITHUB_ENTERPRISE_API_SUFFIX}`;
}

/**
 * Split the segments that follow the repository: [mode, ref, ...subpath].
 */
function splitExtras(extras: string[]): { ref?: string; subpath?: string } {
  if (extras.length < 2) {
    return {};
  }
  return {
    ref: emptyToUndefined(extras[1]),
    subpath: emptyToUndefined(extras.slice(2).join("/")),
  };
}

/**
 * Web URL grammar, the URL of a repository page in the hosting UI.
 *
 * GitLab puts a "-" segment between the project path and extras:
 *   https://host/group/repo/-/tree/<ref>/<path>
 * GitHub has no such marker, the repo is always owner/repo:
 *   https://github.com/owner/repo/tree/<ref>/<path>
 */
function parseWebUrl(platform: ContentPlatform, rest: string, uri: string): ParsedLocation {
  let url: URL;
  try {
    url = new URL(rest);
  } catch {
    fail(`Invalid web URL in '${redactCredentials(uri)}'`, uri);
  }

  const segments = url.pathname.split("/").filter(Boolean);
  const apiBase = webApiBase(platform, url);

  const markerIndex = segments.indexOf(WEB_UI_EXTRAS_SEGMENT);
  if (markerIndex !== -1) {
    return {
      ...splitNamespaceRepo(segments.slice(0, markerIndex), uri),
      ...splitExtras(segments.slice(markerIndex + 1)),
      apiBase,
    };
  }

  const mode = segments[2];
  if (platform === "github" && mode !== undefined && WEB_UI_MODES.has(mode)) {
    return {
      ...splitNamespaceRepo(segments.slice(0, 2), uri),
      ...splitExtras(segments.slice(2)),
      apiBase,
    };
  }

  return { ...splitNamespaceRepo(segments, uri), apiBase };
}

/**
 * Infer the kind from a subpath: none → repo, last segment with a "." → file, else dir.
 */
export function inferKind(subpath: string | undefined): FetchKind {
  if (!subpath) {
    return "repo";
  }
  const lastSegment = subpath.split("/").filter(Boolean).pop() ?? "";
  return lastSegment.includes(".") ? "file" : "dir";
}

function resolveKind(requested: RequestedKind, subpath: string | undefined, uri: string): FetchKind {
  if (requested === "auto") {
    return inferKind(subpath);
  }
  if (requested !== "repo" && !subpath) {
    fail(`Kind '${requested}' requires a subpath ('//path') in '${redactCredentials(uri)}'`, uri);
  }
  return requested;
}

/**
 * Match the scheme prefix of a content source.
 */
export function contentPlatformOf(uri: string): ContentPlatform | undefined {
  const lower = uri.toLowerCase();
  if (lower.startsWith(CONTENT_SCHEMES.gitlab)) return "gitlab";
  if (lower.startsWith(CONTENT_SCHEMES.github)) return "github";
  return undefined;
}

/**
 * Parse a content source string into a FetchRequest.
 * Throws ParseError on malformed input.
 */
export function parseFetchUri(uri: string, options: ParseFetchUriOptions = {}): FetchRequest {
  const platform = contentPlatformOf(uri);
  if (!platform) {
    fail(
      `Unsupported URI scheme in '${redactCredentials(uri)}'. Expected ${Object.values(CONTENT_SCHEMES).join(" or ")}`,
      uri
    );
  }

  const rest = uri.slice(CONTENT_SCHEMES[platform].length);
  const location = /^https?:\/\//i.test(rest) ? parseWebUrl(platform, rest, uri) : parseCompact(rest, uri);

  if (location.subpath?.split("/").some((segment) => segment === "." || segment === "..")) {
    fail(`Subpath may not contain '.' or '..' segments in '${redactCredentials(uri)}'`, uri);
  }

  const kind = resolveKind(options.kind ?? "auto", location.subpath, uri);

  return {
    platform,
    namespace: location.namespace,
    repo: location.repo,
    ref: location.ref ?? DEFAULT_REF,
    refExplicit: location.ref !== undefined,
    subpath: kind === "repo" ? undefined : location.subpath,
    kind,
    apiBase: location.apiBase,
  };
}

/**
 * Serialize a FetchRequest back to the compact grammar.
 *
 * @example
 * formatFetchUri(parseFetchUri("gitlab://group/sub/repo@main//docs")) → "gitlab://group/sub/repo@main//docs"
 */
export function formatFetchUri(request: FetchRequest): string {
  const ref = request.refExplicit ? `@${request.ref}` : "";
  const subpath = request.subpath ? `${SUBPATH_SEPARATOR}${request.subpath}` : "";
  return `${CONTENT_SCHEMES[request.platform]}${request.namespace}/${request.repo}${ref}${subpath}`;
}
