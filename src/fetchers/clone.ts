/**
 * Repository clone backend
 *
 * Shallow-clones a repository with the git CLI into `dest/<repo name>`.
 *
 * Accepted sources:
 * - `https://host/org/repo.git`, `http://...`, `ssh://git@host/org/repo.git`
 * - SCP style: `git@host:org/repo.git`
 * - shorthand: `group/sub/repo`, expanded against the configured host
 *
 * The branch always comes from the options, never from the source string.
 */

import { join, resolve } from "path";
import {
  CloneError,
  DestinationExistsError,
  ParseError,
  ShellExecError,
  ToolNotFoundError,
  redactCredentials,
  type FileSystem,
  type Logger,
  type ShellExecutor,
} from "#/core";
import type { GitSettings } from "#/config";
import type { CloneSourceForm, CloneSpec, FetchOptions, Fetcher } from "./fetchers.types";

const URL_PREFIXES = ["http://", "https://", "ssh://"];
const ANY_SCHEME = /^[a-z][a-z0-9+.-]*:\/\//i;
const SCP_PREFIX = /^[^@\s/:]+@[^@\s/:]+:/;

function invalid(source: string, reason: string): never {
  const redacted = redactCredentials(source);
  throw new ParseError(`Invalid Git source format: '${redacted}'\n${reason}`, redacted);
}

/**
 * Classify a clone source. Throws ParseError for unsupported schemes
 * and unrecognised shapes.
 */
export function classifyCloneSource(source: string): CloneSourceForm {
  const lower = source.toLowerCase();
  if (URL_PREFIXES.some((prefix) => lower.startsWith(prefix))) {
    return "url";
  }
  if (ANY_SCHEME.test(source)) {
    const redacted = redactCredentials(source);
    throw new ParseError(`Invalid URL scheme in source: '${redacted}'`, redacted);
  }
  if (SCP_PREFIX.test(source)) {
    return "scp";
  }
  if (source.includes("/")) {
    return "shorthand";
  }
  return invalid(
    source,
    "Expected a full Git URL (HTTPS/SSH/SCP) or shorthand like 'group/repo'."
  );
}

/**
 * Whether `source` carries an "@" that looks like a branch delimiter.
 * Userinfo in a URL authority and the SCP user are not stray.
 */
export function hasStrayAt(source: string, form: CloneSourceForm): boolean {
  switch (form) {
    case "url": {
      const authorityStart = source.indexOf("://") + 3;
      const pathStart = source.indexOf("/", authorityStart);
      return pathStart !== -1 && source.slice(pathStart + 1).includes("@");
    }
    case "scp":
      return source.slice(source.indexOf(":") + 1).includes("@");
    case "shorthand":
      return source.includes("@");
  }
}

/**
 * Turn a validated source into a repository URL git understands.
 *
 * @example
 * normalizeCloneSource("group/repo", "shorthand", settings) → "git@gitlab.com:group/repo.git"
 */
export function normalizeCloneSource(source: string, form: CloneSourceForm, settings: GitSettings): string {
  if (form !== "shorthand") {
    return source;
  }

  const path = source.replace(/^\/+|\/+$/g, "").replace(/\.git$/, "");
  if (path.split("/").filter(Boolean).length < 2) {
    invalid(source, "Shorthand sources need at least 'namespace/repo'.");
  }

  if (settings.protocol === "ssh") {
    return `${settings.user}@${settings.host}:${path}.git`;
  }
  return `${settings.protocol}://${settings.host}/${path}.git`;
}

/**
 * Directory name git would pick: last path segment without ".git".
 */
export function repoDirName(repoUrl: string): string {
  const last = repoUrl.replace(/\/+$/, "").split(/[/:]/).pop() ?? "";
  const name = last.endsWith(".git") ? last.slice(0, -".git".length) : last;
  if (!name) {
    invalid(repoUrl, "Cannot derive a repository name from the source.");
  }
  return name;
}

/**
 * Build the git argv for a shallow clone. The target is always last.
 */
export function buildCloneArgs(spec: CloneSpec): string[] {
  const args = ["clone", "--depth", "1", "--no-tags"];
  if (spec.branch) {
    args.push("-b", spec.branch);
  }
  args.push(spec.repoUrl, spec.targetDir);
  return args;
}

export class RepoCloneFetcher implements Fetcher {
  private settings: GitSettings;
  private shell: ShellExecutor;
  private fs: FileSystem;
  private logger: Logger;

  constructor(settings: GitSettings, shell: ShellExecutor, fs: FileSystem, logger: Logger) {
    this.settings = settings;
    this.shell = shell;
    this.fs = fs;
    this.logger = logger;
  }

  /**
   * Validate, normalize and plan the clone without running anything.
   */
  plan(source: string, dest: string, branch?: string): CloneSpec {
    const form = classifyCloneSource(source);
    if (hasStrayAt(source, form)) {
      invalid(
        source,
        "Detected '@' after the repository path. Pass the branch separately (--branch)."
      );
    }

    const repoUrl = normalizeCloneSource(source, form, this.settings);
    return {
      repoUrl,
      branch: branch || undefined,
      targetDir: join(resolve(dest), repoDirName(repoUrl)),
    };
  }

  async fetch(source: string, dest: string, options: FetchOptions = {}): Promise<string> {
    const spec = this.plan(source, dest, options.branch);

    this.ensureClonable(spec.targetDir);
    this.fs.mkdir(resolve(dest), { recursive: true });

    this.logger.debug(`Cloning ${redactCredentials(spec.repoUrl)} into ${spec.targetDir}`);

    try {
      this.shell.execFile(this.settings.binary, buildCloneArgs(spec), {
        timeout: this.settings.timeoutMs,
      });
    } catch (err) {
      throw this.toCloneFailure(err, source);
    }

    return spec.targetDir;
  }

  private ensureClonable(targetDir: string): void {
    if (!this.fs.exists(targetDir)) {
      return;
    }
    const stats = this.fs.stat(targetDir);
    if (!stats.isDirectory || this.fs.readdir(targetDir).length > 0) {
      throw new DestinationExistsError(targetDir);
    }
  }

  private toCloneFailure(err: unknown, source: string): Error {
    if (err instanceof ShellExecError && err.errno === "ENOENT") {
      return new ToolNotFoundError(
        this.settings.binary,
        "Install git or set GIT_BINARY to the git executable."
      );
    }

    const detail =
      err instanceof ShellExecError
        ? err.stderr.trim() || err.message
        : err instanceof Error
          ? err.message
          : String(err);

    return new CloneError(
      `git clone failed for source '${redactCredentials(source)}': ${redactCredentials(detail)}`,
      err
    );
  }
}
