/**
 * Remote content backend
 *
 * Downloads a whole repository, one directory or one file through the
 * GitLab or GitHub REST API. Directories and repositories come down as a
 * zip archive and go through extractSubset; files are streamed as-is.
 */

import { basename, join, resolve } from "path";
import { ParseError, redactUrl, type FileSystem, type HttpClient, type Logger } from "#/core";
import type { GitHubSettings, GitLabSettings } from "#/config";
import { extractSubset } from "#/archive";
import { formatFetchUri, parseFetchUri, type FetchRequest } from "#/source";
import {
  GITHUB_RAW_MEDIA_TYPE,
  buildGitHubContentsUrl,
  buildGitHubZipballUrl,
  buildGitLabArchiveUrl,
  buildGitLabFileUrl,
  downloadToFile,
  getGitHubHeaders,
  getGitLabHeaders,
  withTempFile,
} from "./download";
import type { FetchOptions, Fetcher } from "./fetchers.types";

interface DownloadTarget {
  url: string;
  headers: Record<string, string>;
}

export class RepoContentFetcher implements Fetcher {
  private gitlab: GitLabSettings;
  private github: GitHubSettings;
  private http: HttpClient;
  private fs: FileSystem;
  private logger: Logger;

  constructor(
    gitlab: GitLabSettings,
    github: GitHubSettings,
    http: HttpClient,
    fs: FileSystem,
    logger: Logger
  ) {
    this.gitlab = gitlab;
    this.github = github;
    this.http = http;
    this.fs = fs;
    this.logger = logger;
  }

  async fetch(source: string, dest: string, options: FetchOptions = {}): Promise<string> {
    const parsed = parseFetchUri(source, { kind: options.kind });
    const request: FetchRequest =
      !parsed.refExplicit && options.branch ? { ...parsed, ref: options.branch, refExplicit: true } : parsed;
    return this.fetchRequest(request, dest);
  }

  /**
   * Fetch an already parsed request. Returns the file path for kind "file",
   * otherwise the destination directory.
   */
  async fetchRequest(request: FetchRequest, dest: string): Promise<string> {
    const destDir = resolve(dest);
    this.fs.mkdir(destDir, { recursive: true });

    this.logger.debug(`Fetching ${request.kind} ${formatFetchUri(request)}`);

    if (request.kind === "file") {
      return this.fetchFile(request, destDir);
    }
    return this.fetchArchive(request, destDir);
  }

  private async fetchFile(request: FetchRequest, destDir: string): Promise<string> {
    const subpath = request.subpath;
    if (!subpath) {
      throw new ParseError("Kind 'file' requires a subpath", formatFetchUri(request));
    }

    const target = this.fileTarget(request, subpath);
    const outputPath = join(destDir, basename(subpath));

    this.logger.debug(`Downloading ${redactUrl(target.url)}`);
    await downloadToFile(this.http, this.fs, target.url, outputPath, target.headers);
    return outputPath;
  }

  private async fetchArchive(request: FetchRequest, destDir: string): Promise<string> {
    const target = this.archiveTarget(request);
    const prefix = request.kind === "dir" ? request.subpath : undefined;

    await withTempFile(this.fs, ".zip", async (archivePath) => {
      this.logger.debug(`Downloading ${redactUrl(target.url)}`);
      await downloadToFile(this.http, this.fs, target.url, archivePath, target.headers);

      const written = extractSubset(this.fs, archivePath, destDir, prefix);
      this.logger.debug(`Extracted ${written.length} file(s) into ${destDir}`);
    });

    return destDir;
  }

  private apiBase(request: FetchRequest): string {
    const configured = request.platform === "gitlab" ? this.gitlab.apiBase : this.github.apiBase;
    return (request.apiBase ?? configured).replace(/\/+$/, "");
  }

  private fileTarget(request: FetchRequest, subpath: string): DownloadTarget {
    const apiBase = this.apiBase(request);

    if (request.platform === "gitlab") {
      return {
        url: buildGitLabFileUrl(apiBase, `${request.namespace}/${request.repo}`, subpath, request.ref),
        headers: getGitLabHeaders(this.gitlab.token),
      };
    }
    return {
      url: buildGitHubContentsUrl(apiBase, request.namespace, request.repo, subpath, request.ref),
      headers: getGitHubHeaders(this.github.token, GITHUB_RAW_MEDIA_TYPE),
    };
  }

  private archiveTarget(request: FetchRequest): DownloadTarget {
    const apiBase = this.apiBase(request);

    if (request.platform === "gitlab") {
      // GitLab pre-trims the archive to the subpath; extraction still applies the prefix
      const path = request.kind === "dir" ? request.subpath : undefined;
      return {
        url: buildGitLabArchiveUrl(apiBase, `${request.namespace}/${request.repo}`, request.ref, path),
        headers: getGitLabHeaders(this.gitlab.token),
      };
    }
    return {
      url: buildGitHubZipballUrl(apiBase, request.namespace, request.repo, request.ref),
      headers: getGitHubHeaders(this.github.token),
    };
  }
}
