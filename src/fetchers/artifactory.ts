/**
 * Artifact repository backend
 *
 * One download-by-coordinates call against an Artifactory-style generic
 * repository:
 * - `artifactory://<repoKey>/<path>` resolved against the configured base URL
 * - `https://host/artifactory/<repoKey>/<path>` downloaded as given
 */

import { resolve } from "path";
import {
  ConfigurationError,
  ParseError,
  isWithinTarget,
  redactCredentials,
  redactUrl,
  type FileSystem,
  type HttpClient,
  type Logger,
} from "#/core";
import type { ArtifactorySettings } from "#/config";
import { ARTIFACT_REPOSITORY_TOKEN } from "#/constants";
import { downloadToFile, getBearerHeaders } from "./download";
import type { Fetcher } from "./fetchers.types";

const SCHEME = `${ARTIFACT_REPOSITORY_TOKEN}://`;

export interface ArtifactLocation {
  url: string;
  fileName: string;
}

function fail(message: string, source: string): never {
  const redacted = redactCredentials(source);
  throw new ParseError(`${message} in '${redacted}'`, redacted);
}

/**
 * The name the artifact is saved under must be a single plain path segment.
 */
function checkFileName(fileName: string, source: string): string {
  if (fileName === "." || fileName === ".." || /[/\\]/.test(fileName)) {
    fail(`Artifact name '${fileName}' is not a plain file name`, source);
  }
  return fileName;
}

function decodeSegment(segment: string, source: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return fail("Malformed percent-encoding", source);
  }
}

/**
 * Resolve an artifact source to its download URL and file name.
 *
 * @example
 * resolveArtifactLocation("artifactory://libs-release/com/acme/app-1.0.jar", { baseUrl: "https://repo.example.com/artifactory" })
 * → { url: "https://repo.example.com/artifactory/libs-release/com/acme/app-1.0.jar", fileName: "app-1.0.jar" }
 */
export function resolveArtifactLocation(source: string, settings: ArtifactorySettings): ArtifactLocation {
  if (source.toLowerCase().startsWith(SCHEME)) {
    const rest = source.slice(SCHEME.length);
    if (rest.endsWith("/")) {
      fail("Expected a file path rather than a folder", source);
    }

    const segments = rest.split("/").filter(Boolean);
    const fileName = segments[segments.length - 1];
    if (segments.length < 2 || !fileName) {
      fail("Expected 'artifactory://<repoKey>/<path>'", source);
    }

    if (!settings.baseUrl) {
      throw new ConfigurationError(
        "Artifactory base URL is not configured. Set ARTIFETCH_ARTIFACTORY_URL or artifactory.url in the config file"
      );
    }

    return {
      url: `${settings.baseUrl}/${segments.map(encodeURIComponent).join("/")}`,
      fileName: checkFileName(fileName, source),
    };
  }

  if (/^https?:\/\//i.test(source)) {
    let url: URL;
    try {
      url = new URL(source);
    } catch {
      fail("Invalid artifact URL", source);
    }

    if (url.pathname.endsWith("/")) {
      fail("Expected a file path rather than a folder", source);
    }
    const segments = url.pathname.split("/").filter(Boolean);
    const last = segments[segments.length - 1];
    if (segments.length < 2 || !last) {
      fail("Expected '<repoKey>/<path>' after the host", source);
    }

    return { url: source, fileName: checkFileName(decodeSegment(last, source), source) };
  }

  return fail("Unsupported artifact source. Expected artifactory://<repoKey>/<path> or an http(s) URL", source);
}

export class ArtifactoryFetcher implements Fetcher {
  private settings: ArtifactorySettings;
  private http: HttpClient;
  private fs: FileSystem;
  private logger: Logger;

  constructor(settings: ArtifactorySettings, http: HttpClient, fs: FileSystem, logger: Logger) {
    this.settings = settings;
    this.http = http;
    this.fs = fs;
    this.logger = logger;
  }

  async fetch(source: string, dest: string): Promise<string> {
    const location = resolveArtifactLocation(source, this.settings);
    const destDir = resolve(dest);
    const outputPath = resolve(destDir, location.fileName);
    if (!isWithinTarget(destDir, outputPath)) {
      throw new ParseError(`Artifact path escapes destination: ${location.fileName}`, redactCredentials(source));
    }

    this.fs.mkdir(destDir, { recursive: true });
    this.logger.debug(`Downloading ${redactUrl(location.url)}`);

    await downloadToFile(this.http, this.fs, location.url, outputPath, getBearerHeaders(this.settings.token));
    return outputPath;
  }
}
