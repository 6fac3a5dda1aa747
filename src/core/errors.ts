/**
 * Typed error classes for artifetch
 *
 * Error hierarchy:
 * - ArtifetchError (base)
 *   - ParseError (malformed source string)
 *   - DetectionError (provider cannot be inferred from the source)
 *   - UnsupportedProviderError (unknown provider key)
 *   - ConfigurationError (invalid config file or environment value)
 *   - DestinationExistsError (clone target already populated)
 *   - ToolNotFoundError (external executable missing)
 *   - CloneError (git clone exited non-zero)
 *   - HttpError (non-2xx response)
 *   - ExtractionError (unreadable or unsafe archive)
 *   - FetchError (single error surfaced by the fetch entry point)
 * - ShellExecError (raised by ShellExecutor implementations)
 */

/** Base error class for all artifetch errors */
export class ArtifetchError extends Error {
  readonly code: string;

  constructor(message: string, code: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ArtifetchError";
    this.code = code;
    Error.captureStackTrace?.(this, this.constructor);
  }
}

export class ParseError extends ArtifetchError {
  readonly source: string;

  constructor(message: string, source: string) {
    super(message, "PARSE_ERROR");
    this.name = "ParseError";
    this.source = source;
  }
}

export class DetectionError extends ArtifetchError {
  constructor(message: string) {
    super(message, "DETECTION_ERROR");
    this.name = "DetectionError";
  }
}

export class UnsupportedProviderError extends ArtifetchError {
  readonly provider: string;

  constructor(provider: string, supported: readonly string[]) {
    super(
      `Unsupported provider: ${provider}. Expected one of: ${supported.join(", ")}`,
      "UNSUPPORTED_PROVIDER"
    );
    this.name = "UnsupportedProviderError";
    this.provider = provider;
  }
}

export class ConfigurationError extends ArtifetchError {
  readonly details: string[];

  constructor(message: string, details: string[] = []) {
    const suffix = details.length > 0 ? `:\n${details.map((d) => `  ${d}`).join("\n")}` : "";
    super(`${message}${suffix}`, "CONFIGURATION_ERROR");
    this.name = "ConfigurationError";
    this.details = details;
  }
}

export class DestinationExistsError extends ArtifetchError {
  readonly path: string;

  constructor(path: string) {
    super(`Destination '${path}' already exists and is not empty.`, "DESTINATION_EXISTS");
    this.name = "DestinationExistsError";
    this.path = path;
  }
}

export class ToolNotFoundError extends ArtifetchError {
  readonly tool: string;

  constructor(tool: string, remediation: string) {
    super(`${tool} not found on PATH. ${remediation}`, "TOOL_NOT_FOUND");
    this.name = "ToolNotFoundError";
    this.tool = tool;
  }
}

export class CloneError extends ArtifetchError {
  constructor(message: string, cause?: unknown) {
    super(message, "CLONE_ERROR", { cause });
    this.name = "CloneError";
  }
}

export class HttpError extends ArtifetchError {
  readonly status: number;
  readonly url: string;

  /** `url` must already be redacted */
  constructor(status: number, statusText: string, url: string) {
    const text = statusText ? ` ${statusText}` : "";
    super(`HTTP ${status}${text} for ${url}`, "HTTP_ERROR");
    this.name = "HttpError";
    this.status = status;
    this.url = url;
  }
}

export class ExtractionError extends ArtifetchError {
  constructor(message: string, cause?: unknown) {
    super(message, "EXTRACTION_ERROR", { cause });
    this.name = "ExtractionError";
  }
}

/**
 * The one error kind callers of `fetch` need to handle.
 * The original failure stays available as `cause`.
 */
export class FetchError extends ArtifetchError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, { cause });
    this.name = "FetchError";
  }
}

/** Failure of a ShellExecutor call */
export class ShellExecError extends Error {
  readonly command: string;
  /** Process exit code, or null when the process never ran or was killed */
  readonly exitCode: number | null;
  /** System error code, e.g. ENOENT or ETIMEDOUT */
  readonly errno: string | undefined;
  readonly stderr: string;

  constructor(
    command: string,
    details: { exitCode: number | null; errno?: string; stderr?: string; message?: string }
  ) {
    const reason =
      details.message ??
      (details.exitCode !== null ? `exited with code ${details.exitCode}` : "failed to run");
    super(`${command} ${reason}`);
    this.name = "ShellExecError";
    this.command = command;
    this.exitCode = details.exitCode;
    this.errno = details.errno;
    this.stderr = details.stderr ?? "";
  }
}

export function isArtifetchError(error: unknown): error is ArtifetchError {
  return error instanceof ArtifetchError;
}
