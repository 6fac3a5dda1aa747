/**
 * Test utilities - Mock factories for dependency injection interfaces
 */

import AdmZip from "adm-zip";
import type {
  EngineContext,
  FileSystem,
  HttpClient,
  Logger,
  ShellExecOptions,
  ShellExecutor,
} from "#/core";
import { ShellExecError } from "#/core";
import { defaultConfig, type ResolvedConfig } from "#/config";

interface MockFileEntry {
  content: Buffer;
  isDirectory: boolean;
}

function toBuffer(data: string | Buffer): Buffer {
  return typeof data === "string" ? Buffer.from(data) : data;
}

function trimSlash(path: string): string {
  return path.length > 1 && path.endsWith("/") ? path.slice(0, -1) : path;
}

/**
 * Create a mock FileSystem with in-memory storage
 */
export function createMockFileSystem(
  initialFiles: Record<string, string | Buffer> = {}
): FileSystem & { files: Map<string, MockFileEntry>; readText(path: string): string } {
  const files = new Map<string, MockFileEntry>();

  for (const [path, content] of Object.entries(initialFiles)) {
    files.set(path, { content: toBuffer(content), isDirectory: false });
  }

  const hasChildren = (path: string): boolean => {
    const prefix = `${trimSlash(path)}/`;
    for (const filePath of files.keys()) {
      if (filePath.startsWith(prefix)) return true;
    }
    return false;
  };

  const readFileBinary = (path: string): Buffer => {
    const entry = files.get(path);
    if (!entry || entry.isDirectory) {
      throw new Error(`ENOENT: no such file or directory, open '${path}'`);
    }
    return entry.content;
  };

  return {
    files,

    readText(path: string): string {
      return readFileBinary(path).toString("utf-8");
    },

    readFileBinary,

    writeFileBinary(path: string, content: Buffer): void {
      files.set(path, { content, isDirectory: false });
    },

    async writeFileStream(path: string, body: ReadableStream<Uint8Array>): Promise<void> {
      const data = Buffer.from(await new Response(body).arrayBuffer());
      files.set(path, { content: data, isDirectory: false });
    },

    exists(path: string): boolean {
      return files.has(trimSlash(path)) || hasChildren(path);
    },

    mkdir(path: string, _options?: { recursive?: boolean }): void {
      const normalized = trimSlash(path);
      if (!files.has(normalized)) {
        files.set(normalized, { content: Buffer.alloc(0), isDirectory: true });
      }
    },

    readdir(path: string): string[] {
      const prefix = `${trimSlash(path)}/`;
      const results = new Set<string>();

      for (const filePath of files.keys()) {
        if (filePath.startsWith(prefix)) {
          const firstPart = filePath.slice(prefix.length).split("/")[0];
          if (firstPart) {
            results.add(firstPart);
          }
        }
      }

      return Array.from(results);
    },

    stat(path: string): { isDirectory: boolean; isFile: boolean; size: number } {
      const entry = files.get(trimSlash(path));
      if (!entry) {
        if (hasChildren(path)) {
          return { isDirectory: true, isFile: false, size: 0 };
        }
        throw new Error(`ENOENT: no such file or directory, stat '${path}'`);
      }

      if (entry.isDirectory) {
        return { isDirectory: true, isFile: false, size: 0 };
      }

      return { isDirectory: false, isFile: true, size: entry.content.length };
    },

    unlink(path: string): void {
      files.delete(path);
    },
  };
}

/**
 * Recorded HTTP request
 */
interface HttpCall {
  url: string;
  /** Header names lower-cased, as Headers stores them */
  headers: Record<string, string>;
}

/**
 * Create a mock HttpClient with predefined responses, keyed by exact URL.
 * Unknown URLs answer 404.
 */
export function createMockHttpClient(
  responses: Map<string, Response | (() => Response)> = new Map()
): HttpClient & { responses: Map<string, Response | (() => Response)>; calls: HttpCall[] } {
  const calls: HttpCall[] = [];

  return {
    responses,
    calls,

    async fetch(url: string, options?: RequestInit): Promise<Response> {
      calls.push({ url, headers: Object.fromEntries(new Headers(options?.headers).entries()) });

      const responseOrFactory = responses.get(url);
      if (!responseOrFactory) {
        return new Response(null, {
          status: 404,
          statusText: "Not Found",
        });
      }

      return typeof responseOrFactory === "function" ? responseOrFactory() : responseOrFactory;
    },
  };
}

/**
 * Recorded shell execution call
 */
interface ShellCall {
  command: string;
  args: string[];
  options: ShellExecOptions | undefined;
}

/**
 * Create a mock ShellExecutor with predefined command outputs.
 * Matching is done against the command name. Unmatched commands succeed with "".
 */
export function createMockShellExecutor(
  results: Record<string, string | Error> = {}
): ShellExecutor & { calls: ShellCall[] } {
  const calls: ShellCall[] = [];

  return {
    calls,

    execFile(command: string, args: string[], options?: ShellExecOptions): string {
      calls.push({ command, args, options });

      const result = results[command];
      if (result instanceof Error) {
        throw result;
      }
      return result ?? "";
    },
  };
}

/** ShellExecError as raised for a binary missing from PATH */
export function commandNotFound(command: string): ShellExecError {
  return new ShellExecError(command, { exitCode: null, errno: "ENOENT", message: "not found" });
}

/** ShellExecError as raised for a non-zero exit */
export function commandFailed(command: string, exitCode: number, stderr: string): ShellExecError {
  return new ShellExecError(command, { exitCode, stderr });
}

/**
 * Create a Logger that records every line
 */
export function createMockLogger(): Logger & { lines: Array<{ level: string; message: string }> } {
  const lines: Array<{ level: string; message: string }> = [];
  const record = (level: string) => (message: string) => {
    lines.push({ level, message });
  };

  return {
    lines,
    debug: record("debug"),
    info: record("info"),
    warn: record("warn"),
    error: record("error"),
  };
}

/**
 * Create an engine context wired to fresh mocks
 */
export function createMockContext(
  overrides: {
    config?: Partial<ResolvedConfig>;
    responses?: Map<string, Response | (() => Response)>;
    shellResults?: Record<string, string | Error>;
    files?: Record<string, string | Buffer>;
  } = {}
) {
  const fs = createMockFileSystem(overrides.files);
  const http = createMockHttpClient(overrides.responses);
  const shell = createMockShellExecutor(overrides.shellResults);
  const logger = createMockLogger();
  const config: ResolvedConfig = { ...defaultConfig(), ...overrides.config };

  const context: EngineContext = { fs, http, shell, logger, config };
  return { context, fs, http, shell, logger, config };
}

/**
 * Build a zip archive in memory. Entry names are used as given,
 * so callers include the synthetic top-level folder themselves.
 */
export function makeZip(entries: Record<string, string>): Buffer {
  const zip = new AdmZip();
  for (const [name, content] of Object.entries(entries)) {
    zip.addFile(name, Buffer.from(content));
  }
  return zip.toBuffer();
}

/**
 * Build a zipball the way hosting APIs do: every entry under one top folder.
 */
export function makeZipball(topFolder: string, files: Record<string, string>): Buffer {
  const entries: Record<string, string> = {};
  for (const [path, content] of Object.entries(files)) {
    entries[`${topFolder}/${path}`] = content;
  }
  return makeZip(entries);
}

/**
 * Rewrite an entry name in the local and central headers of a built zip.
 * Both names must have the same byte length. adm-zip cleans names on add,
 * so this is how a test gets a stored name like "top/../x".
 */
export function renameZipEntry(zip: Buffer, from: string, to: string): Buffer {
  const source = Buffer.from(from);
  const replacement = Buffer.from(to);
  if (source.length !== replacement.length) {
    throw new Error(`Entry names differ in length: ${from} / ${to}`);
  }

  const result = Buffer.from(zip);
  let index = result.indexOf(source);
  while (index !== -1) {
    replacement.copy(result, index);
    index = result.indexOf(source, index + source.length);
  }
  return result;
}

/**
 * Helper to create a binary response
 */
export function binaryResponse(data: Buffer | string, status = 200): Response {
  return new Response(new Uint8Array(toBuffer(data)), {
    status,
    headers: { "Content-Type": "application/octet-stream" },
  });
}

/**
 * Helper to create an error response
 */
export function errorResponse(status: number, statusText: string): Response {
  return new Response(null, { status, statusText });
}
