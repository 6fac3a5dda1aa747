/**
 * Node.js implementations of the core interfaces.
 * Everything else in the engine only sees the interfaces.
 */

import {
  createWriteStream,
  existsSync,
  mkdirSync,
  readFileSync,
  readdirSync,
  statSync,
  unlinkSync,
  writeFileSync,
} from "fs";
import { execFileSync } from "child_process";
import { Readable } from "stream";
import { pipeline } from "stream/promises";
import type { FileSystem, HttpClient, Logger, ShellExecOptions, ShellExecutor } from "./interfaces";
import { ShellExecError } from "./errors";

export function createNodeFileSystem(): FileSystem {
  return {
    readFileBinary: (path) => readFileSync(path),
    writeFileBinary: (path, content) => writeFileSync(path, content),
    async writeFileStream(path, body) {
      await pipeline(Readable.fromWeb(body), createWriteStream(path));
    },
    exists: (path) => existsSync(path),
    mkdir: (path, options) => {
      mkdirSync(path, { recursive: options?.recursive ?? false });
    },
    readdir: (path) => readdirSync(path),
    stat(path) {
      const stats = statSync(path);
      return { isDirectory: stats.isDirectory(), isFile: stats.isFile(), size: stats.size };
    },
    unlink: (path) => unlinkSync(path),
  };
}

/**
 * HTTP client over the global fetch.
 * Every request gets a fixed timeout unless the caller passes its own signal.
 */
export function createNodeHttpClient(timeoutMs: number): HttpClient {
  return {
    fetch(url, options = {}) {
      return fetch(url, {
        redirect: "follow",
        ...options,
        signal: options.signal ?? AbortSignal.timeout(timeoutMs),
      });
    },
  };
}

interface ExecFileFailure {
  code?: string;
  status?: number | null;
  stderr?: Buffer | string;
  message?: string;
}

function isExecFileFailure(err: unknown): err is Error & ExecFileFailure {
  return err instanceof Error;
}

export function createNodeShellExecutor(): ShellExecutor {
  return {
    execFile(command: string, args: string[], options: ShellExecOptions = {}): string {
      try {
        return execFileSync(command, args, {
          encoding: "utf-8",
          cwd: options.cwd,
          timeout: options.timeout,
          stdio: ["ignore", "pipe", "pipe"],
        });
      } catch (err) {
        if (!isExecFileFailure(err)) {
          throw new ShellExecError(command, { exitCode: null, message: String(err) });
        }
        const stderr = typeof err.stderr === "string" ? err.stderr : err.stderr?.toString("utf-8");
        if (err.code === "ENOENT") {
          throw new ShellExecError(command, { exitCode: null, errno: "ENOENT", message: "not found" });
        }
        if (err.code === "ETIMEDOUT") {
          throw new ShellExecError(command, {
            exitCode: null,
            errno: "ETIMEDOUT",
            stderr,
            message: `timed out after ${options.timeout}ms`,
          });
        }
        throw new ShellExecError(command, {
          exitCode: err.status ?? null,
          errno: err.code,
          stderr,
        });
      }
    },
  };
}

export function createSilentLogger(): Logger {
  return {
    debug: () => {},
    info: () => {},
    warn: () => {},
    error: () => {},
  };
}
