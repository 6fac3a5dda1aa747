/**
 * Core interfaces for dependency injection.
 * These abstract away I/O operations for testability and portability.
 */

import type { ResolvedConfig } from "#/config";

export interface FileSystem {
  readFileBinary(path: string): Buffer;
  writeFileBinary(path: string, content: Buffer): void;
  /**
   * Write a response body to disk chunk by chunk.
   * Resolves once the last chunk has been flushed.
   */
  writeFileStream(path: string, body: ReadableStream<Uint8Array>): Promise<void>;
  exists(path: string): boolean;
  mkdir(path: string, options?: { recursive?: boolean }): void;
  readdir(path: string): string[];
  stat(path: string): { isDirectory: boolean; isFile: boolean; size: number };
  unlink(path: string): void;
}

export interface HttpClient {
  fetch(url: string, options?: RequestInit): Promise<Response>;
}

export interface ShellExecOptions {
  /** Kill the process after this many milliseconds */
  timeout?: number;
  cwd?: string;
}

/**
 * Shell command executor using array-based arguments.
 * Arguments go straight to the executable, never through a shell.
 *
 * Implementations throw ShellExecError on a missing executable,
 * a non-zero exit or a timeout.
 */
export interface ShellExecutor {
  execFile(command: string, args: string[], options?: ShellExecOptions): string;
}

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface EngineContext {
  fs: FileSystem;
  http: HttpClient;
  shell: ShellExecutor;
  logger: Logger;
  config: ResolvedConfig;
}
