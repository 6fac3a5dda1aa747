/**
 * Fetcher types
 */

import type { RequestedKind } from "#/source";

export interface FetchOptions {
  /** Branch or ref. For content sources it only applies when the URI names no ref */
  branch?: string;
  /** Content sources only; ignored by other backends */
  kind?: RequestedKind;
}

/**
 * A backend that materializes one source under `dest`.
 * Resolves to the local path of what was fetched.
 */
export interface Fetcher {
  fetch(source: string, dest: string, options?: FetchOptions): Promise<string>;
}

/** Shape of a clone source, decided before anything touches the disk */
export type CloneSourceForm = "url" | "scp" | "shorthand";

export interface CloneSpec {
  repoUrl: string;
  branch?: string;
  targetDir: string;
}
