/**
 * Source types
 *
 * A FetchRequest is parsed once from the source string and consumed by
 * exactly one content fetch.
 */

export type ContentPlatform = "gitlab" | "github";

export type FetchKind = "repo" | "dir" | "file";

/** Kind requested by the caller; "auto" infers it from the subpath */
export type RequestedKind = FetchKind | "auto";

export interface FetchRequest {
  readonly platform: ContentPlatform;
  readonly namespace: string;
  readonly repo: string;
  /** Branch, tag or sha. "HEAD" when the source names none */
  readonly ref: string;
  /** Whether `ref` came from the source string rather than the default */
  readonly refExplicit: boolean;
  /** Path inside the repository; always undefined for kind "repo" */
  readonly subpath?: string;
  readonly kind: FetchKind;
  /** API base derived from a web URL source; wins over configuration */
  readonly apiBase?: string;
}

export interface ParseFetchUriOptions {
  kind?: RequestedKind;
}
