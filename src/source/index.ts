/**
 * Source module
 *
 * URI grammar for remote content sources (gitlab://, github://).
 */

export * from "./source.types";
export { parseFetchUri, formatFetchUri, inferKind, contentPlatformOf, CONTENT_SCHEMES } from "./source";
