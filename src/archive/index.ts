/**
 * Archive module
 *
 * Zip subset extraction with top-folder and prefix flattening.
 */

export { extractSubset, listArchiveEntries, planArchiveEntries } from "./extract";
export type { ArchiveEntry } from "./extract";
