/**
 * Zip subset extraction.
 *
 * Hosting APIs wrap every archive in one synthetic top-level folder
 * (e.g. "repo-main-1a2b3c/"). Extraction always strips it and, when a
 * subset prefix is given, keeps only entries under that prefix with the
 * prefix itself flattened away:
 *
 *   top/a/b/c.txt, top/a/d.txt  --prefix "a"-->  dest/b/c.txt, dest/d.txt
 */

import AdmZip from "adm-zip";
import { dirname, isAbsolute, join, normalize, resolve } from "path";
import { ExtractionError, isWithinTarget, type FileSystem } from "#/core";

export interface ArchiveEntry {
  /** Raw zip entry name */
  archivePath: string;
  /** Path under the destination after top-folder and prefix stripping */
  relativePath: string;
}

function trimSlashes(value: string): string {
  return value.replace(/^\/+|\/+$/g, "");
}

function openArchive(fs: FileSystem, archivePath: string): AdmZip {
  try {
    return new AdmZip(fs.readFileBinary(archivePath));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ExtractionError(`Cannot read archive ${archivePath}: ${message}`, err);
  }
}

/**
 * Map zip entry names to destination-relative paths.
 * Directory entries and entries outside the prefix are dropped.
 */
export function planArchiveEntries(names: string[], subsetPrefix?: string): ArchiveEntry[] {
  const first = names[0];
  if (first === undefined) {
    return [];
  }

  const top = `${first.split("/")[0]}/`;
  const prefix = subsetPrefix ? trimSlashes(subsetPrefix) : "";
  const entries: ArchiveEntry[] = [];

  for (const name of names) {
    if (name.endsWith("/")) continue;

    let rel = name.startsWith(top) ? name.slice(top.length) : name;

    if (prefix) {
      // The prefix itself is the directory marker, not content
      if (rel === prefix || !rel.startsWith(`${prefix}/`)) continue;
      rel = rel.slice(prefix.length + 1);
    }

    if (rel) {
      entries.push({ archivePath: name, relativePath: rel });
    }
  }

  return entries;
}

/**
 * List the entries extractSubset would write, without writing anything.
 */
export function listArchiveEntries(fs: FileSystem, archivePath: string, subsetPrefix?: string): ArchiveEntry[] {
  const zip = openArchive(fs, archivePath);
  return planArchiveEntries(
    zip.getEntries().map((entry) => entry.entryName),
    subsetPrefix
  );
}

/**
 * Extract the archive at `archivePath` into `destDir`.
 *
 * Existing files at colliding paths are overwritten. Not transactional:
 * a failure part-way leaves what was already written.
 * An empty archive or a prefix matching nothing writes nothing.
 */
export function extractSubset(
  fs: FileSystem,
  archivePath: string,
  destDir: string,
  subsetPrefix?: string
): ArchiveEntry[] {
  const zip = openArchive(fs, archivePath);
  const zipEntries = zip.getEntries();
  const byName = new Map(zipEntries.map((entry) => [entry.entryName, entry]));
  const planned = planArchiveEntries(
    zipEntries.map((entry) => entry.entryName),
    subsetPrefix
  );

  const resolvedDest = resolve(destDir);
  fs.mkdir(destDir, { recursive: true });

  for (const entry of planned) {
    const target = resolve(resolvedDest, normalize(entry.relativePath));
    if (isAbsolute(entry.relativePath) || !isWithinTarget(resolvedDest, target)) {
      throw new ExtractionError(`Archive entry escapes destination: ${entry.archivePath}`);
    }

    const zipEntry = byName.get(entry.archivePath);
    if (!zipEntry) continue;

    let data: Buffer;
    try {
      data = zipEntry.getData();
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new ExtractionError(`Cannot read archive entry ${entry.archivePath}: ${message}`, err);
    }

    const outputPath = join(destDir, entry.relativePath);
    fs.mkdir(dirname(outputPath), { recursive: true });
    fs.writeFileBinary(outputPath, data);
  }

  return planned;
}
