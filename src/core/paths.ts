import { isAbsolute, relative } from "path";

/**
 * Whether `resolvedPath` lies strictly inside `resolvedTargetDir`.
 * Both paths must already be resolved.
 */
export function isWithinTarget(resolvedTargetDir: string, resolvedPath: string): boolean {
  if (resolvedPath === resolvedTargetDir) return false;
  const rel = relative(resolvedTargetDir, resolvedPath);
  return !(rel.startsWith("..") || isAbsolute(rel));
}
