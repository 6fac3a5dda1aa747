/**
 * Fetchers module
 *
 * One backend per provider kind plus the shared download helpers.
 */

export * from "./fetchers.types";
export {
  RepoCloneFetcher,
  classifyCloneSource,
  hasStrayAt,
  normalizeCloneSource,
  repoDirName,
  buildCloneArgs,
} from "./clone";
export { RepoContentFetcher } from "./content";
export { ArtifactoryFetcher, resolveArtifactLocation } from "./artifactory";
export type { ArtifactLocation } from "./artifactory";
export {
  buildGitLabFileUrl,
  buildGitLabArchiveUrl,
  buildGitHubZipballUrl,
  buildGitHubContentsUrl,
  getGitLabHeaders,
  getGitHubHeaders,
  getBearerHeaders,
  withTempFile,
  downloadToFile,
  GITHUB_RAW_MEDIA_TYPE,
} from "./download";
