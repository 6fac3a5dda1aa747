/**
 * Provider detection
 *
 * Rules, case-insensitive, first match wins:
 * 1. contains "artifactory"                      → artifactory
 * 2. starts with gitlab:// or github://          → content
 * 3. ends with .git, or starts with git@/ssh://  → git
 * Anything else needs an explicit provider.
 */

import { DetectionError, UnsupportedProviderError, redactCredentials } from "#/core";
import { ARTIFACT_REPOSITORY_TOKEN } from "#/constants";
import { contentPlatformOf } from "#/source";
import { PROVIDER_KEYS, type ProviderKey, type ProviderKind } from "./providers.types";

function isProviderKey(key: string): key is ProviderKey {
  return Object.hasOwn(PROVIDER_KEYS, key);
}

/**
 * Infer the provider from the source string alone.
 * Throws DetectionError rather than guessing.
 */
export function detectProvider(source: string): ProviderKind {
  const lower = source.trim().toLowerCase();

  if (lower.includes(ARTIFACT_REPOSITORY_TOKEN)) {
    return "artifactory";
  }

  if (contentPlatformOf(lower)) {
    return "content";
  }

  if (lower.replace(/\/+$/, "").endsWith(".git") || lower.startsWith("git@") || lower.startsWith("ssh://")) {
    return "git";
  }

  throw new DetectionError(
    `Cannot detect provider for '${redactCredentials(source)}'. ` +
      `Pass one explicitly with --provider (${Object.keys(PROVIDER_KEYS).join(", ")}).`
  );
}

/**
 * Map a user-supplied provider key (or alias) to its ProviderKind.
 *
 * @example
 * parseProviderKey("GitLab") → "content"
 */
export function parseProviderKey(key: string): ProviderKind {
  const normalized = key.trim().toLowerCase();
  if (!isProviderKey(normalized)) {
    throw new UnsupportedProviderError(key, Object.keys(PROVIDER_KEYS));
  }
  return PROVIDER_KEYS[normalized];
}
