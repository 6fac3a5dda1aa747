/**
 * Provider types
 *
 * The set of backends is closed: one ProviderKind per fetcher.
 */

export const PROVIDER_KINDS = ["artifactory", "content", "git"] as const;

export type ProviderKind = (typeof PROVIDER_KINDS)[number];

/** Keys accepted from users, including aliases */
export const PROVIDER_KEYS = {
  artifactory: "artifactory",
  content: "content",
  gitlab: "content",
  github: "content",
  git: "git",
  clone: "git",
} as const satisfies Record<string, ProviderKind>;

export type ProviderKey = keyof typeof PROVIDER_KEYS;
