/**
 * Config module
 *
 * Loads .artifetch.yaml and environment overrides into a ResolvedConfig.
 */

export * from "./config.types";
export { ConfigFileSchema, ConfigEnvSchema, GitProtocolSchema } from "./schema";
export { safeParseYaml, safeValidate, formatZodIssues } from "./friendly-errors";
export type { FriendlyError, ParseResult } from "./friendly-errors";
export { loadConfig, withDotEnv, defaultConfig, resolveGitLabApiBase, toCloneHost } from "./config";
export type { LoadConfigOptions } from "./config";
