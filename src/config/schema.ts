import { z } from "zod";

export const GitProtocolSchema = z.enum(["ssh", "https", "http"]);
export type GitProtocol = z.infer<typeof GitProtocolSchema>;

const TimeoutSchema = z.number().int().positive();

// Env values arrive as strings
const TimeoutEnvSchema = z.coerce
  .number({ invalid_type_error: "must be a number of milliseconds" })
  .int()
  .positive();

const NonEmptyString = z.string().trim().min(1);

// Config file (.artifetch.yaml). Every field is optional; env vars win.
export const ConfigFileSchema = z
  .object({
    gitlab: z
      .object({
        apiBase: NonEmptyString.optional(),
        host: NonEmptyString.optional(),
        token: NonEmptyString.optional(),
      })
      .strict()
      .optional(),
    github: z
      .object({
        apiBase: NonEmptyString.optional(),
        token: NonEmptyString.optional(),
      })
      .strict()
      .optional(),
    artifactory: z
      .object({
        url: z.string().url().optional(),
        token: NonEmptyString.optional(),
      })
      .strict()
      .optional(),
    git: z
      .object({
        binary: NonEmptyString.optional(),
        host: NonEmptyString.optional(),
        protocol: GitProtocolSchema.optional(),
        user: NonEmptyString.optional(),
        timeoutMs: TimeoutSchema.optional(),
      })
      .strict()
      .optional(),
    http: z
      .object({
        timeoutMs: TimeoutSchema.optional(),
      })
      .strict()
      .optional(),
  })
  .strict();
export type ConfigFile = z.infer<typeof ConfigFileSchema>;

// Empty env values count as unset
const optionalEnv = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((value) => (value === "" ? undefined : value), schema.optional());

export const ConfigEnvSchema = z.object({
  GITLAB_TOKEN: optionalEnv(z.string()),
  GITHUB_TOKEN: optionalEnv(z.string()),
  ARTIFACTORY_TOKEN: optionalEnv(z.string()),
  GIT_BINARY: optionalEnv(z.string()),
  ARTIFETCH_GIT_HOST: optionalEnv(z.string()),
  ARTIFETCH_GIT_PROTO: optionalEnv(
    z.string().trim().toLowerCase().pipe(GitProtocolSchema)
  ),
  ARTIFETCH_GIT_USER: optionalEnv(z.string()),
  ARTIFETCH_GITLAB_API_BASE: optionalEnv(z.string()),
  ARTIFETCH_GITHUB_API_BASE: optionalEnv(z.string()),
  ARTIFETCH_ARTIFACTORY_URL: optionalEnv(z.string().url()),
  ARTIFETCH_HTTP_TIMEOUT_MS: optionalEnv(TimeoutEnvSchema),
  ARTIFETCH_GIT_TIMEOUT_MS: optionalEnv(TimeoutEnvSchema),
  ARTIFETCH_CONFIG: optionalEnv(z.string()),
});
export type ConfigEnvValues = z.infer<typeof ConfigEnvSchema>;
