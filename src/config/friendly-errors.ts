/**
 * Friendly Errors
 *
 * YAML + Zod parsing with human-readable errors, used for the config file
 * and for environment variables.
 *
 * @example
 * ```ts
 * const result = safeParseYaml(content, ConfigFileSchema, ".artifetch.yaml");
 * if (!result.success) {
 *   throw new ConfigurationError(result.error.message, result.error.details);
 * }
 * ```
 */

import { parse as parseYaml, YAMLParseError } from "yaml";
import type { ZodType, ZodTypeDef, ZodError } from "zod";

export type ParseErrorType = "yaml" | "validation";

export interface FriendlyError {
  type: ParseErrorType;
  message: string;
  details: string[];
}

export type ParseResult<T> =
  | { success: true; data: T }
  | { success: false; error: FriendlyError };

export function formatZodIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    return `${path}${issue.message}`;
  });
}

function formatYamlError(error: YAMLParseError): string {
  // First line only; the rest is a source excerpt
  return error.message.split("\n")[0] ?? error.message;
}

/**
 * Parse YAML content and validate it against a Zod schema.
 * An empty document validates as `{}`.
 */
export function safeParseYaml<Output, Input = Output>(
  content: string,
  schema: ZodType<Output, ZodTypeDef, Input>,
  filepath?: string
): ParseResult<Output> {
  const fileContext = filepath ? ` in ${filepath}` : "";

  let raw: unknown;
  try {
    raw = parseYaml(content) ?? {};
  } catch (err) {
    if (err instanceof YAMLParseError) {
      return {
        success: false,
        error: {
          type: "yaml",
          message: `Invalid YAML syntax${fileContext}`,
          details: [formatYamlError(err)],
        },
      };
    }
    return {
      success: false,
      error: {
        type: "yaml",
        message: `Failed to parse YAML${fileContext}`,
        details: [err instanceof Error ? err.message : String(err)],
      },
    };
  }

  return safeValidate(raw, schema, `Invalid configuration${fileContext}`);
}

/**
 * Validate an already-parsed value (e.g. process.env) against a Zod schema.
 */
export function safeValidate<Output, Input = Output>(
  raw: unknown,
  schema: ZodType<Output, ZodTypeDef, Input>,
  message: string
): ParseResult<Output> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    return {
      success: false,
      error: {
        type: "validation",
        message,
        details: formatZodIssues(result.error),
      },
    };
  }

  return { success: true, data: result.data };
}
