/**
 * Configuration Schema Validation
 *
 * Zod schema for validating CLI configuration from .infobotrc files and
 * environment variables.
 */

import { z } from 'zod';

/**
 * CLI Configuration Schema
 */
export const CliConfigSchema = z.object({
  /** Wikipedia language edition, e.g. "en" */
  lang: z
    .string()
    .regex(/^[a-z][a-z0-9-]*$/, 'must be a Wikipedia language code such as "en"')
    .optional(),

  /** MediaWiki action API endpoint; overrides the one derived from `lang` */
  apiUrl: z.string().url().optional(),

  /** User-Agent sent with every Wikipedia request */
  userAgent: z.string().min(1).optional(),

  /** Per-request timeout in milliseconds (no timeout when unset) */
  timeoutMs: z.number().int().positive().optional(),
});

/**
 * Shape of a .infobotrc file before its keys are merged with the environment
 */
export const ConfigFileSchema = z.record(z.unknown());

/** Type inferred from CliConfigSchema */
export type CliConfig = z.infer<typeof CliConfigSchema>;

/**
 * Safely validate CLI configuration without throwing
 */
export function safeValidateCliConfig(config: unknown): z.SafeParseReturnType<unknown, CliConfig> {
  return CliConfigSchema.safeParse(config);
}

/**
 * Format Zod validation errors for user display
 */
export function formatValidationError(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
      return `${path}${issue.message}`;
    })
    .join('\n');
}
