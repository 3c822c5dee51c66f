import { z } from 'zod';
import { ArbiterError } from '@audio-arbiter/engine-core';
import type { ActivatableProfile } from '@audio-arbiter/engine-core';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

const ACTIVATABLE = [
  'hearing_aid',
  'classic_media',
  'classic_call',
  'le_audio',
] as const satisfies readonly ActivatableProfile[];

export const arbiterConfigSchema = z.object({
  logLevel: z.enum(LOG_LEVELS).default('info'),
  /** Skip setActiveDevice() calls that repeat the current holder. */
  dedupeCommands: z.boolean().default(false),
  /** Profiles that are never subscribed, commanded or offered as a fallback. */
  disabledProfiles: z.array(z.enum(ACTIVATABLE)).default([]),
});

export type ArbiterConfig = z.infer<typeof arbiterConfigSchema>;
export type ArbiterConfigInput = z.input<typeof arbiterConfigSchema>;

// ─── Environment ─────────────────────────────────────────────

const envSchema = z.object({
  LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
  ARBITER_DEDUPE_COMMANDS: z
    .enum(['true', 'false', '1', '0'])
    .transform((v) => v === 'true' || v === '1')
    .optional(),
  ARBITER_DISABLED_PROFILES: z
    .string()
    .transform((v) =>
      v
        .split(',')
        .map((p) => p.trim())
        .filter((p) => p.length > 0),
    )
    .optional(),
});

export class ConfigError extends Error {
  readonly code = ArbiterError.INVALID_CONFIG;

  constructor(readonly detail: string) {
    super(`Invalid arbiter configuration: ${detail}`);
    this.name = 'ConfigError';
  }
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/** Validate a configuration object. Returns the parsed config or an INVALID_CONFIG result. */
export function parseConfig(
  input: unknown,
): { config: ArbiterConfig } | { error: ArbiterError; detail: string } {
  const result = arbiterConfigSchema.safeParse(input);
  if (!result.success) {
    return { error: ArbiterError.INVALID_CONFIG, detail: describeIssues(result.error) };
  }
  return { config: result.data };
}

/**
 * Read configuration from environment variables.
 * Throws ConfigError at startup when a variable is present but invalid.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ArbiterConfig {
  const vars = envSchema.safeParse(env);
  if (!vars.success) {
    throw new ConfigError(describeIssues(vars.error));
  }
  const parsed = parseConfig({
    logLevel: vars.data.LOG_LEVEL,
    dedupeCommands: vars.data.ARBITER_DEDUPE_COMMANDS,
    disabledProfiles: vars.data.ARBITER_DISABLED_PROFILES,
  });
  if ('error' in parsed) {
    throw new ConfigError(parsed.detail);
  }
  return parsed.config;
}
