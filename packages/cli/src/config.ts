/**
 * CLI configuration from the environment
 */

import { z } from 'zod';
import type { LevelWithSilent } from 'pino';
import { ConfigError } from './errors.js';
import type { CLIOptions } from './types.js';

const FlagSchema = z
  .enum(['1', '0', 'true', 'false'])
  .transform((value) => value === '1' || value === 'true')
  .default('false');

const EnvSchema = z.object({
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  TILLWIRE_STRICT: FlagSchema,
  TILLWIRE_PRESERVE_EXPANDED: FlagSchema,
});

export interface CliConfig {
  logLevel: LevelWithSilent;
  /** Decode with strict-only invariants */
  strict: boolean;
  /** Keep embedded objects when re-encoding */
  preserveExpanded: boolean;
}

/**
 * Read configuration from environment variables.
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): CliConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const fields = result.error.issues.map((issue) => issue.path.join('.'));
    const details = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(fields, details);
  }
  return {
    logLevel: result.data.LOG_LEVEL,
    strict: result.data.TILLWIRE_STRICT,
    preserveExpanded: result.data.TILLWIRE_PRESERVE_EXPANDED,
  };
}

/**
 * Apply command-line flags on top of the environment. A flag can only
 * switch a mode on.
 */
export function withFlags(config: CliConfig, flags: Pick<CLIOptions, 'strict' | 'preserveExpanded'>): CliConfig {
  return {
    ...config,
    strict: config.strict || flags.strict === true,
    preserveExpanded: config.preserveExpanded || flags.preserveExpanded === true,
  };
}
