// Runtime configuration
//
// Two knobs drive the validation engine:
// - validateAt: whether setters run field validation at all (default "none")
// - onError: what happens to a failing result (default "log")
//
// Configuration is an explicit value. Callers resolve it once and pass it
// down; nothing in the engines re-reads the environment mid-operation.

import { z } from 'zod';
import { DEFAULT_CONFIG, type RuntimeConfig } from '@lumen-state/protocol';

export const runtimeConfigSchema = z.object({
  validateAt: z.enum(['runtime', 'none']).default(DEFAULT_CONFIG.validateAt),
  onError: z.enum(['raise', 'log', 'ignore']).default(DEFAULT_CONFIG.onError),
});

export type RuntimeConfigInput = z.input<typeof runtimeConfigSchema>;

/**
 * Environment variables read by configFromEnv
 */
export const CONFIG_ENV_VARS = {
  validateAt: 'LUMEN_STATE_VALIDATE_AT',
  onError: 'LUMEN_STATE_ON_ERROR',
} as const satisfies Record<keyof RuntimeConfig, string>;

/**
 * Resolve a complete, frozen configuration from partial input.
 *
 * @throws ZodError if a knob has an unsupported value
 */
export function resolveConfig(input: RuntimeConfigInput = {}): Readonly<RuntimeConfig> {
  return Object.freeze(runtimeConfigSchema.parse(input));
}

/**
 * Resolve configuration from environment variables.
 * Empty or unset variables fall back to the defaults.
 *
 * @throws ZodError naming the knob when a variable has an unsupported value
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Readonly<RuntimeConfig> {
  const read = (name: string) => {
    const raw = env[name]?.trim().toLowerCase();
    return raw ? raw : undefined;
  };

  return Object.freeze(
    runtimeConfigSchema.parse({
      validateAt: read(CONFIG_ENV_VARS.validateAt),
      onError: read(CONFIG_ENV_VARS.onError),
    })
  );
}

/**
 * Generic lookup with the documented default.
 */
export function lookupConfig<K extends keyof RuntimeConfig>(
  config: Partial<RuntimeConfig> | undefined,
  key: K
): RuntimeConfig[K] {
  return config?.[key] ?? DEFAULT_CONFIG[key];
}

export function validationEnabled(config: Partial<RuntimeConfig> | undefined): boolean {
  return lookupConfig(config, 'validateAt') === 'runtime';
}
