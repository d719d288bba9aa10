// Runtime configuration knobs

/**
 * Whether setters run field validation at all
 */
export type ValidateAt = 'runtime' | 'none';

/**
 * What happens to a failing validation result
 */
export type OnError = 'raise' | 'log' | 'ignore';

export type RuntimeConfig = {
  validateAt: ValidateAt;
  onError: OnError;
};

export const DEFAULT_CONFIG: Readonly<RuntimeConfig> = Object.freeze({
  validateAt: 'none',
  onError: 'log',
});
