// Tests for runtime configuration

import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import { configFromEnv, lookupConfig, resolveConfig, validationEnabled } from './config.js';

describe('resolveConfig', () => {
  it('fills in defaults', () => {
    const config = resolveConfig();

    expect(config).toEqual({ validateAt: 'none', onError: 'log' });
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('keeps explicit values', () => {
    expect(resolveConfig({ onError: 'raise' })).toEqual({ validateAt: 'none', onError: 'raise' });
  });
});

describe('configFromEnv', () => {
  it('reads and normalises variables', () => {
    const config = configFromEnv({ LUMEN_STATE_VALIDATE_AT: ' Runtime ', LUMEN_STATE_ON_ERROR: '' });

    expect(config).toEqual({ validateAt: 'runtime', onError: 'log' });
  });

  it('rejects unsupported values', () => {
    expect(() => configFromEnv({ LUMEN_STATE_ON_ERROR: 'panic' })).toThrow(ZodError);
  });
});

describe('lookupConfig', () => {
  it('falls back to the defaults', () => {
    expect(lookupConfig(undefined, 'onError')).toBe('log');
    expect(lookupConfig({ validateAt: 'runtime' }, 'onError')).toBe('log');
    expect(lookupConfig({ onError: 'ignore' }, 'onError')).toBe('ignore');
  });

  it('enables validation only at runtime', () => {
    expect(validationEnabled(undefined)).toBe(false);
    expect(validationEnabled({ validateAt: 'none' })).toBe(false);
    expect(validationEnabled({ validateAt: 'runtime' })).toBe(true);
  });
});
