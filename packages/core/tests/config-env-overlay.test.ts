import { describe, it, expect } from 'vitest';
import { applyEnvOverrides } from '../src/config-env-overlay.js';

describe('applyEnvOverrides', () => {
  it('sets a nested path, matching existing camelCase keys', () => {
    const config: Record<string, unknown> = { coordinator: { keepAliveMs: 300000 } };
    applyEnvOverrides(config, {
      MODELGATE_COORDINATOR__KEEPALIVEMS: '60000',
    });
    expect(config['coordinator']).toEqual({ keepAliveMs: 60000 });
  });

  it('sets a top-level path', () => {
    const config: Record<string, unknown> = {};
    applyEnvOverrides(config, {
      MODELGATE_SOMEFIELD: 'hello',
    });
    expect(config['somefield']).toBe('hello');
  });

  it('coerces numbers', () => {
    const config: Record<string, unknown> = {};
    applyEnvOverrides(config, {
      MODELGATE_PORT: '3000',
      MODELGATE_RATIO: '0.75',
      MODELGATE_NEGATIVE: '-42',
    });
    expect(config['port']).toBe(3000);
    expect(config['ratio']).toBe(0.75);
    expect(config['negative']).toBe(-42);
  });

  it('coerces booleans', () => {
    const config: Record<string, unknown> = {};
    applyEnvOverrides(config, {
      MODELGATE_ENABLED: 'true',
      MODELGATE_DISABLED: 'false',
    });
    expect(config['enabled']).toBe(true);
    expect(config['disabled']).toBe(false);
  });

  it('leaves non-numeric strings as strings', () => {
    const config: Record<string, unknown> = {};
    applyEnvOverrides(config, {
      MODELGATE_NAME: 'scout',
    });
    expect(config['name']).toBe('scout');
  });

  it('ignores env vars without the prefix', () => {
    const config: Record<string, unknown> = { original: 'value' };
    applyEnvOverrides(config, {
      OTHER_VAR: 'ignored',
      HOME: '/home/user',
      MODELGATE_ADDED: 'yes',
    });
    expect(config).toEqual({ original: 'value', added: 'yes' });
  });

  it('skips the entry-point variables', () => {
    const config: Record<string, unknown> = { coordinator: { keepAliveMs: 300000 } };
    applyEnvOverrides(config, {
      MODELGATE_CONFIG: '/etc/modelgate/prod.json5',
      MODELGATE_LOG_LEVEL: 'debug',
      MODELGATE_COORDINATOR__KEEPALIVEMS: '60000',
    });
    expect(config).toEqual({ coordinator: { keepAliveMs: 60000 } });
  });

  it('creates intermediate objects for deep paths', () => {
    const config: Record<string, unknown> = {};
    applyEnvOverrides(config, {
      MODELGATE_A__B__C: 'deep',
    });
    expect(config).toEqual({ a: { b: { c: 'deep' } } });
  });

  it('indexes into arrays with numeric segments', () => {
    const config: Record<string, unknown> = {
      resources: [
        { id: 'small', cost: 2 },
        { id: 'large', cost: 8 },
      ],
    };
    applyEnvOverrides(config, {
      MODELGATE_RESOURCES__1__COST: '6',
    });
    expect(config['resources']).toEqual([
      { id: 'small', cost: 2 },
      { id: 'large', cost: 6 },
    ]);
  });

  it('skips variables with empty path segments', () => {
    const config: Record<string, unknown> = {};
    applyEnvOverrides(config, {
      MODELGATE_: 'x',
      MODELGATE_A____B: 'y',
    });
    expect(config).toEqual({});
  });

  it('returns the same config reference', () => {
    const config = { a: 1 };
    const result = applyEnvOverrides(config, {});
    expect(result).toBe(config);
  });
});
