import { describe, expect, it } from 'vitest';
import { cfg, configSchema } from '../src/utils/config.js';

describe('Configuration System', () => {
  it('should load config with default values', () => {
    expect(cfg).toBeDefined();
    expect(cfg.NODE_ENV).toBe('test'); // vitest sets NODE_ENV to 'test'
    expect(cfg.LOG_LEVEL).toBe('info');
    expect(cfg.ZIPTREE_TRAVERSAL_LIMIT).toBe(0);
    expect(cfg.ZIPTREE_VALIDATE_CAPABILITY).toBe(true);
  });

  it('should have proper types', () => {
    const env: 'development' | 'production' | 'test' = cfg.NODE_ENV;
    const limit: number = cfg.ZIPTREE_TRAVERSAL_LIMIT;
    const validate: boolean = cfg.ZIPTREE_VALIDATE_CAPABILITY;

    expect(typeof env).toBe('string');
    expect(typeof limit).toBe('number');
    expect(typeof validate).toBe('boolean');
  });

  it('should fall back to schema defaults for an empty environment', () => {
    expect(configSchema.parse({})).toEqual({
      NODE_ENV: 'development',
      LOG_LEVEL: 'info',
      ZIPTREE_TRAVERSAL_LIMIT: 0,
      ZIPTREE_VALIDATE_CAPABILITY: true,
    });
  });

  it('should coerce values read from the environment', () => {
    const parsed = configSchema.parse({
      ZIPTREE_TRAVERSAL_LIMIT: '0',
      ZIPTREE_VALIDATE_CAPABILITY: 'false',
    });

    expect(parsed.ZIPTREE_TRAVERSAL_LIMIT).toBe(0);
    expect(parsed.ZIPTREE_VALIDATE_CAPABILITY).toBe(false);
  });

  it('should only switch flags on for "true" and "1"', () => {
    const flagOf = (value: string) =>
      configSchema.parse({ ZIPTREE_VALIDATE_CAPABILITY: value }).ZIPTREE_VALIDATE_CAPABILITY;

    expect(flagOf('1')).toBe(true);
    expect(flagOf(' TRUE ')).toBe(true);
    expect(flagOf('yes')).toBe(false);
    expect(flagOf('0')).toBe(false);
  });

  it('should validate numeric constraints', () => {
    expect(() => configSchema.parse({ ZIPTREE_TRAVERSAL_LIMIT: '-1' })).toThrow();
    expect(() => configSchema.parse({ ZIPTREE_TRAVERSAL_LIMIT: '1.5' })).toThrow();
    expect(() => configSchema.parse({ LOG_LEVEL: 'verbose' })).toThrow();
  });
});
