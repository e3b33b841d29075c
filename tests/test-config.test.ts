import { describe, it, expect } from 'vitest';
import { Accumulator } from '../src/accumulator.js';
import { Config, loadConfig } from '../src/config.js';
import { ConfigError, ConfigNotFoundError } from '../src/errors.js';
import { createTestLogger, fixturePath } from './helpers.js';

describe('Config', () => {
  it('creates with no arguments', () => {
    const cfg = new Config();
    expect(cfg.get('anything')).toBeUndefined();
  });

  it('traverses nested objects with dot-path', () => {
    const cfg = new Config({ total: { number_format: 2, prefix: '$' } });
    expect(cfg.get('total.number_format')).toBe(2);
    expect(cfg.get('total.prefix')).toBe('$');
  });

  it('returns nested object for partial path', () => {
    const cfg = new Config({ a: { b: { c: 'deep' } } });
    expect(cfg.get('a.b')).toEqual({ c: 'deep' });
  });

  it('returns default value when key missing', () => {
    const cfg = new Config({ x: 1 });
    expect(cfg.get('y', 'fallback')).toBe('fallback');
    expect(cfg.get('a.b.c', 42)).toBe(42);
  });

  it('returns default when traversal hits non-object', () => {
    const cfg = new Config({ a: 'string-value', n: null });
    expect(cfg.get('a.b', 'default')).toBe('default');
    expect(cfg.get('n.b', 'default')).toBe('default');
  });

  it('keeps false and null values', () => {
    const cfg = new Config({ total: { round: false, suffix: null } });
    expect(cfg.get('total.round', 2)).toBe(false);
    expect(cfg.get('total.suffix', 'x')).toBeNull();
  });
});

describe('loadConfig', () => {
  it('loads a YAML mapping', () => {
    const cfg = loadConfig(fixturePath('total.yaml'));
    expect(cfg.get('total.number_format')).toBe(2);
    expect(cfg.get('total.round')).toBe(false);
    expect(cfg.get('total.prefix')).toBe('$');
    expect(cfg.get('total.suffix')).toBe(' USD');
  });

  it('loads an empty file as an empty configuration', () => {
    expect(loadConfig(fixturePath('empty.yaml')).get('total')).toBeUndefined();
  });

  it('raises ConfigNotFoundError for a missing file', () => {
    expect(() => loadConfig(fixturePath('missing.yaml'))).toThrow(ConfigNotFoundError);
  });

  it('raises ConfigError for invalid YAML', () => {
    expect(() => loadConfig(fixturePath('broken.yaml'))).toThrow(ConfigError);
  });

  it('raises ConfigError when the document is not a mapping', () => {
    expect(() => loadConfig(fixturePath('list.yaml'))).toThrow(/is not a mapping/);
  });

  it('feeds an accumulator', () => {
    const total = Accumulator.fromConfig(loadConfig(fixturePath('total.yaml')), {
      logger: createTestLogger().logger,
    });
    total.set('jan', 20);
    total.set('feb', 25);
    expect(total.total()).toBe('$45.00 USD');
  });

  it('reads a named section', () => {
    const total = Accumulator.fromConfig(loadConfig(fixturePath('points.yaml')), {
      section: 'scores',
      logger: createTestLogger().logger,
    });
    total.set('round1', 7.4);
    expect(total.total()).toBe('7 pts');
  });

  it('rejects an invalid section', () => {
    expect(() => Accumulator.fromConfig(loadConfig(fixturePath('invalid-total.yaml')))).toThrow(ConfigError);
  });
});
