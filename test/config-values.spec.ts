import { describe, expect, it } from 'vitest';
import {
  MASK,
  displayConfigValue,
  flattenConfig,
  formatConfigValue,
  isSensitiveKey,
  parseConfigValue
} from '../src/config/values.js';

describe('parseConfigValue', () => {
  it('types booleans in any case', () => {
    expect(parseConfigValue('true')).toBe(true);
    expect(parseConfigValue('FALSE')).toBe(false);
  });

  it('types integers and floats', () => {
    expect(parseConfigValue('8080')).toBe(8080);
    expect(parseConfigValue('-3')).toBe(-3);
    expect(parseConfigValue('0.25')).toBe(0.25);
  });

  it('keeps everything else as a string', () => {
    expect(parseConfigValue('New App')).toBe('New App');
    expect(parseConfigValue('1.2.3')).toBe('1.2.3');
    expect(parseConfigValue('')).toBe('');
  });
});

describe('sensitive keys', () => {
  it('matches passwords, keys and secrets', () => {
    expect(isSensitiveKey('app.key')).toBe(true);
    expect(isSensitiveKey('database.connections.default.password')).toBe(true);
    expect(isSensitiveKey('services.jwt.secret')).toBe(true);
    expect(isSensitiveKey('app.name')).toBe(false);
  });

  it('masks non-empty sensitive values unless revealed', () => {
    expect(displayConfigValue('app.key', 'base64:test-secret')).toBe(MASK);
    expect(displayConfigValue('app.key', '')).toBe('');
    expect(displayConfigValue('app.key', 'base64:test-secret', true)).toBe('base64:test-secret');
    expect(displayConfigValue('app.name', 'Demo')).toBe('Demo');
  });
});

describe('formatting', () => {
  it('formats sequences and maps', () => {
    expect(formatConfigValue(['a', 1, true])).toBe('[a, 1, true]');
    expect(formatConfigValue({ nested: 1 })).toBe('{...}');
    expect(formatConfigValue(null)).toBe('null');
  });

  it('flattens nested maps into dotted keys', () => {
    expect(flattenConfig({ app: { name: 'Demo', debug: false }, tags: ['a'] })).toEqual([
      ['app.name', 'Demo'],
      ['app.debug', false],
      ['tags', ['a']]
    ]);
  });
});
