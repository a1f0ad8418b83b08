import type { ConfigValue } from '../types/index.js';

const INTEGER = /^[+-]?\d+$/;
const FLOAT = /^[+-]?(\d+\.\d*|\.\d+|\d+)([eE][+-]?\d+)?$/;

const SENSITIVE_KEYS = [
  'app.key',
  'database.connections.default.password',
  'cache.redis.password',
  'jwt_secret',
  'mail_password',
  'aws_secret_access_key',
  'sentry_dsn',
  'api_key',
  'secret',
  'token',
  'private_key',
  'password'
];

export const MASK = '••••••••';

/**
 * Types a value typed on the command line: booleans, then integers, then
 * floats, otherwise the raw string.
 */
export function parseConfigValue(raw: string): ConfigValue {
  const lower = raw.toLowerCase();
  if (lower === 'true') return true;
  if (lower === 'false') return false;
  if (INTEGER.test(raw)) {
    const int = Number(raw);
    if (Number.isSafeInteger(int)) return int;
  }
  if (FLOAT.test(raw)) return Number(raw);
  return raw;
}

export function formatConfigValue(value: ConfigValue): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return `[${value.map(formatConfigValue).join(', ')}]`;
  if (typeof value === 'object') return '{...}';
  return String(value);
}

export function isSensitiveKey(key: string): boolean {
  const lower = key.toLowerCase();
  return SENSITIVE_KEYS.some(
    (sensitive) => lower.includes(sensitive) || lower.includes(sensitive.replace(/_/g, '.'))
  );
}

export function displayConfigValue(key: string, value: ConfigValue, reveal = false): string {
  if (!reveal && isSensitiveKey(key) && typeof value !== 'object') {
    return value === '' || value === null ? '' : MASK;
  }
  return formatConfigValue(value);
}

export function flattenConfig(
  value: { [key: string]: ConfigValue },
  prefix = ''
): Array<[string, ConfigValue]> {
  const entries: Array<[string, ConfigValue]> = [];

  for (const [key, entry] of Object.entries(value)) {
    const fullKey = prefix ? `${prefix}.${key}` : key;
    if (entry !== null && typeof entry === 'object' && !Array.isArray(entry)) {
      entries.push(...flattenConfig(entry, fullKey));
    } else {
      entries.push([fullKey, entry]);
    }
  }

  return entries;
}
