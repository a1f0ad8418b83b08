import { z } from 'zod';
import type { Logger } from '../utils/logger.js';
import type { ConfigValue } from '../types/index.js';
import { setting as lookup } from '../helpers/project.js';

export interface ConfigIssue {
  severity: 'error' | 'warning';
  key?: string;
  message: string;
}

const REQUIRED_KEYS = [
  'app.name',
  'app.env',
  'app.key',
  'database.default',
  'database.connections.default.driver',
  'database.connections.default.host',
  'database.connections.default.database'
];

const KNOWN_DRIVERS = ['postgres', 'mysql', 'sqlite'];
const KNOWN_ENVIRONMENTS = ['development', 'testing', 'production'];

const configSchema = z
  .object({
    app: z
      .object({
        name: z.string().optional(),
        env: z.string().optional(),
        debug: z.boolean().optional(),
        url: z.string().optional(),
        key: z.string().optional()
      })
      .passthrough()
      .optional(),
    server: z
      .object({
        host: z.string().optional(),
        port: z.number().int().optional()
      })
      .passthrough()
      .optional(),
    database: z
      .object({
        default: z.string().optional(),
        connections: z.record(z.object({ driver: z.string().optional() }).passthrough()).optional()
      })
      .passthrough()
      .optional(),
    logging: z
      .object({
        level: z.string().optional()
      })
      .passthrough()
      .optional(),
    paths: z.record(z.string()).optional()
  })
  .passthrough();

export function validateConfig(config: { [key: string]: ConfigValue }): ConfigIssue[] {
  const issues: ConfigIssue[] = [];

  const parsed = configSchema.safeParse(config);
  if (!parsed.success) {
    for (const issue of parsed.error.issues) {
      issues.push({
        severity: 'error',
        key: issue.path.join('.'),
        message: `'${issue.path.join('.')}': ${issue.message}`
      });
    }
  }

  for (const key of REQUIRED_KEYS) {
    const value = lookup(config, key);
    if (value === undefined) {
      issues.push({ severity: 'error', key, message: `Required key '${key}' is missing` });
    } else if (value === '' || value === null) {
      issues.push({ severity: 'warning', key, message: `'${key}' is empty` });
    }
  }

  const appKey = lookup(config, 'app.key');
  if (typeof appKey === 'string' && appKey !== '') {
    if (!appKey.startsWith('base64:')) {
      issues.push({ severity: 'warning', key: 'app.key', message: "app.key should start with 'base64:'" });
    }
    if (appKey.length < 32) {
      issues.push({ severity: 'warning', key: 'app.key', message: 'app.key appears to be too short' });
    }
  }

  const defaultConnection = lookup(config, 'database.default');
  if (typeof defaultConnection === 'string' && defaultConnection !== '') {
    if (lookup(config, `database.connections.${defaultConnection}`) === undefined) {
      issues.push({
        severity: 'error',
        key: 'database.default',
        message: `database.default points to missing connection '${defaultConnection}'`
      });
    }
  }

  const driver = lookup(config, 'database.connections.default.driver');
  if (typeof driver === 'string' && !KNOWN_DRIVERS.includes(driver)) {
    issues.push({
      severity: 'warning',
      key: 'database.connections.default.driver',
      message: `Unsupported database driver: ${driver}`
    });
  }

  const env = lookup(config, 'app.env');
  if (typeof env === 'string') {
    if (!KNOWN_ENVIRONMENTS.includes(env)) {
      issues.push({ severity: 'warning', key: 'app.env', message: `Unknown environment: ${env}` });
    }

    if (env === 'production') {
      if (lookup(config, 'app.debug') === true) {
        issues.push({ severity: 'error', key: 'app.debug', message: 'app.debug should be false in production' });
      }
      const level = lookup(config, 'logging.level');
      if (level === 'debug' || level === 'trace') {
        issues.push({
          severity: 'warning',
          key: 'logging.level',
          message: "Consider using 'info' or 'warn' log level in production"
        });
      }
    }
  }

  const port = lookup(config, 'server.port');
  if (typeof port === 'number' && (port < 1 || port > 65535)) {
    issues.push({ severity: 'error', key: 'server.port', message: 'server.port must be between 1 and 65535' });
  }

  return issues;
}

export function printConfigIssues(issues: ConfigIssue[], logger: Logger) {
  if (issues.length === 0) {
    logger.success('Configuration is valid!');
    return;
  }

  const errors = issues.filter((issue) => issue.severity === 'error');
  const warnings = issues.filter((issue) => issue.severity === 'warning');

  if (errors.length > 0) {
    logger.error(`Found ${errors.length} configuration error(s):`);
    errors.forEach((issue, index) => {
      logger.line(`  ${index + 1}. ${issue.message}`);
    });
  }

  if (warnings.length > 0) {
    logger.warn(`Found ${warnings.length} configuration warning(s):`);
    warnings.forEach((issue, index) => {
      logger.line(`  ${index + 1}. ${issue.message}`);
    });
  }
}
