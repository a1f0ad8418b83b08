import { describe, expect, it } from 'vitest';
import type { ConfigValue } from '../src/types/index.js';
import { printConfigIssues, validateConfig } from '../src/validators/config.js';
import { memoryLogger } from './helpers.js';

type Config = { [key: string]: ConfigValue };

function validConfig(): Config {
  return {
    app: { name: 'Demo', env: 'development', debug: true, key: 'base64:dGVzdC1zZWNyZXQtdGVzdC1zZWNyZXQtdGVzdA==' },
    server: { host: '127.0.0.1', port: 3000 },
    database: {
      default: 'default',
      connections: { default: { driver: 'postgres', host: 'localhost', database: 'demo' } }
    },
    logging: { level: 'debug' }
  };
}

describe('validateConfig', () => {
  it('accepts a complete development config', () => {
    expect(validateConfig(validConfig())).toEqual([]);
  });

  it('reports missing required keys as errors and empty ones as warnings', () => {
    const config = validConfig();
    config.app = { name: 'Demo', env: 'development', key: '' };

    expect(validateConfig(config)).toEqual([{ severity: 'warning', key: 'app.key', message: "'app.key' is empty" }]);

    delete config.app;
    expect(validateConfig(config).map((issue) => issue.message)).toEqual([
      "Required key 'app.name' is missing",
      "Required key 'app.env' is missing",
      "Required key 'app.key' is missing"
    ]);
  });

  it('checks the shape of the application key', () => {
    const config = validConfig();
    config.app = { name: 'Demo', env: 'development', key: 'short' };

    expect(validateConfig(config).map((issue) => issue.message)).toEqual([
      "app.key should start with 'base64:'",
      'app.key appears to be too short'
    ]);
  });

  it('flags debug mode and verbose logging in production', () => {
    const config = validConfig();
    config.app = { name: 'Demo', env: 'production', debug: true, key: 'base64:dGVzdC1zZWNyZXQtdGVzdC1zZWNyZXQtdGVzdA==' };

    expect(validateConfig(config)).toEqual([
      { severity: 'error', key: 'app.debug', message: 'app.debug should be false in production' },
      { severity: 'warning', key: 'logging.level', message: "Consider using 'info' or 'warn' log level in production" }
    ]);
  });

  it('checks database references and drivers', () => {
    const config = validConfig();
    config.database = {
      default: 'primary',
      connections: { default: { driver: 'oracle', host: 'localhost', database: 'demo' } }
    };

    expect(validateConfig(config).map((issue) => issue.message)).toEqual([
      "database.default points to missing connection 'primary'",
      'Unsupported database driver: oracle'
    ]);
  });

  it('reports wrongly typed values and ports out of range', () => {
    const config = validConfig();
    config.server = { host: '127.0.0.1', port: 70000 };
    config.app = { name: 'Demo', env: 'staging', debug: 'yes', key: 'base64:dGVzdC1zZWNyZXQtdGVzdC1zZWNyZXQtdGVzdA==' };

    const issues = validateConfig(config);

    expect(issues.map((issue) => [issue.severity, issue.key])).toEqual([
      ['error', 'app.debug'],
      ['warning', 'app.env'],
      ['error', 'server.port']
    ]);
    expect(issues[1].message).toBe('Unknown environment: staging');
  });
});

describe('printConfigIssues', () => {
  it('prints a success line when there are no issues', () => {
    const { logger, stdout } = memoryLogger();

    printConfigIssues([], logger);

    expect(stdout()).toEqual(['✓ Configuration is valid!']);
  });

  it('numbers errors and warnings separately', () => {
    const { logger, stdout, stderr } = memoryLogger();

    printConfigIssues(
      [
        { severity: 'error', message: 'first error' },
        { severity: 'warning', message: 'only warning' },
        { severity: 'error', message: 'second error' }
      ],
      logger
    );

    expect(stderr()).toEqual(['✗ Found 2 configuration error(s):']);
    expect(stdout()).toEqual([
      '  1. first error',
      '  2. second error',
      '⚠ Found 1 configuration warning(s):',
      '  1. only warning'
    ]);
  });
});
