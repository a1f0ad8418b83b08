import { randomBytes } from 'crypto';
import { flagBoolean, requireArgument } from '../dispatcher/dispatch.js';
import type { CommandDefinition } from '../dispatcher/registry.js';
import type { CommandContext } from '../dispatcher/context.js';
import { ConfigValidationError } from '../errors.js';
import { openProject, settingString } from '../helpers/project.js';
import { displayConfigValue, flattenConfig, parseConfigValue } from '../config/values.js';
import { printConfigIssues, validateConfig } from '../validators/config.js';
import type { ConfigValue } from '../types/index.js';
import { toSnakeCase } from '../utils/naming.js';

const REVEAL = { flags: '--reveal', description: 'Show sensitive values instead of masking them' };

export function generateAppKey(): string {
  return `base64:${randomBytes(32).toString('base64')}`;
}

function printEntries(context: CommandContext, entries: Array<[string, ConfigValue]>, reveal: boolean) {
  const { logger } = context;
  for (const [key, value] of entries) {
    logger.output(`${logger.paint.cyan(key)} = ${displayConfigValue(key, value, reveal)}`);
  }
}

export const configShowCommand: CommandDefinition = {
  name: 'config:show',
  description: 'Show all configuration values',
  options: [REVEAL],
  handler: async (descriptor, context) => {
    const project = await openProject(context.cwd);
    const entries = flattenConfig(await project.config.all());

    if (entries.length === 0) {
      context.logger.warn('kiln.yaml is empty');
      return;
    }
    printEntries(context, entries, flagBoolean(descriptor, 'reveal'));
  }
};

export const configGetCommand: CommandDefinition = {
  name: 'config:get',
  description: 'Get a configuration value by dotted key',
  arguments: [{ name: 'key', description: 'Configuration key, e.g. app.name', required: true }],
  options: [REVEAL],
  handler: async (descriptor, context) => {
    const key = requireArgument(descriptor, 0, 'key');
    const project = await openProject(context.cwd);
    const value = await project.config.get(key);
    const reveal = flagBoolean(descriptor, 'reveal');

    if (value !== null && typeof value === 'object' && !Array.isArray(value)) {
      printEntries(context, flattenConfig(value, key), reveal);
      return;
    }
    printEntries(context, [[key, value]], reveal);
  }
};

export const configSetCommand: CommandDefinition = {
  name: 'config:set',
  description: 'Set a configuration value by dotted key',
  arguments: [
    { name: 'key', description: 'Configuration key, e.g. app.name', required: true },
    { name: 'value', description: 'New value; true/false and numbers are typed', required: true }
  ],
  options: [{ flags: '--string', description: 'Store the value as a string without typing it' }],
  handler: async (descriptor, context) => {
    const key = requireArgument(descriptor, 0, 'key');
    const raw = requireArgument(descriptor, 1, 'value');
    const value = flagBoolean(descriptor, 'string') ? raw : parseConfigValue(raw);

    const project = await openProject(context.cwd);
    await project.config.set(key, value);

    context.logger.success(`Set ${key} = ${displayConfigValue(key, value)}`);
  }
};

export const configGenerateKeyCommand: CommandDefinition = {
  name: 'config:generate-key',
  description: 'Generate a new application key',
  options: [{ flags: '--show', description: 'Print the key instead of writing it' }],
  handler: async (descriptor, context) => {
    const key = generateAppKey();

    if (flagBoolean(descriptor, 'show')) {
      context.logger.output(key);
      return;
    }

    const project = await openProject(context.cwd);
    await project.config.set('app.key', key);
    context.logger.success('Application key set successfully');
  }
};

export const configValidateCommand: CommandDefinition = {
  name: 'config:validate',
  description: 'Validate kiln.yaml',
  handler: async (_descriptor, context) => {
    const project = await openProject(context.cwd);
    const issues = validateConfig(await project.config.all());

    printConfigIssues(issues, context.logger);

    const errors = issues.filter((issue) => issue.severity === 'error').length;
    if (errors > 0) {
      throw new ConfigValidationError(errors);
    }
  }
};

export const configResetCommand: CommandDefinition = {
  name: 'config:reset',
  description: 'Reset kiln.yaml to the default configuration',
  options: [{ flags: '--force', description: 'Do not ask for confirmation' }],
  handler: async (descriptor, context) => {
    const { logger } = context;
    const project = await openProject(context.cwd);

    if (!flagBoolean(descriptor, 'force')) {
      logger.warn('This will reset kiln.yaml to default values!');
      if (!(await context.confirm('Reset the configuration?'))) {
        logger.info('Operation cancelled');
        return;
      }
    }

    const appName = settingString(project.settings, 'app.name', 'Kiln App');
    const defaults = await context.templates.renderProjectFile('base', 'kiln.yaml.hbs', {
      appName,
      databaseName: toSnakeCase(appName) || 'kiln_app'
    });
    await project.config.replace(defaults);

    logger.success('Configuration reset to defaults!');
    logger.info("Don't forget to:");
    logger.line('  1. Configure your database connection');
    logger.line('  2. Generate a new application key with: kiln config:generate-key');
    logger.line('  3. Update other environment-specific settings');
  }
};

export const configCommands: CommandDefinition[] = [
  configShowCommand,
  configGetCommand,
  configSetCommand,
  configGenerateKeyCommand,
  configValidateCommand,
  configResetCommand
];
