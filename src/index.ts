// Main entry point for programmatic usage
export { run, type RunOptions } from './kernel.js';
export { createDefaultRegistry } from './commands/index.js';
export { parseCommandLine, type ParseOutcome } from './dispatcher/parser.js';
export { dispatch } from './dispatcher/dispatch.js';
export {
  CommandRegistry,
  type CommandDefinition,
  type CommandHandler,
  type ArgumentDefinition,
  type OptionDefinition
} from './dispatcher/registry.js';
export type { CommandContext } from './dispatcher/context.js';
export { GeneratorEngine, type GeneratorOptions } from './generators/engine.js';
export { ProjectScaffolder, type ScaffoldOptions, type ScaffoldResult } from './generators/project.js';
export { TemplateStore } from './generators/templates.js';
export { ConfigStore } from './config/store.js';
export { parseConfigValue } from './config/values.js';
export { validateConfig, type ConfigIssue } from './validators/config.js';
export { DEFAULT_LAYOUT, resolveLayout, type ProjectLayout } from './helpers/layout.js';
export { Logger, createLogger, type LogLevel } from './utils/logger.js';
export { SpawnRunner, type ProcessRunner, type ProcessInvocation, type ProcessOutcome } from './utils/process.js';
export * from './errors.js';

export type {
  CommandDescriptor,
  ComponentKind,
  ComponentSpec,
  GeneratedFile,
  ConfigValue
} from './types/index.js';

export { VERSION as version } from './version.js';
