import { createDefaultRegistry } from './commands/index.js';
import { promptConfirm, spinnerFor, type CommandContext } from './dispatcher/context.js';
import { dispatch } from './dispatcher/dispatch.js';
import { parseCommandLine } from './dispatcher/parser.js';
import type { CommandRegistry } from './dispatcher/registry.js';
import { exitCodeFor } from './errors.js';
import { TemplateStore } from './generators/templates.js';
import { createLogger } from './utils/logger.js';
import { SpawnRunner } from './utils/process.js';

export interface RunOptions extends Partial<CommandContext> {
  registry?: CommandRegistry;
}

function hasVerboseToken(tokens: readonly string[]): boolean {
  return tokens.some((token) => token === '-v' || token === '--verbose');
}

/**
 * Parses and runs one command line and returns the process exit code.
 * Every collaborator can be replaced through `options`.
 */
export async function run(tokens: readonly string[], options: RunOptions = {}): Promise<number> {
  const env = options.env ?? process.env;
  const logger = options.logger ?? createLogger(env);
  let verbose = hasVerboseToken(tokens);

  try {
    const registry = options.registry ?? createDefaultRegistry();
    const parsed = parseCommandLine(tokens, registry);

    if (parsed.type === 'output') {
      logger.output(parsed.text);
      return parsed.exitCode;
    }

    const { descriptor } = parsed;
    verbose = descriptor.flags.verbose === true;
    if (descriptor.flags.quiet === true) {
      logger.setLevel('error');
    } else if (verbose) {
      logger.setLevel('debug');
    }

    const context: CommandContext = {
      cwd: options.cwd ?? process.cwd(),
      logger,
      runner: options.runner ?? new SpawnRunner(),
      templates: options.templates ?? new TemplateStore(),
      clock: options.clock ?? (() => new Date()),
      confirm: options.confirm ?? promptConfirm,
      spinner: options.spinner ?? spinnerFor(logger),
      env
    };

    await dispatch(descriptor, registry, context);
    return 0;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error(message);

    if (verbose && error instanceof Error && error.stack) {
      logger.setLevel('debug');
      logger.debug(error.stack);
    }
    return exitCodeFor(error);
  }
}
