import { Argument, Command, CommanderError, InvalidArgumentError, Option } from 'commander';
import { ParseError, UnknownCommandError } from '../errors.js';
import type { CommandDescriptor, FlagValue } from '../types/index.js';
import { VERSION } from '../version.js';
import {
  splitCommandName,
  type ArgumentDefinition,
  type CommandDefinition,
  type CommandRegistry,
  type OptionDefinition
} from './registry.js';

export type ParseOutcome =
  | { type: 'command'; descriptor: CommandDescriptor }
  | { type: 'output'; text: string; exitCode: number };

const OUTPUT_CODES = new Set(['commander.help', 'commander.helpDisplayed', 'commander.version']);

export function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!/^-?\d+$/.test(value.trim()) || !Number.isSafeInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

export function parseBooleanValue(value: string): boolean {
  const lower = value.trim().toLowerCase();
  if (lower === 'true' || lower === 'yes' || lower === '1') return true;
  if (lower === 'false' || lower === 'no' || lower === '0') return false;
  throw new InvalidArgumentError('Expected true or false.');
}

function buildArgument(definition: ArgumentDefinition): Argument {
  const syntax = definition.required ? `<${definition.name}>` : `[${definition.name}]`;
  const argument = new Argument(syntax, definition.description);
  if (definition.choices) {
    argument.choices(definition.choices);
  }
  return argument;
}

function buildOption(definition: OptionDefinition): Option {
  const option = new Option(definition.flags, definition.description);

  if (definition.choices) {
    option.choices(definition.choices);
  }
  if (definition.type === 'integer') {
    option.argParser(parseInteger);
  } else if (definition.type === 'boolean-value') {
    option.argParser(parseBooleanValue);
  }
  if (definition.defaultValue !== undefined) {
    option.default(definition.defaultValue);
  }

  return option;
}

function collectFlags(sources: Command[]): Record<string, FlagValue> {
  const flags: Record<string, FlagValue> = {};

  for (const source of sources) {
    const values = source.opts();
    for (const option of source.options) {
      if (option.long === '--version') continue;

      const key = option.attributeName();
      const value: unknown = values[key];
      if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
        flags[key] = value;
      } else if (value === undefined && !option.required && !option.optional) {
        flags[key] = false;
      }
    }
  }

  return flags;
}

function firstOperand(tokens: readonly string[]): string {
  return tokens.find((token) => !token.startsWith('-')) ?? '';
}

function stripPrefix(message: string): string {
  return message.replace(/^error:\s*/, '');
}

/**
 * Builds a fresh commander program from the registry and parses `tokens`
 * (without the node/script prefix). Help and version requests come back as
 * text; commander never writes to the terminal or exits the process.
 */
export function parseCommandLine(tokens: readonly string[], registry: CommandRegistry): ParseOutcome {
  let output = '';
  let descriptor: CommandDescriptor | undefined;

  const program = new Command();
  program
    .name('kiln')
    .description('Command-line companion for Kiln applications')
    .version(VERSION, '-V, --version', 'Show the kiln version')
    .option('-v, --verbose', 'Show debug output')
    .option('-q, --quiet', 'Only show errors')
    .allowExcessArguments(false)
    .exitOverride()
    .configureOutput({
      writeOut: (text) => {
        output += text;
      },
      writeErr: (text) => {
        output += text;
      },
      outputError: () => {}
    });

  for (const definition of registry.list()) {
    addSubcommand(program, definition, (sub) => {
      const { verb, noun } = splitCommandName(definition.name);
      descriptor = Object.freeze({
        verb,
        noun,
        args: Object.freeze([...sub.args]),
        flags: Object.freeze(collectFlags([program, sub]))
      });
    });
  }

  try {
    program.parse([...tokens], { from: 'user' });
  } catch (error) {
    if (!(error instanceof CommanderError)) {
      throw error;
    }
    if (OUTPUT_CODES.has(error.code)) {
      return { type: 'output', text: output, exitCode: error.exitCode };
    }
    if (error.code === 'commander.unknownCommand') {
      throw new UnknownCommandError(firstOperand(tokens), stripPrefix(error.message));
    }
    throw new ParseError(stripPrefix(error.message));
  }

  if (!descriptor) {
    throw new ParseError('No command given');
  }

  return { type: 'command', descriptor };
}

function addSubcommand(program: Command, definition: CommandDefinition, onMatch: (sub: Command) => void) {
  const sub = program
    .command(definition.name)
    .description(definition.description)
    .allowExcessArguments(false);

  for (const argument of definition.arguments ?? []) {
    sub.addArgument(buildArgument(argument));
  }
  for (const option of definition.options ?? []) {
    sub.addOption(buildOption(option));
  }

  sub.action(() => {
    onMatch(sub);
  });
}
