import { UnknownCommandError } from '../errors.js';
import type { CommandDescriptor, FlagValue } from '../types/index.js';
import type { CommandContext } from './context.js';

export interface ArgumentDefinition {
  name: string;
  description: string;
  required?: boolean;
  choices?: readonly string[];
}

export type OptionType = 'string' | 'integer' | 'boolean-value';

/**
 * `flags` uses commander syntax: `-m, --model <model>` takes a value,
 * `--force` is a switch. The descriptor key is commander's attribute name
 * (`--max-jobs` becomes `maxJobs`).
 */
export interface OptionDefinition {
  flags: string;
  description: string;
  type?: OptionType;
  choices?: readonly string[];
  defaultValue?: FlagValue;
}

export type CommandHandler = (descriptor: CommandDescriptor, context: CommandContext) => Promise<void>;

export interface CommandDefinition {
  /** `verb` or `verb:noun`. */
  name: string;
  description: string;
  arguments?: readonly ArgumentDefinition[];
  options?: readonly OptionDefinition[];
  handler: CommandHandler;
}

export function commandKey(verb: string, noun?: string): string {
  return noun ? `${verb}:${noun}` : verb;
}

export function splitCommandName(name: string): { verb: string; noun?: string } {
  const index = name.indexOf(':');
  if (index === -1) {
    return { verb: name };
  }
  return { verb: name.slice(0, index), noun: name.slice(index + 1) };
}

export class CommandRegistry {
  private readonly commands = new Map<string, CommandDefinition>();

  register(...definitions: CommandDefinition[]): this {
    for (const definition of definitions) {
      if (this.commands.has(definition.name)) {
        throw new Error(`Command '${definition.name}' is already registered`);
      }
      this.commands.set(definition.name, definition);
    }
    return this;
  }

  has(verb: string, noun?: string): boolean {
    return this.commands.has(commandKey(verb, noun));
  }

  resolve(verb: string, noun?: string): CommandDefinition {
    const key = commandKey(verb, noun);
    const definition = this.commands.get(key);
    if (!definition) {
      throw new UnknownCommandError(key);
    }
    return definition;
  }

  list(): CommandDefinition[] {
    return [...this.commands.values()];
  }
}
