import { ParseError } from '../errors.js';
import type { CommandDescriptor } from '../types/index.js';
import type { CommandContext } from './context.js';
import type { CommandRegistry } from './registry.js';

export async function dispatch(
  descriptor: CommandDescriptor,
  registry: CommandRegistry,
  context: CommandContext
): Promise<void> {
  const definition = registry.resolve(descriptor.verb, descriptor.noun);
  context.logger.debug(`Running ${definition.name}`);
  await definition.handler(descriptor, context);
}

export function flagString(descriptor: CommandDescriptor, name: string): string | undefined {
  const value = descriptor.flags[name];
  if (value === undefined || value === false) return undefined;
  return String(value);
}

export function flagBoolean(descriptor: CommandDescriptor, name: string): boolean {
  return descriptor.flags[name] === true;
}

export function flagNumber(descriptor: CommandDescriptor, name: string): number | undefined {
  const value = descriptor.flags[name];
  return typeof value === 'number' ? value : undefined;
}

export function argument(descriptor: CommandDescriptor, index: number): string | undefined {
  return descriptor.args[index];
}

export function requireArgument(descriptor: CommandDescriptor, index: number, name: string): string {
  const value = descriptor.args[index];
  if (value === undefined || value === '') {
    throw new ParseError(`Missing required argument '${name}'`);
  }
  return value;
}
