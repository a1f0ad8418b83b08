import { CommandRegistry } from '../dispatcher/registry.js';
import { buildCommand } from './build.js';
import { cacheCommands } from './cache.js';
import { configCommands } from './config.js';
import { dbCommands } from './db.js';
import { deployCommand } from './deploy.js';
import { infoCommand } from './info.js';
import { makeCommands } from './make.js';
import { migrateCommands } from './migrate.js';
import { newCommand } from './new.js';
import { queueCommands } from './queue.js';
import { serveCommand } from './serve.js';
import { testCommand } from './test.js';

export function createDefaultRegistry(): CommandRegistry {
  return new CommandRegistry().register(
    newCommand,
    serveCommand,
    ...makeCommands,
    ...dbCommands,
    ...migrateCommands,
    ...cacheCommands,
    ...queueCommands,
    ...configCommands,
    testCommand,
    buildCommand,
    deployCommand,
    infoCommand
  );
}
