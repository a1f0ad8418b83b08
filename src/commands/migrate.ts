import { argument, flagNumber } from '../dispatcher/dispatch.js';
import type { CommandContext } from '../dispatcher/context.js';
import type { CommandDefinition } from '../dispatcher/registry.js';
import { openProject } from '../helpers/project.js';
import { npmRun, runDelegated } from '../utils/process.js';

async function runMigrations(context: CommandContext, args: string[], message: string) {
  const project = await openProject(context.cwd);

  context.logger.info(message);
  await runDelegated(context.runner, { ...npmRun('migrate', args), cwd: project.root, stdio: 'inherit' });
}

export const migrateCommand: CommandDefinition = {
  name: 'migrate',
  description: 'Run or roll back database migrations',
  arguments: [{ name: 'direction', description: 'up (default) or down', choices: ['up', 'down'] }],
  options: [{ flags: '--steps <n>', description: 'Number of migrations to roll back', type: 'integer' }],
  handler: async (descriptor, context) => {
    const direction = argument(descriptor, 0) ?? 'up';
    const steps = flagNumber(descriptor, 'steps');

    if (direction === 'down') {
      const count = steps ?? 1;
      await runMigrations(context, ['down', '--steps', String(count)], `Rolling back ${count} migration(s)...`);
    } else {
      const args = steps === undefined ? ['up'] : ['up', '--steps', String(steps)];
      await runMigrations(context, args, 'Running pending migrations...');
    }
    context.logger.success('Migrations completed');
  }
};

export const migrateResetCommand: CommandDefinition = {
  name: 'migrate:reset',
  description: 'Roll back all migrations',
  handler: async (_descriptor, context) => {
    await runMigrations(context, ['reset'], 'Rolling back all migrations...');
    context.logger.success('All migrations rolled back');
  }
};

export const migrateRefreshCommand: CommandDefinition = {
  name: 'migrate:refresh',
  description: 'Roll back and re-run all migrations',
  handler: async (_descriptor, context) => {
    await runMigrations(context, ['refresh'], 'Refreshing migrations...');
    context.logger.success('Migrations refreshed');
  }
};

export const migrateStatusCommand: CommandDefinition = {
  name: 'migrate:status',
  description: 'Show the status of each migration',
  handler: async (_descriptor, context) => {
    await runMigrations(context, ['status'], 'Migration status:');
  }
};

export const migrateCommands: CommandDefinition[] = [
  migrateCommand,
  migrateResetCommand,
  migrateRefreshCommand,
  migrateStatusCommand
];
