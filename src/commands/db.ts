import fs from 'fs-extra';
import * as path from 'path';
import { flagBoolean, flagString } from '../dispatcher/dispatch.js';
import type { CommandContext } from '../dispatcher/context.js';
import type { CommandDefinition } from '../dispatcher/registry.js';
import type { CommandDescriptor } from '../types/index.js';
import { OperationRefusedError } from '../errors.js';
import { openProject, settingString, type Project } from '../helpers/project.js';
import { npmRun, runDelegated, type ProcessInvocation } from '../utils/process.js';

export interface DatabaseConnection {
  name: string;
  driver: string;
  host: string;
  port: string;
  database: string;
  username: string;
  password: string;
}

const DEFAULT_PORTS: Record<string, string> = {
  postgres: '5432',
  mysql: '3306'
};

export function resolveConnection(project: Project): DatabaseConnection {
  const { settings } = project;
  const name = settingString(settings, 'database.default', 'default');
  const prefix = `database.connections.${name}`;
  const driver = settingString(settings, `${prefix}.driver`, '');

  if (!driver) {
    throw new OperationRefusedError(`No database driver configured under '${prefix}.driver' in kiln.yaml`);
  }

  return {
    name,
    driver,
    host: settingString(settings, `${prefix}.host`, 'localhost'),
    port: settingString(settings, `${prefix}.port`, DEFAULT_PORTS[driver] ?? ''),
    database: settingString(settings, `${prefix}.database`, ''),
    username: settingString(settings, `${prefix}.username`, driver === 'postgres' ? 'postgres' : 'root'),
    password: settingString(settings, `${prefix}.password`, '')
  };
}

function requireDatabase(connection: DatabaseConnection): string {
  if (!connection.database) {
    throw new OperationRefusedError(
      `No database name configured under 'database.connections.${connection.name}.database' in kiln.yaml`
    );
  }
  return connection.database;
}

function postgres(connection: DatabaseConnection, command: string, extra: string[], root: string): ProcessInvocation {
  return {
    command,
    args: ['-h', connection.host, '-p', connection.port, '-U', connection.username, ...extra],
    cwd: root,
    env: connection.password ? { PGPASSWORD: connection.password } : undefined,
    stdio: 'pipe'
  };
}

function mysql(connection: DatabaseConnection, command: string, extra: string[], root: string): ProcessInvocation {
  return {
    command,
    args: [`-h${connection.host}`, `-P${connection.port}`, `-u${connection.username}`, ...extra],
    cwd: root,
    env: connection.password ? { MYSQL_PWD: connection.password } : undefined,
    stdio: 'pipe'
  };
}

function unsupported(driver: string): never {
  throw new OperationRefusedError(`Unsupported database driver: ${driver}`);
}

async function createDatabase(project: Project, context: CommandContext) {
  const connection = resolveConnection(project);
  const database = requireDatabase(connection);
  context.logger.info(`Creating database '${context.logger.paint.cyan.bold(database)}'...`);

  switch (connection.driver) {
    case 'postgres':
      await runDelegated(context.runner, postgres(connection, 'createdb', [database], project.root));
      break;
    case 'mysql':
      await runDelegated(
        context.runner,
        mysql(connection, 'mysql', ['-e', `CREATE DATABASE IF NOT EXISTS \`${database}\``], project.root)
      );
      break;
    case 'sqlite':
      await fs.ensureFile(path.resolve(project.root, database));
      break;
    default:
      unsupported(connection.driver);
  }

  context.logger.success(`Database '${database}' created successfully!`);
}

/** Returns false when the user declines the confirmation. */
async function dropDatabase(project: Project, context: CommandContext, force: boolean): Promise<boolean> {
  const connection = resolveConnection(project);
  const database = requireDatabase(connection);

  if (!force) {
    context.logger.warn(`This will permanently delete database '${database}'`);
    if (!(await context.confirm('Are you sure?'))) {
      context.logger.info('Operation cancelled');
      return false;
    }
  }

  context.logger.info(`Dropping database '${context.logger.paint.cyan.bold(database)}'...`);

  switch (connection.driver) {
    case 'postgres':
      await runDelegated(context.runner, postgres(connection, 'dropdb', ['--if-exists', database], project.root));
      break;
    case 'mysql':
      await runDelegated(
        context.runner,
        mysql(connection, 'mysql', ['-e', `DROP DATABASE IF EXISTS \`${database}\``], project.root)
      );
      break;
    case 'sqlite':
      await fs.remove(path.resolve(project.root, database));
      break;
    default:
      unsupported(connection.driver);
  }

  context.logger.success(`Database '${database}' dropped successfully!`);
  return true;
}

export const dbStatusCommand: CommandDefinition = {
  name: 'db:status',
  description: 'Show the configured database connection and check it responds',
  handler: async (_descriptor, context) => {
    const { logger } = context;
    const project = await openProject(context.cwd);
    const connection = resolveConnection(project);
    const label = (text: string) => logger.paint.cyan.bold(text);

    logger.info('Database Status:');
    logger.line(`  ${label('Connection:')} ${connection.name}`);
    logger.line(`  ${label('Driver:')} ${connection.driver}`);
    if (connection.driver !== 'sqlite') {
      logger.line(`  ${label('Host:')} ${connection.host}:${connection.port}`);
    }
    logger.line(`  ${label('Database:')} ${connection.database || 'unknown'}`);

    switch (connection.driver) {
      case 'postgres':
        await runDelegated(
          context.runner,
          postgres(connection, 'pg_isready', connection.database ? ['-d', connection.database] : [], project.root)
        );
        break;
      case 'mysql':
        await runDelegated(context.runner, mysql(connection, 'mysqladmin', ['ping'], project.root));
        break;
      case 'sqlite': {
        const file = path.resolve(project.root, requireDatabase(connection));
        if (!(await fs.pathExists(file))) {
          throw new OperationRefusedError(`Database file '${connection.database}' does not exist. Run 'kiln db:create'.`);
        }
        break;
      }
      default:
        unsupported(connection.driver);
    }

    logger.success('Database connection: OK');
    logger.info("Use 'kiln migrate:status' for migration details");
  }
};

export const dbCreateCommand: CommandDefinition = {
  name: 'db:create',
  description: 'Create the configured database',
  handler: async (_descriptor, context) => {
    await createDatabase(await openProject(context.cwd), context);
  }
};

export const dbDropCommand: CommandDefinition = {
  name: 'db:drop',
  description: 'Drop the configured database',
  options: [{ flags: '--force', description: 'Do not ask for confirmation' }],
  handler: async (descriptor, context) => {
    await dropDatabase(await openProject(context.cwd), context, flagBoolean(descriptor, 'force'));
  }
};

export const dbResetCommand: CommandDefinition = {
  name: 'db:reset',
  description: 'Drop and re-create the configured database',
  options: [{ flags: '--force', description: 'Do not ask for confirmation' }],
  handler: async (descriptor, context) => {
    const project = await openProject(context.cwd);

    context.logger.info('Resetting database...');
    if (!(await dropDatabase(project, context, flagBoolean(descriptor, 'force')))) {
      return;
    }
    await createDatabase(project, context);
    context.logger.success('Database reset completed!');
  }
};

async function runSeeders(descriptor: CommandDescriptor, context: CommandContext) {
  const project = await openProject(context.cwd);
  const env = settingString(project.settings, 'app.env', 'development');

  if (env === 'production' && !flagBoolean(descriptor, 'force')) {
    throw new OperationRefusedError('Refusing to seed the database in production. Use --force to continue.');
  }

  const seeder = flagString(descriptor, 'class');
  context.logger.info(seeder ? `Running seeder ${seeder}...` : 'Seeding database...');
  await runDelegated(context.runner, {
    ...npmRun('seed', seeder ? ['--class', seeder] : []),
    cwd: project.root,
    stdio: 'inherit'
  });
  context.logger.success('Database seeding completed!');
}

const SEED_OPTIONS = [
  { flags: '-c, --class <class>', description: 'Run a single seeder class' },
  { flags: '--force', description: 'Allow seeding in production' }
];

export const dbSeedCommand: CommandDefinition = {
  name: 'db:seed',
  description: 'Seed the database',
  options: SEED_OPTIONS,
  handler: runSeeders
};

export const seedCommand: CommandDefinition = {
  name: 'seed',
  description: 'Seed the database',
  options: SEED_OPTIONS,
  handler: runSeeders
};

export const dbCommands: CommandDefinition[] = [
  dbStatusCommand,
  dbCreateCommand,
  dbDropCommand,
  dbResetCommand,
  dbSeedCommand,
  seedCommand
];
