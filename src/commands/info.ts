import fs from 'fs-extra';
import * as path from 'path';
import { flagBoolean } from '../dispatcher/dispatch.js';
import type { CommandDefinition } from '../dispatcher/registry.js';
import type { LayoutKey } from '../helpers/layout.js';
import { openProject, settingString } from '../helpers/project.js';
import { VERSION } from '../version.js';

const COUNTED: Array<[string, LayoutKey]> = [
  ['Controllers', 'controllers'],
  ['Models', 'models'],
  ['Middleware', 'middleware'],
  ['Requests', 'requests'],
  ['Resources', 'resources'],
  ['Jobs', 'jobs'],
  ['Events', 'events'],
  ['Listeners', 'listeners'],
  ['Policies', 'policies'],
  ['Commands', 'commands'],
  ['Migrations', 'migrations'],
  ['Seeders', 'seeders'],
  ['Factories', 'factories'],
  ['Unit tests', 'unitTests'],
  ['Integration tests', 'integrationTests']
];

export async function countSourceFiles(dir: string): Promise<number> {
  if (!(await fs.pathExists(dir))) return 0;

  let count = 0;
  for (const entry of await fs.readdir(dir, { withFileTypes: true })) {
    if (entry.isDirectory()) {
      count += await countSourceFiles(path.join(dir, entry.name));
    } else if (entry.isFile() && entry.name.endsWith('.ts') && !entry.name.endsWith('.d.ts')) {
      count += 1;
    }
  }
  return count;
}

export const infoCommand: CommandDefinition = {
  name: 'info',
  description: 'Show application information',
  options: [{ flags: '--detailed', description: 'Also show the directory layout and template versions' }],
  handler: async (descriptor, context) => {
    const { logger } = context;
    const project = await openProject(context.cwd);
    const { settings } = project;
    const label = (text: string) => logger.paint.cyan.bold(text.padEnd(20));
    const section = (title: string) => {
      logger.line();
      logger.line(logger.paint.blue.bold(title));
    };

    section('Application');
    logger.line(`  ${label('Name')}${settingString(settings, 'app.name', path.basename(project.root))}`);
    logger.line(`  ${label('Environment')}${settingString(settings, 'app.env', 'development')}`);
    logger.line(`  ${label('Debug')}${settingString(settings, 'app.debug', 'false')}`);
    logger.line(`  ${label('URL')}${settingString(settings, 'app.url', '-')}`);
    logger.line(`  ${label('Root')}${project.root}`);

    section('Versions');
    logger.line(`  ${label('Kiln CLI')}${VERSION}`);
    logger.line(`  ${label('Node.js')}${process.version}`);
    logger.line(`  ${label('Platform')}${process.platform} ${process.arch}`);

    section('Database');
    const connection = settingString(settings, 'database.default', 'default');
    logger.line(`  ${label('Connection')}${connection}`);
    logger.line(`  ${label('Driver')}${settingString(settings, `database.connections.${connection}.driver`, '-')}`);

    section('Components');
    for (const [title, key] of COUNTED) {
      const count = await countSourceFiles(path.join(project.root, project.layout[key]));
      logger.line(`  ${label(title)}${count}`);
    }

    if (flagBoolean(descriptor, 'detailed')) {
      section('Layout');
      for (const [key, dir] of Object.entries(project.layout)) {
        logger.line(`  ${label(key)}${dir}`);
      }

      section('Templates');
      const manifest = await context.templates.manifest();
      for (const [name, entry] of Object.entries(manifest.components)) {
        logger.line(`  ${label(name)}${entry.version}`);
      }
      for (const [name, entry] of Object.entries(manifest.projects)) {
        logger.line(`  ${label(`project:${name}`)}${entry.version}`);
      }
    }
    logger.line();
  }
};
