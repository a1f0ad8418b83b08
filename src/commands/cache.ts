import { createHash } from 'crypto';
import fs from 'fs-extra';
import * as path from 'path';
import { requireArgument } from '../dispatcher/dispatch.js';
import type { CommandDefinition } from '../dispatcher/registry.js';
import type { LayoutKey } from '../helpers/layout.js';
import { openProject, type Project } from '../helpers/project.js';

const CLEARED_DIRECTORIES: LayoutKey[] = ['cache', 'sessions', 'compiledViews', 'bootstrapCache'];

export const CONFIG_CACHE_FILE = 'config.json';

export function cacheKeyFile(key: string): string {
  return `${createHash('sha256').update(key).digest('hex')}.json`;
}

/** Removes everything in `dir` except `.gitkeep`; returns how many entries went. */
export async function clearDirectory(dir: string): Promise<number> {
  if (!(await fs.pathExists(dir))) return 0;

  const entries = (await fs.readdir(dir)).filter((entry) => entry !== '.gitkeep');
  for (const entry of entries) {
    await fs.remove(path.join(dir, entry));
  }
  return entries.length;
}

/** Writes the parsed kiln.yaml as JSON to bootstrap/cache/config.json. */
export async function writeConfigCache(project: Project): Promise<string> {
  const relative = path.posix.join(project.layout.bootstrapCache, CONFIG_CACHE_FILE);
  await fs.outputJson(path.join(project.root, relative), await project.config.all(), { spaces: 2 });
  return relative;
}

export const cacheClearCommand: CommandDefinition = {
  name: 'cache:clear',
  description: 'Clear the file cache, sessions, compiled views and bootstrap cache',
  handler: async (_descriptor, context) => {
    const project = await openProject(context.cwd);

    context.logger.info('Clearing application cache...');
    for (const key of CLEARED_DIRECTORIES) {
      const dir = project.layout[key];
      const removed = await clearDirectory(path.join(project.root, dir));
      context.logger.debug(`Removed ${removed} item(s) from ${dir}`);
    }
    context.logger.success('Application cache cleared!');
  }
};

export const cacheForgetCommand: CommandDefinition = {
  name: 'cache:forget',
  description: 'Remove a single key from the file cache',
  arguments: [{ name: 'key', description: 'Cache key', required: true }],
  handler: async (descriptor, context) => {
    const key = requireArgument(descriptor, 0, 'key');
    const project = await openProject(context.cwd);
    const file = path.join(project.root, project.layout.cache, cacheKeyFile(key));

    if (!(await fs.pathExists(file))) {
      context.logger.warn(`Cache key '${key}' not found`);
      return;
    }
    await fs.remove(file);
    context.logger.success(`Cache key '${key}' forgotten`);
  }
};

export const cacheConfigCommand: CommandDefinition = {
  name: 'cache:config',
  description: 'Cache kiln.yaml as JSON for faster boot',
  handler: async (_descriptor, context) => {
    const project = await openProject(context.cwd);
    const file = await writeConfigCache(project);
    context.logger.success(`Configuration cached to ${file}`);
  }
};

export const cacheCommands: CommandDefinition[] = [cacheClearCommand, cacheForgetCommand, cacheConfigCommand];
