import fs from 'fs-extra';
import * as path from 'path';
import { ConfigStore, CONFIG_FILE } from '../config/store.js';
import { NotAProjectError } from '../errors.js';
import type { ConfigValue } from '../types/index.js';
import { resolveLayout, type ProjectLayout } from './layout.js';

export interface Project {
  root: string;
  layout: ProjectLayout;
  config: ConfigStore;
  settings: { [key: string]: ConfigValue };
}

export async function findProjectRoot(start: string): Promise<string> {
  let current = path.resolve(start);

  while (true) {
    if (await fs.pathExists(path.join(current, CONFIG_FILE))) {
      return current;
    }
    const parent = path.dirname(current);
    if (parent === current) {
      throw new NotAProjectError(start);
    }
    current = parent;
  }
}

export async function openProject(cwd: string): Promise<Project> {
  const root = await findProjectRoot(cwd);
  const config = new ConfigStore(path.join(root, CONFIG_FILE));
  const settings = await config.all();

  return {
    root,
    layout: resolveLayout(settings.paths),
    config,
    settings
  };
}

/** Reads a dotted key from already-loaded settings. */
export function setting(settings: { [key: string]: ConfigValue }, key: string): ConfigValue | undefined {
  let current: ConfigValue | undefined = settings;
  for (const segment of key.split('.')) {
    if (current === null || current === undefined || typeof current !== 'object' || Array.isArray(current)) {
      return undefined;
    }
    current = current[segment];
  }
  return current;
}

export function settingString(
  settings: { [key: string]: ConfigValue },
  key: string,
  fallback: string
): string {
  const value = setting(settings, key);
  if (value === undefined || value === null || typeof value === 'object') {
    return fallback;
  }
  return String(value);
}
