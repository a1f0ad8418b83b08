import * as path from 'path';

export interface ProjectLayout {
  controllers: string;
  models: string;
  middleware: string;
  requests: string;
  resources: string;
  jobs: string;
  events: string;
  listeners: string;
  policies: string;
  commands: string;
  migrations: string;
  seeders: string;
  factories: string;
  unitTests: string;
  integrationTests: string;
  routes: string;
  config: string;
  views: string;
  assets: string;
  logs: string;
  cache: string;
  sessions: string;
  compiledViews: string;
  uploads: string;
  bootstrapCache: string;
}

export type LayoutKey = keyof ProjectLayout;

export const DEFAULT_LAYOUT: Readonly<ProjectLayout> = Object.freeze({
  controllers: 'src/controllers',
  models: 'src/models',
  middleware: 'src/middleware',
  requests: 'src/requests',
  resources: 'src/resources',
  jobs: 'src/jobs',
  events: 'src/events',
  listeners: 'src/listeners',
  policies: 'src/policies',
  commands: 'src/commands',
  migrations: 'database/migrations',
  seeders: 'database/seeders',
  factories: 'database/factories',
  unitTests: 'tests/unit',
  integrationTests: 'tests/integration',
  routes: 'routes',
  config: 'config',
  views: 'resources/views',
  assets: 'resources/assets',
  logs: 'storage/logs',
  cache: 'storage/cache',
  sessions: 'storage/sessions',
  compiledViews: 'storage/views',
  uploads: 'storage/uploads',
  bootstrapCache: 'bootstrap/cache'
});

function isLayoutKey(key: string): key is LayoutKey {
  return Object.prototype.hasOwnProperty.call(DEFAULT_LAYOUT, key);
}

function normalizeRelative(dir: string): string | undefined {
  const normalized = path.posix.normalize(dir.replace(/\\/g, '/')).replace(/\/+$/, '');
  if (normalized === '' || normalized === '.' || normalized.startsWith('..') || path.posix.isAbsolute(normalized)) {
    return undefined;
  }
  return normalized;
}

/**
 * Applies `paths.*` overrides from kiln.yaml. Unknown keys and paths that
 * leave the project root are ignored.
 */
export function resolveLayout(overrides: unknown): ProjectLayout {
  const layout: ProjectLayout = { ...DEFAULT_LAYOUT };

  if (typeof overrides !== 'object' || overrides === null || Array.isArray(overrides)) {
    return layout;
  }

  for (const [key, value] of Object.entries(overrides)) {
    if (!isLayoutKey(key) || typeof value !== 'string') continue;
    const dir = normalizeRelative(value);
    if (dir) {
      layout[key] = dir;
    }
  }

  return layout;
}

export function layoutDirectories(layout: ProjectLayout): string[] {
  return [...new Set(Object.values(layout))].sort();
}
