import * as path from 'path';
import type { LayoutKey, ProjectLayout } from '../helpers/layout.js';
import type { ComponentKind, ComponentSpec, NameVariants, SpecOf } from '../types/index.js';
import { nameVariants } from '../utils/naming.js';

export interface ComponentRule<K extends ComponentKind> {
  suffix: (spec: SpecOf<K>) => string;
  directory: (spec: SpecOf<K>) => LayoutKey;
  template: (spec: SpecOf<K>, variants: NameVariants) => string;
  fileName?: (variants: NameVariants, now: Date) => string;
  /**
   * When set, an existing file is any file in the target directory this
   * predicate accepts, instead of the exact file name.
   */
  matches?: (fileName: string, variants: NameVariants) => boolean;
  context?: (spec: SpecOf<K>, variants: NameVariants, layout: ProjectLayout) => Record<string, unknown>;
  followUps?: (spec: SpecOf<K>, variants: NameVariants) => ComponentSpec[];
}

type RuleTable = { [K in ComponentKind]: ComponentRule<K> };

const MIGRATION_FILE = /^\d{4}_\d{2}_\d{2}_\d{6}_(.+)\.ts$/;

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

export function migrationTimestamp(date: Date): string {
  return [
    date.getUTCFullYear(),
    pad(date.getUTCMonth() + 1),
    pad(date.getUTCDate()),
    `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  ].join('_');
}

export interface MigrationTarget {
  table?: string;
  create: boolean;
}

/**
 * `create_users_table` creates `users`; `add_email_to_users_table` (also
 * `_from_` and `_in_`) alters `users`. Explicit options win over the name.
 */
export function migrationTarget(name: string, create?: string, table?: string): MigrationTarget {
  if (create) return { table: create, create: true };
  if (table) return { table, create: false };

  const snake = nameVariants(name).snakeName;
  const created = /^create_(\w+)_table$/.exec(snake);
  if (created) return { table: created[1], create: true };

  const altered = /_(?:to|from|in)_(\w+)_table$/.exec(snake);
  if (altered) return { table: altered[1], create: false };

  return { create: false };
}

/** Relative module specifier from a layout directory to a project file (without extension). */
export function importPath(layout: ProjectLayout, from: LayoutKey, target: string): string {
  const relative = path.posix.relative(layout[from], target);
  return `${relative.startsWith('.') ? relative : `./${relative}`}.js`;
}

function modelContext(layout: ProjectLayout, from: LayoutKey, model: string) {
  const variants = nameVariants(model);
  return {
    model: variants,
    modelImport: importPath(layout, from, path.posix.join(layout.models, variants.className))
  };
}

const none = () => '';

export const COMPONENT_RULES: RuleTable = {
  controller: {
    suffix: () => 'Controller',
    directory: () => 'controllers',
    template: (spec) => (spec.api ? 'controller.api' : spec.resource ? 'controller.resource' : 'controller.plain'),
    context: (spec, _variants, layout) => (spec.model ? modelContext(layout, 'controllers', spec.model) : {})
  },
  model: {
    suffix: none,
    directory: () => 'models',
    template: () => 'model',
    followUps: (spec, variants) => {
      const followUps: ComponentSpec[] = [];
      if (spec.migration) {
        followUps.push({
          kind: 'migration',
          name: `create_${variants.tableName}_table`,
          create: variants.tableName,
          force: spec.force
        });
      }
      if (spec.factory) {
        followUps.push({ kind: 'factory', name: `${variants.className}Factory`, model: variants.className, force: spec.force });
      }
      if (spec.seeder) {
        followUps.push({ kind: 'seeder', name: `${variants.className}Seeder`, model: variants.className, force: spec.force });
      }
      return followUps;
    }
  },
  migration: {
    suffix: none,
    directory: () => 'migrations',
    template: (spec) => {
      const target = migrationTarget(spec.name, spec.create, spec.table);
      if (!target.table) return 'migration.blank';
      return target.create ? 'migration.create' : 'migration.update';
    },
    fileName: (variants, now) => `${migrationTimestamp(now)}_${variants.snakeName}.ts`,
    matches: (fileName, variants) => MIGRATION_FILE.exec(fileName)?.[1] === variants.snakeName,
    context: (spec) => ({ table: migrationTarget(spec.name, spec.create, spec.table).table })
  },
  middleware: {
    suffix: none,
    directory: () => 'middleware',
    template: () => 'middleware'
  },
  request: {
    suffix: () => 'Request',
    directory: () => 'requests',
    template: () => 'request'
  },
  resource: {
    suffix: (spec) => (spec.collection ? 'Collection' : 'Resource'),
    directory: () => 'resources',
    template: (spec) => (spec.collection ? 'resource.collection' : 'resource')
  },
  seeder: {
    suffix: () => 'Seeder',
    directory: () => 'seeders',
    template: () => 'seeder',
    context: (spec, variants, layout) => {
      const model = nameVariants(spec.model ?? variants.baseName);
      return {
        model,
        factoryImport: importPath(layout, 'seeders', path.posix.join(layout.factories, `${model.className}Factory`))
      };
    }
  },
  factory: {
    suffix: () => 'Factory',
    directory: () => 'factories',
    template: () => 'factory',
    context: (spec, variants, layout) => modelContext(layout, 'factories', spec.model ?? variants.baseName)
  },
  job: {
    suffix: none,
    directory: () => 'jobs',
    template: (spec) => (spec.sync ? 'job.sync' : 'job')
  },
  event: {
    suffix: none,
    directory: () => 'events',
    template: () => 'event'
  },
  listener: {
    suffix: none,
    directory: () => 'listeners',
    template: () => 'listener',
    context: (spec, _variants, layout) => {
      if (!spec.event) return {};
      const event = nameVariants(spec.event);
      return {
        event,
        eventImport: importPath(layout, 'listeners', path.posix.join(layout.events, event.className))
      };
    }
  },
  policy: {
    suffix: () => 'Policy',
    directory: () => 'policies',
    template: () => 'policy',
    context: (spec, variants, layout) => modelContext(layout, 'policies', spec.model ?? variants.baseName)
  },
  command: {
    suffix: () => 'Command',
    directory: () => 'commands',
    template: () => 'command',
    context: (_spec, variants) => ({ signature: `app:${variants.kebabName}` })
  },
  test: {
    suffix: () => 'Test',
    directory: (spec) => (spec.integration ? 'integrationTests' : 'unitTests'),
    template: (spec) => (spec.integration ? 'test.integration' : 'test.unit'),
    fileName: (variants) => `${variants.className}.test.ts`,
    context: (spec, _variants, layout) => ({
      appImport: importPath(layout, spec.integration ? 'integrationTests' : 'unitTests', 'src/app')
    })
  }
};

export function ruleFor<K extends ComponentKind>(kind: K): ComponentRule<K> {
  return COMPONENT_RULES[kind];
}
