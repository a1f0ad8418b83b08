import { flagBoolean, flagString, requireArgument } from '../dispatcher/dispatch.js';
import type { CommandDefinition, OptionDefinition } from '../dispatcher/registry.js';
import { GeneratorEngine } from '../generators/engine.js';
import { openProject } from '../helpers/project.js';
import type { CommandDescriptor, ComponentKind, ComponentSpec } from '../types/index.js';
import { capitalize } from '../utils/naming.js';

const FORCE: OptionDefinition = { flags: '--force', description: 'Overwrite the file if it already exists' };
const MODEL: OptionDefinition = { flags: '-m, --model <model>', description: 'Model the component works with' };

const KIND_OPTIONS: Record<ComponentKind, OptionDefinition[]> = {
  controller: [
    { flags: '-r, --resource', description: 'Generate a resource controller' },
    { flags: '--api', description: 'Generate an API controller without create/edit actions' },
    MODEL
  ],
  model: [
    { flags: '-m, --migration', description: 'Also create a migration' },
    { flags: '-f, --factory', description: 'Also create a factory' },
    { flags: '-s, --seeder', description: 'Also create a seeder' },
    { flags: '-a, --all', description: 'Also create a migration, factory and seeder' }
  ],
  migration: [
    { flags: '--create <table>', description: 'Table to create' },
    { flags: '--table <table>', description: 'Table to alter' }
  ],
  middleware: [],
  request: [],
  resource: [{ flags: '-c, --collection', description: 'Generate a resource collection' }],
  seeder: [MODEL],
  factory: [MODEL],
  job: [{ flags: '--sync', description: 'Generate a synchronous job' }],
  event: [],
  listener: [{ flags: '-e, --event <event>', description: 'Event the listener handles' }],
  policy: [MODEL],
  command: [],
  test: [
    { flags: '-u, --unit', description: 'Generate a unit test (default)' },
    { flags: '--integration', description: 'Generate an integration test' }
  ]
};

const DESCRIPTIONS: Record<ComponentKind, string> = {
  controller: 'Create a new controller',
  model: 'Create a new model',
  migration: 'Create a new migration',
  middleware: 'Create a new middleware',
  request: 'Create a new form request',
  resource: 'Create a new API resource',
  seeder: 'Create a new seeder',
  factory: 'Create a new model factory',
  job: 'Create a new job',
  event: 'Create a new event',
  listener: 'Create a new event listener',
  policy: 'Create a new policy',
  command: 'Create a new console command',
  test: 'Create a new test'
};

export function componentSpec(kind: ComponentKind, descriptor: CommandDescriptor): ComponentSpec {
  const name = requireArgument(descriptor, 0, 'name');
  const force = flagBoolean(descriptor, 'force');
  const all = flagBoolean(descriptor, 'all');

  switch (kind) {
    case 'controller':
      return {
        kind,
        name,
        force,
        resource: flagBoolean(descriptor, 'resource'),
        api: flagBoolean(descriptor, 'api'),
        model: flagString(descriptor, 'model')
      };
    case 'model':
      return {
        kind,
        name,
        force,
        migration: all || flagBoolean(descriptor, 'migration'),
        factory: all || flagBoolean(descriptor, 'factory'),
        seeder: all || flagBoolean(descriptor, 'seeder')
      };
    case 'migration':
      return { kind, name, force, create: flagString(descriptor, 'create'), table: flagString(descriptor, 'table') };
    case 'resource':
      return { kind, name, force, collection: flagBoolean(descriptor, 'collection') };
    case 'seeder':
    case 'factory':
    case 'policy':
      return { kind, name, force, model: flagString(descriptor, 'model') };
    case 'job':
      return { kind, name, force, sync: flagBoolean(descriptor, 'sync') };
    case 'listener':
      return { kind, name, force, event: flagString(descriptor, 'event') };
    case 'test':
      return { kind, name, force, integration: flagBoolean(descriptor, 'integration') };
    case 'middleware':
    case 'request':
    case 'event':
    case 'command':
      return { kind, name, force };
  }
}

function makeCommand(kind: ComponentKind): CommandDefinition {
  return {
    name: `make:${kind}`,
    description: DESCRIPTIONS[kind],
    arguments: [{ name: 'name', description: `Name of the ${kind}`, required: true }],
    options: [...KIND_OPTIONS[kind], FORCE],
    handler: async (descriptor, context) => {
      const spec = componentSpec(kind, descriptor);
      const project = await openProject(context.cwd);
      const engine = new GeneratorEngine({
        root: project.root,
        layout: project.layout,
        templates: context.templates,
        clock: context.clock,
        onGenerated: (file) => {
          const verb = file.overwritten ? 'overwritten' : 'created';
          context.logger.success(`${capitalize(file.kind)} ${verb}: ${file.path}`);
        }
      });

      context.logger.debug(`Generating ${kind} '${spec.name}' in ${project.root}`);
      await engine.generate(spec);
    }
  };
}

export const makeCommands: CommandDefinition[] = [
  makeCommand('controller'),
  makeCommand('model'),
  makeCommand('migration'),
  makeCommand('middleware'),
  makeCommand('request'),
  makeCommand('resource'),
  makeCommand('seeder'),
  makeCommand('factory'),
  makeCommand('job'),
  makeCommand('event'),
  makeCommand('listener'),
  makeCommand('policy'),
  makeCommand('command'),
  makeCommand('test')
];
