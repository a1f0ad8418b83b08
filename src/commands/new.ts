import * as path from 'path';
import { flagBoolean, flagString, requireArgument } from '../dispatcher/dispatch.js';
import type { CommandDefinition } from '../dispatcher/registry.js';
import { DEFAULT_PROJECT_TEMPLATE, ProjectScaffolder } from '../generators/project.js';

export const newCommand: CommandDefinition = {
  name: 'new',
  description: 'Create a new Kiln application',
  arguments: [{ name: 'name', description: 'Name of the application', required: true }],
  options: [
    {
      flags: '-t, --template <template>',
      description: 'Project template (web, api, minimal) or a local template directory',
      defaultValue: DEFAULT_PROJECT_TEMPLATE
    },
    { flags: '-p, --path <path>', description: 'Directory to create the application in' },
    {
      flags: '--git <bool>',
      description: 'Initialize a git repository',
      type: 'boolean-value',
      defaultValue: true
    }
  ],
  handler: async (descriptor, context) => {
    const { logger } = context;
    const name = requireArgument(descriptor, 0, 'name');
    const git = flagBoolean(descriptor, 'git');

    logger.info(`Creating a new Kiln application: ${logger.paint.cyan.bold(name)}`);

    const scaffolder = new ProjectScaffolder({
      cwd: context.cwd,
      templates: context.templates,
      runner: context.runner,
      spinner: context.spinner
    });
    const result = await scaffolder.scaffold({
      name,
      directory: flagString(descriptor, 'path'),
      template: flagString(descriptor, 'template'),
      git
    });

    if (git) {
      logger.success('Initialized git repository');
    }
    logger.success(`Application '${name}' created successfully!`);

    logger.line();
    logger.line(logger.paint.blue('Next steps:'));
    logger.line(logger.paint.gray(`  cd ${path.relative(context.cwd, result.root) || '.'}`));
    logger.line(logger.paint.gray('  npm install'));
    logger.line(logger.paint.gray('  kiln config:generate-key'));
    logger.line(logger.paint.gray('  kiln serve'));
    logger.line();
  }
};
