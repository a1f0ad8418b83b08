import { argument, flagBoolean } from '../dispatcher/dispatch.js';
import type { CommandDefinition } from '../dispatcher/registry.js';
import { openProject } from '../helpers/project.js';
import { runDelegated } from '../utils/process.js';

export const testCommand: CommandDefinition = {
  name: 'test',
  description: 'Run the application tests',
  arguments: [{ name: 'pattern', description: 'Only run test files matching this pattern' }],
  options: [
    { flags: '--unit', description: 'Run only unit tests' },
    { flags: '--integration', description: 'Run only integration tests' }
  ],
  handler: async (descriptor, context) => {
    const project = await openProject(context.cwd);
    const args = ['vitest', 'run'];

    if (flagBoolean(descriptor, 'unit')) {
      args.push(project.layout.unitTests);
    }
    if (flagBoolean(descriptor, 'integration')) {
      args.push(project.layout.integrationTests);
    }
    const pattern = argument(descriptor, 0);
    if (pattern) {
      args.push(pattern);
    }

    context.logger.info('Running tests...');
    await runDelegated(context.runner, { command: 'npx', args, cwd: project.root, stdio: 'inherit' });
    context.logger.success('All tests passed');
  }
};
