import { flagBoolean, flagNumber, flagString } from '../dispatcher/dispatch.js';
import type { CommandDefinition } from '../dispatcher/registry.js';
import { ParseError } from '../errors.js';
import { openProject } from '../helpers/project.js';
import { npmRun, runDelegated } from '../utils/process.js';

export const serveCommand: CommandDefinition = {
  name: 'serve',
  description: 'Serve the application',
  options: [
    { flags: '--host <host>', description: 'Host to bind to', defaultValue: '127.0.0.1' },
    { flags: '-p, --port <port>', description: 'Port to bind to', type: 'integer', defaultValue: 3000 },
    { flags: '-e, --env <env>', description: 'Environment to run in', defaultValue: 'development' },
    { flags: '--reload', description: 'Restart the server when files change' }
  ],
  handler: async (descriptor, context) => {
    const { logger } = context;
    const project = await openProject(context.cwd);
    const host = flagString(descriptor, 'host') ?? '127.0.0.1';
    const port = flagNumber(descriptor, 'port') ?? 3000;
    const env = flagString(descriptor, 'env') ?? 'development';
    const reload = flagBoolean(descriptor, 'reload');

    if (port < 1 || port > 65535) {
      throw new ParseError(`Port must be between 1 and 65535, got ${port}`);
    }

    logger.info(`Starting development server on ${logger.paint.cyan(`http://${host}:${port}`)}`);
    logger.info(`Environment: ${env}${reload ? ', reloading on change' : ''}`);
    logger.line(logger.paint.gray('Press Ctrl+C to stop the server'));

    await runDelegated(context.runner, {
      ...npmRun(reload ? 'dev' : 'serve'),
      cwd: project.root,
      env: { APP_ENV: env, HOST: host, PORT: String(port) },
      stdio: 'inherit'
    });

    logger.info('Server stopped');
  }
};
