import fs from 'fs-extra';
import * as path from 'path';
import { flagBoolean, flagString } from '../dispatcher/dispatch.js';
import type { CommandDefinition } from '../dispatcher/registry.js';
import { openProject } from '../helpers/project.js';
import { npmRun, runDelegated } from '../utils/process.js';
import { writeConfigCache } from './cache.js';

export const BUILD_DIRECTORY = 'dist';

export const buildCommand: CommandDefinition = {
  name: 'build',
  description: 'Build the application for production',
  options: [
    { flags: '-e, --env <env>', description: 'Target environment', defaultValue: 'production' },
    { flags: '--optimize', description: 'Start from an empty build directory and cache the configuration' },
    { flags: '-o, --output <dir>', description: 'Copy the build output to this directory' }
  ],
  handler: async (descriptor, context) => {
    const { logger } = context;
    const project = await openProject(context.cwd);
    const env = flagString(descriptor, 'env') ?? 'production';
    const buildDir = path.join(project.root, BUILD_DIRECTORY);

    logger.info(`Building application for ${logger.paint.cyan(env)}...`);

    if (flagBoolean(descriptor, 'optimize')) {
      await fs.emptyDir(buildDir);
      const cached = await writeConfigCache(project);
      logger.debug(`Configuration cached to ${cached}`);
    }

    await runDelegated(context.runner, {
      ...npmRun('build'),
      cwd: project.root,
      env: { NODE_ENV: env, APP_ENV: env },
      stdio: 'inherit'
    });

    const output = flagString(descriptor, 'output');
    if (output) {
      const destination = path.resolve(project.root, output);
      await fs.copy(buildDir, destination, { overwrite: true });
      logger.info(`Build copied to ${path.relative(project.root, destination) || '.'}`);
    }

    logger.success('Build completed successfully!');
  }
};
