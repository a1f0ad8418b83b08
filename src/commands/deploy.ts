import fs from 'fs-extra';
import * as path from 'path';
import { parse } from 'yaml';
import { z } from 'zod';
import { argument, flagBoolean } from '../dispatcher/dispatch.js';
import type { CommandDefinition } from '../dispatcher/registry.js';
import { ConfigFormatError, OperationRefusedError, ParseError } from '../errors.js';
import { openProject } from '../helpers/project.js';
import { describeInvocation, npmRun, runDelegated, type ProcessInvocation } from '../utils/process.js';
import { BUILD_DIRECTORY } from './build.js';

export const DEFAULT_DEPLOY_TARGET = 'production';

const deployConfigSchema = z
  .object({
    strategy: z.enum(['docker', 'server', 'custom']),
    environment: z.record(z.string()).default({}),
    before: z.array(z.string()).default([]),
    after: z.array(z.string()).default([]),
    commands: z.array(z.string()).default([]),
    docker: z
      .object({
        image: z.string().min(1),
        tag: z.string().default('latest'),
        registry: z.string().optional(),
        dockerfile: z.string().optional()
      })
      .optional(),
    server: z
      .object({
        host: z.string().min(1),
        user: z.string().min(1),
        port: z.number().int().positive().default(22),
        path: z.string().min(1),
        restart: z.string().optional()
      })
      .optional()
  })
  .superRefine((config, ctx) => {
    if (config.strategy === 'docker' && !config.docker) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['docker'], message: "required for the 'docker' strategy" });
    }
    if (config.strategy === 'server' && !config.server) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['server'], message: "required for the 'server' strategy" });
    }
  });

export type DeployConfig = z.infer<typeof deployConfigSchema>;

export interface DeployStep {
  title: string;
  invocation: ProcessInvocation;
}

const TARGET_NAME = /^[A-Za-z0-9][A-Za-z0-9_-]*$/;

export function deployConfigPath(target: string): string {
  if (!TARGET_NAME.test(target)) {
    throw new ParseError(
      `Invalid deployment target '${target}': use letters, digits, '-' and '_' only`
    );
  }
  return path.posix.join('deploy', `${target}.yaml`);
}

export async function loadDeployConfig(root: string, target: string): Promise<DeployConfig> {
  const relative = deployConfigPath(target);
  const file = path.join(root, relative);

  if (!(await fs.pathExists(file))) {
    throw new OperationRefusedError(`Deployment config '${relative}' not found`);
  }

  let raw: unknown;
  try {
    raw = parse(await fs.readFile(file, 'utf-8'));
  } catch (error) {
    throw new ConfigFormatError(relative, error instanceof Error ? error.message : String(error));
  }

  const parsed = deployConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigFormatError(relative, `${issue.path.join('.') || '<root>'}: ${issue.message}`);
  }
  return parsed.data;
}

function shell(command: string, cwd: string, env: Record<string, string>): ProcessInvocation {
  return { command: 'sh', args: ['-c', command], cwd, env, stdio: 'inherit' };
}

export function planDeployment(config: DeployConfig, root: string, skipBuild: boolean): DeployStep[] {
  const env = config.environment;
  const steps: DeployStep[] = [];

  if (!skipBuild) {
    steps.push({
      title: 'Build application',
      invocation: { ...npmRun('build'), cwd: root, env: { ...env, NODE_ENV: 'production' }, stdio: 'inherit' }
    });
  }

  for (const command of config.before) {
    steps.push({ title: `Before deploy: ${command}`, invocation: shell(command, root, env) });
  }

  if (config.strategy === 'docker' && config.docker) {
    const { image, tag, registry, dockerfile } = config.docker;
    const reference = `${registry ? `${registry}/` : ''}${image}:${tag}`;
    steps.push({
      title: `Build image ${reference}`,
      invocation: {
        command: 'docker',
        args: ['build', '-t', reference, ...(dockerfile ? ['-f', dockerfile] : []), '.'],
        cwd: root,
        env,
        stdio: 'inherit'
      }
    });
    steps.push({
      title: `Push image ${reference}`,
      invocation: { command: 'docker', args: ['push', reference], cwd: root, env, stdio: 'inherit' }
    });
  } else if (config.strategy === 'server' && config.server) {
    const { host, user, port, path: remotePath, restart } = config.server;
    const destination = `${user}@${host}`;
    steps.push({
      title: `Upload to ${destination}:${remotePath}`,
      invocation: {
        command: 'rsync',
        args: [
          '-az',
          '--delete',
          '-e',
          `ssh -p ${port}`,
          `${BUILD_DIRECTORY}/`,
          'package.json',
          'kiln.yaml',
          `${destination}:${remotePath}/`
        ],
        cwd: root,
        env,
        stdio: 'inherit'
      }
    });
    if (restart) {
      steps.push({
        title: `Restart on ${host}`,
        invocation: {
          command: 'ssh',
          args: ['-p', String(port), destination, `cd ${remotePath} && ${restart}`],
          cwd: root,
          env,
          stdio: 'inherit'
        }
      });
    }
  }

  for (const command of config.commands) {
    steps.push({ title: `Deploy: ${command}`, invocation: shell(command, root, env) });
  }

  for (const command of config.after) {
    steps.push({ title: `After deploy: ${command}`, invocation: shell(command, root, env) });
  }

  return steps;
}

export const deployCommand: CommandDefinition = {
  name: 'deploy',
  description: 'Deploy the application',
  arguments: [{ name: 'target', description: `Deployment target (default: ${DEFAULT_DEPLOY_TARGET})` }],
  options: [
    { flags: '--skip-build', description: 'Skip the build step' },
    { flags: '--dry-run', description: 'Print the deployment steps without running them' }
  ],
  handler: async (descriptor, context) => {
    const { logger } = context;
    const project = await openProject(context.cwd);
    const target = argument(descriptor, 0) ?? DEFAULT_DEPLOY_TARGET;
    const dryRun = flagBoolean(descriptor, 'dryRun');

    const config = await loadDeployConfig(project.root, target);
    const steps = planDeployment(config, project.root, flagBoolean(descriptor, 'skipBuild'));

    logger.info(`Deploying to ${logger.paint.cyan.bold(target)} (${config.strategy})${dryRun ? ' [dry run]' : ''}`);

    for (const [index, step] of steps.entries()) {
      const prefix = `[${index + 1}/${steps.length}]`;
      if (dryRun) {
        logger.line(`${prefix} ${step.title}`);
        logger.line(logger.paint.gray(`    $ ${describeInvocation(step.invocation)}`));
        continue;
      }
      logger.info(`${prefix} ${step.title}`);
      await runDelegated(context.runner, step.invocation);
    }

    if (dryRun) {
      logger.info('Dry run finished; nothing was executed');
      return;
    }
    logger.success('Deployment completed successfully');
  }
};
