import { argument, flagNumber, flagString } from '../dispatcher/dispatch.js';
import type { CommandContext } from '../dispatcher/context.js';
import type { CommandDefinition } from '../dispatcher/registry.js';
import { openProject } from '../helpers/project.js';
import { npmRun, runDelegated } from '../utils/process.js';

async function runQueue(context: CommandContext, args: string[]) {
  const project = await openProject(context.cwd);
  await runDelegated(context.runner, { ...npmRun('queue', args), cwd: project.root, stdio: 'inherit' });
}

export const queueWorkCommand: CommandDefinition = {
  name: 'queue:work',
  description: 'Start a queue worker',
  options: [
    { flags: '--queue <queue>', description: 'Queue to listen on' },
    { flags: '--max-jobs <n>', description: 'Stop after processing this many jobs', type: 'integer' },
    { flags: '--memory <mb>', description: 'Memory limit in megabytes', type: 'integer' },
    { flags: '--sleep <seconds>', description: 'Seconds to sleep when no job is available', type: 'integer', defaultValue: 3 }
  ],
  handler: async (descriptor, context) => {
    const args = ['work'];
    const queue = flagString(descriptor, 'queue');
    const maxJobs = flagNumber(descriptor, 'maxJobs');
    const memory = flagNumber(descriptor, 'memory');

    if (queue) args.push('--queue', queue);
    if (maxJobs !== undefined) args.push('--max-jobs', String(maxJobs));
    if (memory !== undefined) args.push('--memory', String(memory));
    args.push('--sleep', String(flagNumber(descriptor, 'sleep') ?? 3));

    context.logger.info(`Starting queue worker${queue ? ` on '${queue}'` : ''}...`);
    await runQueue(context, args);
  }
};

export const queueRestartCommand: CommandDefinition = {
  name: 'queue:restart',
  description: 'Signal queue workers to restart after their current job',
  handler: async (_descriptor, context) => {
    await runQueue(context, ['restart']);
    context.logger.success('Queue restart signal sent');
  }
};

export const queueFailedCommand: CommandDefinition = {
  name: 'queue:failed',
  description: 'List failed jobs',
  handler: async (_descriptor, context) => {
    await runQueue(context, ['failed']);
  }
};

export const queueRetryCommand: CommandDefinition = {
  name: 'queue:retry',
  description: 'Retry a failed job, or all failed jobs',
  arguments: [{ name: 'id', description: 'Failed job id (default: all)' }],
  handler: async (descriptor, context) => {
    const id = argument(descriptor, 0) ?? 'all';
    await runQueue(context, ['retry', id]);
    context.logger.success(id === 'all' ? 'All failed jobs pushed back onto the queue' : `Job ${id} pushed back onto the queue`);
  }
};

export const queueFlushCommand: CommandDefinition = {
  name: 'queue:flush',
  description: 'Delete all failed jobs',
  handler: async (_descriptor, context) => {
    await runQueue(context, ['flush']);
    context.logger.success('Failed jobs flushed');
  }
};

export const queueCommands: CommandDefinition[] = [
  queueWorkCommand,
  queueRestartCommand,
  queueFailedCommand,
  queueRetryCommand,
  queueFlushCommand
];
