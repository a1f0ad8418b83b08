import { spawn } from 'child_process';
import { DelegatedFailure } from '../errors.js';

export type StdioMode = 'inherit' | 'ignore' | 'pipe';

export interface ProcessInvocation {
  command: string;
  args: readonly string[];
  cwd: string;
  env?: Record<string, string>;
  stdio?: StdioMode;
}

export interface ProcessOutcome {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
}

export interface ProcessRunner {
  run(invocation: ProcessInvocation): Promise<ProcessOutcome>;
}

const INTERRUPT_SIGNALS: readonly NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

export function describeInvocation(invocation: Pick<ProcessInvocation, 'command' | 'args'>): string {
  return [invocation.command, ...invocation.args]
    .map((part) => (/[\s"']/.test(part) ? JSON.stringify(part) : part))
    .join(' ');
}

/** `npm run <script> -- <args>`; the separator is left out when there are no args. */
export function npmRun(script: string, args: readonly string[] = []): Pick<ProcessInvocation, 'command' | 'args'> {
  return {
    command: 'npm',
    args: ['run', script, ...(args.length > 0 ? ['--', ...args] : [])]
  };
}

/**
 * Ctrl+C reaches kiln and the foreground child together. While the child
 * runs, kiln ignores SIGINT/SIGTERM and lets the child decide how to stop.
 * Returns the function that restores the default handling.
 */
export function deferInterrupts(): () => void {
  const ignore = () => {};
  INTERRUPT_SIGNALS.forEach((signal) => process.on(signal, ignore));
  return () => {
    INTERRUPT_SIGNALS.forEach((signal) => process.off(signal, ignore));
  };
}

export class SpawnRunner implements ProcessRunner {
  run(invocation: ProcessInvocation): Promise<ProcessOutcome> {
    const stdio = invocation.stdio ?? 'inherit';

    return new Promise((resolve, reject) => {
      const release = stdio === 'inherit' ? deferInterrupts() : () => {};
      const child = spawn(invocation.command, [...invocation.args], {
        cwd: invocation.cwd,
        env: { ...process.env, ...invocation.env },
        stdio,
        shell: process.platform === 'win32'
      });

      let stdout = '';
      let stderr = '';
      child.stdout?.on('data', (chunk: Buffer) => {
        stdout += chunk.toString();
      });
      child.stderr?.on('data', (chunk: Buffer) => {
        stderr += chunk.toString();
      });

      child.on('error', (error) => {
        release();
        reject(
          new DelegatedFailure(
            invocation.command,
            `Failed to start '${describeInvocation(invocation)}': ${error.message}`
          )
        );
      });

      child.on('close', (exitCode, signal) => {
        release();
        resolve({ exitCode, signal, stdout, stderr });
      });
    });
  }
}

export function succeeded(outcome: ProcessOutcome): boolean {
  if (outcome.signal !== null) {
    return INTERRUPT_SIGNALS.includes(outcome.signal);
  }
  return outcome.exitCode === 0;
}

/**
 * Runs an external tool and throws DelegatedFailure when it does not finish
 * cleanly. An interrupted foreground process (Ctrl+C) counts as a clean stop.
 */
export async function runDelegated(
  runner: ProcessRunner,
  invocation: ProcessInvocation
): Promise<ProcessOutcome> {
  const outcome = await runner.run(invocation);

  if (!succeeded(outcome)) {
    const detail = outcome.stderr.trim();
    const status = outcome.signal ? `signal ${outcome.signal}` : `exit code ${outcome.exitCode}`;
    throw new DelegatedFailure(
      invocation.command,
      `'${describeInvocation(invocation)}' failed with ${status}${detail ? `: ${detail}` : ''}`,
      outcome.exitCode ?? 1
    );
  }

  return outcome;
}
