import { describe, expect, it } from 'vitest';
import { DelegatedFailure } from '../src/errors.js';
import { deferInterrupts, describeInvocation, npmRun, runDelegated, succeeded } from '../src/utils/process.js';
import { RecordingRunner } from './helpers.js';

describe('describeInvocation', () => {
  it('quotes arguments with spaces or quotes', () => {
    expect(describeInvocation({ command: 'git', args: ['commit', '-m', 'Initial commit'] })).toBe(
      'git commit -m "Initial commit"'
    );
    expect(describeInvocation({ command: 'npm', args: ['run', 'build'] })).toBe('npm run build');
  });
});

describe('npmRun', () => {
  it('adds the argument separator only when there are arguments', () => {
    expect(npmRun('build')).toEqual({ command: 'npm', args: ['run', 'build'] });
    expect(npmRun('migrate', ['status'])).toEqual({ command: 'npm', args: ['run', 'migrate', '--', 'status'] });
  });
});

describe('succeeded', () => {
  it('accepts exit code zero and interrupts', () => {
    expect(succeeded({ exitCode: 0, signal: null, stdout: '', stderr: '' })).toBe(true);
    expect(succeeded({ exitCode: null, signal: 'SIGINT', stdout: '', stderr: '' })).toBe(true);
    expect(succeeded({ exitCode: null, signal: 'SIGKILL', stdout: '', stderr: '' })).toBe(false);
    expect(succeeded({ exitCode: 2, signal: null, stdout: '', stderr: '' })).toBe(false);
  });
});

describe('runDelegated', () => {
  it('returns the outcome of a successful run', async () => {
    const runner = new RecordingRunner(() => ({ stdout: 'ok' }));

    const outcome = await runDelegated(runner, { command: 'pg_isready', args: [], cwd: '.' });

    expect(outcome.stdout).toBe('ok');
  });

  it('propagates the exit code of a failed run', async () => {
    const runner = new RecordingRunner(() => ({ exitCode: 3 }));

    const error = await runDelegated(runner, { command: 'npm', args: ['run', 'build'], cwd: '.' }).catch(
      (caught: unknown) => caught
    );

    expect(error).toBeInstanceOf(DelegatedFailure);
    expect(error).toMatchObject({ command: 'npm', exitCode: 3, message: "'npm run build' failed with exit code 3" });
  });

  it('reports a signal that is not an interrupt', async () => {
    const runner = new RecordingRunner(() => ({ exitCode: null, signal: 'SIGKILL' }));

    await expect(runDelegated(runner, { command: 'npm', args: ['run', 'dev'], cwd: '.' })).rejects.toMatchObject({
      exitCode: 1,
      message: "'npm run dev' failed with signal SIGKILL"
    });
  });
});

describe('deferInterrupts', () => {
  it('ignores interrupts until released', () => {
    const before = { int: process.listenerCount('SIGINT'), term: process.listenerCount('SIGTERM') };

    const release = deferInterrupts();

    expect(process.listenerCount('SIGINT')).toBe(before.int + 1);
    expect(process.listenerCount('SIGTERM')).toBe(before.term + 1);

    release();

    expect(process.listenerCount('SIGINT')).toBe(before.int);
    expect(process.listenerCount('SIGTERM')).toBe(before.term);
  });
});
