import fs from 'fs-extra';
import ora from 'ora';
import * as os from 'os';
import * as path from 'path';
import { run } from '../src/kernel.js';
import { TemplateStore } from '../src/generators/templates.js';
import { Logger, type LogStream } from '../src/utils/logger.js';
import type { ProcessInvocation, ProcessOutcome, ProcessRunner } from '../src/utils/process.js';

export const FIXED_DATE = new Date(Date.UTC(2024, 0, 15, 9, 30, 5));
export const fixedClock = () => FIXED_DATE;

export const templates = new TemplateStore();

export async function createTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'kiln-test-'));
}

export const SAMPLE_CONFIG = `# Application settings
app:
  name: Test App # shown in the title bar
  env: development
  debug: true
  key: ""

server:
  host: 127.0.0.1
  port: 3000

database:
  default: default
  connections:
    default:
      driver: postgres
      host: db.local
      port: 5432
      database: test_app
      username: app
      password: test-secret
`;

export async function createProject(config: string = SAMPLE_CONFIG): Promise<string> {
  const root = await createTempDir();
  await fs.outputFile(path.join(root, 'kiln.yaml'), config);
  return root;
}

export interface MemoryLogger {
  logger: Logger;
  lines: Array<{ stream: LogStream; line: string }>;
  stdout(): string[];
  stderr(): string[];
}

export function memoryLogger(): MemoryLogger {
  const lines: Array<{ stream: LogStream; line: string }> = [];
  const logger = new Logger({
    color: false,
    write: (stream, line) => {
      lines.push({ stream, line });
    }
  });

  return {
    logger,
    lines,
    stdout: () => lines.filter((entry) => entry.stream === 'stdout').map((entry) => entry.line),
    stderr: () => lines.filter((entry) => entry.stream === 'stderr').map((entry) => entry.line)
  };
}

/** Records every invocation; exit codes come from `respond` (default 0). */
export class RecordingRunner implements ProcessRunner {
  readonly calls: ProcessInvocation[] = [];

  constructor(private readonly respond: (invocation: ProcessInvocation) => Partial<ProcessOutcome> = () => ({})) {}

  async run(invocation: ProcessInvocation): Promise<ProcessOutcome> {
    this.calls.push(invocation);
    return { exitCode: 0, signal: null, stdout: '', stderr: '', ...this.respond(invocation) };
  }

  commandLines(): string[] {
    return this.calls.map((call) => [call.command, ...call.args].join(' '));
  }
}

export interface KilnRun {
  code: number;
  output: MemoryLogger;
  runner: RecordingRunner;
}

export async function runKiln(
  cwd: string,
  tokens: string[],
  options: { runner?: RecordingRunner; confirm?: boolean } = {}
): Promise<KilnRun> {
  const output = memoryLogger();
  const runner = options.runner ?? new RecordingRunner();
  const code = await run(tokens, {
    cwd,
    logger: output.logger,
    runner,
    templates,
    clock: fixedClock,
    confirm: async () => options.confirm ?? false,
    spinner: (text) => ora({ text, isSilent: true }),
    env: {}
  });
  return { code, output, runner };
}
