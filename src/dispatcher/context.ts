import ora, { type Ora } from 'ora';
import prompts from 'prompts';
import type { Logger } from '../utils/logger.js';
import type { ProcessRunner } from '../utils/process.js';
import type { TemplateStore } from '../generators/templates.js';

export interface CommandContext {
  cwd: string;
  logger: Logger;
  runner: ProcessRunner;
  templates: TemplateStore;
  clock: () => Date;
  confirm: (message: string) => Promise<boolean>;
  spinner: (text: string) => Ora;
  env: NodeJS.ProcessEnv;
}

export async function promptConfirm(message: string): Promise<boolean> {
  const response = await prompts({
    type: 'confirm',
    name: 'value',
    message,
    initial: false
  });
  return response.value === true;
}

export function spinnerFor(logger: Logger): (text: string) => Ora {
  return (text: string) => ora({ text, isSilent: logger.getLevel() === 'silent' || logger.getLevel() === 'error' });
}
