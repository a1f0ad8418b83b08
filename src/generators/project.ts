import fs from 'fs-extra';
import type { Ora } from 'ora';
import * as path from 'path';
import { DestinationNotEmptyError, InvalidNameError } from '../errors.js';
import { DEFAULT_LAYOUT, layoutDirectories } from '../helpers/layout.js';
import { toKebabCase, toSnakeCase, toTitleCase } from '../utils/naming.js';
import { runDelegated, type ProcessRunner } from '../utils/process.js';
import { VERSION } from '../version.js';
import type { TemplateStore } from './templates.js';

const PROJECT_NAME = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

export const DEFAULT_PROJECT_TEMPLATE = 'web';

export interface ScaffoldOptions {
  name: string;
  /** Parent directory of the new project; defaults to the working directory. */
  directory?: string;
  template?: string;
  git?: boolean;
}

export interface ScaffoldResult {
  root: string;
  template: string;
  templateVersion: string;
  files: string[];
}

export interface ScaffolderDependencies {
  cwd: string;
  templates: TemplateStore;
  runner: ProcessRunner;
  spinner?: (text: string) => Ora;
}

interface PlannedFile {
  source: string;
  target: string;
  render: boolean;
}

async function listFiles(dir: string): Promise<string[]> {
  const files: string[] = [];
  const entries = await fs.readdir(dir, { withFileTypes: true });

  for (const entry of entries) {
    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await listFiles(fullPath)));
    } else if (entry.isFile()) {
      files.push(fullPath);
    }
  }

  return files;
}

/**
 * A file named `_gitignore` becomes `.gitignore`; directories keep their names.
 * `.hbs` files are rendered and lose the suffix.
 */
export function targetPath(relativeSource: string): { target: string; render: boolean } {
  const segments = relativeSource.split(/[\\/]/);
  const fileName = segments.pop() ?? '';
  segments.push(fileName.startsWith('_') && !fileName.startsWith('__') ? `.${fileName.slice(1)}` : fileName);
  let target = segments.join('/');
  const render = target.endsWith('.hbs');
  if (render) {
    target = target.slice(0, -'.hbs'.length);
  }
  return { target, render };
}

async function assertEmptyDestination(destination: string) {
  if (!(await fs.pathExists(destination))) return;

  const stats = await fs.stat(destination);
  if (!stats.isDirectory() || (await fs.readdir(destination)).length > 0) {
    throw new DestinationNotEmptyError(destination);
  }
}

export class ProjectScaffolder {
  constructor(private readonly deps: ScaffolderDependencies) {}

  async scaffold(options: ScaffoldOptions): Promise<ScaffoldResult> {
    const { name } = options;
    if (!PROJECT_NAME.test(name)) {
      throw new InvalidNameError(
        name,
        'project names must start with a letter or digit and contain only letters, digits, ".", "_" and "-"'
      );
    }

    const templateName = options.template ?? DEFAULT_PROJECT_TEMPLATE;
    const template = await this.deps.templates.resolveProject(templateName, this.deps.cwd);
    const root = path.resolve(this.deps.cwd, options.directory ?? '.', name);
    await assertEmptyDestination(root);

    const plan = await this.plan(template.directories);
    const context = {
      projectName: name,
      packageName: toKebabCase(name) || name.toLowerCase(),
      appName: toTitleCase(name),
      databaseName: toSnakeCase(name) || 'kiln_app',
      template: template.name,
      templateVersion: template.version,
      kilnVersion: VERSION
    };

    const spinner = this.deps.spinner?.(`Creating ${name}...`).start();
    try {
      await fs.ensureDir(root);

      for (const file of plan) {
        const destination = path.join(root, file.target);
        if (file.render) {
          const source = await fs.readFile(file.source, 'utf-8');
          await fs.outputFile(destination, this.deps.templates.render(source, context));
        } else {
          await fs.copy(file.source, destination);
        }
      }

      for (const dir of layoutDirectories(DEFAULT_LAYOUT)) {
        const absolute = path.join(root, dir);
        await fs.ensureDir(absolute);
        if ((await fs.readdir(absolute)).length === 0) {
          await fs.outputFile(path.join(absolute, '.gitkeep'), '');
        }
      }
      spinner?.succeed(`Created ${name} from the ${template.name} template`);
    } catch (error) {
      spinner?.fail(`Failed to create ${name}`);
      throw error;
    }

    if (options.git ?? true) {
      await this.initializeGit(root);
    }

    return {
      root,
      template: template.name,
      templateVersion: template.version,
      files: plan.map((file) => file.target).sort()
    };
  }

  private async plan(directories: string[]): Promise<PlannedFile[]> {
    const planned = new Map<string, PlannedFile>();

    for (const dir of directories) {
      for (const source of await listFiles(dir)) {
        const { target, render } = targetPath(path.relative(dir, source));
        planned.set(target, { source, target, render });
      }
    }

    return [...planned.values()];
  }

  private async initializeGit(root: string) {
    const steps: string[][] = [['init'], ['add', '.'], ['commit', '-m', 'Initial commit']];
    for (const args of steps) {
      await runDelegated(this.deps.runner, { command: 'git', args, cwd: root, stdio: 'pipe' });
    }
  }
}
