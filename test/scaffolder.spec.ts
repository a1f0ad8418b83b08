import fs from 'fs-extra';
import * as path from 'path';
import { beforeEach, describe, expect, it } from 'vitest';
import { DelegatedFailure, DestinationNotEmptyError, InvalidNameError, UnknownTemplateError } from '../src/errors.js';
import { ProjectScaffolder, targetPath } from '../src/generators/project.js';
import { RecordingRunner, createTempDir, templates } from './helpers.js';

describe('targetPath', () => {
  it('turns leading underscores into dots and strips .hbs', () => {
    expect(targetPath('_gitignore')).toEqual({ target: '.gitignore', render: false });
    expect(targetPath('kiln.yaml.hbs')).toEqual({ target: 'kiln.yaml', render: true });
    expect(targetPath('routes/api.ts.hbs')).toEqual({ target: 'routes/api.ts', render: true });
  });

  it('keeps directory names and dunder file names', () => {
    expect(targetPath('__tests__/app.test.ts')).toEqual({ target: '__tests__/app.test.ts', render: false });
    expect(targetPath('_layouts/_gitignore')).toEqual({ target: '_layouts/.gitignore', render: false });
    expect(targetPath('src/__init__.ts')).toEqual({ target: 'src/__init__.ts', render: false });
  });
});

describe('ProjectScaffolder', () => {
  let cwd: string;
  let runner: RecordingRunner;
  let scaffolder: ProjectScaffolder;

  beforeEach(async () => {
    cwd = await createTempDir();
    runner = new RecordingRunner();
    scaffolder = new ProjectScaffolder({ cwd, templates, runner });
  });

  it('creates a web project from the base and web trees', async () => {
    const result = await scaffolder.scaffold({ name: 'blog-app' });
    const root = path.join(cwd, 'blog-app');

    expect(result).toMatchObject({ root, template: 'web', templateVersion: '1.0.0' });
    expect(result.files).toEqual([
      '.env.example',
      '.gitignore',
      'README.md',
      'config/app.ts',
      'kiln.yaml',
      'package.json',
      'resources/views/welcome.html',
      'routes/web.ts',
      'src/app.ts',
      'src/server.ts',
      'tsconfig.json'
    ]);

    const config = await fs.readFile(path.join(root, 'kiln.yaml'), 'utf-8');
    expect(config).toContain('  name: "Blog App"');
    expect(config).toContain('      database: blog_app');

    const manifest: unknown = await fs.readJson(path.join(root, 'package.json'));
    expect(manifest).toMatchObject({ name: 'blog-app', dependencies: { 'kiln-framework': '^0.1.0' } });
  });

  it('creates the layout directories with placeholders', async () => {
    const { root } = await scaffolder.scaffold({ name: 'shop', git: false });

    expect(await fs.pathExists(path.join(root, 'database/migrations/.gitkeep'))).toBe(true);
    expect(await fs.pathExists(path.join(root, 'storage/logs/.gitkeep'))).toBe(true);
    expect(await fs.pathExists(path.join(root, 'routes/.gitkeep'))).toBe(false);
  });

  it('initializes a git repository inside the project', async () => {
    const { root } = await scaffolder.scaffold({ name: 'shop', template: 'api' });

    expect(runner.commandLines()).toEqual(['git init', 'git add .', 'git commit -m Initial commit']);
    expect(runner.calls.every((call) => call.cwd === root && call.stdio === 'pipe')).toBe(true);
  });

  it('skips git when disabled', async () => {
    await scaffolder.scaffold({ name: 'shop', template: 'minimal', git: false });

    expect(runner.calls).toEqual([]);
  });

  it('places the project under the given parent directory', async () => {
    const { root } = await scaffolder.scaffold({ name: 'shop', directory: 'sites', git: false });

    expect(root).toBe(path.join(cwd, 'sites', 'shop'));
    expect(await fs.pathExists(path.join(root, 'kiln.yaml'))).toBe(true);
  });

  it('fails before writing when the destination is not empty', async () => {
    await fs.outputFile(path.join(cwd, 'shop', 'notes.txt'), 'keep me');

    await expect(scaffolder.scaffold({ name: 'shop' })).rejects.toBeInstanceOf(DestinationNotEmptyError);
    expect(await fs.readdir(path.join(cwd, 'shop'))).toEqual(['notes.txt']);
    expect(runner.calls).toEqual([]);
  });

  it('accepts an existing empty destination', async () => {
    await fs.ensureDir(path.join(cwd, 'shop'));

    const { files } = await scaffolder.scaffold({ name: 'shop', git: false });

    expect(files).toContain('kiln.yaml');
  });

  it('rejects invalid project names and unknown templates', async () => {
    await expect(scaffolder.scaffold({ name: '-shop' })).rejects.toBeInstanceOf(InvalidNameError);
    await expect(scaffolder.scaffold({ name: 'shop', template: 'desktop' })).rejects.toBeInstanceOf(UnknownTemplateError);
    await expect(scaffolder.scaffold({ name: 'shop', template: 'base' })).rejects.toBeInstanceOf(UnknownTemplateError);
    expect(await fs.readdir(cwd)).toEqual([]);
  });

  it('layers a local template directory over the base tree', async () => {
    await fs.outputFile(path.join(cwd, 'starter', 'src', 'app.ts'), '// custom app\n');
    await fs.outputFile(path.join(cwd, 'starter', 'NOTES.md.hbs'), '# {{appName}}\n');

    const result = await scaffolder.scaffold({ name: 'custom-site', template: 'starter', git: false });

    expect(result.templateVersion).toBe('local');
    expect(result.files).toContain('kiln.yaml');
    expect(await fs.readFile(path.join(result.root, 'src/app.ts'), 'utf-8')).toBe('// custom app\n');
    expect(await fs.readFile(path.join(result.root, 'NOTES.md'), 'utf-8')).toBe('# Custom Site\n');
  });

  it('reports a failing git step', async () => {
    const failing = new RecordingRunner((call) =>
      call.args[0] === 'commit' ? { exitCode: 128, stderr: 'Author identity unknown\n' } : {}
    );
    const local = new ProjectScaffolder({ cwd, templates, runner: failing });

    const error = await local.scaffold({ name: 'shop' }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(DelegatedFailure);
    expect(error).toMatchObject({
      exitCode: 128,
      message: `'git commit -m "Initial commit"' failed with exit code 128: Author identity unknown`
    });
  });
});
