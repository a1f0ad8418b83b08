import fs from 'fs-extra';
import * as path from 'path';
import { beforeEach, describe, expect, it } from 'vitest';
import { InvalidNameError, TargetExistsError } from '../src/errors.js';
import { importPath, migrationTarget, migrationTimestamp } from '../src/generators/components.js';
import { GeneratorEngine } from '../src/generators/engine.js';
import { DEFAULT_LAYOUT, resolveLayout } from '../src/helpers/layout.js';
import type { GeneratedFile } from '../src/types/index.js';
import { FIXED_DATE, createTempDir, fixedClock, templates } from './helpers.js';

describe('migration helpers', () => {
  it('formats timestamps in UTC', () => {
    expect(migrationTimestamp(FIXED_DATE)).toBe('2024_01_15_093005');
  });

  it('guesses the table from the migration name', () => {
    expect(migrationTarget('create_posts_table')).toEqual({ table: 'posts', create: true });
    expect(migrationTarget('add_email_to_users_table')).toEqual({ table: 'users', create: false });
    expect(migrationTarget('CreateFlightsTable')).toEqual({ table: 'flights', create: true });
    expect(migrationTarget('backfill_totals')).toEqual({ create: false });
  });

  it('prefers explicit options over the name', () => {
    expect(migrationTarget('create_posts_table', undefined, 'articles')).toEqual({ table: 'articles', create: false });
    expect(migrationTarget('anything', 'logs')).toEqual({ table: 'logs', create: true });
  });

  it('builds relative import specifiers', () => {
    expect(importPath(DEFAULT_LAYOUT, 'controllers', 'src/models/Post')).toBe('../models/Post.js');
    expect(importPath(DEFAULT_LAYOUT, 'routes', 'routes/web')).toBe('./web.js');
  });
});

describe('GeneratorEngine', () => {
  let root: string;
  let written: GeneratedFile[];
  let engine: GeneratorEngine;

  beforeEach(async () => {
    root = await createTempDir();
    written = [];
    engine = new GeneratorEngine({
      root,
      layout: DEFAULT_LAYOUT,
      templates,
      clock: fixedClock,
      onGenerated: (file) => written.push(file)
    });
  });

  const read = (relative: string) => fs.readFile(path.join(root, relative), 'utf-8');

  it('writes a controller under the layout directory', async () => {
    const [file] = await engine.generate({ kind: 'controller', name: 'Post', force: false, resource: true, api: false, model: 'Post' });

    expect(file).toMatchObject({
      kind: 'controller',
      className: 'PostController',
      path: 'src/controllers/PostController.ts',
      overwritten: false
    });
    const content = await read('src/controllers/PostController.ts');
    expect(content).toContain('export class PostController extends Controller {');
    expect(content).toContain("import { Post } from '../models/Post.js';");
    expect(content).toContain("return view.render('post/index', { postList });");
  });

  it('writes the model and its follow-ups in order', async () => {
    const files = await engine.generate({ kind: 'model', name: 'User', force: false, migration: true, factory: true, seeder: true });

    expect(files.map((file) => file.path)).toEqual([
      'src/models/User.ts',
      'database/migrations/2024_01_15_093005_create_users_table.ts',
      'database/factories/UserFactory.ts',
      'database/seeders/UserSeeder.ts'
    ]);
    expect(written.map((file) => file.kind)).toEqual(['model', 'migration', 'factory', 'seeder']);

    expect(await read('src/models/User.ts')).toContain("static table = 'users';");
    const migration = await read('database/migrations/2024_01_15_093005_create_users_table.ts');
    expect(migration).toContain('export default class CreateUsersTable extends Migration {');
    expect(migration).toContain("await schema.createTable('users', (table) => {");
    expect(await read('database/seeders/UserSeeder.ts')).toContain(
      "import { UserFactory } from '../factories/UserFactory.js';"
    );
  });

  it('refuses to overwrite and leaves the existing file unchanged', async () => {
    await fs.outputFile(path.join(root, 'src/models/User.ts'), '// hand written\n');

    const error = await engine
      .generate({ kind: 'model', name: 'User', force: false, migration: true, factory: false, seeder: false })
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(TargetExistsError);
    expect(error).toMatchObject({ target: 'src/models/User.ts' });
    expect(await read('src/models/User.ts')).toBe('// hand written\n');
    expect(await fs.pathExists(path.join(root, 'database/migrations'))).toBe(false);
  });

  it('overwrites with force', async () => {
    await fs.outputFile(path.join(root, 'src/jobs/SendMail.ts'), '// old\n');

    const [file] = await engine.generate({ kind: 'job', name: 'SendMail', force: true, sync: false });

    expect(file.overwritten).toBe(true);
    expect(await read('src/jobs/SendMail.ts')).not.toBe('// old\n');
  });

  it('detects an existing migration regardless of its timestamp', async () => {
    await fs.outputFile(path.join(root, 'database/migrations/2023_12_01_000000_create_posts_table.ts'), '// old\n');

    await expect(engine.generate({ kind: 'migration', name: 'create_posts_table', force: false })).rejects.toMatchObject({
      target: 'database/migrations/2023_12_01_000000_create_posts_table.ts'
    });

    const [file] = await engine.generate({ kind: 'migration', name: 'create_posts_table', force: true });
    expect(file.path).toBe('database/migrations/2023_12_01_000000_create_posts_table.ts');
    expect(file.overwritten).toBe(true);
  });

  it('does not treat a longer migration name as the same migration', async () => {
    await fs.outputFile(path.join(root, 'database/migrations/2023_12_01_000000_create_posts_table_v2.ts'), '// old\n');

    const [file] = await engine.generate({ kind: 'migration', name: 'create_posts_table', force: false });

    expect(file.path).toBe('database/migrations/2024_01_15_093005_create_posts_table.ts');
  });

  it('renders alter migrations for the guessed table', async () => {
    const [file] = await engine.generate({ kind: 'migration', name: 'add_email_to_users_table', force: false });

    expect(await read(file.path)).toContain("await schema.alterTable('users', (table) => {");
  });

  it('rejects names that are not identifiers before writing anything', async () => {
    await expect(engine.generate({ kind: 'controller', name: 'user-profile', force: false, resource: false, api: false })).rejects.toBeInstanceOf(
      InvalidNameError
    );
    await expect(engine.generate({ kind: 'listener', name: 'SendWelcome', force: false, event: '1Bad' })).rejects.toBeInstanceOf(
      InvalidNameError
    );
    await expect(engine.generate({ kind: 'model', name: '__', force: false, migration: false, factory: false, seeder: false })).rejects.toBeInstanceOf(
      InvalidNameError
    );
    expect(await fs.readdir(root)).toEqual([]);
  });

  it('places tests by kind and honors layout overrides', async () => {
    const custom = new GeneratorEngine({
      root,
      layout: resolveLayout({ unitTests: 'spec/unit/', controllers: '../outside' }),
      templates,
      clock: fixedClock
    });

    const [unit] = await custom.generate({ kind: 'test', name: 'Billing', force: false, integration: false });
    const [controller] = await custom.generate({ kind: 'controller', name: 'Home', force: false, resource: false, api: false });

    expect(unit.path).toBe('spec/unit/BillingTest.test.ts');
    expect(controller.path).toBe('src/controllers/HomeController.ts');
  });
});
