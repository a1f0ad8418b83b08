import fs from 'fs-extra';
import * as path from 'path';
import { InvalidNameError, TargetExistsError } from '../errors.js';
import type { ProjectLayout } from '../helpers/layout.js';
import type { ComponentSpec, GeneratedFile } from '../types/index.js';
import { isValidIdentifier, nameVariants } from '../utils/naming.js';
import { ruleFor } from './components.js';
import type { TemplateStore } from './templates.js';

export interface GeneratorOptions {
  root: string;
  layout: ProjectLayout;
  templates: TemplateStore;
  clock?: () => Date;
  /** Called after each file is written, before the next follow-up runs. */
  onGenerated?: (file: GeneratedFile) => void;
}

const IDENTIFIER_RULE =
  'names must contain only letters, digits and underscores, and start with a letter once leading underscores are dropped';

function assertIdentifier(value: string | undefined) {
  if (value !== undefined && !isValidIdentifier(value)) {
    throw new InvalidNameError(value, IDENTIFIER_RULE);
  }
}

function referencedNames(spec: ComponentSpec): Array<string | undefined> {
  switch (spec.kind) {
    case 'controller':
    case 'seeder':
    case 'factory':
    case 'policy':
      return [spec.model];
    case 'listener':
      return [spec.event];
    case 'migration':
      return [spec.create, spec.table];
    default:
      return [];
  }
}

export class GeneratorEngine {
  private readonly clock: () => Date;

  constructor(private readonly options: GeneratorOptions) {
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Writes the component and then its follow-ups in order. The first failure
   * stops the run; files written before it stay on disk.
   */
  async generate(spec: ComponentSpec): Promise<GeneratedFile[]> {
    const generated = [await this.write(spec)];

    const rule = ruleFor(spec.kind);
    const followUps = rule.followUps?.(spec, nameVariants(spec.name, rule.suffix(spec))) ?? [];
    for (const followUp of followUps) {
      generated.push(await this.write(followUp));
    }

    return generated;
  }

  private async write(spec: ComponentSpec): Promise<GeneratedFile> {
    assertIdentifier(spec.name);
    referencedNames(spec).forEach(assertIdentifier);

    const { root, layout, templates } = this.options;
    const rule = ruleFor(spec.kind);
    const variants = nameVariants(spec.name, rule.suffix(spec));
    const directory = layout[rule.directory(spec)];

    const existing = rule.matches
      ? await this.findMatching(directory, (file) => rule.matches?.(file, variants) === true)
      : undefined;
    const fileName = existing ?? (rule.fileName ? rule.fileName(variants, this.clock()) : `${variants.className}.ts`);
    const relativePath = path.posix.join(directory, fileName);
    const absolutePath = path.join(root, relativePath);

    const exists = existing !== undefined || (await fs.pathExists(absolutePath));
    if (exists && !spec.force) {
      throw new TargetExistsError(relativePath);
    }

    const context = { ...variants, ...rule.context?.(spec, variants, layout) };
    const content = await templates.renderComponent(rule.template(spec, variants), context);
    await fs.outputFile(absolutePath, content);

    const file: GeneratedFile = {
      kind: spec.kind,
      className: variants.className,
      path: relativePath,
      absolutePath,
      overwritten: exists
    };
    this.options.onGenerated?.(file);
    return file;
  }

  private async findMatching(directory: string, predicate: (file: string) => boolean): Promise<string | undefined> {
    const absolute = path.join(this.options.root, directory);
    if (!(await fs.pathExists(absolute))) {
      return undefined;
    }
    const files = await fs.readdir(absolute);
    return files.sort().find(predicate);
  }
}
