import fs from 'fs-extra';
import Handlebars from 'handlebars';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { ConfigFormatError, UnknownTemplateError } from '../errors.js';

export const DEFAULT_TEMPLATES_DIR = fileURLToPath(new URL('../../templates', import.meta.url));

const componentEntrySchema = z.object({
  file: z.string().min(1),
  version: z.string().min(1),
  description: z.string()
});

const projectEntrySchema = z.object({
  directory: z.string().min(1),
  version: z.string().min(1),
  description: z.string(),
  extends: z.string().optional(),
  hidden: z.boolean().optional()
});

const manifestSchema = z.object({
  version: z.string(),
  components: z.record(componentEntrySchema),
  projects: z.record(projectEntrySchema)
});

export type TemplateManifest = z.infer<typeof manifestSchema>;

export interface ComponentTemplate {
  name: string;
  version: string;
  source: string;
}

export interface ProjectTemplate {
  name: string;
  version: string;
  /** Template trees in the order they are applied; later trees win. */
  directories: string[];
}

export class TemplateStore {
  private manifestCache?: TemplateManifest;
  private readonly handlebars = Handlebars.create();
  private readonly compiled = new Map<string, ReturnType<typeof Handlebars.compile>>();

  constructor(readonly root: string = DEFAULT_TEMPLATES_DIR) {}

  async manifest(): Promise<TemplateManifest> {
    if (this.manifestCache) {
      return this.manifestCache;
    }

    const file = path.join(this.root, 'manifest.json');
    const raw: unknown = await fs.readJson(file);
    const parsed = manifestSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new ConfigFormatError(file, `${issue.path.join('.')}: ${issue.message}`);
    }

    this.manifestCache = parsed.data;
    return parsed.data;
  }

  async component(name: string): Promise<ComponentTemplate> {
    const manifest = await this.manifest();
    const entry = manifest.components[name];
    if (!entry) {
      throw new UnknownTemplateError(name, Object.keys(manifest.components));
    }

    const source = await fs.readFile(path.join(this.root, entry.file), 'utf-8');
    return { name, version: entry.version, source };
  }

  async renderComponent(name: string, context: object): Promise<string> {
    const template = await this.component(name);
    return this.render(template.source, context, name);
  }

  /**
   * Renders Handlebars text without HTML escaping. Pass `cacheKey` to reuse
   * the compiled template across calls.
   */
  render(source: string, context: object, cacheKey?: string): string {
    let template = cacheKey ? this.compiled.get(cacheKey) : undefined;
    if (!template) {
      template = this.handlebars.compile(source, { noEscape: true });
      if (cacheKey) {
        this.compiled.set(cacheKey, template);
      }
    }
    return template(context);
  }

  async projectNames(): Promise<string[]> {
    const manifest = await this.manifest();
    return Object.entries(manifest.projects)
      .filter(([, entry]) => !entry.hidden)
      .map(([name]) => name);
  }

  /**
   * Resolves a project template by manifest name, or as a local directory
   * layered on top of the shared base tree.
   */
  async resolveProject(nameOrPath: string, cwd: string): Promise<ProjectTemplate> {
    const manifest = await this.manifest();
    const entry = manifest.projects[nameOrPath];

    if (entry && !entry.hidden) {
      return {
        name: nameOrPath,
        version: entry.version,
        directories: this.projectChain(manifest, nameOrPath)
      };
    }

    const local = path.resolve(cwd, nameOrPath);
    if (await isDirectory(local)) {
      const base = Object.entries(manifest.projects).find(([, candidate]) => candidate.hidden);
      return {
        name: nameOrPath,
        version: 'local',
        directories: [...(base ? this.projectChain(manifest, base[0]) : []), local]
      };
    }

    throw new UnknownTemplateError(nameOrPath, await this.projectNames());
  }

  /** Renders one file of a manifest project tree, e.g. the default kiln.yaml. */
  async renderProjectFile(project: string, file: string, context: object): Promise<string> {
    const manifest = await this.manifest();
    const entry = manifest.projects[project];
    if (!entry) {
      throw new UnknownTemplateError(project, Object.keys(manifest.projects));
    }

    const source = await fs.readFile(path.join(this.root, entry.directory, file), 'utf-8');
    return this.render(source, context);
  }

  private projectChain(manifest: TemplateManifest, name: string): string[] {
    const chain: string[] = [];
    const seen = new Set<string>();
    let current: string | undefined = name;

    while (current !== undefined) {
      const entry: TemplateManifest['projects'][string] | undefined = manifest.projects[current];
      if (!entry || seen.has(current)) {
        throw new ConfigFormatError(path.join(this.root, 'manifest.json'), `broken template chain at '${current}'`);
      }
      seen.add(current);
      chain.unshift(path.join(this.root, entry.directory));
      current = entry.extends;
    }

    return chain;
  }
}

async function isDirectory(target: string): Promise<boolean> {
  if (!(await fs.pathExists(target))) return false;
  const stats = await fs.stat(target);
  return stats.isDirectory();
}
