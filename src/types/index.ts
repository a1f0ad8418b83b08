export type FlagValue = string | number | boolean;

export interface CommandDescriptor {
  readonly verb: string;
  readonly noun?: string;
  readonly args: readonly string[];
  readonly flags: Readonly<Record<string, FlagValue>>;
}

export const COMPONENT_KINDS = [
  'controller',
  'model',
  'middleware',
  'request',
  'resource',
  'seeder',
  'factory',
  'job',
  'event',
  'listener',
  'migration',
  'policy',
  'command',
  'test'
] as const;

export type ComponentKind = (typeof COMPONENT_KINDS)[number];

interface ComponentBase<K extends ComponentKind> {
  kind: K;
  name: string;
  force: boolean;
}

export interface ControllerSpec extends ComponentBase<'controller'> {
  resource: boolean;
  api: boolean;
  model?: string;
}

export interface ModelSpec extends ComponentBase<'model'> {
  migration: boolean;
  factory: boolean;
  seeder: boolean;
}

export interface MigrationSpec extends ComponentBase<'migration'> {
  create?: string;
  table?: string;
}

export interface ResourceSpec extends ComponentBase<'resource'> {
  collection: boolean;
}

export interface SeederSpec extends ComponentBase<'seeder'> {
  model?: string;
}

export interface FactorySpec extends ComponentBase<'factory'> {
  model?: string;
}

export interface JobSpec extends ComponentBase<'job'> {
  sync: boolean;
}

export interface ListenerSpec extends ComponentBase<'listener'> {
  event?: string;
}

export interface PolicySpec extends ComponentBase<'policy'> {
  model?: string;
}

export interface TestSpec extends ComponentBase<'test'> {
  integration: boolean;
}

export type ComponentSpec =
  | ControllerSpec
  | ModelSpec
  | MigrationSpec
  | ComponentBase<'middleware'>
  | ComponentBase<'request'>
  | ResourceSpec
  | SeederSpec
  | FactorySpec
  | JobSpec
  | ComponentBase<'event'>
  | ListenerSpec
  | PolicySpec
  | ComponentBase<'command'>
  | TestSpec;

export type SpecOf<K extends ComponentKind> = Extract<ComponentSpec, { kind: K }>;

export interface GeneratedFile {
  kind: ComponentKind;
  className: string;
  /** Project-relative POSIX path. */
  path: string;
  absolutePath: string;
  overwritten: boolean;
}

export interface NameVariants {
  name: string;
  className: string;
  baseName: string;
  camelName: string;
  snakeName: string;
  kebabName: string;
  tableName: string;
  titleName: string;
}

export type TemplateContext = NameVariants & Record<string, unknown>;

export type ProjectTemplateName = 'web' | 'api' | 'minimal';

export type ConfigValue =
  | string
  | number
  | boolean
  | null
  | ConfigValue[]
  | { [key: string]: ConfigValue };
