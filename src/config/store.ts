import fs from 'fs-extra';
import { Document, isCollection, isMap, isScalar, parseDocument } from 'yaml';
import {
  ConfigFormatError,
  KeyNotFoundError,
  ParseError,
  TypeConflictError
} from '../errors.js';
import type { ConfigValue } from '../types/index.js';

export const CONFIG_FILE = 'kiln.yaml';

export function splitKey(key: string): string[] {
  const segments = key.split('.');
  if (key.trim() === '' || segments.some((segment) => segment.trim() === '')) {
    throw new ParseError(`Invalid configuration key '${key}'`);
  }
  return segments;
}

export function toConfigValue(value: unknown): ConfigValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'bigint') return Number(value);
  if (Array.isArray(value)) return value.map(toConfigValue);
  if (value instanceof Map) {
    const result: { [key: string]: ConfigValue } = {};
    for (const [key, entry] of value) {
      result[String(key)] = toConfigValue(entry);
    }
    return result;
  }
  if (typeof value === 'object') {
    const result: { [key: string]: ConfigValue } = {};
    for (const [key, entry] of Object.entries(value)) {
      result[key] = toConfigValue(entry);
    }
    return result;
  }
  return String(value);
}

/**
 * Dotted-key access to kiln.yaml. Every `set` re-reads the file, mutates the
 * parsed YAML document and writes it back, so keys, comments and formatting
 * that the key does not address are kept.
 */
export class ConfigStore {
  constructor(readonly filePath: string) {}

  async exists(): Promise<boolean> {
    return fs.pathExists(this.filePath);
  }

  async readDocument(): Promise<Document> {
    const text = (await this.exists()) ? await fs.readFile(this.filePath, 'utf-8') : '';
    const doc: Document = parseDocument(text);

    if (doc.errors.length > 0) {
      throw new ConfigFormatError(this.filePath, doc.errors[0].message);
    }

    return doc;
  }

  async all(): Promise<{ [key: string]: ConfigValue }> {
    const doc = await this.readDocument();
    const value = toConfigValue(doc.toJS());
    if (value === null) return {};
    if (typeof value !== 'object' || Array.isArray(value)) {
      throw new ConfigFormatError(this.filePath, 'top level must be a mapping');
    }
    return value;
  }

  async has(key: string): Promise<boolean> {
    const doc = await this.readDocument();
    return doc.getIn(resolvePath(doc, splitKey(key)), true) !== undefined;
  }

  async get(key: string): Promise<ConfigValue> {
    const doc = await this.readDocument();
    const node: unknown = doc.getIn(resolvePath(doc, splitKey(key)), true);

    if (node === undefined) {
      throw new KeyNotFoundError(key);
    }
    if (isScalar(node)) {
      return toConfigValue(node.value);
    }
    if (isCollection(node)) {
      return toConfigValue(node.toJS(doc));
    }
    return toConfigValue(node);
  }

  async set(key: string, value: ConfigValue): Promise<void> {
    const segments = splitKey(key);
    const doc = await this.readDocument();

    const path = resolvePath(doc, segments);
    assertMappingPath(doc, key, segments, path);
    doc.setIn(path, value);

    await fs.outputFile(this.filePath, doc.toString());
  }

  async replace(text: string): Promise<void> {
    await fs.outputFile(this.filePath, text);
  }
}

/**
 * Maps dotted segments to the key nodes already in the document, so `8080`
 * or `true` keys match their text. Segments with no matching key stay strings.
 */
function resolvePath(doc: Document, segments: string[]): unknown[] {
  const path: unknown[] = [];
  let current: unknown = doc.contents;

  for (const segment of segments) {
    const pair = isMap(current)
      ? current.items.find((item) => isScalar(item.key) && String(item.key.value) === segment)
      : undefined;
    path.push(pair ? pair.key : segment);
    current = pair?.value;
  }

  return path;
}

function assertMappingPath(doc: Document, key: string, segments: string[], path: unknown[]) {
  let current: unknown = doc.contents;

  for (let depth = 0; depth < segments.length; depth++) {
    // Missing levels are created by setIn.
    if (current === null || current === undefined) return;

    if (!isMap(current)) {
      throw new TypeConflictError(key, depth === 0 ? '<root>' : segments.slice(0, depth).join('.'));
    }
    if (depth === segments.length - 1) return;

    current = current.get(path[depth], true);
  }
}
