import pluralize from 'pluralize';
import type { NameVariants } from '../types/index.js';

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

/** The class name derived from the value must also start with a letter, so `_` and `_9` fail. */
export function isValidIdentifier(value: string): boolean {
  return IDENTIFIER.test(value) && /^[A-Za-z]/.test(toPascalCase(value));
}

export function capitalize(str: string): string {
  return str.charAt(0).toUpperCase() + str.slice(1);
}

export function words(input: string): string[] {
  return input
    .replace(/([a-z0-9])([A-Z])/g, '$1 $2')
    .replace(/([A-Z]+)([A-Z][a-z])/g, '$1 $2')
    .split(/[^A-Za-z0-9]+/)
    .filter((word) => word.length > 0)
    .map((word) => word.toLowerCase());
}

/**
 * Upper-cases the first letter of every `_`/`-`/space separated piece and
 * keeps the rest as typed, so `HTTPServer` stays `HTTPServer`.
 */
export function toPascalCase(input: string): string {
  return input
    .split(/[-_\s]+/)
    .filter((piece) => piece.length > 0)
    .map(capitalize)
    .join('');
}

export function toCamelCase(input: string): string {
  const pascal = toPascalCase(input);
  return pascal.charAt(0).toLowerCase() + pascal.slice(1);
}

export function toSnakeCase(input: string): string {
  return words(input).join('_');
}

export function toKebabCase(input: string): string {
  return words(input).join('-');
}

export function toTitleCase(input: string): string {
  return words(input).map(capitalize).join(' ');
}

/** snake_case with the last word pluralized: `UserProfile` → `user_profiles`. */
export function toTableName(input: string): string {
  const parts = words(input);
  if (parts.length === 0) return '';
  parts[parts.length - 1] = pluralize.plural(parts[parts.length - 1]);
  return parts.join('_');
}

export function withSuffix(className: string, suffix: string): string {
  if (!suffix || (className.endsWith(suffix) && className.length > suffix.length)) {
    return className;
  }
  return `${className}${suffix}`;
}

export function withoutSuffix(className: string, suffix: string): string {
  if (suffix && className.endsWith(suffix) && className.length > suffix.length) {
    return className.slice(0, -suffix.length);
  }
  return className;
}

export function nameVariants(name: string, suffix = ''): NameVariants {
  const className = withSuffix(toPascalCase(name), suffix);
  const baseName = withoutSuffix(className, suffix);

  return {
    name,
    className,
    baseName,
    camelName: toCamelCase(baseName),
    snakeName: toSnakeCase(baseName),
    kebabName: toKebabCase(baseName),
    tableName: toTableName(baseName),
    titleName: toTitleCase(baseName)
  };
}
