import { describe, expect, it } from 'vitest';
import {
  isValidIdentifier,
  nameVariants,
  toKebabCase,
  toPascalCase,
  toSnakeCase,
  toTableName,
  withSuffix,
  withoutSuffix
} from '../src/utils/naming.js';

describe('isValidIdentifier', () => {
  it('accepts letters, digits and underscores after a letter or underscore', () => {
    expect(isValidIdentifier('User')).toBe(true);
    expect(isValidIdentifier('_Private')).toBe(true);
    expect(isValidIdentifier('create_users_table')).toBe(true);
  });

  it('rejects names that start with a digit or contain other characters', () => {
    expect(isValidIdentifier('9Lives')).toBe(false);
    expect(isValidIdentifier('user-name')).toBe(false);
    expect(isValidIdentifier('User Name')).toBe(false);
    expect(isValidIdentifier('')).toBe(false);
  });

  it('rejects names that leave no class name', () => {
    expect(isValidIdentifier('_')).toBe(false);
    expect(isValidIdentifier('__')).toBe(false);
    expect(isValidIdentifier('_9')).toBe(false);
  });
});

describe('case conversion', () => {
  it('converts separated words to PascalCase and keeps existing capitals', () => {
    expect(toPascalCase('user_profile')).toBe('UserProfile');
    expect(toPascalCase('user-profile')).toBe('UserProfile');
    expect(toPascalCase('HTTPServer')).toBe('HTTPServer');
  });

  it('splits acronyms when converting to snake_case and kebab-case', () => {
    expect(toSnakeCase('UserProfile')).toBe('user_profile');
    expect(toSnakeCase('HTTPServer')).toBe('http_server');
    expect(toKebabCase('BlogPost')).toBe('blog-post');
  });

  it('pluralizes only the last word of a table name', () => {
    expect(toTableName('UserProfile')).toBe('user_profiles');
    expect(toTableName('Category')).toBe('categories');
    expect(toTableName('Person')).toBe('people');
  });
});

describe('suffixes', () => {
  it('adds a suffix once', () => {
    expect(withSuffix('User', 'Controller')).toBe('UserController');
    expect(withSuffix('UserController', 'Controller')).toBe('UserController');
    expect(withSuffix('Controller', 'Controller')).toBe('ControllerController');
  });

  it('strips a suffix only when something remains', () => {
    expect(withoutSuffix('UserSeeder', 'Seeder')).toBe('User');
    expect(withoutSuffix('Seeder', 'Seeder')).toBe('Seeder');
  });
});

describe('nameVariants', () => {
  it('derives every casing from the base name', () => {
    expect(nameVariants('blog_post', 'Controller')).toEqual({
      name: 'blog_post',
      className: 'BlogPostController',
      baseName: 'BlogPost',
      camelName: 'blogPost',
      snakeName: 'blog_post',
      kebabName: 'blog-post',
      tableName: 'blog_posts',
      titleName: 'Blog Post'
    });
  });

  it('does not repeat a suffix the name already carries', () => {
    const variants = nameVariants('UserController', 'Controller');
    expect(variants.className).toBe('UserController');
    expect(variants.baseName).toBe('User');
    expect(variants.tableName).toBe('users');
  });
});
