import * as yaml from 'yaml';
import { type ZodError } from 'zod';
import { type ProjectConfig } from '../types';

export class ValidationError extends Error {
  constructor(
    message: string,
    public readonly field: string,
    public readonly value: unknown,
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

export function fromZodError(error: ZodError, source: string): ValidationError[] {
  return error.issues.map((issue) => {
    const field = issue.path.join('.') || '(root)';
    return new ValidationError(`${source}: ${field}: ${issue.message}`, field, issue.code);
  });
}

/**
 * Parses a `key=value` override. The value is read as a YAML scalar so
 * `retries=3` yields a number and `debug=true` a boolean.
 */
export function parseOverride(pair: string): ProjectConfig {
  const separator = pair.indexOf('=');
  if (separator <= 0) {
    throw new ValidationError(`Override must look like key=value, got "${pair}"`, 'override', pair);
  }

  const key = pair.slice(0, separator).trim();
  if (key.length === 0) {
    throw new ValidationError('Override key cannot be empty', 'override', pair);
  }

  const raw = pair.slice(separator + 1);
  const value: unknown = raw.trim().length === 0 ? '' : yaml.parse(raw);
  return { [key]: value };
}

export function parseOverrides(pairs: readonly string[]): ProjectConfig {
  return pairs.reduce<ProjectConfig>((acc, pair) => ({ ...acc, ...parseOverride(pair) }), {});
}

interface NamedNode {
  name: string | null;
  file: string;
  children: NamedNode[];
}

/**
 * Reports every project whose name is already used by one of its ancestors.
 * Such a project can never be pushed while its ancestor is active.
 */
export function validateProjectTree(root: NamedNode): ValidationError[] {
  const errors: ValidationError[] = [];

  const visit = (node: NamedNode, ancestors: Map<string, string>): void => {
    if (node.name !== null) {
      const clash = ancestors.get(node.name);
      if (clash !== undefined) {
        errors.push(new ValidationError(
          `Project "${node.name}" in ${node.file} is nested inside a project of the same name in ${clash}`,
          'name',
          node.name,
        ));
        return;
      }
    }

    const scope = node.name === null ? ancestors : new Map(ancestors).set(node.name, node.file);
    for (const child of node.children) {
      visit(child, scope);
    }
  };

  visit(root, new Map());
  return errors;
}
