/**
 * Shared validation functions for block trees handed to the diff engine.
 * Input from outside (fetched pages, parser output) is checked here so the
 * aligner and planner only ever see well-formed trees.
 */

import type { Block } from '../diff/types.js';

const UID_PATTERN = /^[a-zA-Z0-9_-]{9}$/;

export interface ValidationError {
  /** Child-index path from the root, e.g. "root/0/2" */
  path: string;
  field: string;
  message: string;
  expected?: string;
  received?: string;
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
}

export interface TreeValidationOptions {
  /** Every non-root block must carry an identifier (existing trees) */
  requireIdentifiers?: boolean;
}

/**
 * Validates a Roam UID.
 * @param uid The UID to validate
 * @param required If true, UID is required
 * @returns Error message if invalid, null if valid
 */
export function validateUid(uid: string | undefined | null, required = true): string | null {
  if (!uid) {
    return required ? 'uid is required' : null;
  }
  if (!UID_PATTERN.test(uid)) {
    return 'uid must be 9 alphanumeric characters (with _ and -)';
  }
  return null;
}

/**
 * Validates a heading attribute.
 * @returns Error message if invalid, null if valid
 */
export function validateHeading(heading: unknown): string | null {
  if (heading === undefined) {
    return null;
  }
  if (typeof heading !== 'number' || !Number.isInteger(heading) || heading < 1 || heading > 3) {
    return 'heading must be an integer between 1 and 3';
  }
  return null;
}

/**
 * Validate a block tree: text and attribute shapes, identifier uniqueness and,
 * for existing trees, identifier presence.
 */
export function validateBlockTree(root: Block, options: TreeValidationOptions = {}): ValidationResult {
  const errors: ValidationError[] = [];
  const seen = new Map<string, string>(); // identifier -> first path

  function visit(block: Block, path: string, isRoot: boolean): void {
    if (typeof block.text !== 'string') {
      errors.push({ path, field: 'text', message: 'text must be a string', received: typeof block.text });
    }

    if (block.identifier !== undefined) {
      const firstPath = seen.get(block.identifier);
      if (firstPath !== undefined) {
        errors.push({
          path,
          field: 'identifier',
          message: `duplicate identifier "${block.identifier}" (first seen at ${firstPath})`,
        });
      } else {
        seen.set(block.identifier, path);
      }
    } else if (options.requireIdentifiers && !isRoot) {
      errors.push({ path, field: 'identifier', message: 'existing block has no identifier' });
    }

    for (const [key, value] of Object.entries(block.attributes)) {
      if (!['string', 'number', 'boolean'].includes(typeof value)) {
        errors.push({
          path,
          field: `attributes.${key}`,
          message: 'attribute values must be strings, numbers or booleans',
          received: typeof value,
        });
      }
    }

    const headingError = validateHeading(block.attributes.heading);
    if (headingError) {
      errors.push({
        path,
        field: 'attributes.heading',
        message: headingError,
        expected: '1-3',
        received: String(block.attributes.heading),
      });
    }

    block.children.forEach((child, idx) => visit(child, `${path}/${idx}`, false));
  }

  visit(root, 'root', true);

  return { valid: errors.length === 0, errors };
}

/**
 * Format validation errors into a readable error message.
 */
export function formatValidationErrors(errors: ValidationError[]): string {
  return errors
    .map((err) => {
      let msg = `[${err.path}] ${err.field}: ${err.message}`;
      if (err.expected) msg += ` (expected: ${err.expected})`;
      if (err.received) msg += ` (received: ${err.received})`;
      return msg;
    })
    .join('\n');
}
