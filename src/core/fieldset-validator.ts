/**
 * Fieldset Validator: keeps a fieldset declaration only if every field it
 * groups is both known to the form and part of the export.
 */

import type { Logger } from '../logging.js';
import { difference } from './field-selector.js';

export interface FieldsetOptions {
  fields?: readonly string[];
  [attr: string]: unknown;
}

/** Ordered (name, options) pairs */
export type FieldsetDeclaration = ReadonlyArray<readonly [name: string, options: FieldsetOptions]>;

/**
 * Union of every field name referenced by the declaration, in first-seen order.
 */
export function collectFieldsetFields(fieldsets: FieldsetDeclaration): string[] {
  const names = new Set<string>();
  for (const [, options] of fieldsets) {
    for (const name of options.fields ?? []) {
      names.add(name);
    }
  }
  return [...names];
}

/**
 * Validate a fieldset declaration. All or nothing: any unknown or excluded
 * field discards the whole declaration.
 *
 * @returns The declaration unchanged, or an empty declaration
 */
export function validateFieldsets(
  fieldsets: FieldsetDeclaration,
  allFields: ReadonlySet<string>,
  resolvedFields: readonly string[],
  logger: Logger
): FieldsetDeclaration {
  const referenced = collectFieldsetFields(fieldsets);

  const invalid = difference(referenced, allFields);
  if (invalid.length > 0) {
    logger.warn({ fields: invalid }, 'Fieldset fields are not present in form fields');
    return [];
  }

  const excluded = difference(referenced, new Set(resolvedFields));
  if (excluded.length > 0) {
    logger.warn({ fields: excluded }, 'Fieldset fields are excluded from the export');
    return [];
  }

  return fieldsets;
}
