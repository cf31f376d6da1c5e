/**
 * Field Selector: resolves which fields an export contains, and in what order.
 *
 * Directives that name fields the form does not have are dropped with a
 * warning instead of failing the export.
 */

import type { Logger } from '../logging.js';

// =============================================================================
// § Types
// =============================================================================

export type FieldNames = readonly string[] | ReadonlySet<string>;

export interface SelectionDirectives {
  exclude?: FieldNames;
  include?: FieldNames;
  readonly?: FieldNames;
  ordering?: readonly string[];
}

export interface FieldSelection {
  readonly exclude: ReadonlySet<string>;
  readonly include: ReadonlySet<string>;
  readonly readonly: ReadonlySet<string>;
  readonly ordering: readonly string[];
  /** Resolved field list: unique names, in export order */
  readonly fields: readonly string[];
}

// =============================================================================
// § Helpers
// =============================================================================

export function difference(left: Iterable<string>, right: ReadonlySet<string>): string[] {
  const result: string[] = [];
  for (const name of new Set(left)) {
    if (!right.has(name)) result.push(name);
  }
  return result;
}

function validateDirective(
  kind: string,
  names: Set<string>,
  allFields: ReadonlySet<string>,
  logger: Logger
): Set<string> {
  if (names.size === 0) return names;

  const unknown = difference(names, allFields);
  if (unknown.length > 0) {
    logger.warn({ directive: kind, fields: unknown }, `${kind} fields are not present in form fields`);
    return new Set<string>();
  }
  return names;
}

// =============================================================================
// § Resolution
// =============================================================================

/**
 * Resolve the selection directives against the form's declared field order.
 *
 * @param declaredOrder - The form's field names in declaration order
 * @param directives - Caller-supplied include / exclude / readonly / ordering
 * @param logger - Receives one warning per discarded directive
 */
export function resolveFieldSelection(
  declaredOrder: readonly string[],
  directives: SelectionDirectives,
  logger: Logger
): FieldSelection {
  const allFields: ReadonlySet<string> = new Set(declaredOrder);

  let exclude = validateDirective('Excluded', new Set<string>(directives.exclude ?? []), allFields, logger);
  let include = validateDirective('Included', new Set<string>(directives.include ?? []), allFields, logger);
  const readonly = validateDirective('Readonly', new Set<string>(directives.readonly ?? []), allFields, logger);

  let ordering: readonly string[] = [...(directives.ordering ?? [])];
  if (ordering.length > 0) {
    const unknown = difference(ordering, allFields);
    if (unknown.length > 0) {
      logger.warn({ directive: 'Ordered', fields: unknown }, 'Ordered fields are not present in form fields');
      ordering = [];
    }
  }

  if (include.size > 0 && exclude.size > 0) {
    logger.warn(
      { include: [...include], exclude: [...exclude] },
      'Included and excluded fields cannot be combined; ignoring both'
    );
    include = new Set<string>();
    exclude = new Set<string>();
  }

  // Names included but unknown to the form are never exported.
  for (const name of difference(include, allFields)) {
    exclude.add(name);
  }

  // `include` does not narrow the list; only `exclude` and `ordering` shape it.
  const source = ordering.length > 0 ? ordering : declaredOrder;
  const seen = new Set<string>();
  const fields: string[] = [];
  for (const name of source) {
    if (exclude.has(name) || seen.has(name)) continue;
    seen.add(name);
    fields.push(name);
  }

  return Object.freeze({
    exclude,
    include,
    readonly,
    ordering: Object.freeze([...ordering]),
    fields: Object.freeze(fields),
  });
}
