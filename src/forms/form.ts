/**
 * Form: a named collection of fields plus the state of one binding
 * (submitted data, initial values, validation errors).
 *
 * `FormSource` is all the export machinery reads; `Form` is the stock
 * implementation. Validation happens elsewhere: errors are handed in.
 */

import type { FieldsetDeclaration } from '../core/fieldset-validator.js';
import type { TextValue } from '../core/lazy-text.js';
import type { FormField } from '../fields/field-types.js';
import type { Layout } from '../layout/layout-objects.js';

/** Error key for errors not tied to a single field */
export const NON_FIELD_ERRORS = '__all__';

export interface FormLayoutHelper {
  /** Probed at export time; only a `Layout` instance is exported */
  layout?: unknown;
}

export interface FormSource {
  /** The form's type name */
  readonly title: string;
  readonly fields: ReadonlyMap<string, FormField>;
  /** Field names in declaration order */
  declaredOrder(): string[];
  readonly isBound: boolean;
  /** Submitted data; empty when unbound */
  readonly data: Record<string, unknown>;
  /** Form-level initial values, overriding each field's own */
  readonly initial: Record<string, unknown>;
  readonly errors: Record<string, TextValue[]>;
  nonFieldErrors(): TextValue[];
  readonly labelSuffix: TextValue;
  readonly prefix: string | null;
  readonly fieldsets?: FieldsetDeclaration;
  readonly helper?: FormLayoutHelper;
}

export interface FormDefinition {
  title: string;
  /** Fields by name; pass pairs when names would not keep their order as object keys */
  fields: Record<string, FormField> | ReadonlyArray<readonly [string, FormField]>;
  labelSuffix?: TextValue;
  prefix?: string | null;
  fieldsets?: FieldsetDeclaration;
  layout?: Layout;
}

export interface FormBinding {
  /** Submitted data; its presence makes the form bound */
  data?: Record<string, unknown>;
  initial?: Record<string, unknown>;
  errors?: Record<string, TextValue[]>;
}

type FieldPairs = ReadonlyArray<readonly [string, FormField]>;

function isFieldPairs(fields: FormDefinition['fields']): fields is FieldPairs {
  return Array.isArray(fields);
}

function fieldEntries(fields: FormDefinition['fields']): FieldPairs {
  return isFieldPairs(fields) ? fields : Object.entries(fields);
}

export class Form implements FormSource {
  readonly title: string;
  readonly fields: ReadonlyMap<string, FormField>;
  readonly isBound: boolean;
  readonly data: Record<string, unknown>;
  readonly initial: Record<string, unknown>;
  readonly errors: Record<string, TextValue[]>;
  readonly labelSuffix: TextValue;
  readonly prefix: string | null;
  readonly fieldsets?: FieldsetDeclaration;
  readonly helper?: FormLayoutHelper;

  constructor(definition: FormDefinition, binding: FormBinding = {}) {
    this.title = definition.title;
    this.fields = new Map(fieldEntries(definition.fields));
    this.isBound = binding.data !== undefined;
    this.data = { ...(binding.data ?? {}) };
    this.initial = { ...(binding.initial ?? {}) };
    this.errors = this.isBound ? { ...(binding.errors ?? {}) } : {};
    this.labelSuffix = definition.labelSuffix ?? ':';
    this.prefix = definition.prefix ?? null;
    if (definition.fieldsets !== undefined) {
      this.fieldsets = definition.fieldsets;
    }
    if (definition.layout !== undefined) {
      this.helper = { layout: definition.layout };
    }
  }

  declaredOrder(): string[] {
    return Array.from(this.fields.keys());
  }

  nonFieldErrors(): TextValue[] {
    return [...(this.errors[NON_FIELD_ERRORS] ?? [])];
  }

  /**
   * Name under which a field is submitted, honouring the form prefix.
   */
  addPrefix(fieldName: string): string {
    return this.prefix ? `${this.prefix}-${fieldName}` : fieldName;
  }
}
