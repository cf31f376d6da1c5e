/**
 * RemoteForm: exports a form as a plain, ordered, JSON-ready structure
 * for a renderer that has no access to the form definition itself.
 *
 * Field selection and fieldsets are resolved once, at construction.
 * `asDict()` then serializes every selected field through the field
 * serializer registry. A field that fails to serialize is exported as an
 * empty entry with a warning; a malformed layout aborts the export.
 */

import {
  getDefaultFieldSerializerRegistry,
  type FieldSerializerRegistry,
} from '../fields/field-serializers.js';
import type { FormField } from '../fields/field-types.js';
import type { FormSource } from '../forms/form.js';
import { Layout } from '../layout/layout-objects.js';
import { parseLayout, type ParsedLayoutNode } from '../layout/layout-parser.js';
import { getLogger, type Logger } from '../logging.js';
import { assertValidDirectives } from '../schemas/remote-form-options.js';
import { FieldSerializerNotFoundError } from './errors.js';
import { resolveFieldSelection, type FieldSelection, type SelectionDirectives } from './field-selector.js';
import { validateFieldsets, type FieldsetDeclaration } from './fieldset-validator.js';
import { resolveLazy, type Resolved, type TextValue } from './lazy-text.js';
import { ownValue, setEntry } from './records.js';

// =============================================================================
// § Types
// =============================================================================

export interface RemoteFormOptions extends SelectionDirectives {
  /** Overrides the fieldsets declared on the form */
  fieldsets?: FieldsetDeclaration;
  /** Defaults to the shared registry of built-in field types */
  registry?: FieldSerializerRegistry;
  /** Defaults to the library logger */
  logger?: Logger;
}

/** One field's entry; empty apart from `initial` when serialization failed */
export interface ExportedField {
  initial: unknown;
  readonly?: boolean;
  [key: string]: unknown;
}

/**
 * Integer-like field names are reordered by object key ordering, so
 * `ordered_fields` is the authoritative export order, not the key order of `fields`.
 */
export interface RemoteFormDict {
  title: string;
  non_field_errors: TextValue[];
  label_suffix: TextValue;
  is_bound: boolean;
  prefix: string | null;
  fields: Record<string, ExportedField>;
  errors: Record<string, TextValue[]>;
  fieldsets: FieldsetDeclaration;
  ordered_fields: string[];
  layout?: ParsedLayoutNode;
  data: Record<string, unknown>;
}

/** The export with every deferred string evaluated */
export type RemoteFormExport = Resolved<RemoteFormDict>;

// =============================================================================
// § RemoteForm
// =============================================================================

export class RemoteForm {
  readonly selection: FieldSelection;
  /** Validated fieldsets; empty when the declaration was discarded */
  readonly fieldsets: FieldsetDeclaration;
  private readonly registry: FieldSerializerRegistry;
  private readonly logger: Logger;

  /**
   * @throws {RemoteFormOptionsError} If a directive is not a list of field names
   */
  constructor(
    readonly form: FormSource,
    options: RemoteFormOptions = {}
  ) {
    const { registry, logger, ...directives } = options;
    assertValidDirectives(directives);

    this.registry = registry ?? getDefaultFieldSerializerRegistry();
    this.logger = (logger ?? getLogger()).child({ component: 'remote-form', form: form.title });

    const declaredOrder = form.declaredOrder();
    this.selection = resolveFieldSelection(declaredOrder, directives, this.logger);
    this.fieldsets = validateFieldsets(
      directives.fieldsets ?? form.fieldsets ?? [],
      new Set(declaredOrder),
      this.selection.fields,
      this.logger
    );
  }

  /** Resolved field list, in export order */
  get fields(): readonly string[] {
    return this.selection.fields;
  }

  /**
   * Build the export structure.
   *
   * @throws {LayoutConfigurationError} If the form's layout holds an unsupported node
   * @throws {FlatAttributeParseError} If a layout container has malformed attributes
   */
  asDict(): RemoteFormExport {
    const layout = this.parseFormLayout();

    const fields: Record<string, ExportedField> = {};
    const initialData: Record<string, unknown> = {};

    for (const name of this.selection.fields) {
      const entry = this.exportField(name);
      setEntry(fields, name, entry);
      setEntry(initialData, name, entry.initial);
    }

    const dict: RemoteFormDict = {
      title: this.form.title,
      non_field_errors: this.form.nonFieldErrors(),
      label_suffix: this.form.labelSuffix,
      is_bound: this.form.isBound,
      prefix: this.form.prefix,
      fields,
      errors: { ...this.form.errors },
      fieldsets: this.fieldsets,
      ordered_fields: [...this.selection.fields],
      ...(layout ? { layout } : {}),
      data: this.hasSubmittedData() ? { ...this.form.data } : initialData,
    };

    return resolveLazy(dict);
  }

  toJSON(): RemoteFormExport {
    return this.asDict();
  }

  /** Bound with at least one submitted value; empty submissions export initial values */
  private hasSubmittedData(): boolean {
    return this.form.isBound && Object.keys(this.form.data).length > 0;
  }

  private parseFormLayout(): ParsedLayoutNode | undefined {
    const layout = this.form.helper?.layout;
    if (!(layout instanceof Layout)) {
      return undefined;
    }
    return parseLayout(layout);
  }

  private exportField(name: string): ExportedField {
    const field = this.form.fields.get(name);
    let entry: Record<string, unknown>;

    try {
      entry = { ...this.serializeField(name, field) };
    } catch (err) {
      this.logger.warn({ field: name, fieldType: field?.type, err }, `Error serializing field ${name}`);
      entry = {};
    }

    if (this.selection.readonly.has(name)) {
      entry['readonly'] = true;
    }

    return { ...entry, initial: entry['initial'] ?? null };
  }

  private serializeField(name: string, field: FormField | undefined): Record<string, unknown> {
    if (!field) {
      throw new Error(`Form has no field named '${name}'`);
    }

    const serialize = this.registry.lookup(field.type);
    if (!serialize) {
      throw new FieldSerializerNotFoundError(field.type);
    }

    return serialize(field, {
      name,
      initial: ownValue(this.form.initial, name),
      errors: ownValue(this.form.errors, name) ?? [],
    });
  }
}

/**
 * Export a form in one call.
 */
export function serializeForm(form: FormSource, options?: RemoteFormOptions): RemoteFormExport {
  return new RemoteForm(form, options).asDict();
}
