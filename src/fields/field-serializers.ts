/**
 * Field Serializer Registry
 *
 * Maps a field type tag to the function that turns a field of that type
 * into the dictionary a remote renderer consumes. Unknown tags are a lookup
 * miss, never an error: the caller decides how to degrade.
 */

import { FieldTypeMismatchError } from '../core/errors.js';
import type { TextValue } from '../core/lazy-text.js';
import {
  isFieldOfType,
  type BooleanField,
  type CharField,
  type ChoiceField,
  type DecimalField,
  type FieldOfType,
  type FieldType,
  type FileField,
  type FormField,
  type IntegerField,
  type RegexField,
  type TemporalField,
  type TypedChoiceField,
} from './field-types.js';
import { serializeChoices, serializeWidget, type SerializedWidget } from './widgets.js';

/**
 * Per-field inputs that come from the form rather than the field itself
 */
export interface FieldSerializationContext {
  /** Name the field is bound to on the form */
  name: string;
  /** Form-level initial value for this field, if any */
  initial?: unknown;
  /** Validation errors of the bound form for this field */
  errors?: readonly TextValue[];
}

export interface SerializedField {
  title: FieldType;
  required: boolean;
  label: TextValue | null;
  initial: unknown;
  help_text: TextValue;
  error_messages: Record<string, TextValue>;
  errors: TextValue[];
  widget: SerializedWidget;
  [constraint: string]: unknown;
}

export type FieldSerializer<T extends FieldType = FieldType> = (
  field: FieldOfType<T>,
  context: FieldSerializationContext
) => SerializedField;

/** A registered serializer, accepting any field and checking its tag */
export type RegisteredFieldSerializer = (field: FormField, context: FieldSerializationContext) => SerializedField;

export class FieldSerializerRegistry {
  private readonly serializers: Map<string, RegisteredFieldSerializer> = new Map();

  /**
   * Registers (or replaces) the serializer for a field type.
   */
  register<T extends FieldType>(type: T, serializer: FieldSerializer<T>): this {
    this.serializers.set(type, (field, context) => {
      if (!isFieldOfType(field, type)) {
        throw new FieldTypeMismatchError(type, field.type);
      }
      return serializer(field, context);
    });
    return this;
  }

  /**
   * @returns True if a serializer was removed
   */
  unregister(type: string): boolean {
    return this.serializers.delete(type);
  }

  has(type: string): boolean {
    return this.serializers.has(type);
  }

  lookup(type: string): RegisteredFieldSerializer | undefined {
    return this.serializers.get(type);
  }

  listTypes(): string[] {
    return Array.from(this.serializers.keys());
  }
}

// =============================================================================
// § Built-in serializers
// =============================================================================

function resolveInitial(field: FormField, context: FieldSerializationContext): unknown {
  return context.initial ?? field.initial ?? null;
}

export function serializeBaseField(field: FormField, context: FieldSerializationContext): SerializedField {
  return {
    title: field.type,
    required: field.required,
    label: field.label,
    initial: resolveInitial(field, context),
    help_text: field.helpText,
    error_messages: { ...field.errorMessages },
    errors: [...(context.errors ?? [])],
    widget: serializeWidget(field),
  };
}

export function serializeCharField(field: CharField, context: FieldSerializationContext): SerializedField {
  return {
    ...serializeBaseField(field, context),
    max_length: field.maxLength ?? null,
    min_length: field.minLength ?? null,
  };
}

export function serializeRegexField(field: RegexField, context: FieldSerializationContext): SerializedField {
  return {
    ...serializeBaseField(field, context),
    max_length: field.maxLength ?? null,
    min_length: field.minLength ?? null,
    regex: field.regex,
  };
}

export function serializeIntegerField(field: IntegerField, context: FieldSerializationContext): SerializedField {
  return {
    ...serializeBaseField(field, context),
    max_value: field.maxValue ?? null,
    min_value: field.minValue ?? null,
  };
}

export function serializeDecimalField(field: DecimalField, context: FieldSerializationContext): SerializedField {
  return {
    ...serializeBaseField(field, context),
    max_value: field.maxValue ?? null,
    min_value: field.minValue ?? null,
    max_digits: field.maxDigits ?? null,
    decimal_places: field.decimalPlaces ?? null,
  };
}

export function serializeBooleanField(field: BooleanField, context: FieldSerializationContext): SerializedField {
  return serializeBaseField(field, context);
}

export const DEFAULT_INPUT_FORMATS: Record<TemporalField['type'], string[]> = {
  date: ['%Y-%m-%d', '%m/%d/%Y', '%m/%d/%y'],
  time: ['%H:%M:%S', '%H:%M'],
  datetime: ['%Y-%m-%d %H:%M:%S', '%Y-%m-%d %H:%M', '%Y-%m-%d'],
};

function formatTemporal(type: TemporalField['type'], value: Date): string {
  const iso = value.toISOString();
  switch (type) {
    case 'date':
      return iso.slice(0, 10);
    case 'time':
      return iso.slice(11, 19);
    case 'datetime':
      return iso;
  }
}

export function serializeTemporalField(field: TemporalField, context: FieldSerializationContext): SerializedField {
  const base = serializeBaseField(field, context);
  const initial = base.initial instanceof Date ? formatTemporal(field.type, base.initial) : base.initial;

  return {
    ...base,
    initial,
    input_formats: [...(field.inputFormats ?? DEFAULT_INPUT_FORMATS[field.type])],
  };
}

export function serializeChoiceField(field: ChoiceField, context: FieldSerializationContext): SerializedField {
  return {
    ...serializeBaseField(field, context),
    choices: serializeChoices(field.choices),
  };
}

export function serializeTypedChoiceField(
  field: TypedChoiceField,
  context: FieldSerializationContext
): SerializedField {
  return {
    ...serializeBaseField(field, context),
    choices: serializeChoices(field.choices),
    empty_value: field.emptyValue,
  };
}

export function serializeFileField(field: FileField, context: FieldSerializationContext): SerializedField {
  return {
    ...serializeBaseField(field, context),
    max_length: field.maxLength ?? null,
    allow_empty_file: field.allowEmptyFile ?? false,
  };
}

/**
 * Creates a registry with a serializer for every built-in field type.
 */
export function createDefaultFieldSerializerRegistry(): FieldSerializerRegistry {
  const registry = new FieldSerializerRegistry();

  for (const type of ['char', 'email', 'url', 'slug', 'ip_address'] as const) {
    registry.register(type, serializeCharField);
  }
  registry.register('regex', serializeRegexField);
  registry.register('integer', serializeIntegerField);
  registry.register('float', serializeIntegerField);
  registry.register('decimal', serializeDecimalField);
  registry.register('boolean', serializeBooleanField);
  registry.register('null_boolean', serializeBooleanField);
  for (const type of ['date', 'time', 'datetime'] as const) {
    registry.register(type, serializeTemporalField);
  }
  registry.register('choice', serializeChoiceField);
  registry.register('multiple_choice', serializeChoiceField);
  registry.register('typed_choice', serializeTypedChoiceField);
  registry.register('typed_multiple_choice', serializeTypedChoiceField);
  registry.register('file', serializeFileField);
  registry.register('image', serializeFileField);

  return registry;
}

let _defaultRegistry: FieldSerializerRegistry | undefined;

/** Shared registry used when a caller does not supply one */
export function getDefaultFieldSerializerRegistry(): FieldSerializerRegistry {
  if (!_defaultRegistry) {
    _defaultRegistry = createDefaultFieldSerializerRegistry();
  }
  return _defaultRegistry;
}
