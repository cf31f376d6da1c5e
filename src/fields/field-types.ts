/**
 * Form field definitions
 *
 * Typed representation of the fields a form declares. Each variant carries
 * the constraints a remote renderer needs; the `type` tag selects the
 * serializer in the field serializer registry.
 */

import type { TextValue } from '../core/lazy-text.js';
import type { Widget } from './widgets.js';

/**
 * Field type discriminator
 */
export type FieldType =
  | 'char'
  | 'email'
  | 'url'
  | 'slug'
  | 'ip_address'
  | 'regex'
  | 'integer'
  | 'float'
  | 'decimal'
  | 'boolean'
  | 'null_boolean'
  | 'date'
  | 'time'
  | 'datetime'
  | 'choice'
  | 'multiple_choice'
  | 'typed_choice'
  | 'typed_multiple_choice'
  | 'file'
  | 'image';

export const FIELD_TYPES: readonly FieldType[] = [
  'char',
  'email',
  'url',
  'slug',
  'ip_address',
  'regex',
  'integer',
  'float',
  'decimal',
  'boolean',
  'null_boolean',
  'date',
  'time',
  'datetime',
  'choice',
  'multiple_choice',
  'typed_choice',
  'typed_multiple_choice',
  'file',
  'image',
];

/**
 * A choice value paired with its display label
 */
export type Choice = readonly [value: string | number | boolean | null, label: TextValue];

/**
 * Base field metadata common to all field types
 */
export interface BaseField {
  type: FieldType;
  required: boolean;
  label: TextValue | null;
  /** Field-level default, used when the form has no initial override */
  initial: unknown;
  helpText: TextValue;
  errorMessages: Record<string, TextValue>;
  /** Defaults to the widget registered for the field type */
  widget?: Widget;
}

/**
 * Length constraints shared by text-like fields
 */
export interface LengthConstraints {
  maxLength?: number | null;
  minLength?: number | null;
}

export interface CharField extends BaseField, LengthConstraints {
  type: 'char' | 'email' | 'url' | 'slug' | 'ip_address';
}

export interface RegexField extends BaseField, LengthConstraints {
  type: 'regex';
  regex: string;
}

export interface IntegerField extends BaseField {
  type: 'integer' | 'float';
  maxValue?: number | null;
  minValue?: number | null;
}

export interface DecimalField extends BaseField {
  type: 'decimal';
  maxValue?: number | string | null;
  minValue?: number | string | null;
  maxDigits?: number | null;
  decimalPlaces?: number | null;
}

export interface BooleanField extends BaseField {
  type: 'boolean' | 'null_boolean';
}

export interface TemporalField extends BaseField {
  type: 'date' | 'time' | 'datetime';
  inputFormats?: string[];
}

export interface ChoiceField extends BaseField {
  type: 'choice' | 'multiple_choice';
  choices: Choice[];
}

export interface TypedChoiceField extends BaseField {
  type: 'typed_choice' | 'typed_multiple_choice';
  choices: Choice[];
  /** Value used when nothing is selected */
  emptyValue: unknown;
}

export interface FileField extends BaseField {
  type: 'file' | 'image';
  maxLength?: number | null;
  allowEmptyFile?: boolean;
}

/**
 * Union of all field types
 */
export type FormField =
  | CharField
  | RegexField
  | IntegerField
  | DecimalField
  | BooleanField
  | TemporalField
  | ChoiceField
  | TypedChoiceField
  | FileField;

/**
 * The field variant carrying a given type tag
 */
export type FieldOfType<T extends FieldType> = FormField & { type: T };

export function isFieldOfType<T extends FieldType>(field: FormField, type: T): field is FieldOfType<T> {
  return field.type === type;
}
