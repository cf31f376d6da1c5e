/**
 * Widgets: the input control a renderer should use for a field.
 */

import type { TextValue } from '../core/lazy-text.js';
import type { Choice, FieldType, FormField } from './field-types.js';

export type WidgetType =
  | 'text_input'
  | 'email_input'
  | 'url_input'
  | 'number_input'
  | 'password_input'
  | 'hidden_input'
  | 'textarea'
  | 'checkbox_input'
  | 'null_boolean_select'
  | 'select'
  | 'select_multiple'
  | 'radio_select'
  | 'checkbox_select_multiple'
  | 'date_input'
  | 'time_input'
  | 'datetime_input'
  | 'file_input'
  | 'clearable_file_input';

export type WidgetAttrValue = string | number | boolean;

export interface Widget {
  type: WidgetType;
  attrs?: Record<string, WidgetAttrValue>;
  isLocalized?: boolean;
}

export const DEFAULT_WIDGETS: Record<FieldType, WidgetType> = {
  char: 'text_input',
  email: 'email_input',
  url: 'url_input',
  slug: 'text_input',
  ip_address: 'text_input',
  regex: 'text_input',
  integer: 'number_input',
  float: 'number_input',
  decimal: 'number_input',
  boolean: 'checkbox_input',
  null_boolean: 'null_boolean_select',
  date: 'date_input',
  time: 'time_input',
  datetime: 'datetime_input',
  choice: 'select',
  multiple_choice: 'select_multiple',
  typed_choice: 'select',
  typed_multiple_choice: 'select_multiple',
  file: 'clearable_file_input',
  image: 'clearable_file_input',
};

const INPUT_TYPES: Partial<Record<WidgetType, string>> = {
  text_input: 'text',
  email_input: 'email',
  url_input: 'url',
  number_input: 'number',
  password_input: 'password',
  hidden_input: 'hidden',
  checkbox_input: 'checkbox',
  date_input: 'text',
  time_input: 'text',
  datetime_input: 'text',
  file_input: 'file',
  clearable_file_input: 'file',
};

const CHOICE_WIDGETS: ReadonlySet<WidgetType> = new Set([
  'select',
  'select_multiple',
  'radio_select',
  'checkbox_select_multiple',
  'null_boolean_select',
]);

const MULTIPART_WIDGETS: ReadonlySet<WidgetType> = new Set(['file_input', 'clearable_file_input']);

export interface SerializedChoice {
  value: Choice[0];
  display: TextValue;
}

export interface SerializedWidget {
  title: WidgetType;
  is_hidden: boolean;
  needs_multipart_form: boolean;
  is_localized: boolean;
  is_required: boolean;
  attrs: Record<string, WidgetAttrValue>;
  input_type?: string;
  choices?: SerializedChoice[];
}

export function serializeChoices(choices: readonly Choice[]): SerializedChoice[] {
  return choices.map(([value, display]) => ({ value, display }));
}

const NULL_BOOLEAN_CHOICES: Choice[] = [
  ['1', 'Unknown'],
  ['2', 'Yes'],
  ['3', 'No'],
];

/**
 * Serialize the widget of a field, falling back to the default widget
 * for its type.
 */
export function serializeWidget(field: FormField): SerializedWidget {
  const widget: Widget = field.widget ?? { type: DEFAULT_WIDGETS[field.type] };

  const result: SerializedWidget = {
    title: widget.type,
    is_hidden: widget.type === 'hidden_input',
    needs_multipart_form: MULTIPART_WIDGETS.has(widget.type),
    is_localized: widget.isLocalized ?? false,
    is_required: field.required,
    attrs: { ...(widget.attrs ?? {}) },
  };

  const inputType = INPUT_TYPES[widget.type];
  if (inputType !== undefined) {
    result.input_type = inputType;
  }

  if (CHOICE_WIDGETS.has(widget.type)) {
    if ('choices' in field) {
      result.choices = serializeChoices(field.choices);
    } else if (widget.type === 'null_boolean_select') {
      result.choices = serializeChoices(NULL_BOOLEAN_CHOICES);
    } else {
      result.choices = [];
    }
  }

  return result;
}
