/**
 * Builders that fill in the common field defaults
 * (required, no label, no initial value, empty help text).
 */

import type {
  BaseField,
  BooleanField,
  CharField,
  ChoiceField,
  DecimalField,
  FileField,
  IntegerField,
  RegexField,
  TemporalField,
  TypedChoiceField,
} from './field-types.js';

type CommonKey = 'required' | 'label' | 'initial' | 'helpText' | 'errorMessages';

export type FieldOptions<F extends BaseField> = Omit<F, 'type' | CommonKey> & Partial<Pick<F, CommonKey>>;

function defaults(): Pick<BaseField, CommonKey> {
  return { required: true, label: null, initial: null, helpText: '', errorMessages: {} };
}

function charOf(type: CharField['type']) {
  return (options: FieldOptions<CharField> = {}): CharField => ({ ...defaults(), ...options, type });
}

function numberOf(type: IntegerField['type']) {
  return (options: FieldOptions<IntegerField> = {}): IntegerField => ({ ...defaults(), ...options, type });
}

function booleanOf(type: BooleanField['type']) {
  // An unchecked checkbox submits nothing, so booleans default to optional.
  return (options: FieldOptions<BooleanField> = {}): BooleanField => ({
    ...defaults(),
    required: false,
    ...options,
    type,
  });
}

function temporalOf(type: TemporalField['type']) {
  return (options: FieldOptions<TemporalField> = {}): TemporalField => ({ ...defaults(), ...options, type });
}

function choiceOf(type: ChoiceField['type']) {
  return (options: FieldOptions<ChoiceField>): ChoiceField => ({ ...defaults(), ...options, type });
}

function typedChoiceOf(type: TypedChoiceField['type']) {
  return (
    options: Omit<FieldOptions<TypedChoiceField>, 'emptyValue'> & { emptyValue?: unknown }
  ): TypedChoiceField => ({ ...defaults(), emptyValue: '', ...options, type });
}

function fileOf(type: FileField['type']) {
  return (options: FieldOptions<FileField> = {}): FileField => ({ ...defaults(), ...options, type });
}

export const fields = {
  char: charOf('char'),
  email: charOf('email'),
  url: charOf('url'),
  slug: charOf('slug'),
  ipAddress: charOf('ip_address'),
  regex: (options: FieldOptions<RegexField>): RegexField => ({ ...defaults(), ...options, type: 'regex' }),
  integer: numberOf('integer'),
  float: numberOf('float'),
  decimal: (options: FieldOptions<DecimalField> = {}): DecimalField => ({
    ...defaults(),
    ...options,
    type: 'decimal',
  }),
  boolean: booleanOf('boolean'),
  nullBoolean: booleanOf('null_boolean'),
  date: temporalOf('date'),
  time: temporalOf('time'),
  datetime: temporalOf('datetime'),
  choice: choiceOf('choice'),
  multipleChoice: choiceOf('multiple_choice'),
  typedChoice: typedChoiceOf('typed_choice'),
  typedMultipleChoice: typedChoiceOf('typed_multiple_choice'),
  file: fileOf('file'),
  image: fileOf('image'),
};
