/**
 * formwire
 * Export form definitions as ordered, JSON-ready structures for remote renderers
 */

// =============================================================================
// Form Export
// =============================================================================

export { RemoteForm, serializeForm } from './core/remote-form.js';
export type { RemoteFormOptions, RemoteFormDict, RemoteFormExport, ExportedField } from './core/remote-form.js';

export { resolveFieldSelection } from './core/field-selector.js';
export type { FieldNames, FieldSelection, SelectionDirectives } from './core/field-selector.js';

export { validateFieldsets, collectFieldsetFields } from './core/fieldset-validator.js';
export type { FieldsetDeclaration, FieldsetOptions } from './core/fieldset-validator.js';

export { LazyText, lazyText, isLazyText, resolveLazy } from './core/lazy-text.js';
export type { Resolved, TextValue } from './core/lazy-text.js';

// =============================================================================
// Forms & Fields
// =============================================================================

export { Form, NON_FIELD_ERRORS } from './forms/form.js';
export type { FormBinding, FormDefinition, FormLayoutHelper, FormSource } from './forms/form.js';

export { fields } from './fields/field-builders.js';
export type { FieldOptions } from './fields/field-builders.js';
export { FIELD_TYPES, isFieldOfType } from './fields/field-types.js';
export type {
  BaseField,
  BooleanField,
  CharField,
  Choice,
  ChoiceField,
  DecimalField,
  FieldOfType,
  FieldType,
  FileField,
  FormField,
  IntegerField,
  RegexField,
  TemporalField,
  TypedChoiceField,
} from './fields/field-types.js';

export {
  FieldSerializerRegistry,
  createDefaultFieldSerializerRegistry,
  getDefaultFieldSerializerRegistry,
  serializeBaseField,
  DEFAULT_INPUT_FORMATS,
} from './fields/field-serializers.js';
export type {
  FieldSerializationContext,
  FieldSerializer,
  RegisteredFieldSerializer,
  SerializedField,
} from './fields/field-serializers.js';

export { DEFAULT_WIDGETS, serializeWidget, serializeChoices } from './fields/widgets.js';
export type { SerializedChoice, SerializedWidget, Widget, WidgetAttrValue, WidgetType } from './fields/widgets.js';

// =============================================================================
// Layout
// =============================================================================

export { Layout, Div, Row, Column, Fieldset, Field, flatAttributes } from './layout/layout-objects.js';
export type { DivOptions, LayoutAttrs, LayoutNode, RawLayoutMapping } from './layout/layout-objects.js';
export { parseLayout, parseFlatAttributes, normalizeAttributeKeys, slugify } from './layout/layout-parser.js';
export type { ParsedLayoutElement, ParsedLayoutMapping, ParsedLayoutNode } from './layout/layout-parser.js';

// =============================================================================
// Errors, Logging & Configuration
// =============================================================================

export {
  ConfigurationError,
  FieldSerializerNotFoundError,
  FieldTypeMismatchError,
  FlatAttributeParseError,
  LayoutConfigurationError,
  RemoteFormOptionsError,
} from './core/errors.js';

export { createLogger, getLogger, setLogger, createChildLogger } from './logging.js';
export type { Logger, LoggerOptions, LogFormat, LogLevel } from './logging.js';
export { loadConfigFromEnv } from './config.js';
export type { FormwireConfig } from './config.js';
