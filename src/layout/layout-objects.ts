/**
 * Layout objects: presentational hints describing how a form's fields
 * are grouped on screen. A form opts in by carrying a `Layout` root.
 */

export type LayoutAttrs = Record<string, string>;

/** A plain mapping whose keys are passed to the renderer verbatim */
export type RawLayoutMapping = Record<string, unknown>;

export type LayoutNode = Layout | Div | Field | RawLayoutMapping;

const ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#x27;',
};

export function escapeAttributeValue(value: string): string {
  return value.replace(/[&<>"']/g, (char) => ESCAPES[char] ?? char);
}

/**
 * Render a mapping as a flat attribute string: ` key="value"` per entry,
 * with underscores in keys turned into hyphens.
 */
export function flatAttributes(attrs: Record<string, string | number | boolean>): string {
  return Object.entries(attrs)
    .map(([key, value]) => ` ${key.replace(/_/g, '-')}="${escapeAttributeValue(String(value))}"`)
    .join('');
}

/** Root of a layout tree */
export class Layout {
  readonly fields: LayoutNode[];

  constructor(...fields: LayoutNode[]) {
    this.fields = fields;
  }
}

export interface DivOptions {
  cssClass?: string;
  /** Extra HTML attributes, rendered into `flatAttrs` */
  attrs?: Record<string, string | number | boolean>;
}

/** A container grouping its children under a CSS class */
export class Div {
  readonly fields: LayoutNode[];
  readonly cssClass: string | null;
  readonly flatAttrs: string;

  constructor(fields: LayoutNode[], options: DivOptions = {}) {
    this.fields = fields;
    this.cssClass = options.cssClass ?? null;
    this.flatAttrs = flatAttributes(options.attrs ?? {});
  }
}

export class Row extends Div {
  constructor(fields: LayoutNode[], options: DivOptions = {}) {
    super(fields, { ...options, cssClass: options.cssClass ?? 'row' });
  }
}

export class Column extends Div {
  constructor(fields: LayoutNode[], options: DivOptions = {}) {
    super(fields, { ...options, cssClass: options.cssClass ?? 'column' });
  }
}

/** A titled group; the legend travels as the `legend` attribute */
export class Fieldset extends Div {
  constructor(legend: string, fields: LayoutNode[], options: DivOptions = {}) {
    super(fields, { ...options, attrs: { legend, ...(options.attrs ?? {}) } });
  }
}

export interface FieldOptions {
  cssClass?: string;
  attrs?: Record<string, string>;
}

/** A reference to form fields by name, with per-field HTML attributes */
export class Field {
  readonly fields: string[];
  readonly attrs: LayoutAttrs;

  constructor(names: string | string[], options: FieldOptions = {}) {
    this.fields = typeof names === 'string' ? [names] : [...names];
    this.attrs = {};
    if (options.cssClass !== undefined) {
      this.attrs['class'] = options.cssClass;
    }
    for (const [key, value] of Object.entries(options.attrs ?? {})) {
      this.attrs[key.replace(/_/g, '-')] = value;
    }
  }
}
