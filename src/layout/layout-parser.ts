/**
 * Layout Tree Parser
 *
 * Flattens a tree of layout objects into plain nodes a remote renderer can
 * walk: `{ type, attrs, children }`, plus `name` on field references.
 * Raw mappings are copied over as they are.
 * A node the parser cannot represent aborts the whole parse.
 */

import { FlatAttributeParseError, LayoutConfigurationError } from '../core/errors.js';
import { isPlainObject, setEntry } from '../core/records.js';
import { Div, Field, Layout } from './layout-objects.js';

/** A layout object or field reference, with its children parsed */
export interface ParsedLayoutElement {
  type: string;
  attrs: Record<string, unknown>;
  children: ParsedLayoutNode[];
  /** Set on field references */
  name?: string;
}

/** A raw mapping node; its own keys, `children` included, pass through unparsed */
export interface ParsedLayoutMapping {
  type: string;
  attrs: Record<string, unknown>;
  [key: string]: unknown;
}

export type ParsedLayoutNode = ParsedLayoutElement | ParsedLayoutMapping;

// =============================================================================
// § Helpers
// =============================================================================

/**
 * Lowercase ASCII slug: accents stripped, anything other than letters,
 * digits, underscores and hyphens dropped, whitespace runs become hyphens.
 */
export function slugify(value: string): string {
  return value
    .normalize('NFKD')
    .replace(/[^\x00-\x7F]/g, '')
    .toLowerCase()
    .replace(/[^\w\s-]/g, '')
    .replace(/[-\s]+/g, '-')
    .replace(/^[-_]+|[-_]+$/g, '');
}

/** Hyphens in attribute keys become underscores */
export function normalizeAttributeKeys(attrs: Record<string, unknown>): Record<string, unknown> {
  const normalized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(attrs)) {
    setEntry(normalized, key.replace(/-/g, '_'), value);
  }
  return normalized;
}

function describe(node: unknown): string {
  if (node === null) return 'null';
  if (typeof node === 'object') {
    const name: unknown = node.constructor?.name;
    return typeof name === 'string' ? name : 'Object';
  }
  return typeof node;
}

// =============================================================================
// § Flat attributes
// =============================================================================

const NAME_START = /[A-Za-z_:]/;
const NAME_CHAR = /[A-Za-z0-9_:.-]/;
const WHITESPACE = /[ \t\r\n]/;

const NAMED_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
};

function decodeEntity(raw: string, entity: string, position: number): string {
  const named = NAMED_ENTITIES[entity];
  if (named !== undefined) return named;

  const numeric = /^#(?:x([0-9A-Fa-f]+)|([0-9]+))$/.exec(entity);
  if (numeric) {
    const codePoint = numeric[1] !== undefined ? parseInt(numeric[1], 16) : parseInt(numeric[2] ?? '', 10);
    if (codePoint > 0 && codePoint <= 0x10ffff) {
      return String.fromCodePoint(codePoint);
    }
  }

  throw new FlatAttributeParseError(raw, `unknown entity '&${entity};'`, position);
}

/**
 * Parse a flat attribute string (`class="foo" data-x="1"`) into a mapping,
 * following XML attribute rules: quoted values, entity references decoded,
 * whitespace required between attributes, no duplicate names.
 *
 * @throws {FlatAttributeParseError} On any malformed input
 */
export function parseFlatAttributes(raw: string): Record<string, string> {
  const attrs: Record<string, string> = {};
  let i = 0;

  const skipWhitespace = (): boolean => {
    const start = i;
    while (i < raw.length && WHITESPACE.test(raw.charAt(i))) i++;
    return i > start;
  };

  skipWhitespace();
  while (i < raw.length) {
    const nameStart = i;
    if (!NAME_START.test(raw.charAt(i))) {
      throw new FlatAttributeParseError(raw, `unexpected character '${raw.charAt(i)}'`, i);
    }
    while (i < raw.length && NAME_CHAR.test(raw.charAt(i))) i++;
    const name = raw.slice(nameStart, i);

    skipWhitespace();
    if (raw.charAt(i) !== '=') {
      throw new FlatAttributeParseError(raw, `expected '=' after '${name}'`, i);
    }
    i++;
    skipWhitespace();

    const quote = raw.charAt(i);
    if (quote !== '"' && quote !== "'") {
      throw new FlatAttributeParseError(raw, `expected quoted value for '${name}'`, i);
    }
    i++;

    let value = '';
    for (;;) {
      if (i >= raw.length) {
        throw new FlatAttributeParseError(raw, `unterminated value for '${name}'`, i);
      }
      const char = raw.charAt(i);
      if (char === quote) {
        i++;
        break;
      }
      if (char === '<') {
        throw new FlatAttributeParseError(raw, `'<' is not allowed in attribute values`, i);
      }
      if (char === '&') {
        const end = raw.indexOf(';', i);
        if (end === -1) {
          throw new FlatAttributeParseError(raw, 'unterminated entity reference', i);
        }
        value += decodeEntity(raw, raw.slice(i + 1, end), i);
        i = end + 1;
        continue;
      }
      // Literal tabs and line breaks in values normalize to spaces.
      value += WHITESPACE.test(char) ? ' ' : char;
      i++;
    }

    if (Object.hasOwn(attrs, name)) {
      throw new FlatAttributeParseError(raw, `duplicate attribute '${name}'`, nameStart);
    }
    setEntry(attrs, name, value);

    const separated = skipWhitespace();
    if (i < raw.length && !separated) {
      throw new FlatAttributeParseError(raw, `expected whitespace after '${name}'`, i);
    }
  }

  return attrs;
}

// =============================================================================
// § Layout tree
// =============================================================================

function parseField(node: Field): ParsedLayoutElement {
  if (node.fields.length !== 1) {
    throw new LayoutConfigurationError(
      `A Field layout object must wrap exactly one field, got ${node.fields.length}: ${node.fields.join(', ')}`
    );
  }
  return {
    type: 'field',
    name: node.fields[0],
    attrs: normalizeAttributeKeys(node.attrs),
    children: [],
  };
}

function parseContainer(node: Layout | Div): ParsedLayoutElement {
  const attrs =
    node instanceof Div ? normalizeAttributeKeys({ ...parseFlatAttributes(node.flatAttrs), class: node.cssClass }) : {};
  return {
    type: slugify(node.constructor.name),
    attrs,
    children: node.fields.map((child) => parseLayout(child)),
  };
}

function parseMapping(node: Record<string, unknown>): ParsedLayoutMapping {
  // Every key of the mapping lands on the node as given; nothing inside is parsed.
  const { type, attrs = {} } = node;
  if (!isPlainObject(attrs)) {
    throw new LayoutConfigurationError(`Layout mapping attrs must be a mapping, got ${describe(attrs)}`);
  }
  return {
    children: [],
    ...node,
    type: typeof type === 'string' ? type : 'dict',
    attrs: normalizeAttributeKeys(attrs),
  };
}

/**
 * Parse a layout tree into plain nodes, children in order.
 *
 * @throws {LayoutConfigurationError} On an unknown node or a Field wrapping several fields
 * @throws {FlatAttributeParseError} On a container with malformed flat attributes
 */
export function parseLayout(node: unknown): ParsedLayoutNode {
  if (node instanceof Field) return parseField(node);
  if (node instanceof Layout || node instanceof Div) return parseContainer(node);
  if (isPlainObject(node)) return parseMapping(node);

  throw new LayoutConfigurationError(`Unknown layout object ${describe(node)}: ${String(node)}`);
}
