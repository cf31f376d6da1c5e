/**
 * Layout Parser Tests
 */

import { describe, it, expect } from 'vitest';
import { FlatAttributeParseError, LayoutConfigurationError } from '../../src/core/errors.js';
import { Column, Div, Field, Fieldset, Layout, Row, flatAttributes } from '../../src/layout/layout-objects.js';
import {
  normalizeAttributeKeys,
  parseFlatAttributes,
  parseLayout,
  slugify,
} from '../../src/layout/layout-parser.js';

describe('parseFlatAttributes', () => {
  it('should parse key/value pairs', () => {
    expect(parseFlatAttributes('class="foo" data-x="1"')).toEqual({ class: 'foo', 'data-x': '1' });
  });

  it('should parse an empty string', () => {
    expect(parseFlatAttributes('')).toEqual({});
    expect(parseFlatAttributes('   ')).toEqual({});
  });

  it('should store inherited member names as plain attributes', () => {
    const attrs = parseFlatAttributes('__proto__="x" constructor="y"');

    expect(Object.keys(attrs)).toEqual(['__proto__', 'constructor']);
    expect(Object.getPrototypeOf(attrs)).toBe(Object.prototype);
    expect(Object.getOwnPropertyDescriptor(attrs, '__proto__')?.value).toBe('x');
  });

  it('should accept single quotes and spaces around the equals sign', () => {
    expect(parseFlatAttributes(` title = 'say "hi"'  id="x" `)).toEqual({ title: 'say "hi"', id: 'x' });
  });

  it('should decode entity references', () => {
    expect(parseFlatAttributes('title="a &amp; b &lt;c&gt; &#39;q&#x27; &quot;"')).toEqual({
      title: `a & b <c> 'q' "`,
    });
  });

  it('should normalize line breaks in values to spaces', () => {
    expect(parseFlatAttributes('title="one\ntwo\tthree"')).toEqual({ title: 'one two three' });
  });

  it('should read what flatAttributes writes', () => {
    const flat = flatAttributes({ data_id: 'a"b', placeholder: 'x & y', tabindex: 2 });

    expect(flat).toBe(' data-id="a&quot;b" placeholder="x &amp; y" tabindex="2"');
    expect(parseFlatAttributes(flat)).toEqual({ 'data-id': 'a"b', placeholder: 'x & y', tabindex: '2' });
  });

  it.each([
    ['class=foo', 'expected quoted value'],
    ['class="foo', 'unterminated value'],
    ['a="1"b="2"', 'expected whitespace'],
    ['a="1" a="2"', 'duplicate attribute'],
    ['="x"', 'unexpected character'],
    ['class', "expected '='"],
    ['a="&bogus;"', 'unknown entity'],
    ['a="&amp"', 'unterminated entity'],
    ['a="<b>"', "'<' is not allowed"],
  ])('should reject %s', (input, reason) => {
    expect(() => parseFlatAttributes(input)).toThrow(FlatAttributeParseError);
    expect(() => parseFlatAttributes(input)).toThrow(reason);
  });

  it('should report the offending position', () => {
    try {
      parseFlatAttributes('a="1" 9="2"');
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(FlatAttributeParseError);
      if (err instanceof FlatAttributeParseError) {
        expect(err.position).toBe(6);
        expect(err.input).toBe('a="1" 9="2"');
      }
    }
  });
});

describe('slugify', () => {
  it.each([
    ['Row', 'row'],
    ['CardSection', 'cardsection'],
    [' Hello World ', 'hello-world'],
    ['Crème Brûlée', 'creme-brulee'],
    ['__private__', 'private'],
  ])('should slugify %j as %j', (input, expected) => {
    expect(slugify(input)).toBe(expected);
  });
});

describe('normalizeAttributeKeys', () => {
  it('should replace hyphens with underscores', () => {
    expect(normalizeAttributeKeys({ 'data-foo-bar': 1, class: 'x' })).toEqual({ data_foo_bar: 1, class: 'x' });
  });
});

describe('parseLayout', () => {
  it('should parse the root layout with no attributes', () => {
    expect(parseLayout(new Layout())).toEqual({ type: 'layout', attrs: {}, children: [] });
  });

  it('should parse containers with their class and flat attributes', () => {
    const div = new Div([], { cssClass: 'panel', attrs: { 'data-panel-id': 'p1', title: 'Main' } });

    expect(parseLayout(div)).toEqual({
      type: 'div',
      attrs: { data_panel_id: 'p1', title: 'Main', class: 'panel' },
      children: [],
    });
  });

  it('should export a null class for containers without one', () => {
    expect(parseLayout(new Div([]))).toEqual({ type: 'div', attrs: { class: null }, children: [] });
  });

  it('should tag container subclasses by their class name', () => {
    class CardSection extends Div {}

    expect(parseLayout(new Row([])).type).toBe('row');
    expect(parseLayout(new Row([])).attrs).toEqual({ class: 'row' });
    expect(parseLayout(new Column([], { cssClass: 'col-6' })).attrs).toEqual({ class: 'col-6' });
    expect(parseLayout(new CardSection([])).type).toBe('cardsection');
  });

  it('should carry a fieldset legend as an attribute', () => {
    expect(parseLayout(new Fieldset('Contact', [new Field('email')]))).toEqual({
      type: 'fieldset',
      attrs: { legend: 'Contact', class: null },
      children: [{ type: 'field', name: 'email', attrs: {}, children: [] }],
    });
  });

  it('should parse field references with their attributes', () => {
    const field = new Field('email', { cssClass: 'wide', attrs: { data_help: 'x', placeholder: 'you@example.com' } });

    expect(parseLayout(field)).toEqual({
      type: 'field',
      name: 'email',
      attrs: { class: 'wide', data_help: 'x', placeholder: 'you@example.com' },
      children: [],
    });
  });

  it('should merge raw mappings into the node', () => {
    expect(parseLayout({ type: 'html', html: '<hr>', attrs: { 'data-x': '1' }, children: [{ type: 'x' }] })).toEqual({
      type: 'html',
      html: '<hr>',
      attrs: { data_x: '1' },
      children: [{ type: 'x' }],
    });
    expect(parseLayout({ text: 'hi' })).toEqual({ type: 'dict', text: 'hi', attrs: {}, children: [] });
  });

  it('should pass the children of raw mappings through unparsed', () => {
    expect(parseLayout(new Layout({ type: 'html', children: ['x'], html: '<hr>' }))).toEqual({
      type: 'layout',
      attrs: {},
      children: [{ type: 'html', html: '<hr>', attrs: {}, children: ['x'] }],
    });
  });

  it('should keep children in order through nested containers', () => {
    const layout = new Layout(
      new Row([new Column([new Field('first')]), new Column([new Field('last')])]),
      { type: 'divider' },
      new Field('email')
    );

    const parsed = parseLayout(layout);

    expect(parsed).toEqual({
      type: 'layout',
      attrs: {},
      children: [
        {
          type: 'row',
          attrs: { class: 'row' },
          children: [
            { type: 'column', attrs: { class: 'column' }, children: [{ type: 'field', name: 'first', attrs: {}, children: [] }] },
            { type: 'column', attrs: { class: 'column' }, children: [{ type: 'field', name: 'last', attrs: {}, children: [] }] },
          ],
        },
        { type: 'divider', attrs: {}, children: [] },
        { type: 'field', name: 'email', attrs: {}, children: [] },
      ],
    });
  });

  it('should reject a field reference wrapping several fields', () => {
    expect(() => parseLayout(new Field(['first', 'last']))).toThrow(LayoutConfigurationError);
    expect(() => parseLayout(new Field([]))).toThrow('must wrap exactly one field, got 0');
  });

  it('should reject invalid nodes anywhere in the tree', () => {
    class Spacer {
      [key: string]: unknown;
    }

    expect(() => parseLayout(new Layout(new Div([new Spacer()])))).toThrow('Unknown layout object Spacer');
    expect(() => parseLayout(null)).toThrow(LayoutConfigurationError);
    expect(() => parseLayout('name')).toThrow('Unknown layout object string: name');
  });

  it('should reject raw mappings with non-mapping attrs', () => {
    expect(() => parseLayout({ attrs: 'class="x"' })).toThrow('attrs must be a mapping, got string');
  });
});
