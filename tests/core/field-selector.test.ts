/**
 * Field Selector Tests
 */

import { describe, it, expect } from 'vitest';
import { resolveFieldSelection, difference } from '../../src/core/field-selector.js';
import { createCaptureLogger } from '../helpers/capture-logger.js';

const DECLARED = ['name', 'age', 'email'];

describe('resolveFieldSelection', () => {
  it('should keep the declared order without directives', () => {
    const { logger, warnings } = createCaptureLogger();
    const selection = resolveFieldSelection(DECLARED, {}, logger);

    expect(selection.fields).toEqual(['name', 'age', 'email']);
    expect(warnings()).toHaveLength(0);
  });

  it('should drop excluded fields', () => {
    const { logger } = createCaptureLogger();
    const selection = resolveFieldSelection(DECLARED, { exclude: ['age'] }, logger);

    expect(selection.fields).toEqual(['name', 'email']);
    expect([...selection.exclude]).toEqual(['age']);
  });

  it('should accept sets as directives', () => {
    const { logger } = createCaptureLogger();
    const selection = resolveFieldSelection(DECLARED, { exclude: new Set(['email']) }, logger);

    expect(selection.fields).toEqual(['name', 'age']);
  });

  it('should reset an exclude list naming unknown fields', () => {
    const { logger, warnings } = createCaptureLogger();
    const selection = resolveFieldSelection(DECLARED, { exclude: ['age', 'ghost'] }, logger);

    expect(selection.exclude.size).toBe(0);
    expect(selection.fields).toEqual(['name', 'age', 'email']);
    expect(warnings()).toHaveLength(1);
    expect(warnings()[0]).toMatchObject({
      msg: 'Excluded fields are not present in form fields',
      directive: 'Excluded',
      fields: ['ghost'],
    });
  });

  it('should reset include and readonly lists naming unknown fields', () => {
    const { logger, warnings } = createCaptureLogger();
    const selection = resolveFieldSelection(
      DECLARED,
      { include: ['name', 'nickname'], readonly: ['phone'] },
      logger
    );

    expect(selection.include.size).toBe(0);
    expect(selection.readonly.size).toBe(0);
    expect(warnings().map((record) => record.msg)).toEqual([
      'Included fields are not present in form fields',
      'Readonly fields are not present in form fields',
    ]);
  });

  it('should not narrow the list to included fields', () => {
    const { logger } = createCaptureLogger();
    const selection = resolveFieldSelection(DECLARED, { include: ['name'] }, logger);

    expect([...selection.include]).toEqual(['name']);
    expect(selection.fields).toEqual(['name', 'age', 'email']);
  });

  it('should reset both include and exclude when both are given', () => {
    const { logger, warnings } = createCaptureLogger();
    const selection = resolveFieldSelection(DECLARED, { include: ['name'], exclude: ['age'] }, logger);

    expect(selection.include.size).toBe(0);
    expect(selection.exclude.size).toBe(0);
    expect(selection.fields).toEqual(['name', 'age', 'email']);
    expect(warnings()).toHaveLength(1);
    expect(warnings()[0]).toMatchObject({
      msg: 'Included and excluded fields cannot be combined; ignoring both',
      include: ['name'],
      exclude: ['age'],
    });
  });

  it('should follow a valid ordering', () => {
    const { logger } = createCaptureLogger();
    const selection = resolveFieldSelection(DECLARED, { ordering: ['email', 'name', 'age'] }, logger);

    expect(selection.fields).toEqual(['email', 'name', 'age']);
  });

  it('should only export fields named by a partial ordering', () => {
    const { logger } = createCaptureLogger();
    const selection = resolveFieldSelection(DECLARED, { ordering: ['email', 'name'] }, logger);

    expect(selection.fields).toEqual(['email', 'name']);
  });

  it('should drop duplicate names from the ordering', () => {
    const { logger } = createCaptureLogger();
    const selection = resolveFieldSelection(DECLARED, { ordering: ['age', 'age', 'name'] }, logger);

    expect(selection.fields).toEqual(['age', 'name']);
  });

  it('should fall back to the declared order when the ordering names unknown fields', () => {
    const { logger, warnings } = createCaptureLogger();
    const selection = resolveFieldSelection(DECLARED, { ordering: ['email', 'ghost'] }, logger);

    expect(selection.ordering).toEqual([]);
    expect(selection.fields).toEqual(['name', 'age', 'email']);
    expect(warnings()[0]).toMatchObject({
      msg: 'Ordered fields are not present in form fields',
      fields: ['ghost'],
    });
  });

  it('should apply exclusions to the ordering', () => {
    const { logger } = createCaptureLogger();
    const selection = resolveFieldSelection(
      DECLARED,
      { ordering: ['email', 'age', 'name'], exclude: ['age'] },
      logger
    );

    expect(selection.fields).toEqual(['email', 'name']);
  });

  it('should keep readonly fields in the selection', () => {
    const { logger } = createCaptureLogger();
    const selection = resolveFieldSelection(DECLARED, { readonly: ['age'] }, logger);

    expect(selection.fields).toEqual(['name', 'age', 'email']);
    expect(selection.readonly.has('age')).toBe(true);
  });

  it('should return a frozen field list', () => {
    const { logger } = createCaptureLogger();
    const selection = resolveFieldSelection(DECLARED, {}, logger);

    expect(Object.isFrozen(selection.fields)).toBe(true);
    expect(Object.isFrozen(selection)).toBe(true);
  });

  it('should handle a form without fields', () => {
    const { logger, warnings } = createCaptureLogger();
    const selection = resolveFieldSelection([], { exclude: ['name'] }, logger);

    expect(selection.fields).toEqual([]);
    expect(warnings()).toHaveLength(1);
  });
});

describe('difference', () => {
  it('should list names missing from the reference set, once each', () => {
    expect(difference(['a', 'b', 'c', 'b'], new Set(['a']))).toEqual(['b', 'c']);
  });
});
