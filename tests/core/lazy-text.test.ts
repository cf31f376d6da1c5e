/**
 * Deferred Text Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { isLazyText, lazyText, resolveLazy } from '../../src/core/lazy-text.js';

describe('lazyText', () => {
  it('should evaluate on every use', () => {
    const evaluate = vi.fn(() => 'Hello');
    const text = lazyText(evaluate);

    expect(evaluate).not.toHaveBeenCalled();
    expect(`${text}`).toBe('Hello');
    expect(JSON.stringify({ text })).toBe('{"text":"Hello"}');
    expect(evaluate).toHaveBeenCalledTimes(2);
  });

  it('should be recognised by isLazyText', () => {
    expect(isLazyText(lazyText(() => 'x'))).toBe(true);
    expect(isLazyText('x')).toBe(false);
  });
});

describe('resolveLazy', () => {
  it('should resolve deferred text through arrays and plain objects', () => {
    const resolved = resolveLazy({
      label: lazyText(() => 'Name'),
      choices: [{ value: 1, display: lazyText(() => 'One') }],
      nested: { deeper: [[lazyText(() => 'deep')]] },
    });

    expect(resolved).toEqual({
      label: 'Name',
      choices: [{ value: 1, display: 'One' }],
      nested: { deeper: [['deep']] },
    });
  });

  it('should leave other values untouched', () => {
    const when = new Date('2024-01-01T00:00:00Z');
    const set = new Set(['a']);

    const resolved = resolveLazy({ when, set, count: 3, empty: null, flag: false });

    expect(resolved.when).toBe(when);
    expect(resolved.set).toBe(set);
    expect(resolved).toMatchObject({ count: 3, empty: null, flag: false });
  });

  it('should copy instead of mutating its input', () => {
    const input = { errors: [lazyText(() => 'Required')] };
    const resolved = resolveLazy(input);

    expect(resolved.errors).toEqual(['Required']);
    expect(isLazyText(input.errors[0])).toBe(true);
  });
});
