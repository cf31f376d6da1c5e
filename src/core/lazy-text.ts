/**
 * Deferred text: strings evaluated only when the export is assembled
 * (translation lookups and the like).
 */

import { isPlainObject, setEntry } from './records.js';

export class LazyText {
  constructor(private readonly evaluate: () => string) {}

  toString(): string {
    return this.evaluate();
  }

  toJSON(): string {
    return this.evaluate();
  }
}

/** A label, help text or error message: either concrete or deferred. */
export type TextValue = string | LazyText;

export function lazyText(evaluate: () => string): LazyText {
  return new LazyText(evaluate);
}

export function isLazyText(value: unknown): value is LazyText {
  return value instanceof LazyText;
}

/**
 * Resolved form of `T`: every LazyText becomes a string,
 * recursively through arrays and plain objects.
 */
export type Resolved<T> = T extends LazyText
  ? string
  : T extends readonly (infer U)[]
    ? Resolved<U>[]
    : T extends Date
      ? T
      : T extends object
        ? { [K in keyof T]: Resolved<T[K]> }
        : T;

/**
 * Walk a structure and replace every LazyText with its evaluated string.
 * Arrays and plain objects are copied; any other value is returned as is.
 */
export function resolveLazy<T>(value: T): Resolved<T>;
export function resolveLazy(value: unknown): unknown {
  if (value instanceof LazyText) {
    return value.toString();
  }

  if (Array.isArray(value)) {
    return value.map((item: unknown) => resolveLazy(item));
  }

  if (isPlainObject(value)) {
    const resolved: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      setEntry(resolved, key, resolveLazy(item));
    }
    return resolved;
  }

  return value;
}
