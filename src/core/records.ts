/**
 * Helpers for plain objects keyed by caller-supplied names.
 *
 * Field and attribute names may collide with `Object.prototype`
 * (`constructor`, `toString`, `__proto__`), so reads go through own keys
 * and writes define data properties.
 */

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== 'object') return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/** Value stored under `key` on the record itself, ignoring inherited members */
export function ownValue<T>(record: Readonly<Record<string, T>>, key: string): T | undefined {
  return Object.hasOwn(record, key) ? record[key] : undefined;
}

/** Store `value` under `key` as an own enumerable property, `__proto__` included */
export function setEntry<T>(record: Record<string, T>, key: string, value: T): void {
  Object.defineProperty(record, key, { value, enumerable: true, writable: true, configurable: true });
}
