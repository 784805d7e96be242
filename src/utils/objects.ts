// ---------------------------------------------------------------------------
// Own-property helpers for objects keyed by vendor-supplied names.
// ---------------------------------------------------------------------------

/**
 * Set `key` as an own enumerable property.  Plain assignment would treat a
 * key such as `__proto__` as a prototype change instead of a field.
 */
export function defineOwn<T>(target: Record<string, T>, key: string, value: T): void {
  Object.defineProperty(target, key, {
    value,
    writable: true,
    enumerable: true,
    configurable: true,
  });
}

/** Read `key` only when it is an own property of `target`. */
export function readOwn<T>(target: Record<string, T>, key: string): T | undefined {
  return Object.hasOwn(target, key) ? target[key] : undefined;
}
