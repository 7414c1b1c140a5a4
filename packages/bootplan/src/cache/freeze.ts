/**
 * Recursively freeze plain objects and arrays. Frozen values are left alone.
 */
export function deepFreeze<T>(value: T): T {
  if (value === null || typeof value !== 'object' || Object.isFrozen(value)) {
    return value;
  }

  Object.freeze(value);
  for (const key of Object.keys(value)) {
    deepFreeze(Reflect.get(value, key));
  }
  return value;
}
