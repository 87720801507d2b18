/**
 * Dynamic values: what an `any` slot decodes into.
 *
 * Exactly three shapes. A leaf is always a string, so decode → encode →
 * decode never changes a token such as "007".
 */
export type DynamicValue = string | DynamicValue[] | DynamicMap;

export interface DynamicMap {
  [key: string]: DynamicValue;
}

export function isDynamicMap(value: unknown): value is DynamicMap {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Map)
  );
}

/**
 * Shallow shape check; nested members are checked when they are visited.
 */
export function isDynamicValue(value: unknown): value is DynamicValue {
  return typeof value === 'string' || Array.isArray(value) || isDynamicMap(value);
}

/**
 * Own-property read that never walks the prototype chain.
 */
export function getOwn<T>(
  target: Readonly<Record<string, T>>,
  key: string
): T | undefined {
  return Object.prototype.hasOwnProperty.call(target, key)
    ? target[key]
    : undefined;
}

/**
 * Own-property write. Keys such as `__proto__` become ordinary data
 * properties instead of touching the prototype.
 */
export function setOwn<T>(
  target: Record<string, T>,
  key: string,
  value: T
): void {
  Object.defineProperty(target, key, {
    value,
    writable: true,
    enumerable: true,
    configurable: true,
  });
}
