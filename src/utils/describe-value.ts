import { isPlainObject } from './type-guards';

/**
 * Renders an arbitrary option value for an error message.
 *
 * Strategy:
 * 1. Primitives:
 *    Strings are quoted (`"yes"`), bigints carry their `n` suffix, symbols use
 *    their description form, everything else uses `String(value)`.
 * 2. Functions:
 *    Rendered as `[Function name]` (or `[Function anonymous]`).
 * 3. Arrays and plain objects:
 *    Rendered as JSON. Values JSON cannot encode (cycles, bigints) fall back
 *    to the internal tag.
 * 4. Other objects:
 *    Rendered by internal tag (e.g. `[object Date]`), never by calling
 *    user-defined `toString` implementations.
 *
 * @param value - The value to render.
 * @returns A single-line representation.
 */
export function describeValue(value: unknown): string {
  switch (typeof value) {
    case 'string':
      return JSON.stringify(value);
    case 'bigint':
      return `${value}n`;
    case 'symbol':
      return value.toString();
    case 'function':
      return `[Function ${value.name || 'anonymous'}]`;
    case 'object':
      if (value === null) return 'null';
      return describeObject(value);
    default:
      return String(value);
  }
}

function describeObject(value: object): string {
  const tag = Object.prototype.toString.call(value);
  if (!Array.isArray(value) && !isPlainObject(value)) return tag;

  try {
    return JSON.stringify(value);
  } catch {
    // Cyclic or holds a bigint
    return tag;
  }
}

/**
 * Renders a list of values as a comma-separated string.
 *
 * @param values - Values to render, in order.
 * @returns e.g. `true, false` or `"admin", "guest"`.
 */
export function describeValues(values: readonly unknown[]): string {
  return values.map(describeValue).join(', ');
}
