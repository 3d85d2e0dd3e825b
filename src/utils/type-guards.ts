import type { StandardSchemaV1 } from '@standard-schema/spec';
import type { Guard } from '../types';

/**
 * Mapping of JavaScript `typeof` results to corresponding TypeScript types.
 * Used by the {@link is} factory.
 */
type PrimitiveTypeMap = {
  boolean: boolean;
  number: number;
  bigint: bigint;
  string: string;
  symbol: symbol;
  undefined: undefined;
  function: (...args: never[]) => unknown;
};

/**
 * Creates a guard for a built-in `typeof` check.
 *
 * @template T  One of the keys of {@link PrimitiveTypeMap}.
 * @param type  The type keyword to compare against `typeof value`.
 * @returns     A guard that returns `true` iff `typeof value === type`.
 */
export function is<T extends keyof PrimitiveTypeMap>(
  type: T
): Guard<PrimitiveTypeMap[T]> {
  return (value: unknown): value is PrimitiveTypeMap[T] =>
    typeof value === type;
}

/** Guard verifying the value is a string. */
export const isString = is('string');

/** Guard verifying the value is a boolean. */
export const isBoolean = is('boolean');

/** Guard verifying the value is a function (constructors included). */
export const isFunction = is('function');

/**
 * Narrowing helper for "object-like" values.
 *
 * @param value
 *   Unknown value to test.
 * @returns
 *   `true` if `value` is a non-null object; otherwise `false`.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Determines whether a value is a "plain object" (a simple POJO / dictionary
 * object).
 *
 * A value is plain when it is a non-null object whose prototype is either
 * `Object.prototype` or `null`. Arrays, class instances, Dates, Maps and
 * boxed primitives are not plain.
 *
 * @param value
 *   The value to test.
 * @returns
 *   `true` if `value` is a plain object; otherwise `false`.
 */
export function isPlainObject(
  value: unknown
): value is Record<PropertyKey, unknown> {
  if (typeof value !== 'object' || value === null) return false;

  const proto = Object.getPrototypeOf(value);
  return proto === null || proto === Object.prototype;
}

/**
 * Checks for Standard Schema V1 compliance.
 *
 * The `~standard` property may sit on an object (Zod, Valibot) or on a
 * callable (ArkType), so both are accepted.
 *
 * @param value
 *   Candidate type constraint.
 * @returns
 *   `true` if `value` exposes a `~standard` adapter with a `validate` function.
 */
export function isStandardSchema(value: unknown): value is StandardSchemaV1 {
  if (!isRecord(value) && !isFunction(value)) return false;
  if (!('~standard' in value)) return false;

  const adapter: unknown = value['~standard'];
  return isRecord(adapter) && isFunction(adapter.validate);
}
