import type { StandardSchemaV1 } from '@standard-schema/spec';

import type {
  ConstructorConstraint,
  OptionName,
  TypeConstraint,
  TypeMatcher,
  TypePredicate
} from '../types';
import { TYPE_PREDICATE } from '../constants';
import { OptionDefinitionError } from '../errors';
import { isFunction, isRecord, isStandardSchema } from '../utils/type-guards';

/**
 * Constructors whose instances are usually seen as primitives.
 *
 * `new String('a')` is a `String`, but so is `'a'`: both must match.
 * Keyed by identity, so shadowed or subclassed constructors fall back to
 * plain `instanceof`.
 */
const PRIMITIVE_TYPEOF = new Map<unknown, string>([
  [String, 'string'],
  [Number, 'number'],
  [Boolean, 'boolean'],
  [Function, 'function']
]);

/**
 * Wraps a guard into a type constraint.
 *
 * Usage:
 * ```ts
 * declareOption(Table, 'name', { type: predicate(isString, 'string') });
 * ```
 *
 * @param test - Returns `true` for acceptable values.
 * @param description - Name of the accepted type, shown in error messages.
 */
export function predicate(
  test: (value: unknown) => boolean,
  description = test.name || 'predicate'
): TypePredicate {
  return Object.freeze({ [TYPE_PREDICATE]: true as const, description, test });
}

/**
 * Type guard for {@link TypePredicate}.
 */
export function isTypePredicate(value: unknown): value is TypePredicate {
  return (
    isRecord(value) && TYPE_PREDICATE in value && value[TYPE_PREDICATE] === true
  );
}

/**
 * Checks whether a value is an accepted form of the `type` setting.
 *
 * Standard Schemas are checked first: some libraries (ArkType) expose
 * callable schemas, which would otherwise pass as constructors.
 */
export function isTypeConstraint(value: unknown): value is TypeConstraint {
  return (
    isStandardSchema(value) || isTypePredicate(value) || isFunction(value)
  );
}

function matchConstructor(type: ConstructorConstraint): TypeMatcher {
  if (type === Object) {
    return value =>
      (typeof value === 'object' && value !== null) ||
      typeof value === 'function';
  }

  if (type === Array) {
    return value => Array.isArray(value);
  }

  const primitive = PRIMITIVE_TYPEOF.get(type);
  if (primitive) {
    return value => typeof value === primitive || value instanceof type;
  }

  return value => value instanceof type;
}

function matchSchema(schema: StandardSchemaV1, name: OptionName): TypeMatcher {
  return value => {
    const result = schema['~standard'].validate(value);

    // Construction is synchronous; a pending result cannot be awaited.
    if (result instanceof Promise) {
      throw new OptionDefinitionError(
        name,
        'async schema validation is not supported'
      );
    }

    return result.issues == null;
  };
}

/**
 * Compiles a type constraint into a predicate.
 *
 * Dispatch:
 * 1. `undefined` → accepts anything.
 * 2. Standard Schema → accepts iff the validator reports no issues.
 * 3. {@link TypePredicate} → delegates to its `test`.
 * 4. Constructor → `instanceof` with primitive, `Array` and `Object` rules.
 *
 * @param type - The declared constraint, if any.
 * @param name - The option name, used in error messages.
 * @returns A matcher with no side effects.
 */
export function createTypeMatcher(
  type: TypeConstraint | undefined,
  name: OptionName
): TypeMatcher {
  if (type === undefined) return () => true;
  if (isStandardSchema(type)) return matchSchema(type, name);
  if (isTypePredicate(type)) return type.test;
  return matchConstructor(type);
}

/**
 * Renders a type constraint for an error message.
 *
 * @returns e.g. `String`, `zod schema`, `positive integer`, or `any`.
 */
export function describeTypeConstraint(
  type: TypeConstraint | undefined
): string {
  if (type === undefined) return 'any';
  if (isStandardSchema(type)) return `${type['~standard'].vendor} schema`;
  if (isTypePredicate(type)) return type.description;
  return type.name || 'anonymous class';
}
