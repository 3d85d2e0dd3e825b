import type { StandardSchemaV1 } from '@standard-schema/spec';
import { TYPE_PREDICATE } from '../constants';

/**
 * A class (or built-in) constructor used as a type constraint.
 *
 * Matching:
 * - Primitive wrappers (`String`, `Number`, `Boolean`, `Function`) also match
 *   their primitive `typeof` counterparts.
 * - `Array` matches via `Array.isArray`.
 * - `Object` matches any non-null object or function.
 * - Any other constructor matches via `instanceof`.
 */
export type ConstructorConstraint = abstract new (...args: never[]) => unknown;

/**
 * An explicit predicate used as a type constraint.
 *
 * Built with `predicate(...)`. The brand separates a predicate from a
 * constructor, since both are plain functions at runtime.
 */
export type TypePredicate = {
  readonly [TYPE_PREDICATE]: true;

  /**
   * Human-readable name of the accepted type, used in error messages.
   */
  readonly description: string;

  /**
   * Returns `true` iff the value is acceptable.
   */
  readonly test: (value: unknown) => boolean;
};

/**
 * The accepted forms of the `type` setting.
 *
 * - {@link ConstructorConstraint}: `instanceof`-style check.
 * - `StandardSchemaV1`: accept iff the validator reports no issues.
 *   The validator output is discarded (accept/reject only, no coercion).
 * - {@link TypePredicate}: arbitrary predicate.
 */
export type TypeConstraint =
  | ConstructorConstraint
  | StandardSchemaV1
  | TypePredicate;

/**
 * A compiled type constraint.
 */
export type TypeMatcher = (value: unknown) => boolean;
