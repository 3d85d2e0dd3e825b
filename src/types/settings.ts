import { COMPUTED_DEFAULT } from '../constants';
import type { TypeConstraint } from './constraints';

/**
 * A default computed from the object under construction.
 *
 * Built with `computed(...)` and resolved lazily, only when the input mapping
 * lacks the option.
 *
 * Implementation Note:
 * `resolve` is declared with method syntax so that a `ComputedDefault<User>`
 * is assignable where a `ComputedDefault<object>` is expected (method
 * parameters are checked bivariantly).
 *
 * @template TOwner - The instance type passed to `resolve`.
 */
export type ComputedDefault<TOwner extends object = object> = {
  readonly [COMPUTED_DEFAULT]: true;
  resolve(owner: TOwner): unknown;
};

/**
 * Settings accepted when declaring an option. Every key is optional.
 */
export type OptionSettings = {
  /**
   * Restrict the value type.
   *
   * @default accept anything
   */
  type?: TypeConstraint;

  /**
   * Explicit list of acceptable values (SameValueZero membership).
   * An empty list places no restriction.
   *
   * @default []
   */
  allow?: readonly unknown[];

  /**
   * Value used when the construction mapping lacks the option.
   *
   * - Static: any value, including `false`, `null`, `undefined` and functions.
   * - Computed: a {@link ComputedDefault} built with `computed(...)`.
   *
   * @default no default
   */
  default?: unknown;

  /**
   * Generate a read-only accessor named after the option.
   *
   * @default false
   */
  reader?: boolean;
};

/**
 * Settings after default filling; the shape `Option` is built from.
 *
 * `default` holds the `Undefined` sentinel when no default was declared.
 */
export type NormalizedSettings = {
  type: TypeConstraint | undefined;
  allow: readonly unknown[];
  default: unknown;
  reader: boolean;
};
