import type { SentinelDefaultPolicy } from './architecture';

/**
 * Canonical "no default supplied" sentinel ({@link SentinelDefaultPolicy}).
 *
 * Semantics:
 * Marks an option declared without a `default` setting. It is never equal to
 * any user value, so `false`, `null`, `undefined`, `0`, `''` and `[]` all
 * remain usable as explicit defaults.
 *
 * Implementation Strategy:
 * Uses `Symbol.for` to ensure global identity, so the sentinel written by
 * settings normalisation matches the check performed by `Option`, even when
 * the package is loaded twice ("Dual Package" hazard).
 *
 * Contract:
 * - Internal: used to detect the absence of a default.
 * - Public: must NEVER be assigned as an option value.
 */
export const Undefined: unique symbol = Symbol.for('options.default.undefined');

/**
 * Type of the {@link Undefined} sentinel.
 */
export type NoDefault = typeof Undefined;

/**
 * Prefix prepended to every error message raised by the mechanism.
 */
export const ERROR_PREFIX = '[Options]';

/**
 * Brand carried by values built with `computed(...)`.
 *
 * Only branded values are invoked as computed defaults; any other value,
 * functions included, is a static default.
 */
export const COMPUTED_DEFAULT: unique symbol = Symbol.for('options.default.computed');

/**
 * Brand carried by type constraints built with `predicate(...)`.
 */
export const TYPE_PREDICATE: unique symbol = Symbol.for('options.type.predicate');
