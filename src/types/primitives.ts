/**
 * Name of a declared option.
 *
 * Role: Registry Key.
 * Matches the own string keys of the construction mapping and, for options
 * declared with `reader: true`, the name of the generated accessor.
 */
export type OptionName = string;

/**
 * The resolved name → value mapping of one instance.
 *
 * Role: Output Shape.
 * Produced by construction after unknown-key rejection, default fill and
 * validation. Stored frozen on the instance.
 */
export type OptionValues = Record<OptionName, unknown>;

/**
 * The raw mapping a caller passes as the trailing constructor argument.
 *
 * Role: Input Constraint.
 * Declared `Readonly` because the caller's object is never mutated: the
 * entry point works on a private copy.
 */
export type OptionInput = Readonly<Record<OptionName, unknown>>;

/**
 * Any class constructor, concrete or abstract.
 *
 * Role: Registry Owner.
 * Used as the identity under which a `Definitions` registry is stored, and as
 * the owner of generated accessors (`type.prototype`).
 *
 * Implementation Note:
 * Parameters are typed `never[]` so that constructors of any arity are
 * assignable without widening to `any`.
 */
export type OptionType = abstract new (...args: never[]) => object;

/**
 * Runtime type guard signature.
 */
export type Guard<T> = (value: unknown) => value is T;
