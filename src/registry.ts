import type { OptionName, OptionSettings, OptionType } from './types';
import type { RegistryOwnership } from './architecture';
import { Definitions } from './definitions/definitions';
import { readReaderValue } from './definitions/reader-slots';
import { Option } from './option/option';
import { normalizeSettings, validateSettings } from './option/settings';

/**
 * Option registries, keyed by class identity ({@link RegistryOwnership}).
 *
 * Lifecycle:
 * - Created once per class, the first time the mechanism touches it.
 * - Grows only through {@link declareOption}.
 * - Read-only once instances of the class are being constructed.
 *
 * A `WeakMap` keeps the registry scoped to the class: nothing outlives an
 * unloaded class, and there is no global list of participating types.
 */
const registries = new WeakMap<object, Definitions>();

/**
 * Returns the parent class of `type`, or `undefined` for a base class.
 *
 * Base classes have `Function.prototype` as their prototype; it is not a
 * class and never owns options.
 */
function parentOf(type: object): object | undefined {
  const parent: unknown = Object.getPrototypeOf(type);
  if (typeof parent !== 'function' || parent === Function.prototype) {
    return undefined;
  }
  return parent;
}

/**
 * Derives the registry of a type the first time it is needed.
 *
 * Inheritance:
 * 1. Ancestor Lookup:
 *    Resolves the parent's registry (deriving it first, recursively, when
 *    the parent has none yet).
 * 2. Copy-on-Inherit:
 *    The subtype receives a clone: a new container referencing the same
 *    `Option`s. Options declared on the subtype afterwards stay invisible
 *    to the parent and to siblings.
 * 3. Root:
 *    A type without ancestors is attached a fresh, empty registry.
 *
 * Timing:
 * JavaScript has no "inherited" hook, so derivation happens when the subtype
 * is first used by the mechanism (an option declaration or a construction).
 * Options an ancestor declares after that point are not seen by the subtype.
 *
 * @param subtype - The class whose registry is derived.
 * @returns The registry now stored for `subtype`.
 */
export function onSubtypeDerived(subtype: object): Definitions {
  const parent = parentOf(subtype);
  const definitions = parent
    ? definitionsFor(parent).clone()
    : new Definitions();

  registries.set(subtype, definitions);
  return definitions;
}

/**
 * Returns the option registry of a type, deriving it on first use.
 */
export function definitionsFor(type: object): Definitions {
  return registries.get(type) ?? onSubtypeDerived(type);
}

/**
 * Declared option names of a type (inherited ones included), in order.
 */
export function optionNames(type: object): OptionName[] {
  return definitionsFor(type).names();
}

/**
 * Generates a read-only accessor for an option on the type's prototype.
 *
 * The getter is non-enumerable, like a class accessor, and reads the
 * per-instance slot bound during construction. Defining it again (an
 * override in a subtype, or a redefinition) replaces the previous getter.
 */
function defineReader(type: OptionType, name: OptionName): void {
  Object.defineProperty(type.prototype, name, {
    configurable: true,
    enumerable: false,
    get(this: object) {
      return readReaderValue(this, name);
    }
  });
}

/**
 * Declares an option on a type.
 *
 * Builds an immutable `Option` from the settings, registers it in the type's
 * registry (the last declaration of a name wins, which is how a subtype
 * overrides an inherited option) and generates the reader when requested.
 *
 * @example
 * ```ts
 * class Repository {
 *   declare readonly adapter: string;
 *
 *   constructor(options?: OptionInput) {
 *     initializeOptions(this, options);
 *   }
 * }
 *
 * declareOption(Repository, 'adapter', { type: String, reader: true });
 * ```
 *
 * @param type - The class declaring the option.
 * @param name - The option name (and reader name).
 * @param settings - `type`, `allow`, `default`, `reader`; all optional.
 * @returns The registered option.
 * @throws OptionDefinitionError when the declaration is malformed.
 */
export function declareOption(
  type: OptionType,
  name: OptionName,
  settings: OptionSettings = {}
): Option {
  const option = new Option(
    name,
    normalizeSettings(validateSettings(name, settings))
  );

  definitionsFor(type).define(option);
  if (option.isReader()) defineReader(type, name);

  return option;
}
