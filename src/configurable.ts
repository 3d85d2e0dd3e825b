import type {
  OptionInput,
  OptionName,
  OptionSettings,
  OptionType,
  OptionValues
} from './types';
import type { Definitions } from './definitions/definitions';
import type { Option } from './option/option';
import { declareOption, definitionsFor } from './registry';

/**
 * Applies a trailing construction mapping to an instance.
 *
 * Steps:
 * 1. Copies the caller's mapping (`null` / omitted → `{}`); the caller's
 *    object is never mutated.
 * 2. Processes the copy against the registry of the instance's class:
 *    unknown keys, defaults, validation, readers.
 * 3. Freezes and returns the completed mapping.
 *
 * Call it from the constructor once the fields a computed default may read
 * are set. {@link Configurable} does this in its own constructor.
 *
 * @param owner - The instance under construction.
 * @param rawOptions - The caller-supplied mapping.
 * @returns The frozen, defaults-filled mapping.
 * @throws InvalidOptionKeyError, InvalidOptionValueError
 */
export function initializeOptions(
  owner: object,
  rawOptions?: OptionInput | null
): Readonly<OptionValues> {
  const options: OptionValues = { ...rawOptions };

  definitionsFor(owner.constructor).process(owner, options);
  return Object.freeze(options);
}

/**
 * Base class for types constructed from an options mapping.
 *
 * Options are declared on the subclass, and readers are typed with
 * `declare` fields (a plain field would shadow the generated getter):
 *
 * ```ts
 * class User extends Configurable<{ name: string; admin: boolean }> {
 *   declare readonly name: string;
 *   declare readonly admin: boolean;
 * }
 *
 * User.option('name', { type: String, reader: true });
 * User.option('admin', { allow: [true, false], reader: true, default: false });
 *
 * new User({ name: 'Piotr' }).admin; // false
 * ```
 *
 * @template TOptions - Shape of the resolved options, used by `getOption`.
 */
export abstract class Configurable<TOptions extends object = OptionValues> {
  /**
   * The resolved options of this instance (frozen, not reassignable).
   */
  declare readonly options: Readonly<OptionValues>;

  constructor(options?: OptionInput | null) {
    Object.defineProperty(this, 'options', {
      value: initializeOptions(this, options),
      writable: false,
      enumerable: true,
      configurable: false
    });
  }

  /**
   * Reads one resolved option value.
   *
   * Implementation Note - Overloads:
   * The public signature carries the `TOptions` typing; the implementation
   * reads the untyped mapping. Validation has already checked every present
   * value against its declared constraint.
   */
  getOption<K extends keyof TOptions & OptionName>(name: K): TOptions[K];

  getOption(name: OptionName): unknown {
    return this.options[name];
  }

  /**
   * Declares an option on the calling class.
   */
  static option<T extends OptionType>(
    this: T,
    name: OptionName,
    settings?: OptionSettings
  ): Option {
    return declareOption(this, name, settings);
  }

  /**
   * The option registry of the calling class.
   */
  static optionDefinitions<T extends OptionType>(this: T): Definitions {
    return definitionsFor(this);
  }
}
