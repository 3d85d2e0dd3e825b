import type { OptionName, OptionValues } from '../types';
import type {
  ConstructionPipeline,
  CopyOnInheritStrategy,
  RejectBeforeMutatePolicy
} from '../architecture';
import type { Option } from '../option/option';
import { InvalidOptionKeyError, InvalidOptionValueError } from '../errors';
import { describeValue, describeValues } from '../utils/describe-value';

/**
 * Ordered registry of the options declared on one type.
 *
 * Ownership:
 * A registry belongs to a class, never to an instance. Subtypes receive a
 * {@link Definitions.clone} of their parent's registry and evolve from there
 * without affecting the parent or their siblings
 * (see {@link CopyOnInheritStrategy}).
 *
 * Order:
 * Declaration order is preserved (insertion order of the backing `Map`).
 * Redefining a name replaces the option but keeps its original position.
 */
export class Definitions implements Iterable<Option> {
  private readonly options: Map<OptionName, Option>;

  constructor(options: Iterable<readonly [OptionName, Option]> = []) {
    this.options = new Map(options);
  }

  /**
   * Registers an option under its name. The last definition wins.
   */
  define(option: Option): void {
    this.options.set(option.name, option);
  }

  /**
   * Returns an independent registry holding the same `Option` references.
   */
  clone(): Definitions {
    return new Definitions(this.options);
  }

  get(name: OptionName): Option | undefined {
    return this.options.get(name);
  }

  has(name: OptionName): boolean {
    return this.options.has(name);
  }

  get size(): number {
    return this.options.size;
  }

  names(): OptionName[] {
    return Array.from(this.options.keys());
  }

  [Symbol.iterator](): Iterator<Option> {
    return this.options.values();
  }

  /**
   * Processes a construction mapping for one instance
   * (steps 2-3 of {@link ConstructionPipeline}).
   *
   * Logic:
   * 1. Unknown Keys:
   *    Every own key of `options`, symbols included, must be declared. Runs over the whole input
   *    before anything else, so no default is computed and no reader bound
   *    for a rejected mapping ({@link RejectBeforeMutatePolicy}).
   * 2. Per option, in declaration order:
   *    - Default: fills a missing key with the resolved default.
   *    - Validation: checks the type, then the allowed set, of a present key.
   *      The first failure aborts processing.
   *    - Reader: binds the value (or `undefined` when absent) to the owner.
   *
   * Trace Example:
   * _Options `name` (String, reader) and `admin` (allow [true, false],
   * default false, reader), input `{ name: 'Piotr' }`_
   * - `name`:  present, is a string, no allow list → reader `'Piotr'`.
   * - `admin`: missing → filled with `false` → allowed → reader `false`.
   * - `options` ends as `{ name: 'Piotr', admin: false }`.
   *
   * @param owner - The instance under construction.
   * @param options - Mutable mapping, completed in place.
   * @throws InvalidOptionKeyError for an undeclared key.
   * @throws InvalidOptionValueError for the first invalid value.
   */
  process(owner: object, options: OptionValues): void {
    this.ensureKnownOptions(owner, options);

    for (const [name, option] of this.options) {
      if (option.hasDefault() && !Object.hasOwn(options, name)) {
        options[name] = option.resolveDefault(owner);
      }

      if (Object.hasOwn(options, name)) {
        validateOptionValue(option, options[name]);
      }

      if (option.isReader()) {
        option.assignReaderValue(owner, options[name]);
      }
    }
  }

  private ensureKnownOptions(owner: object, options: OptionValues): void {
    // Symbol keys are never declared names
    for (const key of Reflect.ownKeys(options)) {
      if (typeof key !== 'string' || !this.options.has(key)) {
        throw new InvalidOptionKeyError(String(key), owner.constructor.name);
      }
    }
  }
}

function validateOptionValue(option: Option, value: unknown): void {
  const subject = `"${option.name}":${describeValue(value)}`;

  if (!option.typeMatches(value)) {
    throw new InvalidOptionValueError(
      option.name,
      value,
      'type',
      `${subject} has incorrect type (expected ${option.describeType()})`
    );
  }

  if (!option.isAllowed(value)) {
    throw new InvalidOptionValueError(
      option.name,
      value,
      'allow',
      `${subject} has incorrect value (allowed: ${describeValues(option.allow)})`
    );
  }
}
