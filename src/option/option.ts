import type {
  NormalizedSettings,
  OptionName,
  TypeConstraint,
  TypeMatcher
} from '../types';
import { Undefined } from '../constants';
import { assignReaderValue } from '../definitions/reader-slots';
import { isComputedDefault } from './default-value';
import { createTypeMatcher, describeTypeConstraint } from './type-matcher';

/**
 * Immutable description of one named construction option.
 *
 * Holds the expected type, the allowed value set, the default and whether a
 * reader is exposed. Querying an option has no side effects; the only write
 * it performs is {@link Option.assignReaderValue}, which targets the owner.
 */
export class Option {
  readonly name: OptionName;
  readonly type: TypeConstraint | undefined;
  readonly allow: readonly unknown[];
  readonly default: unknown;
  readonly reader: boolean;

  private readonly matchesType: TypeMatcher;

  constructor(name: OptionName, settings: NormalizedSettings) {
    this.name = name;
    this.type = settings.type;
    this.allow = Object.freeze([...settings.allow]);
    this.default = settings.default;
    this.reader = settings.reader;
    this.matchesType = createTypeMatcher(settings.type, name);

    Object.freeze(this);
  }

  isReader(): boolean {
    return this.reader;
  }

  /**
   * `true` iff a default was declared, including falsy defaults such as
   * `false`, `null` or `undefined`.
   */
  hasDefault(): boolean {
    return this.default !== Undefined;
  }

  /**
   * Resolves the default for the object under construction.
   *
   * Computed defaults are invoked with `owner`; static defaults are returned
   * as-is (the same reference for every instance).
   */
  resolveDefault(owner: object): unknown {
    return isComputedDefault(this.default)
      ? this.default.resolve(owner)
      : this.default;
  }

  typeMatches(value: unknown): boolean {
    return this.matchesType(value);
  }

  /**
   * `true` iff the allowed set is empty or contains `value` (SameValueZero).
   */
  isAllowed(value: unknown): boolean {
    return this.allow.length === 0 || this.allow.includes(value);
  }

  assignReaderValue(owner: object, value: unknown): void {
    assignReaderValue(owner, this.name, value);
  }

  /**
   * Human-readable form of the type constraint, for error messages.
   */
  describeType(): string {
    return describeTypeConstraint(this.type);
  }
}
