import type { OptionName } from './types';
import { ERROR_PREFIX } from './constants';

/**
 * Base class of every error raised by the options mechanism.
 *
 * Messages carry the `[Options]` prefix so they can be told apart from errors
 * thrown by user code (for example inside a computed default).
 */
export class OptionsError extends Error {
  constructor(message: string) {
    super(`${ERROR_PREFIX} ${message}`);
    this.name = 'OptionsError';
  }
}

/**
 * Raised when the construction mapping holds a key that is not declared on
 * the type or any of its ancestors.
 *
 * Reported before any default is computed or any value validated.
 */
export class InvalidOptionKeyError extends OptionsError {
  constructor(
    public readonly optionName: string,
    public readonly typeName: string
  ) {
    super(`"${optionName}" is not a valid option for ${typeName}`);
    this.name = 'InvalidOptionKeyError';
  }
}

/**
 * Why a present value was rejected.
 *
 * - `type`:  the value fails the declared type constraint.
 * - `allow`: the value satisfies the type but is outside the allowed set.
 */
export type InvalidValueReason = 'type' | 'allow';

/**
 * Raised for the first option, in declaration order, whose value fails its
 * type constraint or its allowed set.
 */
export class InvalidOptionValueError extends OptionsError {
  constructor(
    public readonly optionName: OptionName,
    public readonly value: unknown,
    public readonly reason: InvalidValueReason,
    detail: string
  ) {
    super(detail);
    this.name = 'InvalidOptionValueError';
  }
}

/**
 * Raised when an option declaration is malformed (unknown setting, invalid
 * `type`, non-array `allow`, ...) or when a declared schema cannot be used
 * synchronously.
 */
export class OptionDefinitionError extends OptionsError {
  constructor(
    public readonly optionName: string,
    detail: string
  ) {
    super(`Invalid option "${optionName}": ${detail}`);
    this.name = 'OptionDefinitionError';
  }
}
