import type { ComputedDefault } from '../types';
import { COMPUTED_DEFAULT } from '../constants';
import { isRecord } from '../utils/type-guards';

/**
 * Declares a default computed from the object under construction.
 *
 * The function runs once per construction, only when the mapping lacks the
 * option. Options declared earlier are already resolved at that point, so
 * their accessors can be read from `owner`.
 *
 * @example
 * ```ts
 * declareOption(Relation, 'alias', {
 *   reader: true,
 *   default: computed((relation: Relation) => `${relation.dataset}_alias`)
 * });
 * ```
 *
 * @template TOwner - The instance type the default is computed from.
 * @param resolve - Receives the owner as its sole argument.
 */
export function computed<TOwner extends object>(
  resolve: (owner: TOwner) => unknown
): ComputedDefault<TOwner> {
  return Object.freeze({
    [COMPUTED_DEFAULT]: true as const,
    resolve(owner: TOwner) {
      return resolve(owner);
    }
  });
}

/**
 * Type guard for {@link ComputedDefault}.
 */
export function isComputedDefault(value: unknown): value is ComputedDefault {
  return (
    isRecord(value) &&
    COMPUTED_DEFAULT in value &&
    value[COMPUTED_DEFAULT] === true
  );
}
