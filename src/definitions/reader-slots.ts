import type { OptionName } from '../types';

/**
 * Per-instance storage backing generated readers.
 *
 * Keyed weakly by owner, so slots live exactly as long as the instance.
 * Kept outside the instance so that readers stay read-only: the only writer
 * is option processing during construction.
 */
const slots = new WeakMap<object, Map<OptionName, unknown>>();

/**
 * Binds a resolved value into the owner's slot for `name`.
 */
export function assignReaderValue(
  owner: object,
  name: OptionName,
  value: unknown
): void {
  let values = slots.get(owner);
  if (!values) {
    values = new Map();
    slots.set(owner, values);
  }
  values.set(name, value);
}

/**
 * Reads the owner's slot for `name`.
 *
 * @returns The bound value, or `undefined` when nothing was bound.
 */
export function readReaderValue(owner: object, name: OptionName): unknown {
  return slots.get(owner)?.get(name);
}
