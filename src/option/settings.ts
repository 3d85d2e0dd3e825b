import type { NormalizedSettings, OptionSettings } from '../types';
import { Undefined } from '../constants';
import { OptionDefinitionError } from '../errors';
import { isBoolean, isRecord, isString } from '../utils/type-guards';
import { isTypeConstraint } from './type-matcher';

/**
 * The recognised keys of {@link OptionSettings}.
 */
const SETTING_KEYS = new Set<string>(['type', 'allow', 'default', 'reader']);

/**
 * Option names that cannot be declared.
 *
 * - `constructor` would replace the class reference on the prototype when a
 *   reader is generated.
 * - `__proto__` assigned on the resolved mapping replaces its prototype
 *   instead of adding a key.
 */
const RESERVED_NAMES = new Set<string>(['constructor', '__proto__']);

function describeKind(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

/**
 * Validates the runtime integrity of an option declaration.
 *
 * Declarations are usually typed, but settings objects can also be built
 * dynamically (spread from shared presets, loaded from plain data), so the
 * structural contract is enforced here rather than trusted.
 *
 * Checks:
 * 1. The name is a non-empty string and not reserved.
 * 2. The settings are an object with no unrecognised keys.
 * 3. `type` is a constructor, a Standard Schema or a `predicate(...)`.
 * 4. `allow` is an array.
 * 5. `reader` is a boolean.
 *
 * @param name - The option name as passed to the declaration.
 * @param settings - The raw settings object.
 * @returns The validated settings object.
 * @throws OptionDefinitionError on the first violated check.
 */
export function validateSettings(
  name: unknown,
  settings: unknown
): OptionSettings {
  if (!isString(name) || name.length === 0) {
    throw new OptionDefinitionError(
      String(name),
      'the name must be a non-empty string.'
    );
  }

  if (RESERVED_NAMES.has(name)) {
    throw new OptionDefinitionError(name, 'the name is reserved.');
  }

  if (!isRecord(settings) || Array.isArray(settings)) {
    throw new OptionDefinitionError(
      name,
      `expected a settings object, got ${describeKind(settings)}.`
    );
  }

  const unknownKeys = Object.keys(settings).filter(
    key => !SETTING_KEYS.has(key)
  );
  if (unknownKeys.length > 0) {
    throw new OptionDefinitionError(
      name,
      `unknown setting(s) ${unknownKeys.map(key => `'${key}'`).join(', ')}. ` +
        `Expected any of: 'type', 'allow', 'default', 'reader'.`
    );
  }

  const { type, allow, reader } = settings;

  if (type !== undefined && !isTypeConstraint(type)) {
    throw new OptionDefinitionError(
      name,
      "'type' must be a constructor, a Standard Schema or a predicate(...)."
    );
  }

  if (allow !== undefined && !Array.isArray(allow)) {
    throw new OptionDefinitionError(name, "'allow' must be an array.");
  }

  if (reader !== undefined && !isBoolean(reader)) {
    throw new OptionDefinitionError(name, "'reader' must be a boolean.");
  }

  return {
    type,
    allow,
    reader,
    ...('default' in settings ? { default: settings.default } : {})
  };
}

/**
 * Fills unspecified settings with their defaults.
 *
 * A missing `default` key becomes the `Undefined` sentinel; a `default` key
 * explicitly set to `undefined` is kept as a real default value.
 *
 * @param settings - Validated settings.
 * @returns Settings where every key is defined.
 */
export function normalizeSettings(
  settings: OptionSettings
): NormalizedSettings {
  return {
    type: settings.type,
    allow: settings.allow ?? [],
    default: 'default' in settings ? settings.default : Undefined,
    reader: settings.reader ?? false
  };
}
