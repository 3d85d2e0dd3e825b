import { describe, expect, test, vi } from 'vitest';

import type { OptionSettings, OptionValues } from '../../types';
import { InvalidOptionKeyError, InvalidOptionValueError } from '../../errors';
import { computed } from '../../option/default-value';
import { Option } from '../../option/option';
import { normalizeSettings } from '../../option/settings';
import { Definitions } from '../definitions';
import { readReaderValue } from '../reader-slots';
import { captureError } from '../../tests/test-utils';

class Widget {}

function option(name: string, settings: OptionSettings = {}): Option {
  return new Option(name, normalizeSettings(settings));
}

function definitionsOf(...options: Option[]): Definitions {
  const definitions = new Definitions();
  for (const entry of options) definitions.define(entry);
  return definitions;
}

describe('Definitions', () => {
  describe('Registry', () => {
    test('names follow declaration order', () => {
      const definitions = definitionsOf(option('name'), option('admin'));

      expect(definitions.names()).toEqual(['name', 'admin']);
      expect(definitions.size).toBe(2);
      expect([...definitions].map(entry => entry.name)).toEqual([
        'name',
        'admin'
      ]);
    });

    test('redefinition wins and keeps the original position', () => {
      const replacement = option('name', { default: 'anonymous' });
      const definitions = definitionsOf(option('name'), option('admin'));

      definitions.define(replacement);

      expect(definitions.names()).toEqual(['name', 'admin']);
      expect(definitions.get('name')).toBe(replacement);
    });

    test('lookups report missing names', () => {
      const definitions = definitionsOf(option('name'));

      expect(definitions.has('name')).toBe(true);
      expect(definitions.has('nickname')).toBe(false);
      expect(definitions.get('nickname')).toBeUndefined();
    });
  });

  describe('clone', () => {
    test('a clone shares options but not the container', () => {
      const name = option('name');
      const source = definitionsOf(name);
      const copy = source.clone();

      copy.define(option('level'));

      expect(source.names()).toEqual(['name']);
      expect(copy.names()).toEqual(['name', 'level']);
      expect(copy.get('name')).toBe(name);
    });

    test('overriding in a clone leaves the source untouched', () => {
      const name = option('name');
      const source = definitionsOf(name);
      const copy = source.clone();

      copy.define(option('name', { default: 'root' }));

      expect(source.get('name')).toBe(name);
      expect(source.get('name')?.hasDefault()).toBe(false);
      expect(copy.get('name')?.hasDefault()).toBe(true);
    });
  });

  describe('process', () => {
    test('fills defaults and binds readers', () => {
      const owner = new Widget();
      const definitions = definitionsOf(
        option('name', { type: String, reader: true }),
        option('admin', { allow: [true, false], reader: true, default: false })
      );
      const options: OptionValues = { name: 'Piotr' };

      definitions.process(owner, options);

      expect(options).toEqual({ name: 'Piotr', admin: false });
      expect(readReaderValue(owner, 'name')).toBe('Piotr');
      expect(readReaderValue(owner, 'admin')).toBe(false);
    });

    test('unknown keys are rejected before defaults are computed', () => {
      const owner = new Widget();
      const resolve = vi.fn(() => 'generated');
      const definitions = definitionsOf(
        option('name', { reader: true }),
        option('token', { default: computed(resolve) })
      );
      const options: OptionValues = { name: 'Piotr', nickname: 'P' };

      const error = captureError(
        () => definitions.process(owner, options),
        InvalidOptionKeyError
      );

      expect(error.message).toBe(
        '[Options] "nickname" is not a valid option for Widget'
      );
      expect(error.optionName).toBe('nickname');
      expect(error.typeName).toBe('Widget');
      expect(resolve).not.toHaveBeenCalled();
      expect(options).toEqual({ name: 'Piotr', nickname: 'P' });
      expect(readReaderValue(owner, 'name')).toBeUndefined();
    });

    test('an unknown key wins over an invalid value', () => {
      const definitions = definitionsOf(option('name', { type: String }));

      expect(() =>
        definitions.process(new Widget(), { name: 42, nickname: 'P' })
      ).toThrow(InvalidOptionKeyError);
    });

    test('type mismatches are reported with the expected type', () => {
      const definitions = definitionsOf(option('name', { type: String }));

      const error = captureError(
        () => definitions.process(new Widget(), { name: 42 }),
        InvalidOptionValueError
      );

      expect(error.message).toBe(
        '[Options] "name":42 has incorrect type (expected String)'
      );
      expect(error.optionName).toBe('name');
      expect(error.value).toBe(42);
      expect(error.reason).toBe('type');
    });

    test('values outside the allowed set are reported', () => {
      const definitions = definitionsOf(
        option('admin', { allow: [true, false], default: false })
      );

      const error = captureError(
        () => definitions.process(new Widget(), { admin: 'yes' }),
        InvalidOptionValueError
      );

      expect(error.message).toBe(
        '[Options] "admin":"yes" has incorrect value (allowed: true, false)'
      );
      expect(error.optionName).toBe('admin');
      expect(error.value).toBe('yes');
      expect(error.reason).toBe('allow');
    });

    test('the type is checked before the allowed set', () => {
      const definitions = definitionsOf(
        option('level', { type: Number, allow: [1, 2] })
      );

      const error = captureError(
        () => definitions.process(new Widget(), { level: 'high' }),
        InvalidOptionValueError
      );

      expect(error.reason).toBe('type');
    });

    test('the first violation in declaration order is reported', () => {
      const definitions = definitionsOf(
        option('name', { type: String }),
        option('level', { type: Number })
      );

      const error = captureError(
        () => definitions.process(new Widget(), { level: 'high', name: 1 }),
        InvalidOptionValueError
      );

      expect(error.optionName).toBe('name');
    });

    test('an explicit undefined is present and validated', () => {
      const definitions = definitionsOf(
        option('admin', { allow: [true, false], default: false })
      );

      const error = captureError(
        () => definitions.process(new Widget(), { admin: undefined }),
        InvalidOptionValueError
      );

      expect(error.message).toBe(
        '[Options] "admin":undefined has incorrect value (allowed: true, false)'
      );
    });

    test('absent options without a default are neither validated nor added', () => {
      const owner = new Widget();
      const definitions = definitionsOf(
        option('name', { type: String, reader: true })
      );
      const options: OptionValues = {};

      definitions.process(owner, options);

      expect(Object.hasOwn(options, 'name')).toBe(false);
      expect(readReaderValue(owner, 'name')).toBeUndefined();
    });

    test('options without a reader are not bound', () => {
      const owner = new Widget();
      const definitions = definitionsOf(option('secret', { default: 'hidden' }));
      const options: OptionValues = {};

      definitions.process(owner, options);

      expect(options).toEqual({ secret: 'hidden' });
      expect(readReaderValue(owner, 'secret')).toBeUndefined();
    });

    test('computed defaults run once, with the owner', () => {
      const owner = new Widget();
      const resolve = vi.fn((target: Widget) => target.constructor.name);
      const definitions = definitionsOf(
        option('label', { default: computed(resolve) })
      );
      const options: OptionValues = {};

      definitions.process(owner, options);

      expect(options).toEqual({ label: 'Widget' });
      expect(resolve).toHaveBeenCalledTimes(1);
      expect(resolve).toHaveBeenCalledWith(owner);
    });

    test('computed defaults are skipped when a value is given', () => {
      const resolve = vi.fn(() => 'generated');
      const definitions = definitionsOf(
        option('label', { default: computed(resolve) })
      );

      definitions.process(new Widget(), { label: 'given' });

      expect(resolve).not.toHaveBeenCalled();
    });

    test('computed defaults see readers of earlier options', () => {
      const owner = new Widget();
      const definitions = definitionsOf(
        option('dataset', { type: String, reader: true }),
        option('alias', {
          type: String,
          default: computed(
            (target: Widget) => `${String(readReaderValue(target, 'dataset'))}_alias`
          )
        })
      );
      const options: OptionValues = { dataset: 'users' };

      definitions.process(owner, options);

      expect(options).toEqual({ dataset: 'users', alias: 'users_alias' });
    });

    test('defaulted values are validated', () => {
      const definitions = definitionsOf(
        option('label', { type: String, default: computed(() => 5) })
      );

      const error = captureError(
        () => definitions.process(new Widget(), {}),
        InvalidOptionValueError
      );

      expect(error.message).toBe(
        '[Options] "label":5 has incorrect type (expected String)'
      );
    });
  });
});
