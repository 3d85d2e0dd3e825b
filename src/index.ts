export { Configurable, initializeOptions } from './configurable';
export {
  declareOption,
  definitionsFor,
  onSubtypeDerived,
  optionNames
} from './registry';
export { Definitions } from './definitions/definitions';
export { Option } from './option/option';
export { computed, isComputedDefault } from './option/default-value';
export {
  createTypeMatcher,
  describeTypeConstraint,
  predicate
} from './option/type-matcher';
export { normalizeSettings, validateSettings } from './option/settings';
export { describeValue, describeValues } from './utils/describe-value';
export { Undefined } from './constants';
export type { NoDefault } from './constants';
export {
  InvalidOptionKeyError,
  InvalidOptionValueError,
  OptionDefinitionError,
  OptionsError
} from './errors';
export type { InvalidValueReason } from './errors';
export type * from './types';
