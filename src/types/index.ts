export type {
  Guard,
  OptionInput,
  OptionName,
  OptionType,
  OptionValues
} from './primitives';
export type {
  ConstructorConstraint,
  TypeConstraint,
  TypeMatcher,
  TypePredicate
} from './constraints';
export type {
  ComputedDefault,
  NormalizedSettings,
  OptionSettings
} from './settings';
