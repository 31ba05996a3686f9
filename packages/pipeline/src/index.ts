export { Pipeline } from './pipeline.js';
export type {
  AmountOptions,
  CallableFilter,
  ColumnFactory,
  ColumnValue,
  CompiledFilter,
  FilterOptions,
  OrderColumnsOptions,
  OrderedMapping,
  Pattern,
  PatternMapping,
  RuleKind,
  RuleOptions,
  StripOptions,
  SubstituteValue,
  ValueRuleOptions,
} from './types.js';
export {
  BurnishError,
  ConfigurationError,
  MissingColumnError,
  RuleKindConflictError,
  SerializationError,
  SheetNotFoundError,
  TemplateFieldError,
  UnknownRuleError,
  UnsupportedFormatError,
  getErrorMessage,
} from './errors.js';
export { allowed, compileFilter, isAllowed } from './filters/filter-predicate.js';
export {
  RuleRegistry,
  type RecordRuleRegistration,
  type RuleRegistration,
  type ValueRuleRegistration,
} from './registry/rule-registry.js';
export { isRuleName, ruleKindOf, ruleNames, type RuleName } from './rules/rule-table.js';
export { computeUid } from './identity/uid.js';
export { createNormalizer, normalizeRecord, projectHeader, type RecordNormalizer } from './normalizer.js';
export {
  defaultOutputName,
  mapWithConcurrency,
  type ApplyAllOptions,
  type ApplyOptions,
  type OutputNameGenerator,
} from './runner.js';
export { pipelineEnvelopeSchema, type PipelineEnvelope, type SerializedRule } from './serialization/envelope.js';
