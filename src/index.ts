export { loadOne, loadAll, loadAllIter, Loader } from './load';
export type { LoadOptions } from './load';
export { loadStream } from './stream';
export { dump, dumpAll, dumpTo } from './emitter';
export type { DumpOptions, EmitSink, FlowStyle } from './emitter';
export { Scanner, tokenize } from './scanner';
export type { Token, TokenType, ScannerOptions } from './scanner';
export { Parser, parseEvents } from './parser';
export type { ParseOptions } from './parser';
export { Composer } from './composer';
export type { ComposeOptions, DuplicateKeyPolicy, AliasMode, AliasDepthMode } from './composer';
export {
  ResourceTracker,
  resolveLimits,
  DEFAULT_LIMITS,
  STRICT_LIMITS,
  PERMISSIVE_LIMITS,
  UNLIMITED_LIMITS,
  LIMIT_PRESETS,
} from './limits';
export type { Limits, LimitsPreset, ResourceStats, ResourceTrackerOptions } from './limits';
export {
  YamlError,
  ScanError,
  ParseError,
  MaxDepthError,
  ComposeError,
  EmitError,
  isLimitError,
} from './errors';
export type { ComposeErrorKind, WarningCode, YamlWarning, WarningHandler } from './errors';
export { TagRegistry, resolveTagUri, shortenTag } from './tags';
export type { TagDefinition, TagContext, LoaderType, NodeKind } from './tags';
export { CORE_PROFILE, JSON_PROFILE, FAILSAFE_PROFILE, getSchema, resolvePlainScalar } from './schemas';
export type { SchemaName, SchemaProfile } from './schemas';
export {
  nullValue,
  boolValue,
  intValue,
  floatValue,
  stringValue,
  sequenceValue,
  mappingValue,
  isCollection,
  mappingGet,
  valuesEqual,
  cloneValue,
  toJS,
  fromJS,
} from './value';
export type {
  Value,
  ValueType,
  ScalarValue,
  CollectionValue,
  NullValue,
  BoolValue,
  IntValue,
  FloatValue,
  StringValue,
  SequenceValue,
  MappingValue,
  MappingEntry,
  JSValue,
} from './value';
export type { Event, EventType, ScalarStyle } from './events';
export { formatErrorContext } from './position';
export type { Position } from './position';
export { visitValue } from './visitor';
export type { ValueVisitor, VisitContext } from './visitor';

// Injected at build time by tsup's `define` option from package.json.
declare const __YAMLGUARD_VERSION__: string | undefined;
export const version: string =
  typeof __YAMLGUARD_VERSION__ !== 'undefined'
    ? __YAMLGUARD_VERSION__
    : '0.0.0-dev';
