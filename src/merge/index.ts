/**
 * Layered parameter merge.
 *
 * Public API exports for the merge module.
 */

export type {
  IParameterMerger,
  MergeOptions,
  MergeResult,
  MergeWarning,
  ParameterProvenance,
  ParameterSource,
  ProvenanceLedger,
  ScopeInfo,
  ScopeValue,
  ScopedMapping,
} from "./types.js";

export type {
  BoolValue,
  FloatValue,
  IntValue,
  MappingValue,
  NullValue,
  PlainValue,
  SequenceValue,
  StringValue,
  StructuredKind,
  StructuredValue,
} from "./value.js";

export {
  INT64_MAX,
  INT64_MIN,
  boolValue,
  cloneValue,
  floatValue,
  fromPlain,
  intValue,
  isLeaf,
  isMapping,
  mappingValue,
  nullValue,
  sequenceValue,
  stringValue,
  toPlain,
  valuesEqual,
} from "./value.js";

export type { ParameterFormat, ParseContentOptions, ParsedContent, RootDegradation } from "./codec.js";
export {
  PARAMETER_FORMATS,
  detectSyntax,
  formatJsonFloat,
  formatYamlFloat,
  isParameterFormat,
  parseParameterContent,
  serializeParameters,
} from "./codec.js";

export { MAX_ALIAS_NODES, documentToValue } from "./document.js";
export type { DocumentReadOptions } from "./document.js";

export { FormatError } from "./errors.js";
export type { SourceSyntax } from "./errors.js";

export { foldMappings, mergeInto } from "./objects.js";
export { childPath, foldWithProvenance } from "./provenance.js";
export type { ProvenanceFoldResult } from "./provenance.js";

export { ParameterMerger, provenanceToValue } from "./merger.js";
