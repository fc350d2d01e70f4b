/**
 * Types for layered parameter merging.
 *
 * A merge takes parameter files from several scopes (Default, Region,
 * Environment, Node, ...) and folds them lowest precedence first. The
 * provenance variant also reports which scope supplied each leaf value.
 */

import type { ParameterFormat } from "./codec.js";
import type { MappingValue, StructuredValue } from "./value.js";

/**
 * Options for merge operations
 */
export interface MergeOptions {
  /** Output format of the merged content (default: yaml) */
  outputFormat?: ParameterFormat;
  /**
   * Accepted for compatibility with existing callers. Has no effect: output
   * is identical with or without it.
   */
  includeComments?: boolean;
  /** Fail with FormatError when a source's root is not a mapping */
  strictRoot?: boolean;
  /** Called for every source that parsed but contributed nothing */
  onWarning?: (warning: MergeWarning) => void;
}

/**
 * A source that was read leniently
 */
export interface MergeWarning {
  code: "non-mapping-root";
  /** Position in the caller's input list */
  sourceIndex: number;
  /** Scope of the source (provenance merges only) */
  scopeName?: string;
  message: string;
}

/**
 * Scope attribution shared by sources and ledger entries
 */
export interface ScopeInfo {
  /** Free-form scope label, e.g. "Production" or "Environment/Production" */
  scopeName: string;
  /** Rank used to order scopes; higher wins */
  precedence: number;
}

/**
 * A parameter file with its source information
 */
export interface ParameterSource extends ScopeInfo {
  /** Raw YAML or JSON text */
  content: string;
}

/**
 * A parsed parameter file with its source information
 */
export interface ScopedMapping extends ScopeInfo {
  value: MappingValue;
}

/**
 * A value as supplied by one scope
 */
export interface ScopeValue extends ScopeInfo {
  value: StructuredValue;
}

/**
 * Where a merged leaf value came from
 */
export interface ParameterProvenance extends ScopeValue {
  /**
   * Recorded values this one replaced, most recent first. Absent when the
   * value replaced nothing or only the baseline.
   */
  overriddenValues?: ScopeValue[];
}

/**
 * Provenance records keyed by dot-joined leaf path (e.g. "server.host")
 */
export type ProvenanceLedger = Map<string, ParameterProvenance>;

/**
 * Result of a merge with provenance tracking
 */
export interface MergeResult {
  /** The merged parameters in the requested output format */
  mergedContent: string;
  provenance: ProvenanceLedger;
}

/**
 * Merges parameter files across scopes.
 */
export interface IParameterMerger {
  /**
   * Merge parameter file contents given in precedence order (first = lowest).
   */
  merge(contents: Iterable<string>, options?: MergeOptions): string;

  /**
   * Merge scoped parameter files, ordering them by precedence first, and
   * report the provenance of every overriding leaf.
   */
  mergeWithProvenance(sources: Iterable<ParameterSource>, options?: MergeOptions): MergeResult;
}
