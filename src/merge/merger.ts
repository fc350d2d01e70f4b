/**
 * Parameter merger: parse, fold, serialize.
 */

import { mergeErrors } from "../strings/index.js";
import { parseParameterContent, serializeParameters, type ParsedContent } from "./codec.js";
import { FormatError } from "./errors.js";
import { foldMappings } from "./objects.js";
import { foldWithProvenance } from "./provenance.js";
import type {
  IParameterMerger,
  MergeOptions,
  MergeResult,
  ParameterSource,
  ProvenanceLedger,
  ScopeValue,
  ScopedMapping,
} from "./types.js";
import {
  floatValue,
  intValue,
  mappingValue,
  sequenceValue,
  stringValue,
  type MappingValue,
  type StructuredValue,
} from "./value.js";

/**
 * Deep merge for objects, replace for everything else.
 *
 * Holds no state; one instance can serve any number of concurrent callers.
 */
export class ParameterMerger implements IParameterMerger {
  /**
   * Merge parameter file contents in the order given (first = lowest
   * precedence). The order is trusted as is; nothing is sorted.
   *
   * @throws FormatError naming the index of the first malformed source
   */
  merge(contents: Iterable<string>, options: MergeOptions = {}): string {
    const values = Array.from(contents, (content, index) =>
      parseSource(content, index, undefined, options),
    );

    return serializeParameters(foldMappings(values), options.outputFormat ?? "yaml");
  }

  /**
   * Merge scoped parameter files with provenance tracking.
   *
   * Sources are sorted by ascending precedence before folding; sources with
   * equal precedence keep their input order.
   *
   * @throws FormatError naming the scope and input index of a malformed source
   */
  mergeWithProvenance(
    sources: Iterable<ParameterSource>,
    options: MergeOptions = {},
  ): MergeResult {
    const ordered = Array.from(sources, (source, index) => ({ source, index })).sort(
      (a, b) => a.source.precedence - b.source.precedence,
    );

    const scoped: ScopedMapping[] = ordered.map(({ source, index }) => ({
      scopeName: source.scopeName,
      precedence: source.precedence,
      value: parseSource(source.content, index, source.scopeName, options),
    }));

    const { merged, provenance } = foldWithProvenance(scoped);

    return {
      mergedContent: serializeParameters(merged, options.outputFormat ?? "yaml"),
      provenance,
    };
  }
}

function parseSource(
  content: string,
  sourceIndex: number,
  scopeName: string | undefined,
  options: MergeOptions,
): MappingValue {
  let parsed: ParsedContent;
  try {
    parsed = parseParameterContent(content, { strictRoot: options.strictRoot });
  } catch (err) {
    if (err instanceof FormatError) {
      throw err.withSource(sourceIndex, scopeName);
    }
    throw err;
  }

  if (parsed.degraded) {
    options.onWarning?.({
      code: parsed.degraded,
      sourceIndex,
      scopeName,
      message: mergeErrors.degradedRoot(sourceIndex, scopeName),
    });
  }

  return parsed.value;
}

/**
 * Boundary form of a ledger, ready for `serializeParameters`:
 * `{ <path>: { scopeName, precedence, value, overriddenValues? } }`.
 */
export function provenanceToValue(provenance: ProvenanceLedger): MappingValue {
  return mappingValue(
    Array.from(provenance, ([path, record]): [string, StructuredValue] => {
      const entry = scopeValueToValue(record);
      if (record.overriddenValues) {
        entry.entries.set(
          "overriddenValues",
          sequenceValue(record.overriddenValues.map((overridden) => scopeValueToValue(overridden))),
        );
      }
      return [path, entry];
    }),
  );
}

function scopeValueToValue(scopeValue: ScopeValue): MappingValue {
  return mappingValue([
    ["scopeName", stringValue(scopeValue.scopeName)],
    [
      "precedence",
      Number.isInteger(scopeValue.precedence)
        ? intValue(scopeValue.precedence)
        : floatValue(scopeValue.precedence),
    ],
    ["value", scopeValue.value],
  ]);
}
