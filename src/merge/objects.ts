/**
 * Mapping fold for layered parameters.
 *
 * Later mappings override earlier ones key by key: nested mappings are merged
 * recursively, everything else (scalars, nulls, sequences, mismatched kinds)
 * is replaced wholesale.
 */

import { cloneValue, isMapping, mappingValue, type MappingValue } from "./value.js";

/**
 * Fold mappings left to right, lowest precedence first.
 *
 * The result is a fresh tree; none of the inputs is modified.
 *
 * Strategy, for every key of each later mapping:
 * 1. Key absent from the result → insert a copy of the source value
 * 2. Both values are mappings → merge them by the same rule
 * 3. Anything else → the source value replaces the current one
 *
 * @param values Mappings in ascending precedence
 * @returns The merged mapping (empty when `values` is empty)
 */
export function foldMappings(values: readonly MappingValue[]): MappingValue {
  const [first, ...rest] = values;
  const merged = first ? cloneValue(first) : mappingValue();

  for (const value of rest) {
    mergeInto(merged, value);
  }

  return merged;
}

/**
 * Merge `source` into `target` in place. `source` is only read.
 */
export function mergeInto(target: MappingValue, source: MappingValue): void {
  for (const [key, sourceVal] of source.entries) {
    const targetVal = target.entries.get(key);

    if (isMapping(targetVal) && isMapping(sourceVal)) {
      mergeInto(targetVal, sourceVal);
      continue;
    }

    // Covers both insertion and replacement; sequences are never combined
    target.entries.set(key, cloneValue(sourceVal));
  }
}
