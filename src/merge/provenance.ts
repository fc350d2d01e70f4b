/**
 * Provenance-tracking variant of the mapping fold.
 *
 * While folding, keeps a ledger keyed by the dot-joined path of each leaf
 * (scalar, null or sequence) recording which scope set it last and which
 * recorded values it replaced. The first source is the baseline and is never
 * recorded.
 */

import {
  cloneValue,
  isMapping,
  mappingValue,
  type MappingValue,
  type StructuredValue,
} from "./value.js";
import type {
  ParameterProvenance,
  ProvenanceLedger,
  ScopeInfo,
  ScopeValue,
  ScopedMapping,
} from "./types.js";

export interface ProvenanceFoldResult {
  merged: MappingValue;
  provenance: ProvenanceLedger;
}

/**
 * Fold scoped mappings and record where every non-baseline leaf came from.
 *
 * Sources must already be in ascending precedence; ties are taken in list
 * order.
 */
export function foldWithProvenance(sources: readonly ScopedMapping[]): ProvenanceFoldResult {
  const provenance: ProvenanceLedger = new Map();
  const [baseline, ...rest] = sources;
  const merged = baseline ? cloneValue(baseline.value) : mappingValue();

  for (const source of rest) {
    mergeIntoWithProvenance(merged, source.value, source, "", provenance);
  }

  return { merged, provenance };
}

/**
 * Ledger key for `key` under `parentPath`. Keys containing "." are not
 * escaped.
 */
export function childPath(parentPath: string, key: string): string {
  return parentPath ? `${parentPath}.${key}` : key;
}

function mergeIntoWithProvenance(
  target: MappingValue,
  source: MappingValue,
  scope: ScopeInfo,
  parentPath: string,
  provenance: ProvenanceLedger,
): void {
  for (const [key, sourceVal] of source.entries) {
    const path = childPath(parentPath, key);
    const targetVal = target.entries.get(key);

    if (targetVal === undefined) {
      const inserted = cloneValue(sourceVal);
      target.entries.set(key, inserted);
      recordLeaves(inserted, scope, path, provenance);
      continue;
    }

    if (isMapping(targetVal) && isMapping(sourceVal)) {
      mergeIntoWithProvenance(targetVal, sourceVal, scope, path, provenance);
      continue;
    }

    const replacement = cloneValue(sourceVal);
    target.entries.set(key, replacement);

    if (isMapping(targetVal)) {
      dropDescendants(path, provenance);
    }

    if (isMapping(replacement)) {
      // Only leaves are recorded; the mapping's own leaves start fresh
      provenance.delete(path);
      recordLeaves(replacement, scope, path, provenance);
      continue;
    }

    const overriddenValues = overriddenBy(provenance.get(path));
    const record: ParameterProvenance = {
      scopeName: scope.scopeName,
      precedence: scope.precedence,
      value: cloneValue(replacement),
    };
    if (overriddenValues.length > 0) {
      record.overriddenValues = overriddenValues;
    }
    provenance.set(path, record);
  }
}

/**
 * History carried forward when `existing` is replaced: the existing record
 * first, then everything it had replaced itself.
 */
function overriddenBy(existing: ParameterProvenance | undefined): ScopeValue[] {
  if (!existing) return [];
  return [
    {
      scopeName: existing.scopeName,
      precedence: existing.precedence,
      value: existing.value,
    },
    ...(existing.overriddenValues ?? []),
  ];
}

function recordLeaves(
  value: StructuredValue,
  scope: ScopeInfo,
  path: string,
  provenance: ProvenanceLedger,
): void {
  if (isMapping(value)) {
    for (const [key, child] of value.entries) {
      recordLeaves(child, scope, childPath(path, key), provenance);
    }
    return;
  }

  provenance.set(path, {
    scopeName: scope.scopeName,
    precedence: scope.precedence,
    value: cloneValue(value),
  });
}

function dropDescendants(path: string, provenance: ProvenanceLedger): void {
  const prefix = `${path}.`;
  for (const key of provenance.keys()) {
    if (key.startsWith(prefix)) {
      provenance.delete(key);
    }
  }
}
