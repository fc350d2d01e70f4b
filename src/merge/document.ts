/**
 * Structured values from a parsed yaml document.
 *
 * Walks the document's nodes instead of its JavaScript form so that mapping
 * keys keep the text they were written with: `1.10`, `0x1F` and `~` stay
 * those strings rather than becoming `1.1`, `31` and `null`.
 */

import { isAlias, isMap, isPair, isScalar, isSeq, type Alias, type Document, type Pair } from "yaml";
import { mergeErrors } from "../strings/index.js";
import {
  fromPlain,
  mappingValue,
  nullValue,
  sequenceValue,
  type MappingValue,
  type StructuredValue,
} from "./value.js";

/** Upper bound on the nodes produced by expanding aliases in one document */
export const MAX_ALIAS_NODES = 100_000;

const SET_TAG = "tag:yaml.org,2002:set";
const OMAP_TAG = "tag:yaml.org,2002:omap";

export interface DocumentReadOptions {
  /** Reject two keys with the same text in one mapping; otherwise the last one wins */
  uniqueKeys: boolean;
}

interface WalkState extends DocumentReadOptions {
  doc: Document;
  /** Alias targets currently being expanded */
  expanding: Set<unknown>;
  resolved: Map<Alias, unknown>;
  aliasDepth: number;
  aliasNodes: number;
}

/**
 * Convert the contents of a parsed document.
 *
 * `!!set` becomes a sequence of its members and `!!omap` a mapping.
 * `!!binary` becomes its base64 text and `!!timestamp` an ISO 8601 string.
 *
 * @throws Error for unresolved or self-referencing aliases, alias expansion
 * beyond MAX_ALIAS_NODES, non-scalar keys and (with `uniqueKeys`) duplicate keys
 */
export function documentToValue(doc: Document, options: DocumentReadOptions): StructuredValue {
  return toValue(doc.contents, {
    uniqueKeys: options.uniqueKeys,
    doc,
    expanding: new Set(),
    resolved: new Map(),
    aliasDepth: 0,
    aliasNodes: 0,
  });
}

function toValue(node: unknown, state: WalkState): StructuredValue {
  if (state.aliasDepth > 0) {
    state.aliasNodes += 1;
    if (state.aliasNodes > MAX_ALIAS_NODES) {
      throw new Error(mergeErrors.excessiveAliases(MAX_ALIAS_NODES));
    }
  }

  if (isAlias(node)) {
    return expandAlias(node, state);
  }
  if (isScalar(node)) {
    return fromPlain(node.value);
  }
  if (isMap(node)) {
    if (node.tag === SET_TAG) {
      return sequenceValue(node.items.map((pair) => toValue(pair.key, state)));
    }
    return pairsToMapping(node.items, state);
  }
  if (isSeq(node)) {
    if (node.tag === OMAP_TAG) {
      return pairsToMapping(
        node.items.filter((item): item is Pair => isPair(item)),
        state,
      );
    }
    // !!pairs: one single-entry mapping per pair
    return sequenceValue(
      node.items.map((item) => (isPair(item) ? pairsToMapping([item], state) : toValue(item, state))),
    );
  }
  return nullValue();
}

function resolveAlias(alias: Alias, state: WalkState): unknown {
  // Alias.resolve walks the whole document
  const cached = state.resolved.get(alias);
  if (cached !== undefined) return cached;

  const target = alias.resolve(state.doc);
  if (target === undefined) {
    throw new Error(mergeErrors.unresolvedAlias(alias.source));
  }
  state.resolved.set(alias, target);
  return target;
}

function expandAlias(alias: Alias, state: WalkState): StructuredValue {
  const target = resolveAlias(alias, state);
  if (state.expanding.has(target)) {
    throw new Error(mergeErrors.recursiveAlias(alias.source));
  }

  state.expanding.add(target);
  state.aliasDepth += 1;
  try {
    return toValue(target, state);
  } finally {
    state.expanding.delete(target);
    state.aliasDepth -= 1;
  }
}

function pairsToMapping(pairs: readonly Pair[], state: WalkState): MappingValue {
  const mapping = mappingValue();
  for (const pair of pairs) {
    const key = keyText(pair.key, state);
    if (state.uniqueKeys && mapping.entries.has(key)) {
      throw new Error(mergeErrors.duplicateKey(key));
    }
    mapping.entries.set(key, toValue(pair.value, state));
  }
  return mapping;
}

/**
 * Key as written. Scalars carry their source text; an empty key is "".
 */
function keyText(key: unknown, state: WalkState): string {
  if (isAlias(key)) {
    return keyText(resolveAlias(key, state), state);
  }
  if (isScalar(key)) {
    if (key.source !== undefined) return key.source;
    return key.value === null || key.value === undefined ? "" : String(key.value);
  }
  if (key === null || key === undefined) {
    return "";
  }
  throw new Error(mergeErrors.complexKey);
}
