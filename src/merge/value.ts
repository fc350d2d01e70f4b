/**
 * Structured values for parameter documents.
 *
 * Every parsed parameter file becomes a tree of these. Integers and floats are
 * kept apart so that a value read as `8080` is written back as `8080` and a
 * value read as `1.0` is written back as `1.0`.
 */

export type StructuredValue =
  | NullValue
  | BoolValue
  | IntValue
  | FloatValue
  | StringValue
  | SequenceValue
  | MappingValue;

export interface NullValue {
  kind: "null";
}

export interface BoolValue {
  kind: "bool";
  value: boolean;
}

/** Integral number in the signed 64-bit range */
export interface IntValue {
  kind: "int";
  value: bigint;
}

export interface FloatValue {
  kind: "float";
  value: number;
}

export interface StringValue {
  kind: "string";
  value: string;
}

export interface SequenceValue {
  kind: "sequence";
  items: StructuredValue[];
}

/** String-keyed collection; insertion order is kept for output only */
export interface MappingValue {
  kind: "mapping";
  entries: Map<string, StructuredValue>;
}

export type StructuredKind = StructuredValue["kind"];

/**
 * Plain JavaScript view of a structured value.
 */
export type PlainValue =
  | null
  | boolean
  | number
  | bigint
  | string
  | PlainValue[]
  | { [key: string]: PlainValue };

export const INT64_MIN = -(2n ** 63n);
export const INT64_MAX = 2n ** 63n - 1n;

export const nullValue = (): NullValue => ({ kind: "null" });
export const boolValue = (value: boolean): BoolValue => ({ kind: "bool", value });
export const stringValue = (value: string): StringValue => ({ kind: "string", value });
export const floatValue = (value: number): FloatValue => ({ kind: "float", value });

/**
 * Integer constructor. Integers outside the 64-bit range become floats.
 */
export function intValue(value: bigint | number): IntValue | FloatValue {
  const big = typeof value === "bigint" ? value : BigInt(value);
  if (big < INT64_MIN || big > INT64_MAX) {
    return { kind: "float", value: Number(big) };
  }
  return { kind: "int", value: big };
}

export function sequenceValue(items: StructuredValue[] = []): SequenceValue {
  return { kind: "sequence", items };
}

export function mappingValue(
  entries: Iterable<[string, StructuredValue]> = [],
): MappingValue {
  return { kind: "mapping", entries: new Map(entries) };
}

export function isMapping(value: StructuredValue | undefined): value is MappingValue {
  return value?.kind === "mapping";
}

/**
 * Leaves are everything provenance is tracked for: scalars, nulls and sequences.
 */
export function isLeaf(value: StructuredValue): boolean {
  return value.kind !== "mapping";
}

/**
 * Deep copy. Leaves are immutable records, but sequences and mappings are
 * rebuilt so the copy shares no container with the original.
 */
export function cloneValue<T extends StructuredValue>(value: T): T;
export function cloneValue(value: StructuredValue): StructuredValue {
  switch (value.kind) {
    case "sequence":
      return sequenceValue(value.items.map((item) => cloneValue(item)));
    case "mapping":
      return mappingValue(
        Array.from(value.entries, ([key, child]) => [key, cloneValue(child)]),
      );
    default:
      return { ...value };
  }
}

/**
 * Structural equality. Mapping key order is ignored, sequence order is not.
 */
export function valuesEqual(a: StructuredValue, b: StructuredValue): boolean {
  switch (a.kind) {
    case "null":
      return b.kind === "null";
    case "bool":
      return b.kind === "bool" && b.value === a.value;
    case "int":
      return b.kind === "int" && b.value === a.value;
    case "string":
      return b.kind === "string" && b.value === a.value;
    case "float":
      return b.kind === "float" && Object.is(a.value, b.value);
    case "sequence":
      return (
        b.kind === "sequence" &&
        a.items.length === b.items.length &&
        a.items.every((item, idx) => valuesEqual(item, b.items[idx]))
      );
    case "mapping": {
      if (b.kind !== "mapping" || a.entries.size !== b.entries.size) return false;
      for (const [key, child] of a.entries) {
        const other = b.entries.get(key);
        if (other === undefined || !valuesEqual(child, other)) return false;
      }
      return true;
    }
  }
}

/**
 * Convert the output of a YAML/JSON reader into a structured value.
 *
 * bigint → int, number → float, so readers must be configured to return
 * integers as bigint for the distinction to survive. Sets become sequences,
 * dates ISO 8601 strings and byte arrays base64 strings.
 */
export function fromPlain(value: unknown): StructuredValue {
  if (value === null || value === undefined) return nullValue();

  switch (typeof value) {
    case "boolean":
      return boolValue(value);
    case "bigint":
      return intValue(value);
    case "number":
      return floatValue(value);
    case "string":
      return stringValue(value);
    default:
      break;
  }

  if (Array.isArray(value)) {
    return sequenceValue(value.map((item) => fromPlain(item)));
  }

  if (value instanceof Map) {
    return mappingValue(
      Array.from(value, ([key, child]): [string, StructuredValue] => [
        String(key),
        fromPlain(child),
      ]),
    );
  }

  if (value instanceof Set) {
    return sequenceValue(Array.from(value, (item) => fromPlain(item)));
  }

  if (value instanceof Date) {
    return stringValue(value.toISOString());
  }

  // !!binary
  if (value instanceof Uint8Array) {
    return stringValue(Buffer.from(value).toString("base64"));
  }

  if (typeof value === "object") {
    return mappingValue(
      Object.entries(value).map(([key, child]): [string, StructuredValue] => [
        key,
        fromPlain(child),
      ]),
    );
  }

  return stringValue(String(value));
}

/**
 * Plain JavaScript view. Ints become numbers when they are safe integers and
 * stay bigint otherwise; the int/float distinction is lost for integral floats.
 */
export function toPlain(value: StructuredValue): PlainValue {
  switch (value.kind) {
    case "null":
      return null;
    case "bool":
    case "float":
    case "string":
      return value.value;
    case "int":
      return value.value >= BigInt(Number.MIN_SAFE_INTEGER) &&
        value.value <= BigInt(Number.MAX_SAFE_INTEGER)
        ? Number(value.value)
        : value.value;
    case "sequence":
      return value.items.map((item) => toPlain(item));
    case "mapping": {
      const result: { [key: string]: PlainValue } = {};
      for (const [key, child] of value.entries) {
        Object.defineProperty(result, key, {
          value: toPlain(child),
          enumerable: true,
          writable: true,
          configurable: true,
        });
      }
      return result;
    }
  }
}
