/**
 * Reading and writing parameter documents.
 *
 * Sources are YAML or JSON; a source whose trimmed text starts with `{` is
 * read as JSON, anything else as YAML. Both go through the yaml library with
 * integers read as bigint, which is what keeps `int` and `float` apart.
 */

import * as YAML from "yaml";
import type {
  CreateNodeOptions,
  ParseOptions,
  ScalarTag,
  SchemaOptions,
  ToStringOptions,
} from "yaml";
import { mergeErrors } from "../strings/index.js";
import { FormatError, type SourceSyntax } from "./errors.js";
import { documentToValue, type DocumentReadOptions } from "./document.js";
import {
  isMapping,
  mappingValue,
  type MappingValue,
  type StructuredValue,
} from "./value.js";

export type ParameterFormat = "yaml" | "json";

export const PARAMETER_FORMATS: readonly ParameterFormat[] = ["yaml", "json"];

export function isParameterFormat(value: string): value is ParameterFormat {
  return PARAMETER_FORMATS.some((format) => format === value);
}

/**
 * Why a source contributed nothing even though it parsed.
 */
export type RootDegradation = "non-mapping-root";

export interface ParseContentOptions {
  /** Reject documents whose root is not a mapping instead of reading them as empty */
  strictRoot?: boolean;
}

export interface ParsedContent {
  value: MappingValue;
  syntax: SourceSyntax;
  degraded?: RootDegradation;
}

// Duplicate keys are checked on their source text while converting:
// `1.1` and `1.10` are distinct keys, `'a'` and `a` are the same key.
const YAML_READ_OPTIONS = Object.freeze({
  intAsBigInt: true,
  uniqueKeys: false,
} satisfies ParseOptions & SchemaOptions);

const JSON_READ_OPTIONS = Object.freeze({
  schema: "json",
  intAsBigInt: true,
  uniqueKeys: false,
} satisfies ParseOptions & SchemaOptions);

/**
 * Output-only float tag. Integral floats get a `.0` so they read back as
 * floats; the never-matching test keeps it out of plain scalar resolution.
 */
const floatOutputTag: ScalarTag = {
  tag: "tag:yaml.org,2002:float",
  default: true,
  identify: (value) => typeof value === "number",
  test: /^(?!)/,
  resolve: (source) => Number(source),
  stringify: (item) =>
    typeof item.value === "number" ? formatYamlFloat(item.value) : String(item.value),
};

const YAML_WRITE_OPTIONS = Object.freeze({
  indent: 2,
  lineWidth: 0,
  sortMapEntries: false,
  aliasDuplicateObjects: false,
  customTags: (tags) => [floatOutputTag, ...tags],
} satisfies ToStringOptions & SchemaOptions & CreateNodeOptions);

const JSON_INDENT = "  ";

/**
 * Which reader a source goes through.
 */
export function detectSyntax(content: string): SourceSyntax {
  return content.trim().startsWith("{") ? "json" : "yaml";
}

/**
 * Parse one parameter source into a mapping.
 *
 * Blank text and a null document are empty mappings. A root that is not a
 * mapping is read as an empty mapping and flagged through `degraded`, unless
 * `strictRoot` is set.
 *
 * @throws FormatError on malformed syntax
 */
export function parseParameterContent(
  content: string,
  options: ParseContentOptions = {},
): ParsedContent {
  const text = content.trim();
  const syntax = detectSyntax(text);

  if (text.length === 0) {
    return { value: mappingValue(), syntax };
  }

  const value = syntax === "json" ? readJson(text) : readYaml(text);
  if (value.kind === "null") {
    return { value: mappingValue(), syntax };
  }

  if (isMapping(value)) {
    return { value, syntax };
  }

  if (options.strictRoot) {
    throw new FormatError(mergeErrors.nonMappingRoot(value.kind), syntax);
  }

  return { value: mappingValue(), syntax, degraded: "non-mapping-root" };
}

function readJson(text: string): StructuredValue {
  try {
    JSON.parse(text);
  } catch (err) {
    throw new FormatError(
      mergeErrors.invalidJson(err instanceof Error ? err.message : String(err)),
      "json",
      undefined,
      undefined,
      { cause: err },
    );
  }
  // Second read for number fidelity: JSON.parse cannot tell 1 from 1.0.
  // Like JSON.parse, the last of duplicate keys wins.
  return readDocument(text, JSON_READ_OPTIONS, "json", { uniqueKeys: false });
}

function readYaml(text: string): StructuredValue {
  return readDocument(text, YAML_READ_OPTIONS, "yaml", { uniqueKeys: true });
}

function readDocument(
  text: string,
  options: ParseOptions & SchemaOptions,
  syntax: SourceSyntax,
  readOptions: DocumentReadOptions,
): StructuredValue {
  const describe = syntax === "json" ? mergeErrors.invalidJson : mergeErrors.invalidYaml;
  const doc = YAML.parseDocument(text, options);
  const [first] = doc.errors;
  if (first) {
    throw new FormatError(describe(first.message), syntax, undefined, undefined, {
      cause: first,
    });
  }

  try {
    return documentToValue(doc, readOptions);
  } catch (err) {
    if (err instanceof FormatError) throw err;
    throw new FormatError(
      describe(err instanceof Error ? err.message : String(err)),
      syntax,
      undefined,
      undefined,
      { cause: err },
    );
  }
}

/**
 * Serialize a structured value as YAML or pretty-printed JSON.
 */
export function serializeParameters(
  value: StructuredValue,
  format: ParameterFormat = "yaml",
): string {
  return format === "json" ? toJson(value) : toYaml(value);
}

function toYaml(value: StructuredValue): string {
  return YAML.stringify(toYamlInput(value), YAML_WRITE_OPTIONS);
}

/**
 * Shape the yaml library turns into nodes: Map for mappings, bigint for ints,
 * number for floats.
 */
function toYamlInput(value: StructuredValue): unknown {
  switch (value.kind) {
    case "null":
      return null;
    case "bool":
    case "int":
    case "float":
    case "string":
      return value.value;
    case "sequence":
      return value.items.map((item) => toYamlInput(item));
    case "mapping":
      return new Map(
        Array.from(value.entries, ([key, child]): [string, unknown] => [key, toYamlInput(child)]),
      );
  }
}

function toJson(value: StructuredValue, depth = 0): string {
  switch (value.kind) {
    case "null":
      return "null";
    case "bool":
      return value.value ? "true" : "false";
    case "int":
      return value.value.toString();
    case "float":
      return formatJsonFloat(value.value);
    case "string":
      return JSON.stringify(value.value);
    case "sequence": {
      if (value.items.length === 0) return "[]";
      const inner = JSON_INDENT.repeat(depth + 1);
      const items = value.items.map((item) => inner + toJson(item, depth + 1));
      return `[\n${items.join(",\n")}\n${JSON_INDENT.repeat(depth)}]`;
    }
    case "mapping": {
      if (value.entries.size === 0) return "{}";
      const inner = JSON_INDENT.repeat(depth + 1);
      const members = Array.from(
        value.entries,
        ([key, child]) => `${inner}${JSON.stringify(key)}: ${toJson(child, depth + 1)}`,
      );
      return `{\n${members.join(",\n")}\n${JSON_INDENT.repeat(depth)}}`;
    }
  }
}

function withFraction(text: string): string {
  return /[.eE]/.test(text) ? text : `${text}.0`;
}

export function formatJsonFloat(value: number): string {
  // JSON has no spelling for NaN or the infinities
  if (!Number.isFinite(value)) return "null";
  // String(-0) is "0"
  if (Object.is(value, -0)) return "-0.0";
  return withFraction(String(value));
}

export function formatYamlFloat(value: number): string {
  if (Number.isNaN(value)) return ".nan";
  if (value === Infinity) return ".inf";
  if (value === -Infinity) return "-.inf";
  if (Object.is(value, -0)) return "-0.0";
  return withFraction(String(value));
}
