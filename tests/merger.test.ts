/**
 * Tests for ParameterMerger
 */

import { describe, expect, it } from "vitest";
import { FormatError } from "../src/merge/errors.js";
import { ParameterMerger, provenanceToValue } from "../src/merge/merger.js";
import { serializeParameters } from "../src/merge/codec.js";
import type { MergeWarning } from "../src/merge/types.js";
import { stringValue } from "../src/merge/value.js";

const merger = new ParameterMerger();

function catchFormatError(fn: () => unknown): FormatError {
  try {
    fn();
  } catch (err) {
    if (err instanceof FormatError) return err;
    throw err;
  }
  throw new Error("expected a FormatError");
}

describe("ParameterMerger.merge", () => {
  it("overrides scalars and keeps untouched keys", () => {
    const result = merger.merge([
      "server: localhost\nport: 8080\ndatabase: dev",
      "server: production.example.com\ndatabase: production",
    ]);

    expect(result).toBe("server: production.example.com\nport: 8080\ndatabase: production\n");
  });

  it("writes JSON with integers kept as integers", () => {
    const result = merger.merge(["server: localhost\nport: 8080"], { outputFormat: "json" });

    expect(result).toBe('{\n  "server": "localhost",\n  "port": 8080\n}');
    expect(JSON.parse(result)).toEqual({ server: "localhost", port: 8080 });
  });

  it("deep merges nested mappings", () => {
    const result = merger.merge([
      "config:\n  keep: original\n  replace: old",
      "config:\n  replace: new\n  add: additional",
    ]);

    expect(result).toBe("config:\n  keep: original\n  replace: new\n  add: additional\n");
  });

  it("replaces sequences wholesale", () => {
    const result = merger.merge(["servers:\n  - server1\n  - server2", "servers:\n  - server3"]);

    expect(result).toBe("servers:\n  - server3\n");
  });

  it("mixes JSON and YAML sources", () => {
    const result = merger.merge(['{"a": {"b": 1, "c": 2.5}}', "a:\n  b: 3"]);

    expect(result).toBe("a:\n  b: 3\n  c: 2.5\n");
  });

  it("returns an empty mapping for no sources or blank sources", () => {
    expect(merger.merge([])).toBe("{}\n");
    expect(merger.merge(["", "   "], { outputFormat: "json" })).toBe("{}");
  });

  it("produces the same output with or without includeComments", () => {
    const sources = ["# base\na: 1 # inline", "b: 2"];

    expect(merger.merge(sources, { includeComments: true })).toBe(merger.merge(sources));
  });

  it("accepts any iterable", () => {
    function* sources(): Generator<string> {
      yield "a: 1";
      yield "a: 2";
    }

    expect(merger.merge(sources())).toBe("a: 2\n");
  });

  describe("non-mapping roots", () => {
    it("ignores the source and reports a warning", () => {
      const warnings: MergeWarning[] = [];
      const result = merger.merge(["a: 1", "- x\n- y", "b: 2"], {
        onWarning: (warning) => warnings.push(warning),
      });

      expect(result).toBe("a: 1\nb: 2\n");
      expect(warnings).toEqual([
        {
          code: "non-mapping-root",
          sourceIndex: 1,
          scopeName: undefined,
          message: "Source 1 is not a mapping; it contributes no parameters",
        },
      ]);
    });

    it("fails under strictRoot", () => {
      const err = catchFormatError(() => merger.merge(["a: 1", "plain"], { strictRoot: true }));

      expect(err.sourceIndex).toBe(1);
      expect(err.message).toBe(
        "source 1: Parameter document root must be a mapping, found string",
      );
    });
  });

  it("names the index of a malformed source", () => {
    const err = catchFormatError(() => merger.merge(["a: 1", "b: 2", '{"c": '], {}));

    expect(err.sourceIndex).toBe(2);
    expect(err.scopeName).toBeUndefined();
    expect(err.syntax).toBe("json");
    expect(err.message.startsWith("source 2: Invalid JSON parameters")).toBe(true);
  });
});

describe("ParameterMerger with aliases and written keys", () => {
  it("names the index of a source with an unresolved alias", () => {
    const err = catchFormatError(() => merger.merge(["a: 1", "b: *missing"]));

    expect(err.sourceIndex).toBe(1);
    expect(err.syntax).toBe("yaml");
    expect(err.message).toBe("source 1: Invalid YAML parameters: Unresolved alias *missing");
  });

  it("names the scope of a source whose aliases expand without bound", () => {
    const tenOf = (item: string) => `[${Array.from({ length: 10 }, () => item).join(", ")}]`;
    const bomb = [
      `a: &a ${tenOf("x")}`,
      `b: &b ${tenOf("*a")}`,
      `c: &c ${tenOf("*b")}`,
      `d: &d ${tenOf("*c")}`,
      `e: ${tenOf("*d")}`,
    ].join("\n");

    const err = catchFormatError(() =>
      merger.mergeWithProvenance([
        { content: "a: 1", scopeName: "Default", precedence: 0 },
        { content: bomb, scopeName: "Node", precedence: 100 },
      ]),
    );

    expect(err.sourceIndex).toBe(1);
    expect(err.scopeName).toBe("Node");
    expect(err.message.endsWith("Aliases expand to more than 100000 nodes")).toBe(true);
  });

  it("merges a numeric-looking key with its quoted spelling", () => {
    const result = merger.merge(["1.10: b\n1.1: keep", "'1.10': c"], { outputFormat: "json" });

    expect(result).toBe('{\n  "1.10": "c",\n  "1.1": "keep"\n}');
  });
});

describe("ParameterMerger.mergeWithProvenance", () => {
  it("reports the scope of each overriding leaf", () => {
    const result = merger.mergeWithProvenance([
      { scopeName: "Global", precedence: 1, content: "server:\n  host: localhost\n  port: 8080" },
      { scopeName: "Production", precedence: 2, content: "server:\n  host: prod.example.com" },
    ]);

    expect(result.mergedContent).toBe("server:\n  host: prod.example.com\n  port: 8080\n");
    expect(result.provenance.get("server.host")).toEqual({
      scopeName: "Production",
      precedence: 2,
      value: stringValue("prod.example.com"),
    });
    expect(result.provenance.has("server.port")).toBe(false);
  });

  it("keeps only the recorded part of the override history", () => {
    const result = merger.mergeWithProvenance([
      { scopeName: "Global", precedence: 1, content: "value: a" },
      { scopeName: "Environment", precedence: 2, content: "value: b" },
      { scopeName: "Node", precedence: 3, content: "value: c" },
    ]);

    const record = result.provenance.get("value");
    expect(record?.scopeName).toBe("Node");
    expect(record?.overriddenValues?.map((entry) => entry.scopeName)).toEqual(["Environment"]);
  });

  it("sorts sources by precedence, keeping input order on ties", () => {
    const result = merger.mergeWithProvenance([
      { scopeName: "Node", precedence: 3, content: "value: node" },
      { scopeName: "Global", precedence: 1, content: "value: global\nname: g" },
      { scopeName: "RegionA", precedence: 2, content: "name: a" },
      { scopeName: "RegionB", precedence: 2, content: "name: b" },
    ]);

    expect(result.mergedContent).toBe("value: node\nname: b\n");
    expect(result.provenance.get("name")).toEqual({
      scopeName: "RegionB",
      precedence: 2,
      value: stringValue("b"),
      overriddenValues: [{ scopeName: "RegionA", precedence: 2, value: stringValue("a") }],
    });
  });

  it("has an empty ledger for a single source", () => {
    const result = merger.mergeWithProvenance([
      { scopeName: "Global", precedence: 1, content: "a: 1" },
    ]);

    expect(result.provenance.size).toBe(0);
  });

  it("names the scope and input index of a malformed source", () => {
    const err = catchFormatError(() =>
      merger.mergeWithProvenance([
        { scopeName: "Node", precedence: 3, content: "a: [1" },
        { scopeName: "Global", precedence: 1, content: "a: 1" },
      ]),
    );

    expect(err.sourceIndex).toBe(0);
    expect(err.scopeName).toBe("Node");
    expect(err.message.startsWith("Node (source 0): Invalid YAML parameters")).toBe(true);
  });

  it("reports degraded sources with their scope", () => {
    const warnings: MergeWarning[] = [];
    merger.mergeWithProvenance(
      [
        { scopeName: "Global", precedence: 1, content: "a: 1" },
        { scopeName: "Broken", precedence: 2, content: "42" },
      ],
      { onWarning: (warning) => warnings.push(warning) },
    );

    expect(warnings.map((warning) => warning.message)).toEqual([
      "Broken (source 1) is not a mapping; it contributes no parameters",
    ]);
  });
});

describe("provenanceToValue", () => {
  it("serializes records as scopeName, precedence, value, overriddenValues", () => {
    const { provenance } = merger.mergeWithProvenance([
      { scopeName: "Global", precedence: 1, content: "x: 0" },
      { scopeName: "Environment", precedence: 2, content: "port: 80" },
      { scopeName: "Node", precedence: 3, content: "port: 8080" },
    ]);

    expect(serializeParameters(provenanceToValue(provenance), "json")).toBe(
      [
        "{",
        '  "port": {',
        '    "scopeName": "Node",',
        '    "precedence": 3,',
        '    "value": 8080,',
        '    "overriddenValues": [',
        "      {",
        '        "scopeName": "Environment",',
        '        "precedence": 2,',
        '        "value": 80',
        "      }",
        "    ]",
        "  }",
        "}",
      ].join("\n"),
    );
  });
});
