/**
 * Tests for the mapping fold
 */

import { describe, expect, it } from "vitest";
import { parseParameterContent } from "../src/merge/codec.js";
import { foldMappings, mergeInto } from "../src/merge/objects.js";
import { toPlain, type MappingValue } from "../src/merge/value.js";

function doc(text: string): MappingValue {
  return parseParameterContent(text).value;
}

describe("foldMappings", () => {
  it("returns an empty mapping for no inputs", () => {
    expect(toPlain(foldMappings([]))).toEqual({});
  });

  it("returns a copy of a single input", () => {
    const only = doc("a: 1");
    const merged = foldMappings([only]);

    expect(merged).not.toBe(only);
    expect(toPlain(merged)).toEqual({ a: 1 });
  });

  describe("mappings", () => {
    it("unions keys at every nesting level", () => {
      const merged = foldMappings([
        doc("config:\n  keep: original\n  replace: old\ntop: 1"),
        doc("config:\n  replace: new\n  add: additional\nother: 2"),
      ]);

      expect(toPlain(merged)).toEqual({
        config: { keep: "original", replace: "new", add: "additional" },
        top: 1,
        other: 2,
      });
    });

    it("keeps first-seen key order and appends new keys", () => {
      const merged = foldMappings([doc("b: 1\na: 2"), doc("c: 3\nb: 4")]);

      expect(Array.from(merged.entries.keys())).toEqual(["b", "a", "c"]);
    });
  });

  describe("replacement", () => {
    it("replaces sequences instead of combining them", () => {
      const merged = foldMappings([
        doc("servers:\n  - server1\n  - server2"),
        doc("servers:\n  - server3"),
      ]);

      expect(toPlain(merged)).toEqual({ servers: ["server3"] });
    });

    it("replaces a mapping with a scalar and a scalar with a mapping", () => {
      const merged = foldMappings([
        doc("a:\n  x: 1\nb: plain"),
        doc("a: flat\nb:\n  y: 2"),
      ]);

      expect(toPlain(merged)).toEqual({ a: "flat", b: { y: 2 } });
    });

    it("lets a later null replace a value", () => {
      const merged = foldMappings([doc("a: 1"), doc("a: null")]);

      expect(toPlain(merged)).toEqual({ a: null });
    });

    it("depends on input order for overlapping keys", () => {
      const first = doc("a: 1");
      const second = doc("a: 2");

      expect(toPlain(foldMappings([first, second]))).toEqual({ a: 2 });
      expect(toPlain(foldMappings([second, first]))).toEqual({ a: 1 });
    });
  });

  it("does not modify its inputs", () => {
    const base = doc("config:\n  keep: original\nlist: [1]");
    const override = doc("config:\n  add: new\nlist: [2]");

    const merged = foldMappings([base, override]);
    mergeInto(merged, doc("config:\n  more: true"));

    expect(toPlain(base)).toEqual({ config: { keep: "original" }, list: [1] });
    expect(toPlain(override)).toEqual({ config: { add: "new" }, list: [2] });
  });
});
