// src/core/__tests__/decode.test.ts
import { describe, it, expect } from "vitest";
import { decodeOutput } from "../decode.js";

describe("decodeOutput", () => {
  it("decodes a YAML mapping", () => {
    expect(decodeOutput("a: 1\nb: 2")).toEqual({
      kind: "structured",
      value: { a: 1, b: 2 },
    });
  });

  it("decodes JSON as YAML", () => {
    expect(decodeOutput('{"ports": [1, 2], "up": true}')).toEqual({
      kind: "structured",
      value: { ports: [1, 2], up: true },
    });
  });

  it("decodes a bare scalar", () => {
    expect(decodeOutput("hello")).toEqual({ kind: "structured", value: "hello" });
  });

  it("decodes empty text to null", () => {
    expect(decodeOutput("")).toEqual({ kind: "structured", value: null });
  });

  it("keeps the last value of a duplicated key", () => {
    expect(decodeOutput("a: 1\na: 2")).toEqual({
      kind: "structured",
      value: { a: 2 },
    });
  });

  it("falls back to raw text for an unterminated flow sequence", () => {
    expect(decodeOutput("not: [valid yaml")).toEqual({
      kind: "raw",
      text: "not: [valid yaml",
    });
  });

  it("falls back to raw text for multiple documents", () => {
    expect(decodeOutput("a: 1\n---\nb: 2")).toEqual({
      kind: "raw",
      text: "a: 1\n---\nb: 2",
    });
  });

  it("keeps integers beyond double precision exact", () => {
    expect(decodeOutput("octets: 18446744073709551615\nport: 4000\nneg: -9007199254740993")).toEqual({
      kind: "structured",
      value: { octets: "18446744073709551615", port: 4000, neg: "-9007199254740993" },
    });
  });

  it("converts integers inside nested sequences", () => {
    expect(decodeOutput("vlans: [1, 2, {id: 4094}]\nratio: 0.5")).toEqual({
      kind: "structured",
      value: { vlans: [1, 2, { id: 4094 }], ratio: 0.5 },
    });
  });
});
