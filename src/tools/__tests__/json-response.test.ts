import { describe, expect, it } from "vitest";
import { extractJsonObject } from "../json-response";

describe("extractJsonObject", () => {
  it("parses a bare JSON object", () => {
    expect(extractJsonObject('{"overall_rating": 7}')).toEqual({ overall_rating: 7 });
  });

  it("parses a fenced json block", () => {
    const text = 'Here you go:\n```json\n{"lighting": "soft"}\n```\nThanks.';
    expect(extractJsonObject(text)).toEqual({ lighting: "soft" });
  });

  it("falls back to the outermost braces", () => {
    const text = 'Analysis: {"a": {"b": 1}} end';
    expect(extractJsonObject(text)).toEqual({ a: { b: 1 } });
  });

  it("returns null for arrays, scalars and prose", () => {
    expect(extractJsonObject("[1, 2]")).toBeNull();
    expect(extractJsonObject("42")).toBeNull();
    expect(extractJsonObject("The framing is balanced.")).toBeNull();
    expect(extractJsonObject("{not json}")).toBeNull();
  });
});
