import { describe, expect, it } from "vitest";
import { cleanAndParseJson, cleanJsonText, formatJson } from "@/lib/json/clean-json";

describe("cleanJsonText", () => {
  it("removes trailing commas before closing brackets", () => {
    expect(cleanJsonText('{\n  "a": [1, 2,],\n}\n')).toBe('{\n  "a": [1, 2]}\n');
  });

  it("removes separator lines", () => {
    expect(cleanJsonText("[1,\n==\n2]")).toBe("[1,\n2]");
  });
});

describe("cleanAndParseJson", () => {
  it("parses cleaned text", () => {
    const result = cleanAndParseJson('[{"topic": "Math",},]');

    expect(result).toEqual({ ok: true, cleaned: '[{"topic": "Math"}]', value: [{ topic: "Math" }] });
  });

  it("reports text that is still invalid", () => {
    const result = cleanAndParseJson('{"a": }');

    expect(result.ok).toBe(false);
    expect(result.cleaned).toBe('{"a": }');
  });
});

describe("formatJson", () => {
  it("pretty prints with a trailing newline", () => {
    expect(formatJson({ a: 1 })).toBe('{\n  "a": 1\n}\n');
  });
});
