import { describe, expect, it } from "vitest";
import { parseQuestionCount, parseSeed, parseTopic } from "@/lib/quiz/validation";

describe("quiz validation", () => {
  it("defaults the question count", () => {
    expect(parseQuestionCount(undefined)).toBe(10);
    expect(parseQuestionCount("  ")).toBe(10);
  });

  it("enforces question count bounds", () => {
    expect(parseQuestionCount("5")).toBe(5);
    expect(parseQuestionCount(["3", "4"])).toBe(3);
    expect(() => parseQuestionCount("0")).toThrow(
      "Question count must be between 1 and 50.",
    );
    expect(() => parseQuestionCount("51")).toThrow();
    expect(() => parseQuestionCount("2.5")).toThrow("Question count must be an integer.");
  });

  it("parses an optional seed", () => {
    expect(parseSeed(undefined)).toBeNull();
    expect(parseSeed("42")).toBe(42);
    expect(() => parseSeed("abc")).toThrow("Seed must be an integer.");
  });

  it("trims the topic", () => {
    expect(parseTopic([" Math "])).toBe("Math");
    expect(parseTopic(null)).toBe("");
  });
});
