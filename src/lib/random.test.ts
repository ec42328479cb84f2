import { describe, expect, it } from "vitest";
import { createRandom, createSeededRandom, randomIndex, sample, shuffle } from "@/lib/random";

function draw(random: () => number, count: number) {
  return Array.from({ length: count }, () => random());
}

describe("createSeededRandom", () => {
  it("repeats the same sequence for the same seed", () => {
    expect(draw(createSeededRandom(42), 5)).toEqual(draw(createSeededRandom(42), 5));
  });

  it("produces different sequences for different seeds", () => {
    expect(draw(createSeededRandom(1), 5)).not.toEqual(draw(createSeededRandom(2), 5));
  });

  it("stays within [0, 1)", () => {
    const values = draw(createSeededRandom(7), 200);
    expect(values.every((value) => value >= 0 && value < 1)).toBe(true);
  });
});

describe("createRandom", () => {
  it("uses the seed when one is given", () => {
    expect(draw(createRandom(9), 3)).toEqual(draw(createSeededRandom(9), 3));
  });

  it("falls back to a random seed", () => {
    const value = createRandom()();
    expect(value).toBeGreaterThanOrEqual(0);
    expect(value).toBeLessThan(1);
  });
});

describe("randomIndex", () => {
  it("clamps to the last index", () => {
    expect(randomIndex(() => 1, 3)).toBe(2);
    expect(randomIndex(() => 0, 3)).toBe(0);
  });
});

describe("shuffle", () => {
  it("returns a permutation without mutating the input", () => {
    const input = ["a", "b", "c", "d", "e"];
    const result = shuffle(input, createSeededRandom(3));

    expect(input).toEqual(["a", "b", "c", "d", "e"]);
    expect([...result].sort()).toEqual(input);
  });

  it("follows the injected source", () => {
    expect(shuffle([1, 2, 3], () => 0)).toEqual([2, 3, 1]);
  });
});

describe("sample", () => {
  it("picks distinct items from the input", () => {
    const result = sample(["a", "b", "c", "d", "e"], 3, createSeededRandom(5));

    expect(result).toHaveLength(3);
    expect(new Set(result).size).toBe(3);
    expect(result.every((item) => ["a", "b", "c", "d", "e"].includes(item))).toBe(true);
  });

  it("returns everything when asked for more than available", () => {
    expect(sample(["a", "b"], 5, () => 0)).toEqual(["a", "b"]);
  });

  it("returns nothing for a zero count", () => {
    expect(sample(["a", "b"], 0, () => 0)).toEqual([]);
  });
});
