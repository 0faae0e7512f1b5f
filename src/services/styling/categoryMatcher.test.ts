import { describe, expect, it, vi } from "vitest";
import { bestMatch, scoreCandidates, scoreItem } from "./categoryMatcher.js";
import { mathRandom, seededRandom, type RandomSource } from "./random.js";
import { makeItem } from "../../test/fixtures.js";

const first: RandomSource = { nextInt: () => 0 };
const last: RandomSource = { nextInt: (max) => max - 1 };

const desired = new Set(["Formal", "Business", "Work"]);
const a = makeItem("a", "top", ["Formal"]);
const b = makeItem("b", "top", ["Formal", "Business"]);
const c = makeItem("c", "top", ["Business", "Work"]);
const d = makeItem("d", "top", ["Casual"]);

describe("scoreItem", () => {
  it("counts overlapping tags once each", () => {
    expect(scoreItem(b, desired)).toBe(2);
    expect(scoreItem(makeItem("x", "top", ["Formal", "Formal"]), desired)).toBe(1);
    expect(scoreItem(d, desired)).toBe(0);
  });
});

describe("scoreCandidates", () => {
  it("collects every candidate tied at the top score", () => {
    const { maxScore, tied } = scoreCandidates([a, b, c, d], desired);

    expect(maxScore).toBe(2);
    expect(tied).toEqual([b, c]);
  });

  it("ties everything when nothing overlaps", () => {
    expect(scoreCandidates([a, d], new Set(["Beach"]))).toEqual({ maxScore: 0, tied: [a, d] });
  });
});

describe("bestMatch", () => {
  it("returns null with no candidates", () => {
    expect(bestMatch([], desired, first)).toBeNull();
  });

  it("breaks ties at random among the best scorers only", () => {
    const random = { nextInt: vi.fn((max: number) => max - 1) };

    expect(bestMatch([a, b, c, d], desired, random)).toBe(c);
    expect(random.nextInt).toHaveBeenCalledWith(2);
    expect(bestMatch([a, b, c, d], desired, first)).toBe(b);
  });

  it("picks from every candidate when no tags are wanted", () => {
    expect(bestMatch([a, b, c], new Set(), last)).toBe(c);
  });

  it("picks from every candidate when nothing scores", () => {
    expect(bestMatch([a, d], new Set(["Beach"]), last)).toBe(d);
  });

  it("is reproducible with a seeded source", () => {
    const pool = [a, b, c, d];
    const loose = new Set(["Formal"]);

    expect(bestMatch(pool, loose, seededRandom(42))).toBe(bestMatch(pool, loose, seededRandom(42)));
  });

  it("eventually returns each tied item", () => {
    const seen = new Set<string>();
    for (let i = 0; i < 200; i++) {
      const match = bestMatch([a, b, c, d], desired, mathRandom);
      if (match) seen.add(match.id);
    }

    expect(seen).toEqual(new Set(["b", "c"]));
  });
});
