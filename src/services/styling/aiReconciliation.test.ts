import { describe, expect, it } from "vitest";
import { reconcileSuggestion } from "./aiReconciliation.js";
import type { AISuggestion } from "./types.js";
import { interviewWardrobe, makeItem } from "../../test/fixtures.js";

function suggestion(selectedItemIds: string[]): AISuggestion {
  return { selectedItemIds, reasoning: "Sharp and simple.", styleTip: null, matchScore: null };
}

const coat = makeItem("coat-1", "outerwear", ["Outerwear"]);
const watch = makeItem("watch-1", "accessory");
const spareTop = makeItem("top-2", "top");

describe("reconcileSuggestion", () => {
  const wardrobe = [...interviewWardrobe(), coat, watch, spareTop];

  it("places each selected item in its slot", () => {
    const outfit = reconcileSuggestion(suggestion(["top-1", "bottom-1", "shoes-1", "coat-1"]), wardrobe);

    expect(outfit.top).toBe(wardrobe[0]);
    expect(outfit.bottom).toBe(wardrobe[1]);
    expect(outfit.shoes).toBe(wardrobe[2]);
    expect(outfit.outerwear).toBe(coat);
    expect(outfit.matchedKeywords).toEqual([]);
    expect(outfit.isValid).toBe(true);
  });

  it("keeps the first id per category", () => {
    const outfit = reconcileSuggestion(suggestion(["top-2", "top-1"]), wardrobe);

    expect(outfit.top).toBe(spareTop);
    expect(outfit.items).toEqual([spareTop]);
  });

  it("drops accessories and unknown ids", () => {
    const outfit = reconcileSuggestion(suggestion(["watch-1", "deleted-item", "shoes-1"]), wardrobe);

    expect(outfit.items.map((item) => item.id)).toEqual(["shoes-1"]);
  });

  it("is invalid when only outerwear survives", () => {
    const outfit = reconcileSuggestion(suggestion(["coat-1", "ghost"]), wardrobe);

    expect(outfit.outerwear).toBe(coat);
    expect(outfit.isValid).toBe(false);
  });

  it("returns an empty outfit for an empty selection", () => {
    const outfit = reconcileSuggestion(suggestion([]), wardrobe);

    expect(outfit.items).toEqual([]);
    expect(outfit.isValid).toBe(false);
  });
});
